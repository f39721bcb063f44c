import { promises as fs } from "node:fs";
import type { OperationDescriptor } from "@softcenter/shared";
import { createLogger, type Logger } from "./logger.js";
import { resolveExecutablePath, runSpawnProcess, type SpawnFn } from "./processRunner.js";
import type { ToolProber } from "./toolProbe.js";

export type PrivilegeErrorCode =
  | "authorization_denied"
  | "authorization_timeout"
  | "no_privilege_mechanism"
  | "cancelled";

export class PrivilegeError extends Error {
  constructor(
    readonly code: PrivilegeErrorCode,
    message: string
  ) {
    super(message);
    this.name = "PrivilegeError";
  }
}

export type AuthorizationHandle =
  | { mode: "none" }
  | { mode: "pkexec"; grantedAt: string }
  | { mode: "terminal"; grantedAt: string; terminal: TerminalLauncher };

export type AuthorizeOptions = {
  signal?: AbortSignal;
};

export interface PrivilegeAuthorizer {
  authorize(descriptor: OperationDescriptor, options?: AuthorizeOptions): Promise<AuthorizationHandle>;
}

export type PolkitOutcome = "granted" | "denied" | "no_agent" | "timeout" | "cancelled";

export interface PolkitAgent {
  check(options: { signal?: AbortSignal; timeoutMs: number }): Promise<PolkitOutcome>;
}

export type TerminalCommand = {
  command: string;
  args: string[];
};

export interface TerminalLauncher {
  readonly id: string;
  wrap(script: string): TerminalCommand;
}

export interface TerminalLocator {
  find(): Promise<TerminalLauncher | undefined>;
}

/** How a single command is lifted to root once an operation holds a handle. */
export type ElevationStyle = "prefix" | "helper" | "never";

export type ElevatedCommand = {
  command: string;
  args: string[];
  statusFile?: string;
  // prefix that lifts `kill` to root for children the daemon's user cannot signal
  killPrefix?: string[];
};

export const POLKIT_EXEC_ACTION = "org.freedesktop.policykit.exec";

const NO_ELEVATION: AuthorizationHandle = { mode: "none" };

export type PrivilegeBrokerOptions = {
  prober: ToolProber;
  polkit?: PolkitAgent;
  terminals?: TerminalLocator;
  authorizationTimeoutMs?: number;
  spawn?: SpawnFn;
  logger?: Logger;
};

export class PrivilegeBroker implements PrivilegeAuthorizer {
  private readonly prober: ToolProber;
  private readonly polkit: PolkitAgent;
  private readonly terminals: TerminalLocator;
  private readonly authorizationTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: PrivilegeBrokerOptions) {
    const spawnFn = options.spawn ?? runSpawnProcess;
    this.prober = options.prober;
    this.polkit = options.polkit ?? new PkcheckAgent({ spawn: spawnFn });
    this.terminals = options.terminals ?? new TerminalCatalog({ spawn: spawnFn });
    this.authorizationTimeoutMs = options.authorizationTimeoutMs ?? 120_000;
    this.logger = options.logger ?? createLogger("privilege-broker");
  }

  async authorize(
    descriptor: OperationDescriptor,
    options: AuthorizeOptions = {}
  ): Promise<AuthorizationHandle> {
    if (!descriptor.requiresPrivilege) {
      return NO_ELEVATION;
    }
    throwIfAborted(options.signal);

    const tools = await this.prober.probeAll(["pkexec", "pkcheck", "sudo"]);
    if (tools.pkexec?.installed && tools.pkcheck?.installed) {
      const outcome = await this.polkit.check({
        signal: options.signal,
        timeoutMs: this.authorizationTimeoutMs
      });
      this.logger.debug({ kind: descriptor.kind, source: descriptor.source, outcome }, "polkit check finished");
      switch (outcome) {
        case "granted":
          return { mode: "pkexec", grantedAt: new Date().toISOString() };
        case "denied":
          throw new PrivilegeError("authorization_denied", "administrator authentication was refused");
        case "timeout":
          throw new PrivilegeError(
            "authorization_timeout",
            `no authentication answer within ${this.authorizationTimeoutMs}ms`
          );
        case "cancelled":
          throw new PrivilegeError("cancelled", "authorization cancelled");
        case "no_agent":
          break;
      }
    }
    throwIfAborted(options.signal);

    if (tools.sudo?.installed) {
      const terminal = await this.terminals.find();
      if (terminal) {
        this.logger.info({ terminal: terminal.id }, "no polkit agent, elevating through terminal sudo");
        return { mode: "terminal", grantedAt: new Date().toISOString(), terminal };
      }
    }
    throw new PrivilegeError(
      "no_privilege_mechanism",
      "neither a polkit agent nor a terminal emulator with sudo is available"
    );
  }
}

export type PkcheckAgentOptions = {
  spawn?: SpawnFn;
  pid?: number;
};

/** Asks the session's polkit agent for the pkexec action before any command runs. */
export class PkcheckAgent implements PolkitAgent {
  private readonly spawnFn: SpawnFn;
  private readonly pid: number;

  constructor(options: PkcheckAgentOptions = {}) {
    this.spawnFn = options.spawn ?? runSpawnProcess;
    this.pid = options.pid ?? process.pid;
  }

  async check(options: { signal?: AbortSignal; timeoutMs: number }): Promise<PolkitOutcome> {
    const result = await this.spawnFn(
      "pkcheck",
      ["--action-id", POLKIT_EXEC_ACTION, "--process", String(this.pid), "--allow-user-interaction"],
      {
        signal: options.signal,
        timeoutMs: options.timeoutMs,
        gracePeriodMs: 1_000,
        maxTailLines: 20
      }
    );
    if (result.cancelled) {
      return "cancelled";
    }
    if (result.timedOut) {
      return "timeout";
    }
    if (result.code === 0) {
      return "granted";
    }
    // 2: the action needs interaction but no agent is registered for this session
    if (result.code === 2 || result.errorCode) {
      return "no_agent";
    }
    return "denied";
  }
}

export type TerminalSpec = {
  id: string;
  executable: string;
  prefixArgs: string[];
};

export const TERMINAL_SPECS: readonly TerminalSpec[] = [
  { id: "gnome-terminal", executable: "gnome-terminal", prefixArgs: ["--wait", "--"] },
  { id: "konsole", executable: "konsole", prefixArgs: ["--nofork", "-e"] },
  { id: "xfce4-terminal", executable: "xfce4-terminal", prefixArgs: ["--disable-server", "-x"] },
  { id: "alacritty", executable: "alacritty", prefixArgs: ["-e"] },
  { id: "kitty", executable: "kitty", prefixArgs: [] },
  { id: "xterm", executable: "xterm", prefixArgs: ["-e"] }
];

export function createTerminalLauncher(spec: TerminalSpec, executablePath = spec.executable): TerminalLauncher {
  return {
    id: spec.id,
    wrap(script) {
      return {
        command: executablePath,
        args: [...spec.prefixArgs, "bash", "-c", script]
      };
    }
  };
}

export type TerminalCatalogOptions = {
  preference?: readonly string[];
  spawn?: SpawnFn;
};

export class TerminalCatalog implements TerminalLocator {
  private readonly specs: TerminalSpec[];
  private readonly spawnFn: SpawnFn;
  private found?: Promise<TerminalLauncher | undefined>;

  constructor(options: TerminalCatalogOptions = {}) {
    this.spawnFn = options.spawn ?? runSpawnProcess;
    this.specs = orderTerminals(options.preference ?? []);
  }

  async find(): Promise<TerminalLauncher | undefined> {
    this.found ??= this.locate();
    return await this.found;
  }

  private async locate(): Promise<TerminalLauncher | undefined> {
    for (const spec of this.specs) {
      const executablePath = await resolveExecutablePath(spec.executable, this.spawnFn);
      if (executablePath) {
        return createTerminalLauncher(spec, executablePath);
      }
    }
    return undefined;
  }
}

function orderTerminals(preference: readonly string[]): TerminalSpec[] {
  const preferred = preference
    .map((id) => TERMINAL_SPECS.find((spec) => spec.id === id.trim()))
    .filter((spec): spec is TerminalSpec => spec !== undefined);
  const rest = TERMINAL_SPECS.filter((spec) => !preferred.includes(spec));
  return [...preferred, ...rest];
}

export function elevateCommand(
  handle: AuthorizationHandle,
  argv: readonly string[],
  style: ElevationStyle,
  context: { cwd: string; statusFile: string }
): ElevatedCommand {
  const [command, ...args] = argv;
  if (!command) {
    throw new Error("cannot elevate an empty command");
  }
  if (handle.mode === "none" || style === "never") {
    return { command, args };
  }
  if (handle.mode === "pkexec") {
    if (style === "helper") {
      return { command, args: ["--sudo", "pkexec", ...args], killPrefix: ["pkexec"] };
    }
    return { command: "pkexec", args: [command, ...args], killPrefix: ["pkexec"] };
  }

  // AUR helpers refuse to run as root and call sudo themselves
  const inner = style === "helper" ? [command, ...args] : ["sudo", "--", command, ...args];
  const script = [
    `cd ${quoteShellArg(context.cwd)}`,
    `${inner.map(quoteShellArg).join(" ")}`,
    `printf '%s' "$?" > ${quoteShellArg(context.statusFile)}`,
    "echo",
    "read -r -p 'Press Enter to close' _"
  ].join("; ");
  return { ...handle.terminal.wrap(script), statusFile: context.statusFile };
}

export async function readStatusFile(statusFile: string, fallback: number | null): Promise<number | null> {
  let raw: string;
  try {
    raw = await fs.readFile(statusFile, "utf8");
  } catch {
    return fallback;
  }
  const parsed = Number.parseInt(raw.trim(), 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function quoteShellArg(value: string): string {
  if (/^[A-Za-z0-9_\/.:=@%+,-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new PrivilegeError("cancelled", "authorization cancelled");
  }
}
