import { resolveExecutablePath, runSpawnProcess, type SpawnFn } from "./processRunner.js";
import { createLogger, type Logger } from "./logger.js";

export type ToolName =
  | "pacman"
  | "paru"
  | "yay"
  | "flatpak"
  | "snap"
  | "debtap"
  | "rpmextract"
  | "bsdtar"
  | "reflector"
  | "paccache"
  | "pacman-key"
  | "pkexec"
  | "pkcheck"
  | "sudo"
  | "systemctl";

export type ToolAvailability = {
  tool: ToolName;
  installed: boolean;
  version?: string;
  executablePath?: string;
  resolutionHint: string;
};

export type ToolAvailabilityMap = Partial<Record<ToolName, ToolAvailability>>;

export interface ToolProber {
  probe(tool: ToolName): Promise<ToolAvailability>;
  probeAll(tools: readonly ToolName[]): Promise<ToolAvailabilityMap>;
  refresh(): void;
}

type CatalogEntry = {
  executable: string;
  versionArgs?: string[];
  acceptExitCodes?: number[];
  resolutionHint: string;
};

export const TOOL_CATALOG: Readonly<Record<ToolName, CatalogEntry>> = {
  pacman: { executable: "pacman", versionArgs: ["--version"], resolutionHint: "pacman is part of the base system" },
  paru: { executable: "paru", versionArgs: ["--version"], resolutionHint: "pacman -S paru" },
  yay: { executable: "yay", versionArgs: ["--version"], resolutionHint: "paru -S yay" },
  flatpak: { executable: "flatpak", versionArgs: ["--version"], resolutionHint: "pacman -S flatpak" },
  snap: { executable: "snap", versionArgs: ["version"], resolutionHint: "paru -S snapd" },
  debtap: { executable: "debtap", resolutionHint: "paru -S debtap" },
  rpmextract: { executable: "rpmextract.sh", resolutionHint: "pacman -S rpmextract" },
  bsdtar: { executable: "bsdtar", versionArgs: ["--version"], resolutionHint: "pacman -S libarchive" },
  reflector: { executable: "reflector", versionArgs: ["--version"], resolutionHint: "pacman -S reflector" },
  paccache: { executable: "paccache", versionArgs: ["--version"], resolutionHint: "pacman -S pacman-contrib" },
  "pacman-key": { executable: "pacman-key", versionArgs: ["--version"], resolutionHint: "pacman -S pacman" },
  pkexec: { executable: "pkexec", versionArgs: ["--version"], resolutionHint: "pacman -S polkit" },
  pkcheck: { executable: "pkcheck", versionArgs: ["--version"], resolutionHint: "pacman -S polkit" },
  sudo: { executable: "sudo", versionArgs: ["--version"], resolutionHint: "pacman -S sudo" },
  systemctl: { executable: "systemctl", versionArgs: ["--version"], resolutionHint: "pacman -S systemd" }
};

export const TOOL_NAMES: readonly ToolName[] = [
  "pacman",
  "paru",
  "yay",
  "flatpak",
  "snap",
  "debtap",
  "rpmextract",
  "bsdtar",
  "reflector",
  "paccache",
  "pacman-key",
  "pkexec",
  "pkcheck",
  "sudo",
  "systemctl"
];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((tool) => tool === value);
}

export function toolForExecutable(executable: string): ToolName | undefined {
  const base = executable.split("/").pop() ?? executable;
  return TOOL_NAMES.find((tool) => TOOL_CATALOG[tool].executable === base || tool === base);
}

export type ToolProbeOptions = {
  timeoutMs?: number;
  spawn?: SpawnFn;
  logger?: Logger;
};

export class ToolProbe implements ToolProber {
  private readonly cache = new Map<ToolName, Promise<ToolAvailability>>();
  private readonly timeoutMs: number;
  private readonly spawnFn: SpawnFn;
  private readonly logger: Logger;

  constructor(options: ToolProbeOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 2_000;
    this.spawnFn = options.spawn ?? runSpawnProcess;
    this.logger = options.logger ?? createLogger("tool-probe");
  }

  async probe(tool: ToolName): Promise<ToolAvailability> {
    const cached = this.cache.get(tool);
    if (cached) {
      return await cached;
    }
    const pending = this.detect(tool);
    this.cache.set(tool, pending);
    return await pending;
  }

  async probeAll(tools: readonly ToolName[]): Promise<ToolAvailabilityMap> {
    const unique = [...new Set(tools)];
    const results = await Promise.all(unique.map((tool) => this.probe(tool)));
    const map: ToolAvailabilityMap = {};
    for (const availability of results) {
      map[availability.tool] = availability;
    }
    return map;
  }

  refresh(): void {
    this.cache.clear();
  }

  private async detect(tool: ToolName): Promise<ToolAvailability> {
    const entry = TOOL_CATALOG[tool];
    const missing: ToolAvailability = {
      tool,
      installed: false,
      resolutionHint: entry.resolutionHint
    };

    const executablePath = await resolveExecutablePath(entry.executable, this.spawnFn);
    if (!executablePath) {
      this.logger.debug({ tool }, "tool not found on PATH");
      return missing;
    }
    if (!entry.versionArgs) {
      return { ...missing, installed: true, executablePath };
    }

    const result = await this.spawnFn(executablePath, entry.versionArgs, {
      gracePeriodMs: 500,
      maxTailLines: 10,
      timeoutMs: this.timeoutMs
    });
    const accepted = entry.acceptExitCodes ?? [0];
    if (result.timedOut || result.errorCode || result.code === null || !accepted.includes(result.code)) {
      this.logger.warn(
        { tool, code: result.code, timedOut: result.timedOut, errorCode: result.errorCode },
        "tool version probe failed"
      );
      return { ...missing, executablePath };
    }
    const version = extractVersion(result.outputTail);
    return {
      tool,
      installed: true,
      executablePath,
      resolutionHint: entry.resolutionHint,
      ...(version ? { version } : {})
    };
  }
}

export function extractVersion(output: string): string | undefined {
  for (const line of output.split(/\r?\n/)) {
    const match = line.match(/\bv?(\d+\.\d+(?:\.\d+)*(?:[-+.][0-9A-Za-z.]+)?)/);
    if (match?.[1]) {
      return match[1];
    }
  }
  return undefined;
}

export function formatMissingTools(tools: readonly ToolAvailability[]): string {
  return tools
    .map((item) => `${item.tool} (install with: ${item.resolutionHint})`)
    .join(", ");
}
