import { spawn, type ChildProcess } from "node:child_process";
import { LineDecoder } from "./lineDecoder.js";

export type OutputStream = "stdout" | "stderr";

export type SpawnRunOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  gracePeriodMs: number;
  maxTailLines: number;
  timeoutMs?: number;
  stallTimeoutMs?: number;
  // runs `<prefix> kill -s SIG -- -<pgid>` when the group belongs to another user
  killPrefix?: readonly string[];
  onLine?: (line: string, stream: OutputStream) => void;
};

export type SpawnRunResult = {
  code: number | null;
  signal: NodeJS.Signals | null;
  cancelled: boolean;
  timedOut: boolean;
  stalled: boolean;
  errorCode?: string;
  outputTail: string;
};

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnRunOptions
) => Promise<SpawnRunResult>;

const liveChildren = new Set<ChildProcess>();
let exitHookInstalled = false;

export const runSpawnProcess: SpawnFn = async (command, args, options) => {
  installExitHook();
  return await new Promise<SpawnRunResult>((resolve) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env,
      shell: false,
      // own process group, so cancellation reaches grandchildren too
      detached: true,
      stdio: ["ignore", "pipe", "pipe"]
    });
    liveChildren.add(child);

    let settled = false;
    let timedOut = false;
    let cancelled = false;
    let stalled = false;
    let escalationHandle: NodeJS.Timeout | undefined;
    let stallHandle: NodeJS.Timeout | undefined;
    const tail: string[] = [];
    const decoders: Record<OutputStream, LineDecoder> = {
      stdout: new LineDecoder(),
      stderr: new LineDecoder()
    };

    const onLine = (stream: OutputStream) => (line: string): void => {
      tail.push(line);
      if (tail.length > options.maxTailLines) {
        tail.splice(0, tail.length - options.maxTailLines);
      }
      options.onLine?.(line, stream);
    };

    const signalTree = (signal: NodeJS.Signals): void => {
      const pid = child.pid;
      if (pid === undefined) {
        return;
      }
      const failure = signalProcessGroup(pid, signal);
      if (failure === "ESRCH") {
        return;
      }
      if (options.killPrefix?.length) {
        runPrivilegedKill(options.killPrefix, pid, signal, (message) => tail.push(message));
      } else if (failure) {
        tail.push(`cannot send ${signal} to process group ${pid}: ${failure}`);
      }
    };

    // the leader may exit while grandchildren still hold the pipes open
    const terminate = (): void => {
      if (escalationHandle || settled) {
        return;
      }
      signalTree("SIGTERM");
      escalationHandle = setTimeout(() => {
        if (!settled) {
          signalTree("SIGKILL");
        }
      }, options.gracePeriodMs);
    };

    const armStallTimer = (): void => {
      if (!options.stallTimeoutMs) {
        return;
      }
      if (stallHandle) {
        clearTimeout(stallHandle);
      }
      stallHandle = setTimeout(() => {
        stalled = true;
        terminate();
      }, options.stallTimeoutMs);
    };

    const timeoutHandle = options.timeoutMs
      ? setTimeout(() => {
        timedOut = true;
        terminate();
      }, options.timeoutMs)
      : undefined;

    const onAbort = (): void => {
      cancelled = true;
      terminate();
    };
    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    const cleanup = (): void => {
      liveChildren.delete(child);
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      if (stallHandle) {
        clearTimeout(stallHandle);
      }
      if (escalationHandle) {
        clearTimeout(escalationHandle);
      }
      options.signal?.removeEventListener("abort", onAbort);
    };

    armStallTimer();
    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      armStallTimer();
      decoders.stdout.push(chunk, onLine("stdout"));
    });
    child.stderr?.on("data", (chunk: string) => {
      armStallTimer();
      decoders.stderr.push(chunk, onLine("stderr"));
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      if (settled) {
        return;
      }
      // once the process exists only `close` ends the run
      if (child.pid !== undefined) {
        tail.push(`${error.code ?? "error"}: ${error.message}`);
        return;
      }
      settled = true;
      cleanup();
      resolve({
        code: null,
        signal: null,
        cancelled,
        timedOut,
        stalled,
        errorCode: error.code ?? "ESPAWN",
        outputTail: mergeTail(tail, error.message)
      });
    });
    child.on("close", (code, signal) => {
      if (settled) {
        return;
      }
      settled = true;
      decoders.stdout.flush(onLine("stdout"));
      decoders.stderr.flush(onLine("stderr"));
      cleanup();
      resolve({
        code,
        signal,
        cancelled,
        timedOut,
        stalled,
        outputTail: tail.join("\n").trim()
      });
    });
  });
};

export async function resolveExecutablePath(
  binary: string,
  spawnFn: SpawnFn = runSpawnProcess
): Promise<string | undefined> {
  const result = await spawnFn("which", [binary], {
    gracePeriodMs: 500,
    maxTailLines: 20,
    timeoutMs: 4_000
  });
  if (result.code !== 0) {
    return undefined;
  }
  const first = result.outputTail
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find(Boolean);
  return first || undefined;
}

export function liveChildCount(): number {
  return liveChildren.size;
}

function installExitHook(): void {
  if (exitHookInstalled) {
    return;
  }
  exitHookInstalled = true;
  process.once("exit", () => {
    for (const child of liveChildren) {
      if (child.pid === undefined || signalProcessGroup(child.pid, "SIGKILL") !== undefined) {
        child.kill("SIGKILL");
      }
    }
  });
}

/** Signals every process in the group led by `pid`; returns the errno code on failure. */
export function signalProcessGroup(pid: number, signal: NodeJS.Signals): string | undefined {
  try {
    process.kill(-pid, signal);
    return undefined;
  } catch (error) {
    if (error instanceof Error && "code" in error && typeof error.code === "string") {
      return error.code;
    }
    throw error;
  }
}

function runPrivilegedKill(
  prefix: readonly string[],
  pid: number,
  signal: NodeJS.Signals,
  report: (message: string) => void
): void {
  const [command, ...rest] = prefix;
  if (!command) {
    return;
  }
  const killer = spawn(command, [...rest, "kill", "-s", signal.replace(/^SIG/, ""), "--", `-${pid}`], {
    shell: false,
    stdio: "ignore"
  });
  killer.on("error", (error) => report(`privileged kill failed: ${error.message}`));
  killer.on("close", (code) => {
    if (code !== 0 && code !== null) {
      report(`privileged kill exited with ${code}`);
    }
  });
}

function mergeTail(existing: string[], appended: string): string {
  return [existing.join("\n").trim(), appended.trim()].filter(Boolean).join("\n").trim();
}
