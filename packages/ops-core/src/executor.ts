import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import type {
  OperationDescriptor,
  OperationErrorKind,
  OperationProgress,
  OperationResult
} from "@softcenter/shared";
import { createDefaultBackendRegistry, type BackendRegistry } from "./backends/registry.js";
import {
  ARTIFACT_PLACEHOLDER,
  PlanError,
  WORKDIR_PLACEHOLDER,
  type CommandCandidate,
  type OperationPlan,
  type PlanStep
} from "./backends/types.js";
import { commandKey, EtaTracker } from "./etaTracker.js";
import { createLogger, type Logger } from "./logger.js";
import {
  elevateCommand,
  readStatusFile,
  type AuthorizationHandle
} from "./privilegeBroker.js";
import { runSpawnProcess, type SpawnFn, type SpawnRunResult } from "./processRunner.js";
import { classifyLine, DEFAULT_PROGRESS_PATTERNS, type ProgressPattern } from "./progressPatterns.js";
import { formatMissingTools, type ToolAvailability, type ToolName, type ToolProber } from "./toolProbe.js";

export type OperationUpdate =
  | { type: "progress"; progress: OperationProgress }
  | { type: "result"; result: OperationResult };

export type ExecuteOptions = {
  signal?: AbortSignal;
};

export interface OperationRunner {
  execute(
    operationId: string,
    descriptor: OperationDescriptor,
    authorization: AuthorizationHandle,
    options?: ExecuteOptions
  ): AsyncGenerator<OperationUpdate, void, undefined>;
}

export type OperationExecutorOptions = {
  prober: ToolProber;
  backends?: BackendRegistry;
  spawn?: SpawnFn;
  patterns?: readonly ProgressPattern[];
  gracePeriodMs?: number;
  stallTimeoutMs?: number;
  maxTailLines?: number;
  tmpRoot?: string;
  eta?: EtaTracker;
  logger?: Logger;
};

type Emit = (progress: OperationProgress) => void;

type Finish = (
  status: OperationResult["status"],
  exitCode: number | null,
  errorKind?: OperationErrorKind,
  errorDetail?: string
) => OperationResult;

type StepOutcome =
  | { ok: true }
  | { ok: false; result: OperationResult };

const DETAIL_TAIL_LINES = 8;

export class OperationExecutor implements OperationRunner {
  private readonly prober: ToolProber;
  private readonly backends: BackendRegistry;
  private readonly spawnFn: SpawnFn;
  private readonly patterns: readonly ProgressPattern[];
  private readonly gracePeriodMs: number;
  private readonly stallTimeoutMs: number;
  private readonly maxTailLines: number;
  private readonly tmpRoot: string;
  private readonly eta: EtaTracker;
  private readonly logger: Logger;

  constructor(options: OperationExecutorOptions) {
    this.prober = options.prober;
    this.backends = options.backends ?? createDefaultBackendRegistry();
    this.spawnFn = options.spawn ?? runSpawnProcess;
    this.patterns = options.patterns ?? DEFAULT_PROGRESS_PATTERNS;
    this.gracePeriodMs = options.gracePeriodMs ?? 5_000;
    this.stallTimeoutMs = options.stallTimeoutMs ?? 10 * 60_000;
    this.maxTailLines = options.maxTailLines ?? 80;
    this.tmpRoot = options.tmpRoot ?? os.tmpdir();
    this.eta = options.eta ?? new EtaTracker();
    this.logger = options.logger ?? createLogger("executor");
  }

  async *execute(
    operationId: string,
    descriptor: OperationDescriptor,
    authorization: AuthorizationHandle,
    options: ExecuteOptions = {}
  ): AsyncGenerator<OperationUpdate, void, undefined> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    const buffer: OperationProgress[] = [];
    let wake: (() => void) | undefined;
    const state: { outcome?: OperationResult } = {};
    const notify = (): void => {
      const resolve = wake;
      wake = undefined;
      resolve?.();
    };
    const emit: Emit = (progress) => {
      buffer.push(progress);
      notify();
    };
    const completion = this.run(operationId, descriptor, authorization, controller.signal, emit)
      .catch((error: unknown) => {
        this.logger.error({ operationId, err: error }, "operation crashed");
        const detail = error instanceof Error ? error.message : String(error);
        return buildResult(operationId, "failed", null, "execution_failed", detail);
      })
      .then((result) => {
        state.outcome = result;
        notify();
      });

    try {
      while (true) {
        let next = buffer.shift();
        while (next) {
          yield { type: "progress", progress: next };
          next = buffer.shift();
        }
        if (state.outcome) {
          break;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
          if (buffer.length > 0 || state.outcome) {
            notify();
          }
        });
      }
      if (state.outcome) {
        yield { type: "result", result: state.outcome };
      }
    } finally {
      // an abandoned generator must not leave the child running
      if (!state.outcome) {
        controller.abort();
      }
      await completion;
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  private async run(
    operationId: string,
    descriptor: OperationDescriptor,
    authorization: AuthorizationHandle,
    signal: AbortSignal,
    emit: Emit
  ): Promise<OperationResult> {
    const finish: Finish = (status, exitCode, errorKind, errorDetail) =>
      buildResult(operationId, status, exitCode, errorKind, errorDetail);

    let plan: OperationPlan;
    try {
      plan = this.backends.plan(descriptor);
    } catch (error) {
      if (error instanceof PlanError) {
        return finish("failed", null, "unsupported_operation", error.message);
      }
      throw error;
    }

    const missing = await this.missingTools(plan);
    if (missing.length > 0) {
      this.logger.warn({ operationId, missing: missing.map((item) => item.tool) }, "required tools missing");
      return finish("failed", null, "tool_missing", `missing tools: ${formatMissingTools(missing)}`);
    }

    const diagnostics = await this.backends.preflight(descriptor);
    const blocking = diagnostics.filter((item) => item.severity === "error");
    if (blocking.length > 0) {
      return finish("failed", null, "execution_failed", blocking.map((item) => item.message).join("; "));
    }
    if (signal.aborted) {
      return finish("cancelled", null, "cancelled", "cancelled before start");
    }

    const baseDir = await fs.mkdtemp(path.join(this.tmpRoot, "softcenter-op-"));
    const workdir = path.join(baseDir, "work");
    try {
      await fs.mkdir(workdir);
      for (const [index, step] of plan.steps.entries()) {
        const stepOutcome = await this.runStep({
          operationId,
          step,
          index,
          authorization,
          baseDir,
          workdir,
          signal,
          emit,
          finish
        });
        if (!stepOutcome.ok) {
          return stepOutcome.result;
        }
      }
      return finish("success", 0);
    } finally {
      await fs.rm(baseDir, { recursive: true, force: true });
    }
  }

  private async runStep(input: {
    operationId: string;
    step: PlanStep;
    index: number;
    authorization: AuthorizationHandle;
    baseDir: string;
    workdir: string;
    signal: AbortSignal;
    emit: Emit;
    finish: Finish;
  }): Promise<StepOutcome> {
    const { operationId, step, index, emit, finish } = input;
    emit({
      operationId,
      phase: step.phase,
      message: step.label,
      timestamp: new Date().toISOString(),
      confidence: "high"
    });

    const candidates = await this.installedCandidates(step);
    let lastFailure = "";
    let lastExitCode: number | null = null;
    for (const [attempt, candidate] of candidates.entries()) {
      let argv: string[];
      try {
        argv = await substitutePlaceholders(candidate.argv, input.workdir);
        if (candidate.cwd) {
          await fs.mkdir(candidate.cwd, { recursive: true });
        }
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        return { ok: false, result: finish("failed", null, "execution_failed", detail) };
      }
      const cwd = candidate.cwd ?? input.workdir;
      const elevated = elevateCommand(input.authorization, argv, candidate.elevation, {
        cwd,
        statusFile: path.join(input.baseDir, `status-${index}-${attempt}`)
      });
      this.logger.info(
        { operationId, step: step.label, command: elevated.command, args: elevated.args },
        "running step"
      );
      const etaKey = commandKey(argv);
      const startedAt = Date.now();
      let linesSeen = 0;
      const result = await this.spawnFn(elevated.command, elevated.args, {
        cwd,
        signal: input.signal,
        gracePeriodMs: this.gracePeriodMs,
        maxTailLines: this.maxTailLines,
        // a terminal window prints nothing back to us while the user types a password
        ...(elevated.statusFile ? {} : { stallTimeoutMs: this.stallTimeoutMs }),
        ...(elevated.killPrefix ? { killPrefix: elevated.killPrefix } : {}),
        onLine: (line) => {
          linesSeen += 1;
          const classified = classifyLine(line, this.patterns);
          const estimate = classified.percent === undefined
            ? this.eta.estimate(etaKey, linesSeen, Date.now() - startedAt)
            : { percent: classified.percent };
          emit({
            operationId,
            phase: classified.phase,
            message: line,
            timestamp: new Date().toISOString(),
            confidence: classified.confidence,
            ...estimate
          });
        }
      });

      if (result.cancelled) {
        return { ok: false, result: finish("cancelled", result.code, "cancelled", "cancelled by request") };
      }
      if (result.stalled) {
        return {
          ok: false,
          result: finish(
            "failed",
            result.code,
            "timeout",
            `no output for ${this.stallTimeoutMs}ms during ${step.label}`
          )
        };
      }
      const exitCode = elevated.statusFile
        ? await readStatusFile(elevated.statusFile, result.code)
        : result.code;
      if (!result.errorCode && exitCode === 0) {
        this.eta.record(etaKey, { lines: linesSeen, durationMs: Date.now() - startedAt });
        return { ok: true };
      }
      lastExitCode = exitCode;
      lastFailure = describeFailure(step, argv, result, exitCode);
      this.logger.warn({ operationId, step: step.label, exitCode, errorCode: result.errorCode }, "step candidate failed");
    }
    return {
      ok: false,
      result: finish("failed", lastExitCode, "execution_failed", lastFailure || `${step.label}: no runnable command`)
    };
  }

  private async missingTools(plan: OperationPlan): Promise<ToolAvailability[]> {
    const tools = plan.steps.flatMap((step) => step.candidates.flatMap((candidate) => candidate.tools));
    const availability = await this.prober.probeAll(tools);
    const missing = new Map<ToolName, ToolAvailability>();
    for (const step of plan.steps) {
      const runnable = step.candidates.some((candidate) => isRunnable(candidate, availability));
      if (runnable) {
        continue;
      }
      for (const candidate of step.candidates) {
        for (const tool of candidate.tools) {
          const entry = availability[tool];
          if (entry && !entry.installed) {
            missing.set(tool, entry);
          }
        }
      }
    }
    return [...missing.values()];
  }

  private async installedCandidates(step: PlanStep): Promise<CommandCandidate[]> {
    const availability = await this.prober.probeAll(step.candidates.flatMap((candidate) => candidate.tools));
    return step.candidates.filter((candidate) => isRunnable(candidate, availability));
  }
}

export function buildResult(
  operationId: string,
  status: OperationResult["status"],
  exitCode: number | null,
  errorKind?: OperationErrorKind,
  errorDetail?: string
): OperationResult {
  return {
    operationId,
    status,
    exitCode,
    ...(errorKind ? { errorKind } : {}),
    ...(errorDetail ? { errorDetail } : {}),
    finishedAt: new Date().toISOString()
  };
}

function isRunnable(
  candidate: CommandCandidate,
  availability: Partial<Record<ToolName, ToolAvailability>>
): boolean {
  return candidate.tools.every((tool) => availability[tool]?.installed === true);
}

export async function substitutePlaceholders(argv: readonly string[], workdir: string): Promise<string[]> {
  const needsArtifact = argv.some((arg) => arg.includes(ARTIFACT_PLACEHOLDER));
  const artifact = needsArtifact ? await findBuiltPackage(workdir) : undefined;
  return argv.map((arg) => {
    let value = arg.split(WORKDIR_PLACEHOLDER).join(workdir);
    if (artifact) {
      value = value.split(ARTIFACT_PLACEHOLDER).join(artifact);
    }
    return value;
  });
}

export async function findBuiltPackage(workdir: string): Promise<string> {
  const entries = await fs.readdir(workdir);
  const match = entries
    .filter((name) => /\.pkg\.tar(\.(zst|xz|gz|bz2))?$/.test(name))
    .sort()
    .at(0);
  if (!match) {
    throw new Error(`conversion produced no package in ${workdir}`);
  }
  return path.join(workdir, match);
}

function describeFailure(
  step: PlanStep,
  argv: readonly string[],
  result: SpawnRunResult,
  exitCode: number | null
): string {
  const head = result.errorCode
    ? `${step.label}: ${argv[0] ?? "command"} could not start (${result.errorCode})`
    : `${step.label}: ${argv.join(" ")} exited with ${exitCode ?? result.signal ?? "unknown status"}`;
  const tail = result.outputTail.split("\n").slice(-DETAIL_TAIL_LINES).join("\n").trim();
  return tail ? `${head}\n${tail}` : head;
}
