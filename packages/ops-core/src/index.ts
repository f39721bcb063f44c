import { createDefaultBackendRegistry } from "./backends/registry.js";
import { DEFAULT_OPERATION_CONFIG, type OperationConfig } from "./config.js";
import { DiagnosticsEngine, type SystemInspector } from "./diagnostics.js";
import { OperationExecutor, type OperationRunner } from "./executor.js";
import { createLogger, type Logger } from "./logger.js";
import { OperationQueue } from "./operationQueue.js";
import { PrivilegeBroker, TerminalCatalog, type PrivilegeAuthorizer } from "./privilegeBroker.js";
import type { SpawnFn } from "./processRunner.js";
import type { ProgressPattern } from "./progressPatterns.js";
import { ToolProbe, type ToolProber } from "./toolProbe.js";

export * from "./backends/types.js";
export * from "./backends/registry.js";
export { detectFileFormat, type LocalFileFormat } from "./backends/file.js";
export * from "./config.js";
export * from "./diagnostics.js";
export * from "./etaTracker.js";
export * from "./executor.js";
export * from "./lineDecoder.js";
export * from "./logger.js";
export * from "./operationQueue.js";
export * from "./privilegeBroker.js";
export * from "./processRunner.js";
export * from "./progressPatterns.js";
export * from "./toolProbe.js";

export type SoftwareCenterCore = {
  config: OperationConfig;
  prober: ToolProber;
  broker: PrivilegeAuthorizer;
  executor: OperationRunner;
  queue: OperationQueue;
  diagnostics: DiagnosticsEngine;
};

export type SoftwareCenterCoreOverrides = {
  spawn?: SpawnFn;
  prober?: ToolProber;
  broker?: PrivilegeAuthorizer;
  executor?: OperationRunner;
  inspector?: SystemInspector;
  patterns?: readonly ProgressPattern[];
  logger?: Logger;
};

export function createSoftwareCenterCore(
  config: OperationConfig = DEFAULT_OPERATION_CONFIG,
  overrides: SoftwareCenterCoreOverrides = {}
): SoftwareCenterCore {
  const logger = overrides.logger ?? createLogger("core");
  const prober = overrides.prober ?? new ToolProbe({
    timeoutMs: config.probeTimeoutMs,
    logger: logger.child({ component: "tool-probe" }),
    ...(overrides.spawn ? { spawn: overrides.spawn } : {})
  });
  const broker = overrides.broker ?? new PrivilegeBroker({
    prober,
    authorizationTimeoutMs: config.authorizationTimeoutMs,
    terminals: new TerminalCatalog({
      preference: config.terminals ?? [],
      ...(overrides.spawn ? { spawn: overrides.spawn } : {})
    }),
    logger: logger.child({ component: "privilege-broker" }),
    ...(overrides.spawn ? { spawn: overrides.spawn } : {})
  });
  const executor = overrides.executor ?? new OperationExecutor({
    prober,
    backends: createDefaultBackendRegistry(),
    gracePeriodMs: config.gracePeriodMs,
    stallTimeoutMs: config.stallTimeoutMs,
    maxTailLines: config.maxTailLines,
    logger: logger.child({ component: "executor" }),
    ...(overrides.spawn ? { spawn: overrides.spawn } : {}),
    ...(overrides.patterns ? { patterns: overrides.patterns } : {})
  });
  const queue = new OperationQueue({
    broker,
    executor,
    retainedResults: config.retainedResults,
    logger: logger.child({ component: "operation-queue" })
  });
  const diagnostics = new DiagnosticsEngine({
    logger: logger.child({ component: "diagnostics" }),
    ...(overrides.inspector ? { inspector: overrides.inspector } : {})
  });
  return { config, prober, broker, executor, queue, diagnostics };
}
