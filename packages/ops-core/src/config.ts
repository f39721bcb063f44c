export type OperationConfig = {
  probeTimeoutMs: number;
  authorizationTimeoutMs: number;
  gracePeriodMs: number;
  stallTimeoutMs: number;
  maxTailLines: number;
  retainedResults: number;
  terminals?: string[];
};

export const DEFAULT_OPERATION_CONFIG: OperationConfig = {
  probeTimeoutMs: 2_000,
  authorizationTimeoutMs: 120_000,
  gracePeriodMs: 5_000,
  stallTimeoutMs: 10 * 60_000,
  maxTailLines: 80,
  retainedResults: 500
};

type Env = Record<string, string | undefined>;

export function loadOperationConfigFromEnv(env: Env = process.env): OperationConfig {
  const terminals = parseList(env.SOFTCENTER_TERMINALS);
  return {
    probeTimeoutMs: parsePositiveInt(env.SOFTCENTER_PROBE_TIMEOUT_MS, DEFAULT_OPERATION_CONFIG.probeTimeoutMs),
    authorizationTimeoutMs: parsePositiveInt(
      env.SOFTCENTER_AUTH_TIMEOUT_MS,
      DEFAULT_OPERATION_CONFIG.authorizationTimeoutMs
    ),
    gracePeriodMs: parsePositiveInt(env.SOFTCENTER_GRACE_PERIOD_MS, DEFAULT_OPERATION_CONFIG.gracePeriodMs),
    stallTimeoutMs: parsePositiveInt(env.SOFTCENTER_STALL_TIMEOUT_MS, DEFAULT_OPERATION_CONFIG.stallTimeoutMs),
    maxTailLines: parsePositiveInt(env.SOFTCENTER_OUTPUT_TAIL_LINES, DEFAULT_OPERATION_CONFIG.maxTailLines),
    retainedResults: parsePositiveInt(env.SOFTCENTER_RETAINED_RESULTS, DEFAULT_OPERATION_CONFIG.retainedResults),
    ...(terminals.length > 0 ? { terminals } : {})
  };
}

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw);
  if (raw === undefined || raw.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
}

function parseList(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean);
}
