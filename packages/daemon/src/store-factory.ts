import type { SubmissionKeyStore } from "@softcenter/shared";
import { createMemorySubmissionKeyStore, MemoryAuditIndexStore } from "./memory-stores.js";
import { RedisAuditIndexStore, RedisSubmissionKeyStore } from "./redis-stores.js";
import type {
  AuditIndexStore,
  DaemonStoreDiagnostics,
  DaemonStores,
  StoreMode
} from "./store-types.js";

type Closeable = { close?: () => Promise<void> };
type Pingable = { ping?: () => Promise<void> };

export type StoreEnv = Record<string, string | undefined>;

type PrimaryStore<T> = T & Closeable & Pingable;

export type DaemonStoreFactoryOverrides = {
  createRedisSubmissionKeys?: (redisUrl: string, keyPrefix: string, connectTimeoutMs?: number) => PrimaryStore<SubmissionKeyStore>;
  createRedisAuditIndex?: (redisUrl: string, prefix: string, connectTimeoutMs?: number) => PrimaryStore<AuditIndexStore>;
};

export async function createDaemonStoresFromEnv(
  env: StoreEnv = process.env,
  overrides: DaemonStoreFactoryOverrides = {}
): Promise<DaemonStores> {
  const redisUrl = env.REDIS_URL;
  const explicitMode = parseStoreMode(env.STORE_MODE);
  const configuredMode: StoreMode = explicitMode ?? (redisUrl ? "redis" : "memory");
  const auditMode = parseStoreMode(env.AUDIT_INDEX_MODE) ?? configuredMode;
  const redisPrefix = env.REDIS_PREFIX ?? "softcenter:";
  const redisConnectTimeoutMs = parsePositiveMs(env.REDIS_CONNECT_TIMEOUT_MS);

  const diagnostics: DaemonStoreDiagnostics = {
    configuredMode,
    mode: configuredMode,
    degraded: false,
    redisErrorCount: 0
  };

  const memory = {
    submissionKeys: createMemorySubmissionKeyStore(),
    auditIndex: new MemoryAuditIndexStore()
  };

  if (configuredMode === "memory" || !redisUrl) {
    diagnostics.mode = "memory";
    return {
      ...memory,
      diagnostics,
      close: async () => {}
    };
  }

  let closeOnInitFailure: Closeable[] = [];
  try {
    const createSubmissionKeys = overrides.createRedisSubmissionKeys
      ?? ((url: string, keyPrefix: string, timeout?: number) => new RedisSubmissionKeyStore(url, keyPrefix, timeout));
    const createAuditIndex = overrides.createRedisAuditIndex
      ?? ((url: string, prefix: string, timeout?: number) => new RedisAuditIndexStore(url, prefix, timeout));
    const submissionKeys = createSubmissionKeys(redisUrl, `${redisPrefix}submission:`, redisConnectTimeoutMs);
    const redisAudit =
      auditMode === "redis"
        ? createAuditIndex(redisUrl, redisPrefix, redisConnectTimeoutMs)
        : undefined;
    closeOnInitFailure = redisAudit ? [submissionKeys, redisAudit] : [submissionKeys];

    await Promise.all([
      ensureReady(submissionKeys),
      redisAudit ? ensureReady(redisAudit) : Promise.resolve()
    ]);
    return {
      submissionKeys: withFallbackSubmissionKeys(submissionKeys, memory.submissionKeys, diagnostics),
      auditIndex: redisAudit
        ? withFallbackAuditStore(redisAudit, memory.auditIndex, diagnostics)
        : memory.auditIndex,
      diagnostics,
      close: async () => {
        await safeCloseMany(...closeOnInitFailure);
      }
    };
  } catch (error) {
    if (closeOnInitFailure.length > 0) {
      await safeCloseMany(...closeOnInitFailure);
    }
    markRedisError(diagnostics, error);
    return {
      ...memory,
      diagnostics,
      close: async () => {}
    };
  }
}

export function parseStoreMode(raw?: string): StoreMode | undefined {
  if (raw === "memory" || raw === "redis") {
    return raw;
  }
  return undefined;
}

function parsePositiveMs(raw?: string): number | undefined {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return undefined;
  }
  return Math.floor(parsed);
}

async function ensureReady(target: Pingable): Promise<void> {
  if (typeof target.ping === "function") {
    await target.ping();
  }
}

function markRedisError(diagnostics: DaemonStoreDiagnostics, error: unknown): void {
  diagnostics.degraded = true;
  diagnostics.mode = "memory";
  diagnostics.redisErrorCount += 1;
  diagnostics.lastRedisError = formatStoreError(error);
}

function formatStoreError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export async function retry<T>(fn: () => Promise<T>, attempts = 3, initialDelayMs = 80): Promise<T> {
  let delayMs = initialDelayMs;
  let lastError: unknown;
  for (let i = 0; i < attempts; i += 1) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (i < attempts - 1) {
        await new Promise((resolve) => {
          setTimeout(resolve, delayMs);
        });
        delayMs *= 2;
      }
    }
  }
  throw lastError;
}

type Guarded = <T>(primaryCall: () => Promise<T>, fallbackCall: () => Promise<T>) => Promise<T>;

// Primary calls are retried, then answered from memory; the redis error is recorded either way.
function guardWith(diagnostics: DaemonStoreDiagnostics): Guarded {
  return async function guarded<T>(primaryCall: () => Promise<T>, fallbackCall: () => Promise<T>): Promise<T> {
    try {
      return await retry(primaryCall);
    } catch (error) {
      markRedisError(diagnostics, error);
      return await fallbackCall();
    }
  };
}

const skip = async (): Promise<void> => undefined;

export function withFallbackSubmissionKeys(
  primary: SubmissionKeyStore & Closeable,
  fallback: SubmissionKeyStore,
  diagnostics: DaemonStoreDiagnostics
): SubmissionKeyStore & Closeable {
  const guarded = guardWith(diagnostics);
  return {
    lookup: (requestId) => guarded(
      () => primary.lookup(requestId),
      () => fallback.lookup(requestId)
    ),
    // memory keeps a copy of every key
    remember: async (requestId, operationId, ttlMs) => {
      await guarded(() => primary.remember(requestId, operationId, ttlMs), skip);
      await fallback.remember(requestId, operationId, ttlMs);
    },
    close: async () => {
      await primary.close?.();
    }
  };
}

export function withFallbackAuditStore(
  primary: AuditIndexStore,
  fallback: AuditIndexStore,
  diagnostics: DaemonStoreDiagnostics
): AuditIndexStore {
  const guarded = guardWith(diagnostics);
  return {
    applyEvent: async (event, maxRecords) => {
      await guarded(() => primary.applyEvent(event, maxRecords), skip);
      await fallback.applyEvent(event, maxRecords);
    },
    get: (operationId) => guarded(() => primary.get(operationId), () => fallback.get(operationId)),
    listRecent: (limit, filter) => guarded(
      () => primary.listRecent(limit, filter),
      () => fallback.listRecent(limit, filter)
    ),
    count: () => guarded(() => primary.count(), () => fallback.count()),
    statusCounts: () => guarded(() => primary.statusCounts(), () => fallback.statusCounts())
  };
}

async function safeCloseMany(...items: Closeable[]): Promise<void> {
  for (const item of items) {
    if (typeof item.close !== "function") {
      continue;
    }
    try {
      await item.close();
    } catch (error) {
      process.emitWarning(`store close failed: ${formatStoreError(error)}`);
    }
  }
}
