import { createClient, type RedisClientType } from "redis";
import type { SubmissionKeyStore } from "@softcenter/shared";
import type {
  AuditIndexStore,
  AuditRecordFilter,
  OperationAuditEvent,
  OperationAuditRecord
} from "./store-types.js";
import { matchesFilter } from "./memory-stores.js";

type FieldMap = Record<string, string>;

abstract class RedisBackedStore {
  protected readonly client: RedisClientType;
  private connectPromise?: Promise<RedisClientType>;

  constructor(redisUrl: string, connectTimeoutMs?: number) {
    const connectTimeout = parseConnectTimeout(connectTimeoutMs);
    this.client = createClient({
      url: redisUrl,
      socket: connectTimeout ? { connectTimeout } : undefined
    });
  }

  async ping(): Promise<void> {
    await this.ensureConnected();
    await this.client.ping();
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }

  protected async ensureConnected(): Promise<void> {
    if (this.client.isOpen) {
      return;
    }
    if (!this.connectPromise) {
      this.connectPromise = this.client.connect();
    }
    await this.connectPromise;
  }
}

export class RedisSubmissionKeyStore extends RedisBackedStore implements SubmissionKeyStore {
  constructor(
    redisUrl: string,
    private readonly keyPrefix = "softcenter:submission:",
    connectTimeoutMs?: number
  ) {
    super(redisUrl, connectTimeoutMs);
  }

  async lookup(requestId: string): Promise<string | undefined> {
    await this.ensureConnected();
    const value = await this.client.get(this.fullKey(requestId));
    return value ?? undefined;
  }

  async remember(requestId: string, operationId: string, ttlMs: number): Promise<void> {
    await this.ensureConnected();
    await this.client.set(this.fullKey(requestId), operationId, { PX: Math.max(1, ttlMs) });
  }

  private fullKey(requestId: string): string {
    return `${this.keyPrefix}${requestId}`;
  }
}

export class RedisAuditIndexStore extends RedisBackedStore implements AuditIndexStore {
  private readonly updatedIndexKey: string;
  private readonly statusCountsKey: string;

  constructor(
    redisUrl: string,
    private readonly prefix = "softcenter:",
    connectTimeoutMs?: number
  ) {
    super(redisUrl, connectTimeoutMs);
    this.updatedIndexKey = `${this.prefix}audit:index:updated`;
    this.statusCountsKey = `${this.prefix}audit:status:counts`;
  }

  async applyEvent(event: OperationAuditEvent, maxRecords: number): Promise<void> {
    await this.ensureConnected();
    const key = this.recordKey(event.operationId);
    const fields = await this.client.hGetAll(key);
    const prevStatus = fields.status;

    const patch: FieldMap = {
      operationId: event.operationId,
      createdAt: fields.createdAt ?? event.timestamp,
      updatedAt: event.timestamp,
      status: event.status
    };
    for (const name of ["kind", "source", "target", "summary", "errorKind"] as const) {
      const value = event[name] ?? fields[name];
      if (value) {
        patch[name] = value;
      }
    }

    const timestampMs = Date.parse(event.timestamp);
    const score = Number.isFinite(timestampMs) ? timestampMs : Date.now();
    await this.client.multi()
      .hSet(key, patch)
      .rPush(this.eventsKey(event.operationId), JSON.stringify(event))
      .zAdd(this.updatedIndexKey, {
        score,
        value: event.operationId
      })
      .exec();

    if (prevStatus !== event.status) {
      if (prevStatus) {
        await this.client.hIncrBy(this.statusCountsKey, prevStatus, -1);
      }
      await this.client.hIncrBy(this.statusCountsKey, event.status, 1);
    }

    await this.pruneOverflow(maxRecords);
  }

  async get(operationId: string): Promise<OperationAuditRecord | undefined> {
    await this.ensureConnected();
    const fields = await this.client.hGetAll(this.recordKey(operationId));
    const eventsRaw = await this.client.lRange(this.eventsKey(operationId), 0, -1);
    return fromAuditFields(fields, eventsRaw);
  }

  async listRecent(limit: number, filter?: AuditRecordFilter): Promise<OperationAuditRecord[]> {
    await this.ensureConnected();
    const safeLimit = Math.max(1, limit);
    const ids = await this.client.zRange(
      this.updatedIndexKey,
      0,
      Math.max(100, safeLimit * 5),
      { REV: true }
    );
    const values: OperationAuditRecord[] = [];
    for (const operationId of ids) {
      const record = await this.get(operationId);
      if (!record) {
        await this.client.zRem(this.updatedIndexKey, operationId);
        continue;
      }
      if (!matchesFilter(record, filter)) {
        continue;
      }
      values.push(record);
      if (values.length >= safeLimit) {
        break;
      }
    }
    return values;
  }

  async count(): Promise<number> {
    await this.ensureConnected();
    return await this.client.zCard(this.updatedIndexKey);
  }

  async statusCounts(): Promise<Record<string, number>> {
    await this.ensureConnected();
    const fields = await this.client.hGetAll(this.statusCountsKey);
    const output: Record<string, number> = {};
    for (const [key, value] of Object.entries(fields)) {
      const parsed = Number(value);
      if (Number.isFinite(parsed) && parsed > 0) {
        output[key] = parsed;
      }
    }
    return output;
  }

  private async pruneOverflow(maxRecords: number): Promise<void> {
    const safeMax = Math.max(1, maxRecords);
    const total = await this.client.zCard(this.updatedIndexKey);
    if (total <= safeMax) {
      return;
    }
    const oldest = await this.client.zRange(this.updatedIndexKey, 0, total - safeMax - 1);
    for (const operationId of oldest) {
      const key = this.recordKey(operationId);
      const status = await this.client.hGet(key, "status");
      await this.client.multi()
        .del(key)
        .del(this.eventsKey(operationId))
        .zRem(this.updatedIndexKey, operationId)
        .exec();
      if (status) {
        await this.client.hIncrBy(this.statusCountsKey, status, -1);
      }
    }
  }

  private recordKey(operationId: string): string {
    return `${this.prefix}audit:record:${operationId}`;
  }

  private eventsKey(operationId: string): string {
    return `${this.prefix}audit:events:${operationId}`;
  }
}

export function fromAuditFields(
  fields: Record<string, string>,
  rawEvents: string[]
): OperationAuditRecord | undefined {
  if (!fields.operationId || !fields.createdAt || !fields.updatedAt || !fields.status) {
    return undefined;
  }
  const events: OperationAuditEvent[] = [];
  for (const raw of rawEvents) {
    const parsed = parseAuditEvent(raw);
    if (parsed) {
      events.push(parsed);
    }
  }
  return {
    operationId: fields.operationId,
    createdAt: fields.createdAt,
    updatedAt: fields.updatedAt,
    status: fields.status,
    kind: fields.kind,
    source: fields.source,
    target: fields.target,
    summary: fields.summary,
    errorKind: fields.errorKind,
    events
  };
}

export function parseAuditEvent(raw: string): OperationAuditEvent | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (typeof parsed !== "object" || parsed === null) {
    return undefined;
  }
  const value = Object.fromEntries(
    Object.entries(parsed).filter((entry): entry is [string, string] => typeof entry[1] === "string")
  );
  if (!value.operationId || !value.timestamp || !value.status) {
    return undefined;
  }
  return {
    operationId: value.operationId,
    timestamp: value.timestamp,
    status: value.status,
    ...(value.kind ? { kind: value.kind } : {}),
    ...(value.source ? { source: value.source } : {}),
    ...(value.target ? { target: value.target } : {}),
    ...(value.summary ? { summary: value.summary } : {}),
    ...(value.errorKind ? { errorKind: value.errorKind } : {})
  };
}

function parseConnectTimeout(raw: number | undefined): number | undefined {
  if (typeof raw !== "number" || !Number.isFinite(raw) || raw <= 0) {
    return undefined;
  }
  return Math.floor(raw);
}
