import { MemorySubmissionKeyStore } from "@softcenter/shared";
import type {
  AuditIndexStore,
  AuditRecordFilter,
  OperationAuditEvent,
  OperationAuditRecord
} from "./store-types.js";

export class MemoryAuditIndexStore implements AuditIndexStore {
  private readonly records = new Map<string, OperationAuditRecord>();

  async applyEvent(event: OperationAuditEvent, maxRecords: number): Promise<void> {
    const current = this.records.get(event.operationId);
    if (!current) {
      this.records.set(event.operationId, {
        operationId: event.operationId,
        kind: event.kind,
        source: event.source,
        target: event.target,
        createdAt: event.timestamp,
        updatedAt: event.timestamp,
        status: event.status,
        summary: event.summary,
        errorKind: event.errorKind,
        events: [event]
      });
    } else {
      mergeAuditEvent(current, event);
    }

    if (this.records.size > maxRecords) {
      const overflow = this.records.size - maxRecords;
      const oldest = [...this.records.values()]
        .sort((a, b) => a.updatedAt.localeCompare(b.updatedAt))
        .slice(0, overflow);
      for (const record of oldest) {
        this.records.delete(record.operationId);
      }
    }
  }

  async get(operationId: string): Promise<OperationAuditRecord | undefined> {
    const record = this.records.get(operationId);
    if (!record) {
      return undefined;
    }
    return {
      ...record,
      events: [...record.events]
    };
  }

  async listRecent(limit: number, filter?: AuditRecordFilter): Promise<OperationAuditRecord[]> {
    return [...this.records.values()]
      .filter((item) => matchesFilter(item, filter))
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))
      .slice(0, Math.max(1, limit))
      .map((record) => ({
        ...record,
        events: [...record.events]
      }));
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async statusCounts(): Promise<Record<string, number>> {
    const result: Record<string, number> = {};
    for (const record of this.records.values()) {
      result[record.status] = (result[record.status] ?? 0) + 1;
    }
    return result;
  }
}

export function mergeAuditEvent(current: OperationAuditRecord, event: OperationAuditEvent): void {
  current.updatedAt = event.timestamp;
  current.status = event.status;
  if (event.summary) {
    current.summary = event.summary;
  }
  if (event.kind) {
    current.kind = event.kind;
  }
  if (event.source) {
    current.source = event.source;
  }
  if (event.target) {
    current.target = event.target;
  }
  if (event.errorKind) {
    current.errorKind = event.errorKind;
  }
  current.events.push(event);
}

export function matchesFilter(record: OperationAuditRecord, filter?: AuditRecordFilter): boolean {
  if (filter?.status && record.status !== filter.status) {
    return false;
  }
  if (filter?.kind && record.kind !== filter.kind) {
    return false;
  }
  if (filter?.source && record.source !== filter.source) {
    return false;
  }
  return true;
}

export function createMemorySubmissionKeyStore(): MemorySubmissionKeyStore {
  return new MemorySubmissionKeyStore();
}
