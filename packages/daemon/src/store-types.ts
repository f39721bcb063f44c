import type { SubmissionKeyStore } from "@softcenter/shared";

export type StoreMode = "memory" | "redis";

export type OperationAuditEvent = {
  operationId: string;
  timestamp: string;
  status: string;
  kind?: string;
  source?: string;
  target?: string;
  summary?: string;
  errorKind?: string;
};

export type OperationAuditRecord = {
  operationId: string;
  kind?: string;
  source?: string;
  target?: string;
  createdAt: string;
  updatedAt: string;
  status: string;
  summary?: string;
  errorKind?: string;
  events: OperationAuditEvent[];
};

export type AuditRecordFilter = {
  status?: string;
  kind?: string;
  source?: string;
};

export interface AuditIndexStore {
  applyEvent(event: OperationAuditEvent, maxRecords: number): Promise<void>;
  get(operationId: string): Promise<OperationAuditRecord | undefined>;
  listRecent(limit: number, filter?: AuditRecordFilter): Promise<OperationAuditRecord[]>;
  count(): Promise<number>;
  statusCounts(): Promise<Record<string, number>>;
}

export type DaemonStoreDiagnostics = {
  configuredMode: StoreMode;
  mode: StoreMode;
  degraded: boolean;
  redisErrorCount: number;
  lastRedisError?: string;
};

export type DaemonStores = {
  submissionKeys: SubmissionKeyStore & { close?: () => Promise<void> };
  auditIndex: AuditIndexStore;
  diagnostics: DaemonStoreDiagnostics;
  close: () => Promise<void>;
};
