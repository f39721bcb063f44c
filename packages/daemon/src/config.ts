import { parsePositiveInt } from "@softcenter/ops-core";

export type DaemonConfig = {
  host: string;
  port: number;
  auditLogPath?: string;
  auditMaxRecords: number;
  submissionTtlMs: number;
  adminToken?: string;
  // browser origins allowed to open /events besides the daemon's own
  allowedOrigins: string[];
};

type Env = Record<string, string | undefined>;

export const DEFAULT_AUDIT_LOG_PATH = "audit/softcenter-operation-events.jsonl";

export function loadDaemonConfigFromEnv(env: Env = process.env): DaemonConfig {
  const auditLogPath = env.SOFTCENTER_AUDIT_LOG_PATH ?? DEFAULT_AUDIT_LOG_PATH;
  const adminToken = env.SOFTCENTER_ADMIN_TOKEN?.trim();
  return {
    host: env.SOFTCENTER_HOST?.trim() || "127.0.0.1",
    port: parsePositiveInt(env.SOFTCENTER_PORT, 8790),
    // an empty path keeps the audit trail in memory only
    ...(auditLogPath.trim() ? { auditLogPath: auditLogPath.trim() } : {}),
    auditMaxRecords: parsePositiveInt(env.SOFTCENTER_AUDIT_MAX_RECORDS, 2000),
    submissionTtlMs: parsePositiveInt(env.SOFTCENTER_SUBMISSION_TTL_MS, 24 * 60 * 60 * 1000),
    ...(adminToken ? { adminToken } : {}),
    allowedOrigins: (env.SOFTCENTER_ALLOWED_ORIGINS ?? "")
      .split(",")
      .map((origin) => origin.trim())
      .filter(Boolean)
  };
}
