import { promises as fs } from "node:fs";
import path from "node:path";
import { parseAuditEvent } from "./redis-stores.js";
import type {
  AuditIndexStore,
  AuditRecordFilter,
  OperationAuditEvent,
  OperationAuditRecord
} from "./store-types.js";

/**
 * Append-only JSONL log of operation lifecycle events, mirrored into an index
 * store for lookups. Writes are applied in submission order.
 */
export class AuditStore {
  private chain: Promise<void> = Promise.resolve();

  constructor(
    private readonly index: AuditIndexStore,
    private readonly auditPath?: string,
    private readonly maxRecords = 2000
  ) {}

  record(event: OperationAuditEvent): Promise<void> {
    const next = this.chain.then(async () => {
      await this.index.applyEvent(event, this.maxRecords);
      await this.appendEvent(event);
    });
    // a failed write rejects for its caller only
    this.chain = next.catch(() => undefined);
    return next;
  }

  async flush(): Promise<void> {
    await this.chain;
  }

  async hydrateFromDisk(): Promise<number> {
    if (!this.auditPath) {
      return 0;
    }
    const fullPath = path.resolve(this.auditPath);
    let content: string;
    try {
      content = await fs.readFile(fullPath, "utf8");
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return 0;
      }
      throw error;
    }

    let applied = 0;
    for (const rawLine of content.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line) {
        continue;
      }
      const event = parseAuditEvent(line);
      if (!event) {
        continue;
      }
      await this.index.applyEvent(event, this.maxRecords);
      applied += 1;
    }
    return applied;
  }

  async get(operationId: string): Promise<OperationAuditRecord | undefined> {
    await this.flush();
    return this.index.get(operationId);
  }

  async listRecent(limit = 50, filter?: AuditRecordFilter): Promise<OperationAuditRecord[]> {
    await this.flush();
    return this.index.listRecent(limit, filter);
  }

  async count(): Promise<number> {
    await this.flush();
    return this.index.count();
  }

  async statusCounts(): Promise<Record<string, number>> {
    await this.flush();
    return this.index.statusCounts();
  }

  private async appendEvent(event: OperationAuditEvent): Promise<void> {
    if (!this.auditPath) {
      return;
    }
    const fullPath = path.resolve(this.auditPath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.appendFile(fullPath, `${JSON.stringify(event)}\n`, "utf8");
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
