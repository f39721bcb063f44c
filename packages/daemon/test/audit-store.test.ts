import { describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { AuditStore } from "../src/audit-store.js";
import { MemoryAuditIndexStore } from "../src/memory-stores.js";
import type { AuditIndexStore } from "../src/store-types.js";

describe("AuditStore", () => {
  it("records and returns operation history", async () => {
    const store = new AuditStore(new MemoryAuditIndexStore());
    await store.record({
      operationId: "op-1",
      timestamp: "2026-03-01T00:00:00.000Z",
      status: "queued",
      kind: "install",
      source: "aur",
      target: "yay-bin"
    });
    await store.record({
      operationId: "op-1",
      timestamp: "2026-03-01T00:00:01.000Z",
      status: "running"
    });

    const record = await store.get("op-1");
    expect(record?.status).toBe("running");
    expect(record?.source).toBe("aur");
    expect(record?.events.length).toBe(2);
  });

  it("applies unawaited writes in order before reads", async () => {
    const store = new AuditStore(new MemoryAuditIndexStore());
    void store.record({ operationId: "op-1", timestamp: "2026-03-01T00:00:00.000Z", status: "queued" });
    void store.record({ operationId: "op-1", timestamp: "2026-03-01T00:00:01.000Z", status: "authorizing" });
    void store.record({ operationId: "op-1", timestamp: "2026-03-01T00:00:02.000Z", status: "success" });

    expect((await store.get("op-1"))?.events.map((event) => event.status))
      .toEqual(["queued", "authorizing", "success"]);
    expect(await store.statusCounts()).toEqual({ success: 1 });
  });

  it("keeps accepting writes after one fails", async () => {
    const memory = new MemoryAuditIndexStore();
    let failNext = true;
    const flaky: AuditIndexStore = {
      applyEvent: async (event, maxRecords) => {
        if (failNext) {
          failNext = false;
          throw new Error("index unavailable");
        }
        await memory.applyEvent(event, maxRecords);
      },
      get: (operationId) => memory.get(operationId),
      listRecent: (limit, filter) => memory.listRecent(limit, filter),
      count: () => memory.count(),
      statusCounts: () => memory.statusCounts()
    };
    const store = new AuditStore(flaky);
    await expect(store.record({ operationId: "a", timestamp: "2026-03-01T00:00:00.000Z", status: "queued" }))
      .rejects.toThrow("index unavailable");
    await store.record({ operationId: "b", timestamp: "2026-03-01T00:00:01.000Z", status: "queued" });
    expect(await store.count()).toBe(1);
  });

  it("appends JSONL and restores it into a fresh index", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "softcenter-audit-"));
    const auditPath = path.join(dir, "nested", "events.jsonl");
    try {
      const writer = new AuditStore(new MemoryAuditIndexStore(), auditPath);
      await writer.record({ operationId: "op-1", timestamp: "2026-03-01T00:00:00.000Z", status: "queued" });
      await writer.record({ operationId: "op-1", timestamp: "2026-03-01T00:00:03.000Z", status: "success" });

      const lines = (await readFile(auditPath, "utf8")).trim().split("\n");
      expect(lines).toHaveLength(2);
      expect(JSON.parse(lines[1] ?? "{}")).toEqual({
        operationId: "op-1",
        timestamp: "2026-03-01T00:00:03.000Z",
        status: "success"
      });

      const reader = new AuditStore(new MemoryAuditIndexStore(), auditPath);
      expect(await reader.hydrateFromDisk()).toBe(2);
      expect((await reader.get("op-1"))?.status).toBe("success");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("skips unreadable lines while hydrating", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "softcenter-audit-"));
    const auditPath = path.join(dir, "events.jsonl");
    try {
      await writeFile(auditPath, [
        JSON.stringify({ operationId: "a", timestamp: "2026-03-01T00:00:00.000Z", status: "queued" }),
        "{broken",
        "",
        JSON.stringify({ operationId: "b", status: "queued" }),
        JSON.stringify({ operationId: "c", timestamp: "2026-03-01T00:00:01.000Z", status: "cancelled" })
      ].join("\n"), "utf8");
      const store = new AuditStore(new MemoryAuditIndexStore(), auditPath);
      expect(await store.hydrateFromDisk()).toBe(2);
      expect((await store.listRecent(10)).map((record) => record.operationId)).toEqual(["c", "a"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("treats a missing log as empty", async () => {
    const store = new AuditStore(new MemoryAuditIndexStore(), path.join(os.tmpdir(), "softcenter-missing", "none.jsonl"));
    expect(await store.hydrateFromDisk()).toBe(0);
    expect(await new AuditStore(new MemoryAuditIndexStore()).hydrateFromDisk()).toBe(0);
  });

  it("prunes old records when max exceeded", async () => {
    const store = new AuditStore(new MemoryAuditIndexStore(), undefined, 1);
    await store.record({ operationId: "old", timestamp: "2026-03-01T00:00:00.000Z", status: "success" });
    await store.record({ operationId: "new", timestamp: "2026-03-01T00:00:01.000Z", status: "queued" });
    expect(await store.get("old")).toBeUndefined();
    expect(await store.count()).toBe(1);
  });
});
