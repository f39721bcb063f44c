import { afterEach, describe, expect, it, vi } from "vitest";
import { MemorySubmissionKeyStore } from "../src/idempotency.js";

describe("MemorySubmissionKeyStore", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("remembers request ids until they expire", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
    const store = new MemorySubmissionKeyStore();
    await store.remember("req-1", "op-1", 1_000);
    expect(await store.lookup("req-1")).toBe("op-1");

    vi.setSystemTime(new Date("2026-01-01T00:00:01Z"));
    expect(await store.lookup("req-1")).toBeUndefined();
  });

  it("returns undefined for unknown ids", async () => {
    const store = new MemorySubmissionKeyStore();
    expect(await store.lookup("missing")).toBeUndefined();
  });
});
