import { Writable } from "node:stream";
import pino from "pino";
import { describe, expect, it } from "vitest";
import { createOperationDescriptor } from "@softcenter/shared";
import { buildResult, type OperationRunner } from "../src/executor.js";
import { createSoftwareCenterCore } from "../src/index.js";
import type { PrivilegeAuthorizer } from "../src/privilegeBroker.js";
import { StaticProber } from "./fakes.js";

const allowAll: PrivilegeAuthorizer = {
  authorize: async () => ({ mode: "pkexec", grantedAt: "2026-01-01T00:00:00.000Z" })
};

const instantRunner: OperationRunner = {
  async *execute(operationId) {
    yield { type: "result", result: buildResult(operationId, "success", 0) };
  }
};

function capture(): { stream: Writable; lines: string[] } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(...chunk.toString("utf8").split("\n").filter(Boolean));
      callback();
    }
  });
  return { stream, lines };
}

describe("createSoftwareCenterCore", () => {
  it("tags component loggers without repeating the caller's scope", async () => {
    const { stream, lines } = capture();
    const logger = pino({ level: "info" }, stream).child({ scope: "daemon" });
    const core = createSoftwareCenterCore(undefined, {
      prober: new StaticProber(new Set(["pacman"])),
      broker: allowAll,
      executor: instantRunner,
      logger
    });
    const operationId = core.queue.submit(createOperationDescriptor({ kind: "install", source: "repo", target: "vim" }));
    await core.queue.result(operationId);
    await core.queue.close();

    const line = lines.find((entry) => entry.includes(operationId));
    expect(line).toBeDefined();
    expect(line?.match(/"scope":/g)).toHaveLength(1);
    expect(JSON.parse(line ?? "{}")).toMatchObject({ scope: "daemon", component: "operation-queue", operationId });
  });
});
