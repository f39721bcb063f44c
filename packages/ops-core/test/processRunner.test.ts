import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { liveChildCount, runSpawnProcess, signalProcessGroup, type OutputStream } from "../src/processRunner.js";

const node = process.execPath;

describe("runSpawnProcess", () => {
  it("streams lines from both pipes and reports the exit code", async () => {
    const lines: Array<[string, OutputStream]> = [];
    const result = await runSpawnProcess(
      node,
      ["-e", "console.log('one'); console.error('two'); process.exit(3)"],
      {
        gracePeriodMs: 500,
        maxTailLines: 10,
        onLine: (line, stream) => lines.push([line, stream])
      }
    );
    expect(result.code).toBe(3);
    expect(result.cancelled).toBe(false);
    expect(lines).toContainEqual(["one", "stdout"]);
    expect(lines).toContainEqual(["two", "stderr"]);
  });

  it("keeps only the last lines of output", async () => {
    const result = await runSpawnProcess(
      node,
      ["-e", "for (let i = 1; i <= 5; i++) console.log('line ' + i)"],
      { gracePeriodMs: 500, maxTailLines: 2 }
    );
    expect(result.code).toBe(0);
    expect(result.outputTail).toBe("line 4\nline 5");
  });

  it("terminates the child when the signal aborts", async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 100);
    const result = await runSpawnProcess(node, ["-e", "setInterval(() => {}, 1000)"], {
      gracePeriodMs: 1_000,
      maxTailLines: 10,
      signal: controller.signal
    });
    expect(result.cancelled).toBe(true);
    expect(result.signal).toBe("SIGTERM");
    expect(Date.now() - started).toBeLessThan(2_500);
  });

  it("stops grandchildren that hold the pipes open", async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 200);
    const result = await runSpawnProcess("sh", ["-c", "sleep 4; true"], {
      gracePeriodMs: 300,
      maxTailLines: 10,
      signal: controller.signal
    });
    expect(result.cancelled).toBe(true);
    expect(Date.now() - started).toBeLessThan(2_000);
  });

  it("also signals the group through the kill prefix", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "softcenter-kill-"));
    const record = path.join(dir, "kill.txt");
    try {
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 100);
      const result = await runSpawnProcess("sh", ["-c", "sleep 4; true"], {
        gracePeriodMs: 300,
        maxTailLines: 10,
        signal: controller.signal,
        killPrefix: ["sh", "-c", 'printf "%s " "$@" > "$0"', record]
      });
      expect(result.cancelled).toBe(true);
      await vi.waitFor(async () => {
        expect(await readFile(record, "utf8")).toMatch(/^kill -s TERM -- -\d+ $/);
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("reports a missing process group by its errno code", () => {
    expect(signalProcessGroup(2 ** 22 + 12_345, "SIGTERM")).toBe("ESRCH");
  });

  it("keeps multibyte characters split across chunks intact", async () => {
    const lines: string[] = [];
    const result = await runSpawnProcess(
      node,
      [
        "-e",
        "process.stdout.write(Buffer.from([0x6f, 0x6b, 0x20, 0xe2])); " +
          "setTimeout(() => process.stdout.write(Buffer.from([0x9c, 0x93, 0x0a])), 50)"
      ],
      { gracePeriodMs: 500, maxTailLines: 10, onLine: (line) => lines.push(line) }
    );
    expect(result.code).toBe(0);
    expect(lines).toEqual(["ok \u2713"]);
  });

  it("escalates to SIGKILL after the grace period", async () => {
    const controller = new AbortController();
    const result = await runSpawnProcess(
      node,
      ["-e", "process.on('SIGTERM', () => {}); console.log('ready'); setInterval(() => {}, 1000)"],
      {
        gracePeriodMs: 300,
        maxTailLines: 10,
        signal: controller.signal,
        onLine: (line) => {
          if (line === "ready") {
            controller.abort();
          }
        }
      }
    );
    expect(result.cancelled).toBe(true);
    expect(result.signal).toBe("SIGKILL");
  });

  it("stops a child that goes quiet past the stall timeout", async () => {
    const result = await runSpawnProcess(node, ["-e", "setInterval(() => {}, 1000)"], {
      gracePeriodMs: 500,
      maxTailLines: 10,
      stallTimeoutMs: 200
    });
    expect(result.stalled).toBe(true);
    expect(result.cancelled).toBe(false);
  });

  it("stops a child that exceeds its timeout", async () => {
    const result = await runSpawnProcess(node, ["-e", "setInterval(() => console.log('tick'), 50)"], {
      gracePeriodMs: 500,
      maxTailLines: 10,
      timeoutMs: 300
    });
    expect(result.timedOut).toBe(true);
    expect(result.stalled).toBe(false);
  });

  it("reports spawn failures without throwing", async () => {
    const result = await runSpawnProcess("/nonexistent/softcenter-missing-tool", [], {
      gracePeriodMs: 500,
      maxTailLines: 10
    });
    expect(result.code).toBeNull();
    expect(result.errorCode).toBe("ENOENT");
    expect(liveChildCount()).toBe(0);
  });
});
