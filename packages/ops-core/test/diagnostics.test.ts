import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  DiagnosticsEngine,
  formatGiB,
  KEYRING_FILES,
  MIRRORLIST_PATH,
  NodeSystemInspector,
  PACMAN_CACHE_DIR,
  PACMAN_LOCK_PATH,
  type DiskUsage,
  type InspectorCommandResult,
  type SystemInspector
} from "../src/diagnostics.js";
import { silentLogger } from "../src/logger.js";
import { recordingSpawn, spawnResult } from "./fakes.js";

const GIB = 1024 ** 3;
const NOW = new Date("2026-03-31T12:00:00.000Z");

class FakeInspector implements SystemInspector {
  disk: DiskUsage = { totalBytes: 100 * GIB, freeBytes: 50 * GIB };
  present = new Set<string>(KEYRING_FILES);
  sizes = new Map<string, number>([[PACMAN_CACHE_DIR, 1 * GIB]]);
  modified = new Map<string, Date>([[MIRRORLIST_PATH, new Date("2026-03-29T12:00:00.000Z")]]);
  broken: string[] = [];
  commands = new Map<string, InspectorCommandResult>();
  readonly ran: string[] = [];

  async diskUsage(): Promise<DiskUsage> {
    return this.disk;
  }

  async exists(target: string): Promise<boolean> {
    return this.present.has(target);
  }

  async directorySize(target: string): Promise<number> {
    return this.sizes.get(target) ?? 0;
  }

  async modifiedAt(target: string): Promise<Date | undefined> {
    return this.modified.get(target);
  }

  async brokenSymlinks(_dirs: readonly string[], limit: number): Promise<string[]> {
    return this.broken.slice(0, limit);
  }

  async run(command: string, args: readonly string[]): Promise<InspectorCommandResult> {
    const key = [command, ...args].join(" ");
    this.ran.push(key);
    return this.commands.get(key) ?? { code: 0, stdout: "" };
  }
}

function engineWith(inspector: SystemInspector): DiagnosticsEngine {
  return new DiagnosticsEngine({ inspector, now: () => NOW, logger: silentLogger() });
}

describe("DiagnosticsEngine.runChecks", () => {
  it("reports a healthy machine", async () => {
    const checks = await engineWith(new FakeInspector()).runChecks();
    expect(checks.map((check) => [check.id, check.status, check.detail])).toEqual([
      ["disk_space", "ok", "50.0 GiB free (50% used)"],
      ["keyring", "ok", "keyring present"],
      ["orphans", "ok", "no orphaned packages"],
      ["package_cache", "ok", "cache uses 1.0 GiB"],
      ["failed_services", "ok", "no failed units"],
      ["broken_symlinks", "ok", "no broken symlinks in /usr/bin or /usr/lib"],
      ["pacman_lock", "ok", "no lock file"],
      ["mirrorlist_age", "ok", "mirror list updated 2 day(s) ago"]
    ]);
    expect(checks.every((check) => check.remediation === undefined)).toBe(true);
  });

  it("grades free disk space against both thresholds", async () => {
    const inspector = new FakeInspector();
    inspector.disk = { totalBytes: 10 * GIB, freeBytes: 3 * GIB };
    const engine = engineWith(inspector);
    const [warning] = await engine.runChecks();
    expect(warning).toMatchObject({ status: "warning", detail: "3.0 GiB free (70% used)" });
    expect(warning?.remediation?.options?.argv).toEqual(["pacman", "-Sc", "--noconfirm"]);

    inspector.disk = { totalBytes: 10 * GIB, freeBytes: 0.5 * GIB };
    const [critical] = await engine.runChecks();
    expect(critical).toMatchObject({ status: "critical", detail: "0.5 GiB free (95% used)" });
    expect(engine.remediationFor("disk_space")).toEqual({
      kind: "diagnostic_fix",
      target: "disk_space",
      source: "repo",
      requiresPrivilege: true,
      options: { argv: ["pacman", "-Scc", "--noconfirm"], label: "Clear the whole package cache" }
    });
  });

  it("flags missing keyring files", async () => {
    const inspector = new FakeInspector();
    inspector.present = new Set([KEYRING_FILES[0] ?? ""]);
    const checks = await engineWith(inspector).runChecks();
    const keyring = checks.find((check) => check.id === "keyring");
    expect(keyring?.status).toBe("critical");
    expect(keyring?.detail).toBe("keyring files missing: /etc/pacman.d/gnupg/trustdb.gpg");
    expect(keyring?.remediation?.options?.argv).toEqual(["pacman-key", "--init"]);
  });

  it("lists orphans and offers to remove them", async () => {
    const inspector = new FakeInspector();
    inspector.commands.set("pacman -Qdtq", { code: 0, stdout: "p1\np2\np3\np4\np5\np6\n" });
    const engine = engineWith(inspector);
    const checks = await engine.runChecks();
    expect(checks.find((check) => check.id === "orphans")?.detail)
      .toBe("6 orphaned package(s): p1, p2, p3, p4, p5, ...");
    expect(engine.remediationFor("orphans")?.options?.argv)
      .toEqual(["pacman", "-Rns", "--noconfirm", "p1", "p2", "p3", "p4", "p5", "p6"]);
  });

  it("names failed units without their status markers", async () => {
    const inspector = new FakeInspector();
    inspector.commands.set("systemctl --failed --no-pager --no-legend", {
      code: 0,
      stdout: "● nginx.service loaded failed failed Web server\nbackup.timer loaded failed failed Backups\n"
    });
    const checks = await engineWith(inspector).runChecks();
    const services = checks.find((check) => check.id === "failed_services");
    expect(services).toEqual({
      id: "failed_services",
      name: "System services",
      status: "warning",
      detail: "2 failed unit(s): nginx.service, backup.timer"
    });
  });

  it("warns about a large cache and broken symlinks", async () => {
    const inspector = new FakeInspector();
    inspector.sizes.set(PACMAN_CACHE_DIR, 6 * GIB);
    inspector.broken = ["/usr/bin/old-tool"];
    const checks = await engineWith(inspector).runChecks();
    expect(checks.find((check) => check.id === "package_cache")?.detail).toBe("cache uses 6.0 GiB");
    expect(checks.find((check) => check.id === "broken_symlinks")?.detail)
      .toBe("broken symlink(s): /usr/bin/old-tool");
  });

  it("tells a stale pacman lock from one that is held", async () => {
    const inspector = new FakeInspector();
    inspector.present.add(PACMAN_LOCK_PATH);
    inspector.commands.set("pgrep -x pacman", { code: 0, stdout: "4242" });
    const engine = engineWith(inspector);
    let lock = (await engine.runChecks()).find((check) => check.id === "pacman_lock");
    expect(lock).toMatchObject({ status: "warning", detail: "lock held by a running pacman process" });
    expect(engine.remediationFor("pacman_lock")).toBeUndefined();

    inspector.commands.set("pgrep -x pacman", { code: 1, stdout: "" });
    lock = (await engine.runChecks()).find((check) => check.id === "pacman_lock");
    expect(lock?.status).toBe("critical");
    expect(engine.remediationFor("pacman_lock")?.options?.argv).toEqual(["rm", "-f", PACMAN_LOCK_PATH]);
  });

  it("offers no lock removal when pgrep cannot answer", async () => {
    const inspector = new FakeInspector();
    inspector.present.add(PACMAN_LOCK_PATH);
    inspector.commands.set("pgrep -x pacman", { code: null, stdout: "", errorCode: "ENOENT" });
    const engine = engineWith(inspector);
    let lock = (await engine.runChecks()).find((check) => check.id === "pacman_lock");
    expect(lock).toEqual({
      id: "pacman_lock",
      name: "Pacman lock",
      status: "warning",
      detail: "lock file present; could not check for a running pacman (ENOENT)"
    });
    expect(engine.remediationFor("pacman_lock")).toBeUndefined();

    inspector.commands.set("pgrep -x pacman", { code: 3, stdout: "" });
    lock = (await engine.runChecks()).find((check) => check.id === "pacman_lock");
    expect(lock?.detail).toBe("lock file present; could not check for a running pacman (pgrep exited with 3)");
    expect(engine.remediationFor("pacman_lock")).toBeUndefined();
  });

  it("suggests reranking an old or missing mirror list", async () => {
    const inspector = new FakeInspector();
    inspector.modified.set(MIRRORLIST_PATH, new Date("2026-01-01T12:00:00.000Z"));
    const engine = engineWith(inspector);
    const aged = (await engine.runChecks()).find((check) => check.id === "mirrorlist_age");
    expect(aged?.detail).toBe("mirror list last updated 89 days ago");
    expect(aged?.remediation?.options?.argv?.[0]).toBe("reflector");

    inspector.modified.clear();
    const missing = (await engine.runChecks()).find((check) => check.id === "mirrorlist_age");
    expect(missing).toMatchObject({ status: "warning", detail: "/etc/pacman.d/mirrorlist not found" });
  });

  it("turns a check that throws into a warning", async () => {
    const inspector = new FakeInspector();
    inspector.commands.set("pacman -Qdtq", { code: null, stdout: "", errorCode: "ENOENT" });
    const checks = await engineWith(inspector).runChecks();
    expect(checks.find((check) => check.id === "orphans")).toEqual({
      id: "orphans",
      name: "Orphaned packages",
      status: "warning",
      detail: "check failed: pacman could not run (ENOENT)"
    });
  });

  it("reports the same results on repeated runs", async () => {
    const engine = engineWith(new FakeInspector());
    expect(await engine.runChecks()).toEqual(await engine.runChecks());
  });

  it("knows no remediation before any run", () => {
    expect(engineWith(new FakeInspector()).remediationFor("disk_space")).toBeUndefined();
  });
});

describe("DiagnosticsEngine maintenance", () => {
  it("offers privileged maintenance actions", () => {
    const engine = engineWith(new FakeInspector());
    expect(engine.maintenanceActions().map((action) => action.id)).toEqual([
      "keyring_init",
      "keyring_populate",
      "cache_trim",
      "mirrors_refresh",
      "databases_refresh"
    ]);
    expect(engine.maintenanceAction("cache_trim")).toEqual({
      kind: "diagnostic_fix",
      target: "cache_trim",
      source: "repo",
      requiresPrivilege: true,
      options: { argv: ["paccache", "-rk1"], label: "Keep only the latest cached version" }
    });
    expect(engine.maintenanceAction("format_disk")).toBeUndefined();
  });
});

describe("DiagnosticsEngine install checks", () => {
  it("checks disk, lock and sync databases before installing", async () => {
    const inspector = new FakeInspector();
    inspector.commands.set("pacman -Si ghost", { code: 1, stdout: "" });
    const checks = await engineWith(inspector).preInstallChecks(["vim", "ghost"]);
    expect(checks.map((check) => [check.id, check.status, check.detail])).toEqual([
      ["disk_space", "ok", "50.0 GiB free (50% used)"],
      ["pacman_lock", "ok", "no lock file"],
      ["package:vim", "ok", "found in the sync databases"],
      ["package:ghost", "warning", "not found in the sync databases"]
    ]);
  });

  it("verifies packages after an install", async () => {
    const inspector = new FakeInspector();
    inspector.commands.set("pacman -Q vim", { code: 0, stdout: "vim 9.1.0-1\n" });
    inspector.commands.set("pacman -Q ghost", { code: 1, stdout: "" });
    const checks = await engineWith(inspector).verifyInstalled(["vim", "ghost"]);
    expect(checks).toEqual([
      { id: "installed:vim", name: "Package vim", status: "ok", detail: "vim 9.1.0-1" },
      { id: "installed:ghost", name: "Package ghost", status: "critical", detail: "not installed after the operation" }
    ]);
  });
});

describe("formatGiB", () => {
  it("uses one decimal", () => {
    expect(formatGiB(1.25 * GIB)).toBe("1.3 GiB");
    expect(formatGiB(0)).toBe("0.0 GiB");
  });
});

describe("NodeSystemInspector", () => {
  let tmpRoot = "";

  afterEach(async () => {
    if (tmpRoot) {
      await fs.rm(tmpRoot, { recursive: true, force: true });
      tmpRoot = "";
    }
  });

  it("collects stdout and maps timeouts to a null code", async () => {
    const { spawn, calls } = recordingSpawn((call) => {
      call.options.onLine?.("vim 9.1.0-1", "stdout");
      call.options.onLine?.("noise", "stderr");
      return spawnResult({ code: call.args[0] === "-Q" ? 0 : 1, timedOut: call.args[0] === "-Si" });
    });
    const inspector = new NodeSystemInspector({ spawn, commandTimeoutMs: 500 });
    expect(await inspector.run("pacman", ["-Q", "vim"])).toEqual({ code: 0, stdout: "vim 9.1.0-1" });
    expect(await inspector.run("pacman", ["-Si", "vim"])).toEqual({ code: null, stdout: "vim 9.1.0-1" });
    expect(calls[0]?.options.timeoutMs).toBe(500);
  });

  it("passes spawn errors through", async () => {
    const { spawn } = recordingSpawn(() => spawnResult({ code: null, errorCode: "ENOENT" }));
    const inspector = new NodeSystemInspector({ spawn });
    expect(await inspector.run("pgrep", ["-x", "pacman"])).toEqual({ code: null, stdout: "", errorCode: "ENOENT" });
  });

  it("measures directories and finds dangling links", async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), "softcenter-inspect-"));
    await fs.writeFile(path.join(tmpRoot, "a.pkg"), "12345");
    await fs.writeFile(path.join(tmpRoot, "b.pkg"), "678");
    await fs.symlink(path.join(tmpRoot, "missing-target"), path.join(tmpRoot, "dangling"));
    await fs.symlink(path.join(tmpRoot, "a.pkg"), path.join(tmpRoot, "valid"));

    const inspector = new NodeSystemInspector();
    expect(await inspector.directorySize(tmpRoot)).toBe(8);
    expect(await inspector.brokenSymlinks([tmpRoot, path.join(tmpRoot, "nope")], 10))
      .toEqual([path.join(tmpRoot, "dangling")]);
    expect(await inspector.exists(path.join(tmpRoot, "a.pkg"))).toBe(true);
    expect(await inspector.modifiedAt(path.join(tmpRoot, "nope"))).toBeUndefined();
  });
});
