import path from "node:path";
import { promises as fs, type Dirent } from "node:fs";
import {
  createOperationDescriptor,
  type DiagnosticCheck,
  type DiagnosticStatus,
  type MaintenanceAction,
  type OperationDescriptor
} from "@softcenter/shared";
import { createLogger, type Logger } from "./logger.js";
import { runSpawnProcess, type SpawnFn } from "./processRunner.js";

export type InspectorCommandResult = {
  code: number | null;
  stdout: string;
  errorCode?: string;
};

export type DiskUsage = {
  totalBytes: number;
  freeBytes: number;
};

/** Read-only view of the machine. Nothing behind it may change system state. */
export interface SystemInspector {
  diskUsage(target: string): Promise<DiskUsage>;
  exists(target: string): Promise<boolean>;
  directorySize(target: string): Promise<number>;
  modifiedAt(target: string): Promise<Date | undefined>;
  brokenSymlinks(dirs: readonly string[], limit: number): Promise<string[]>;
  run(command: string, args: readonly string[]): Promise<InspectorCommandResult>;
}

export const PACMAN_LOCK_PATH = "/var/lib/pacman/db.lck";
export const PACMAN_CACHE_DIR = "/var/cache/pacman/pkg";
export const MIRRORLIST_PATH = "/etc/pacman.d/mirrorlist";
export const KEYRING_FILES = ["/etc/pacman.d/gnupg/pubring.gpg", "/etc/pacman.d/gnupg/trustdb.gpg"];
export const SYMLINK_DIRS = ["/usr/bin", "/usr/lib"];

const GIB = 1024 ** 3;
const DAY_MS = 24 * 60 * 60 * 1000;
const DISK_CRITICAL_BYTES = 1 * GIB;
const DISK_WARNING_BYTES = 5 * GIB;
const CACHE_WARNING_BYTES = 5 * GIB;
const MIRRORLIST_MAX_AGE_DAYS = 30;
const BROKEN_SYMLINK_LIMIT = 10;

const REFLECTOR_ARGV = [
  "reflector",
  "--latest",
  "10",
  "--sort",
  "rate",
  "--save",
  MIRRORLIST_PATH
];

type CheckOutcome = {
  status: DiagnosticStatus;
  detail: string;
  fix?: { argv: string[]; label: string };
};

type CheckDefinition = {
  id: string;
  name: string;
  run(inspector: SystemInspector, now: Date): Promise<CheckOutcome>;
};

export const DIAGNOSTIC_CHECKS: readonly CheckDefinition[] = [
  {
    id: "disk_space",
    name: "Disk space",
    async run(inspector) {
      const usage = await inspector.diskUsage("/");
      const usedPct = usage.totalBytes > 0
        ? Math.round(((usage.totalBytes - usage.freeBytes) / usage.totalBytes) * 100)
        : 0;
      const detail = `${formatGiB(usage.freeBytes)} free (${usedPct}% used)`;
      if (usage.freeBytes < DISK_CRITICAL_BYTES) {
        return {
          status: "critical",
          detail,
          fix: { argv: ["pacman", "-Scc", "--noconfirm"], label: "Clear the whole package cache" }
        };
      }
      if (usage.freeBytes < DISK_WARNING_BYTES) {
        return {
          status: "warning",
          detail,
          fix: { argv: ["pacman", "-Sc", "--noconfirm"], label: "Clear uninstalled packages from the cache" }
        };
      }
      return { status: "ok", detail };
    }
  },
  {
    id: "keyring",
    name: "Pacman keyring",
    async run(inspector) {
      const missing: string[] = [];
      for (const file of KEYRING_FILES) {
        if (!(await inspector.exists(file))) {
          missing.push(file);
        }
      }
      if (missing.length > 0) {
        return {
          status: "critical",
          detail: `keyring files missing: ${missing.join(", ")}`,
          fix: { argv: ["pacman-key", "--init"], label: "Initialize the pacman keyring" }
        };
      }
      return { status: "ok", detail: "keyring present" };
    }
  },
  {
    id: "orphans",
    name: "Orphaned packages",
    async run(inspector) {
      const result = await inspector.run("pacman", ["-Qdtq"]);
      if (result.errorCode) {
        throw new Error(`pacman could not run (${result.errorCode})`);
      }
      const orphans = nonEmptyLines(result.stdout);
      if (orphans.length === 0) {
        return { status: "ok", detail: "no orphaned packages" };
      }
      const preview = orphans.slice(0, 5).join(", ");
      return {
        status: "warning",
        detail: `${orphans.length} orphaned package(s): ${preview}${orphans.length > 5 ? ", ..." : ""}`,
        fix: { argv: ["pacman", "-Rns", "--noconfirm", ...orphans], label: "Remove orphaned packages" }
      };
    }
  },
  {
    id: "package_cache",
    name: "Package cache",
    async run(inspector) {
      const size = await inspector.directorySize(PACMAN_CACHE_DIR);
      const detail = `cache uses ${formatGiB(size)}`;
      if (size > CACHE_WARNING_BYTES) {
        return {
          status: "warning",
          detail,
          fix: { argv: ["paccache", "-r"], label: "Keep only the last three versions of each package" }
        };
      }
      return { status: "ok", detail };
    }
  },
  {
    id: "failed_services",
    name: "System services",
    async run(inspector) {
      const result = await inspector.run("systemctl", ["--failed", "--no-pager", "--no-legend"]);
      if (result.errorCode) {
        throw new Error(`systemctl could not run (${result.errorCode})`);
      }
      const units = nonEmptyLines(result.stdout)
        .map((line) => line.replace(/^[●*]\s*/, "").split(/\s+/)[0] ?? line)
        .filter(Boolean);
      if (units.length === 0) {
        return { status: "ok", detail: "no failed units" };
      }
      return { status: "warning", detail: `${units.length} failed unit(s): ${units.join(", ")}` };
    }
  },
  {
    id: "broken_symlinks",
    name: "Broken symlinks",
    async run(inspector) {
      const broken = await inspector.brokenSymlinks(SYMLINK_DIRS, BROKEN_SYMLINK_LIMIT);
      if (broken.length === 0) {
        return { status: "ok", detail: "no broken symlinks in /usr/bin or /usr/lib" };
      }
      return { status: "warning", detail: `broken symlink(s): ${broken.join(", ")}` };
    }
  },
  {
    id: "pacman_lock",
    name: "Pacman lock",
    async run(inspector) {
      if (!(await inspector.exists(PACMAN_LOCK_PATH))) {
        return { status: "ok", detail: "no lock file" };
      }
      const running = await inspector.run("pgrep", ["-x", "pacman"]);
      if (running.code === 0) {
        return { status: "warning", detail: "lock held by a running pacman process" };
      }
      // pgrep exits 1 only when nothing matched
      if (running.errorCode || running.code !== 1) {
        return {
          status: "warning",
          detail: `lock file present; could not check for a running pacman (${running.errorCode ?? `pgrep exited with ${running.code}`})`
        };
      }
      return {
        status: "critical",
        detail: `stale lock file ${PACMAN_LOCK_PATH} with no pacman process`,
        fix: { argv: ["rm", "-f", PACMAN_LOCK_PATH], label: "Remove the stale pacman lock" }
      };
    }
  },
  {
    id: "mirrorlist_age",
    name: "Mirror list",
    async run(inspector, now) {
      const modified = await inspector.modifiedAt(MIRRORLIST_PATH);
      const fix = { argv: [...REFLECTOR_ARGV], label: "Rank the fastest recent mirrors" };
      if (!modified) {
        return { status: "warning", detail: `${MIRRORLIST_PATH} not found`, fix };
      }
      const ageDays = Math.floor((now.getTime() - modified.getTime()) / DAY_MS);
      if (ageDays > MIRRORLIST_MAX_AGE_DAYS) {
        return { status: "warning", detail: `mirror list last updated ${ageDays} days ago`, fix };
      }
      return { status: "ok", detail: `mirror list updated ${ageDays} day(s) ago` };
    }
  }
];

const MAINTENANCE_ACTIONS: ReadonlyArray<{ id: string; label: string; argv: string[] }> = [
  { id: "keyring_init", label: "Initialize the pacman keyring", argv: ["pacman-key", "--init"] },
  { id: "keyring_populate", label: "Populate the Arch Linux keyring", argv: ["pacman-key", "--populate", "archlinux"] },
  { id: "cache_trim", label: "Keep only the latest cached version", argv: ["paccache", "-rk1"] },
  { id: "mirrors_refresh", label: "Rank the fastest recent mirrors", argv: [...REFLECTOR_ARGV] },
  { id: "databases_refresh", label: "Force a package database refresh", argv: ["pacman", "-Syy"] }
];

export type DiagnosticsEngineOptions = {
  inspector?: SystemInspector;
  now?: () => Date;
  logger?: Logger;
};

export class DiagnosticsEngine {
  private readonly inspector: SystemInspector;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private latest = new Map<string, DiagnosticCheck>();

  constructor(options: DiagnosticsEngineOptions = {}) {
    this.inspector = options.inspector ?? new NodeSystemInspector();
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger("diagnostics");
  }

  async runChecks(): Promise<DiagnosticCheck[]> {
    const now = this.now();
    const results = await Promise.all(DIAGNOSTIC_CHECKS.map((check) => this.runOne(check, now)));
    this.latest = new Map(results.map((check) => [check.id, check]));
    return results;
  }

  remediationFor(checkId: string): OperationDescriptor | undefined {
    return this.latest.get(checkId)?.remediation;
  }

  maintenanceActions(): MaintenanceAction[] {
    return MAINTENANCE_ACTIONS.map((action) => ({
      id: action.id,
      label: action.label,
      descriptor: fixDescriptor(action.id, action.argv, action.label)
    }));
  }

  maintenanceAction(actionId: string): OperationDescriptor | undefined {
    return this.maintenanceActions().find((action) => action.id === actionId)?.descriptor;
  }

  /** Disk and lock state plus a sync-database lookup for every package about to be installed. */
  async preInstallChecks(packages: readonly string[]): Promise<DiagnosticCheck[]> {
    const now = this.now();
    const base = DIAGNOSTIC_CHECKS.filter((check) => check.id === "disk_space" || check.id === "pacman_lock");
    const results = await Promise.all(base.map((check) => this.runOne(check, now)));
    for (const name of packages) {
      results.push(await this.runOne({
        id: `package:${name}`,
        name: `Package ${name}`,
        run: async (inspector) => {
          const info = await inspector.run("pacman", ["-Si", name]);
          return info.code === 0
            ? { status: "ok", detail: "found in the sync databases" }
            : { status: "warning", detail: "not found in the sync databases" };
        }
      }, now));
    }
    return results;
  }

  async verifyInstalled(packages: readonly string[]): Promise<DiagnosticCheck[]> {
    const now = this.now();
    return await Promise.all(packages.map((name) => this.runOne({
      id: `installed:${name}`,
      name: `Package ${name}`,
      run: async (inspector) => {
        const query = await inspector.run("pacman", ["-Q", name]);
        return query.code === 0
          ? { status: "ok", detail: query.stdout.trim() || "installed" }
          : { status: "critical", detail: "not installed after the operation" };
      }
    }, now)));
  }

  private async runOne(check: CheckDefinition, now: Date): Promise<DiagnosticCheck> {
    try {
      const outcome = await check.run(this.inspector, now);
      return {
        id: check.id,
        name: check.name,
        status: outcome.status,
        detail: outcome.detail,
        ...(outcome.fix ? { remediation: fixDescriptor(check.id, outcome.fix.argv, outcome.fix.label) } : {})
      };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.warn({ check: check.id, err: error }, "diagnostic check failed");
      return { id: check.id, name: check.name, status: "warning", detail: `check failed: ${detail}` };
    }
  }
}

function fixDescriptor(id: string, argv: string[], label: string): OperationDescriptor {
  return createOperationDescriptor({
    kind: "diagnostic_fix",
    source: "repo",
    target: id,
    requiresPrivilege: true,
    options: { argv, label }
  });
}

function nonEmptyLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

export function formatGiB(bytes: number): string {
  return `${(bytes / GIB).toFixed(1)} GiB`;
}

export type NodeSystemInspectorOptions = {
  spawn?: SpawnFn;
  commandTimeoutMs?: number;
};

export class NodeSystemInspector implements SystemInspector {
  private readonly spawnFn: SpawnFn;
  private readonly commandTimeoutMs: number;

  constructor(options: NodeSystemInspectorOptions = {}) {
    this.spawnFn = options.spawn ?? runSpawnProcess;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 10_000;
  }

  async diskUsage(target: string): Promise<DiskUsage> {
    const stats = await fs.statfs(target);
    return {
      totalBytes: stats.blocks * stats.bsize,
      freeBytes: stats.bavail * stats.bsize
    };
  }

  async exists(target: string): Promise<boolean> {
    try {
      await fs.access(target);
      return true;
    } catch {
      return false;
    }
  }

  async directorySize(target: string): Promise<number> {
    const entries = await fs.readdir(target, { withFileTypes: true });
    let total = 0;
    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }
      const stats = await fs.stat(path.join(target, entry.name));
      total += stats.size;
    }
    return total;
  }

  async modifiedAt(target: string): Promise<Date | undefined> {
    try {
      return (await fs.stat(target)).mtime;
    } catch {
      return undefined;
    }
  }

  async brokenSymlinks(dirs: readonly string[], limit: number): Promise<string[]> {
    const broken: string[] = [];
    for (const dir of dirs) {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch {
        continue;
      }
      for (const entry of entries) {
        if (!entry.isSymbolicLink()) {
          continue;
        }
        const full = path.join(dir, entry.name);
        if (!(await this.exists(full))) {
          broken.push(full);
          if (broken.length >= limit) {
            return broken;
          }
        }
      }
    }
    return broken;
  }

  async run(command: string, args: readonly string[]): Promise<InspectorCommandResult> {
    const stdout: string[] = [];
    const result = await this.spawnFn(command, args, {
      gracePeriodMs: 1_000,
      maxTailLines: 20,
      timeoutMs: this.commandTimeoutMs,
      onLine: (line, stream) => {
        if (stream === "stdout") {
          stdout.push(line);
        }
      }
    });
    return {
      code: result.timedOut ? null : result.code,
      stdout: stdout.join("\n"),
      ...(result.errorCode ? { errorCode: result.errorCode } : {})
    };
  }
}
