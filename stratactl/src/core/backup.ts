import fs from "node:fs";
import path from "node:path";
import { copyFile, mkdir, readdir, readFile, unlink } from "node:fs/promises";
import { ConfigurationError } from "../errors.js";
import { parseStore } from "../store/persistence.js";
import type { ConfigurationStore } from "../types/store.js";
import { safePath } from "./security.js";

export type BackupInfo = {
  name: string;
  path: string;
  createdAt: string;
  reason: string | null;
};

const BACKUP_FILE = /^configuration-(\d{8})-(\d{6})-(\d{3})(?:-([A-Za-z0-9_-]+))?\.json$/;

/** `YYYYMMDD-HHMMSS-mmm` in UTC. */
export function formatBackupTimestamp(date: Date): string {
  const iso = date.toISOString(); // 2026-01-02T03:04:05.678Z
  return `${iso.slice(0, 10).replace(/-/g, "")}-${iso.slice(11, 19).replace(/:/g, "")}-${iso.slice(20, 23)}`;
}

export function sanitizeReason(reason: string): string {
  return reason
    .replace(/[^A-Za-z0-9_-]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 64);
}

export function parseBackupName(name: string, dir: string): BackupInfo | null {
  const m = BACKUP_FILE.exec(name);
  if (!m) return null;
  const [, day, time, ms, reason] = m;
  const createdAt = `${day.slice(0, 4)}-${day.slice(4, 6)}-${day.slice(6, 8)}T${time.slice(0, 2)}:${time.slice(2, 4)}:${time.slice(4, 6)}.${ms}Z`;
  return { name, path: path.join(dir, name), createdAt, reason: reason ?? null };
}

/**
 * Timestamped copies of the store file with a retention cap.
 */
export class BackupManager {
  constructor(
    private readonly backupDir: string,
    private readonly maxBackups: number = 10,
  ) {}

  getBackupDir(): string {
    return this.backupDir;
  }

  /** Copy `storePath` into the backup directory and prune beyond `maxBackups`. */
  async create(storePath: string, reason?: string, now: Date = new Date()): Promise<BackupInfo> {
    await mkdir(this.backupDir, { recursive: true });
    const suffix = reason ? sanitizeReason(reason) : "";

    // Names must stay unique and ordered: bump the millisecond on collision.
    const taken = new Set((await this.list()).map((b) => b.createdAt));
    let at = now.getTime();
    while (taken.has(new Date(at).toISOString())) at++;

    const stamp = new Date(at);
    const name = `configuration-${formatBackupTimestamp(stamp)}${suffix ? `-${suffix}` : ""}.json`;
    const info: BackupInfo = {
      name,
      path: path.join(this.backupDir, name),
      createdAt: stamp.toISOString(),
      reason: suffix || null,
    };

    await copyFile(storePath, info.path);
    await this.prune();
    return info;
  }

  /** Newest first. */
  async list(): Promise<BackupInfo[]> {
    if (!fs.existsSync(this.backupDir)) return [];
    const files = await readdir(this.backupDir);
    return files
      .map((f) => parseBackupName(f, this.backupDir))
      .filter((b): b is BackupInfo => b !== null)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.name.localeCompare(a.name));
  }

  /** Delete the oldest backups beyond the retention cap. Returns deleted names. */
  async prune(): Promise<string[]> {
    const backups = await this.list();
    const excess = backups.slice(this.maxBackups);
    for (const b of excess) {
      await unlink(b.path);
    }
    return excess.map((b) => b.name);
  }

  /** Resolve a bare backup name inside the backup dir, or take a path as given. */
  resolve(nameOrPath: string): string {
    if (nameOrPath.includes("/") || nameOrPath.includes("\\")) return path.resolve(nameOrPath);
    return safePath(path.resolve(this.backupDir), nameOrPath);
  }

  /** Read and check a backup; the result carries `storePath`. */
  async read(nameOrPath: string, storePath: string): Promise<ConfigurationStore> {
    const file = this.resolve(nameOrPath);
    if (!fs.existsSync(file)) {
      throw new ConfigurationError("BACKUP_NOT_FOUND", `Backup not found: ${nameOrPath}`);
    }
    const raw = await readFile(file, "utf8");
    return parseStore(raw, storePath);
  }
}
