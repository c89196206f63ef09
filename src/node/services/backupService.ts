import type { Dirent } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import type { Result } from "@/common/types/result";
import { Ok, Err } from "@/common/types/result";
import type { BackupError } from "@/common/types/errors";
import {
  BACKUP_FILE_NAMES,
  BACKUP_NAME_PREFIX,
  DEFAULT_BACKUP_RETENTION,
  ENCRYPTION_KEY_FILE_NAME,
  STORE_DOCUMENT_FILE_NAMES,
} from "@/common/constants/storage";
import { getErrorMessage, hasErrorCode } from "@/common/utils/errors";
import assert from "@/common/utils/assert";
import type { Config } from "@/node/config";
import { parseDocumentFile } from "@/node/storage/encryptedDocumentStore";
import { storeFileLocks } from "@/node/utils/concurrency/storeFileLocks";
import { log } from "@/node/services/log";

export interface BackupInfo {
  name: string;
  path: string;
  createdAt: Date;
  /** Sum of the sizes of the files in the backup. */
  sizeBytes: number;
  files: number;
}

export interface BackupCreated {
  name: string;
  path: string;
  /** Files actually copied; missing store files are skipped. */
  files: number;
}

export interface BackupServiceOptions {
  /** Backups kept after each createBackup(). */
  retain?: number;
  /** Key of the live stores; used to verify backups that carry no key file. */
  encryptionKey?: string;
  now?: () => Date;
}

const STORE_DOCUMENTS: ReadonlySet<string> = new Set(STORE_DOCUMENT_FILE_NAMES);

const BACKUP_NAME_PATTERN = /^backup-(\d{4}-\d{2}-\d{2})T(\d{2})-(\d{2})-(\d{2})-(\d{3})Z(?:-\d{2})?$/;

/**
 * 2026-10-18T09:05:03.042Z -> 2026-10-18T09-05-03-042Z
 *
 * Fixed width and zero padded, so sorting names sorts backups by time.
 */
export function formatBackupTimestamp(date: Date): string {
  return date.toISOString().replace(/:/g, "-").replace(".", "-");
}

export function parseBackupTimestamp(name: string): Date | null {
  const match = BACKUP_NAME_PATTERN.exec(name);
  if (!match) return null;
  const [, day, hours, minutes, seconds, millis] = match;
  const date = new Date(`${day}T${hours}:${minutes}:${seconds}.${millis}Z`);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** A bare `backup-*` directory name: no separators, no parent references. */
export function isValidBackupName(name: string): boolean {
  return (
    name.startsWith(BACKUP_NAME_PREFIX) &&
    name === path.basename(name) &&
    !name.includes("..") &&
    !name.includes("/") &&
    !name.includes("\\")
  );
}

/**
 * Point-in-time snapshots of the store files and the key file.
 *
 * Layout: <root>/backups/backup-<timestamp>/{config,chats,agents}.json + encryption.key
 *
 * Backups only ever read live files. Restore is the one operation that writes
 * them, and it stages and verifies the whole backup before touching anything.
 * Creating a backup never throws; failures are logged and reported as results.
 */
export class BackupService {
  private readonly config: Config;
  private readonly retain: number;
  private readonly encryptionKey: string | undefined;
  private readonly now: () => Date;

  constructor(config: Config, options: BackupServiceOptions = {}) {
    this.config = config;
    this.retain = options.retain ?? DEFAULT_BACKUP_RETENTION;
    assert(Number.isInteger(this.retain) && this.retain >= 0, `invalid backup retention ${this.retain}`);
    this.encryptionKey = options.encryptionKey;
    this.now = options.now ?? (() => new Date());
  }

  get backupsDir(): string {
    return this.config.backupsDir;
  }

  async createBackup(): Promise<Result<BackupCreated, BackupError>> {
    let backupPath: string | null = null;
    try {
      await fs.mkdir(this.config.backupsDir, { recursive: true, mode: 0o700 });
      const created = await this.createBackupDir();
      backupPath = created.path;

      let files = 0;
      for (const fileName of BACKUP_FILE_NAMES) {
        try {
          await fs.copyFile(path.join(this.config.rootDir, fileName), path.join(created.path, fileName));
          files++;
        } catch (error) {
          if (!hasErrorCode(error, "ENOENT")) {
            throw error;
          }
          log.debug(`[BackupService] Skipping ${fileName} (doesn't exist)`);
        }
      }

      log.info(`[BackupService] Backup created: ${created.name} (${files} files)`);
      await this.pruneOldBackups(this.retain);
      return Ok({ name: created.name, path: created.path, files });
    } catch (error) {
      const message = getErrorMessage(error);
      log.warn(`[BackupService] Backup failed: ${message}`);
      if (backupPath) {
        await this.removeQuietly(backupPath);
      }
      return Err({ type: "backup_failed", message });
    }
  }

  /** mkdir without `recursive` fails on EEXIST, which makes the name claim atomic. */
  private async createBackupDir(): Promise<{ name: string; path: string }> {
    const baseName = `${BACKUP_NAME_PREFIX}${formatBackupTimestamp(this.now())}`;
    for (let attempt = 0; attempt < 100; attempt++) {
      const name = attempt === 0 ? baseName : `${baseName}-${attempt.toString().padStart(2, "0")}`;
      const backupPath = path.join(this.config.backupsDir, name);
      try {
        await fs.mkdir(backupPath, { mode: 0o700 });
        return { name, path: backupPath };
      } catch (error) {
        if (!hasErrorCode(error, "EEXIST")) {
          throw error;
        }
      }
    }
    throw new Error(`Too many backups named ${baseName}`);
  }

  /** Backup directory names, newest first. */
  private async listBackupNames(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.config.backupsDir, { withFileTypes: true });
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return [];
      }
      throw error;
    }
    return entries
      .filter((entry) => entry.isDirectory() && isValidBackupName(entry.name))
      .map((entry) => entry.name)
      .sort()
      .reverse();
  }

  /**
   * Delete every backup past the `retain` newest. Returns the deleted names.
   * Failures are logged; the next run tries again.
   */
  async pruneOldBackups(retain = this.retain): Promise<string[]> {
    let names: string[];
    try {
      names = await this.listBackupNames();
    } catch (error) {
      log.warn(`[BackupService] Failed to list backups for pruning: ${getErrorMessage(error)}`);
      return [];
    }

    const deleted: string[] = [];
    for (const name of names.slice(Math.max(0, Math.floor(retain)))) {
      try {
        await fs.rm(path.join(this.config.backupsDir, name), { recursive: true, force: true });
        deleted.push(name);
        log.info(`[BackupService] Deleted old backup: ${name}`);
      } catch (error) {
        log.warn(`[BackupService] Failed to delete old backup ${name}: ${getErrorMessage(error)}`);
      }
    }
    return deleted;
  }

  /** Metadata only; backup contents are never opened. Newest first. */
  async listBackups(): Promise<Result<BackupInfo[]>> {
    try {
      const backups: BackupInfo[] = [];
      for (const name of await this.listBackupNames()) {
        const backupPath = path.join(this.config.backupsDir, name);
        const files = await this.listFiles(backupPath);
        let sizeBytes = 0;
        for (const file of files) {
          sizeBytes += (await fs.stat(path.join(backupPath, file))).size;
        }
        const createdAt = parseBackupTimestamp(name) ?? (await fs.stat(backupPath)).birthtime;
        backups.push({ name, path: backupPath, createdAt, sizeBytes, files: files.length });
      }
      return Ok(backups);
    } catch (error) {
      const message = getErrorMessage(error);
      log.error(`[BackupService] Failed to list backups: ${message}`);
      return Err(message);
    }
  }

  /** Total size of all backups in bytes; 0 when they cannot be listed. */
  async getBackupSize(): Promise<number> {
    const backups = await this.listBackups();
    if (!backups.success) return 0;
    return backups.data.reduce((sum, backup) => sum + backup.sizeBytes, 0);
  }

  private async listFiles(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  }

  private async resolveBackupPath(name: string): Promise<Result<string, BackupError>> {
    if (!isValidBackupName(name)) {
      return Err({ type: "invalid_backup_name", name });
    }
    const backupPath = path.join(this.config.backupsDir, name);
    try {
      const stats = await fs.stat(backupPath);
      if (!stats.isDirectory()) {
        return Err({ type: "backup_not_found", name });
      }
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return Err({ type: "backup_not_found", name });
      }
      throw error;
    }
    return Ok(backupPath);
  }

  /**
   * Replace the live store files with a backup's.
   *
   * 1. Copy every file of the backup into a staging directory under the root.
   * 2. Check every staged store document decrypts, with the staged key file or,
   *    if the backup has none, the live key.
   * 3. When the backup carries a different key, move live documents the backup
   *    lacks aside as `<file>.pre-restore-<timestamp>`; they could no longer be
   *    read and start fresh on the next open.
   * 4. Rename each staged file over its live counterpart, documents first and the
   *    key file last.
   *
   * Any failure before step 3 leaves the live files untouched.
   *
   * Open stores keep their in-memory documents; reopen them after a restore.
   */
  async restoreBackup(name: string): Promise<Result<{ files: number }, BackupError>> {
    let stagingDir: string | null = null;
    try {
      const resolved = await this.resolveBackupPath(name);
      if (!resolved.success) {
        return resolved;
      }
      const backupPath = resolved.data;

      const files = await this.listFiles(backupPath);
      if (files.length === 0) {
        return Err({ type: "restore_failed", message: `Backup ${name} contains no files` });
      }

      stagingDir = await fs.mkdtemp(path.join(this.config.rootDir, ".restore-"));
      for (const file of files) {
        await fs.copyFile(path.join(backupPath, file), path.join(stagingDir, file));
      }

      const verified = await this.verifyStagedDocuments(stagingDir, files);
      if (!verified.success) {
        log.error(`[BackupService] Refusing to restore ${name}: ${verified.error}`);
        return Err({ type: "restore_failed", message: verified.error });
      }

      if (verified.data.keyChanged) {
        await this.moveAsideDocumentsMissingFrom(files);
      }

      // Key file last: until it lands, the previous key still matches the live documents it had
      const ordered = [
        ...files.filter((file) => file !== ENCRYPTION_KEY_FILE_NAME),
        ...files.filter((file) => file === ENCRYPTION_KEY_FILE_NAME),
      ];
      for (const file of ordered) {
        const source = path.join(stagingDir, file);
        const target = path.join(this.config.rootDir, file);
        await storeFileLocks.withLock(target, () => fs.rename(source, target));
      }

      log.info(`[BackupService] Restored ${files.length} files from ${name}`);
      return Ok({ files: files.length });
    } catch (error) {
      const message = getErrorMessage(error);
      log.error(`[BackupService] Restore of ${name} failed: ${message}`);
      return Err({ type: "restore_failed", message });
    } finally {
      if (stagingDir) {
        await this.removeQuietly(stagingDir);
      }
    }
  }

  private async verifyStagedDocuments(
    stagingDir: string,
    files: readonly string[]
  ): Promise<Result<{ keyChanged: boolean }>> {
    let key = this.encryptionKey;
    let keyChanged = false;
    if (files.includes(ENCRYPTION_KEY_FILE_NAME)) {
      const stagedKey = await fs.readFile(path.join(stagingDir, ENCRYPTION_KEY_FILE_NAME), "utf-8");
      if (stagedKey.length === 0) {
        return Err("Backup key file is empty");
      }
      keyChanged = this.encryptionKey !== undefined && stagedKey !== this.encryptionKey;
      key = stagedKey;
    }

    const documents = files.filter((file) => STORE_DOCUMENTS.has(file));
    if (documents.length > 0 && key === undefined) {
      return Err("Backup has no key file and no live key was provided to verify it");
    }

    for (const file of documents) {
      const content = await fs.readFile(path.join(stagingDir, file));
      const parsed = parseDocumentFile(content, key ?? "");
      if (!parsed.success) {
        return Err(`${file} in the backup cannot be decrypted: ${parsed.error}`);
      }
    }
    return Ok({ keyChanged });
  }

  private async moveAsideDocumentsMissingFrom(files: readonly string[]): Promise<void> {
    const suffix = `.pre-restore-${formatBackupTimestamp(this.now())}`;
    for (const file of STORE_DOCUMENT_FILE_NAMES) {
      if (files.includes(file)) continue;
      const livePath = path.join(this.config.rootDir, file);
      try {
        await storeFileLocks.withLock(livePath, () => fs.rename(livePath, livePath + suffix));
        log.warn(`[BackupService] ${file} is sealed with the replaced key; moved aside to ${file}${suffix}`);
      } catch (error) {
        if (!hasErrorCode(error, "ENOENT")) {
          throw error;
        }
      }
    }
  }

  async deleteBackup(name: string): Promise<Result<void, BackupError>> {
    try {
      const resolved = await this.resolveBackupPath(name);
      if (!resolved.success) {
        return resolved;
      }
      await fs.rm(resolved.data, { recursive: true, force: true });
      log.info(`[BackupService] Deleted backup: ${name}`);
      return Ok(undefined);
    } catch (error) {
      const message = getErrorMessage(error);
      log.error(`[BackupService] Failed to delete backup ${name}: ${message}`);
      return Err({ type: "backup_failed", message });
    }
  }

  private async removeQuietly(target: string): Promise<void> {
    try {
      await fs.rm(target, { recursive: true, force: true });
    } catch (error) {
      log.warn(`[BackupService] Failed to clean up ${target}: ${getErrorMessage(error)}`);
    }
  }
}
