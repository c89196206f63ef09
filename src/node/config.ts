import * as fs from "fs";
import * as path from "path";
import { getVellumHome } from "@/common/constants/paths";
import {
  AGENTS_FILE_NAME,
  BACKUPS_DIR_NAME,
  CHATS_FILE_NAME,
  ENCRYPTION_KEY_FILE_NAME,
  LOG_FILE_NAME,
  LOGS_DIR_NAME,
  SETTINGS_FILE_NAME,
} from "@/common/constants/storage";

/**
 * Config - Centralized store path resolution
 *
 * Encapsulates every path the local store reads or writes, making them
 * dependency-injectable and testable. Pass a custom rootDir for tests to avoid
 * polluting ~/.vellum
 */
export class Config {
  readonly rootDir: string;
  readonly encryptionKeyFile: string;
  readonly settingsFile: string;
  readonly chatsFile: string;
  readonly agentsFile: string;
  readonly backupsDir: string;
  readonly logsDir: string;

  constructor(rootDir?: string) {
    this.rootDir = rootDir ?? getVellumHome();
    this.encryptionKeyFile = path.join(this.rootDir, ENCRYPTION_KEY_FILE_NAME);
    this.settingsFile = path.join(this.rootDir, SETTINGS_FILE_NAME);
    this.chatsFile = path.join(this.rootDir, CHATS_FILE_NAME);
    this.agentsFile = path.join(this.rootDir, AGENTS_FILE_NAME);
    this.backupsDir = path.join(this.rootDir, BACKUPS_DIR_NAME);
    this.logsDir = path.join(this.rootDir, LOGS_DIR_NAME);
  }

  /** Encrypted store documents, in startup order. */
  getStoreFiles(): string[] {
    return [this.settingsFile, this.chatsFile, this.agentsFile];
  }

  /**
   * Whether rootDir already holds a store: a key file or any store document.
   * Stores from the previous app generation have documents but no key file.
   */
  hasStore(): boolean {
    return [this.encryptionKeyFile, ...this.getStoreFiles()].some((file) => fs.existsSync(file));
  }

  getLogFile(): string {
    return path.join(this.logsDir, LOG_FILE_NAME);
  }
}
