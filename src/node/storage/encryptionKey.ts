import * as crypto from "crypto";
import * as fs from "fs";
import type { Config } from "@/node/config";
import { log } from "@/node/services/log";
import { getErrorMessage, hasErrorCode } from "@/common/utils/errors";

/**
 * Per-installation encryption key.
 *
 * One key lives in <root>/encryption.key and every store document is sealed with
 * it. Once that file exists it is never regenerated or overwritten: losing it on a
 * non-legacy install makes every document permanently unreadable, and no backup
 * without the key file can bring them back.
 *
 * Installs that wrote documents before key files existed keep using
 * LEGACY_ENCRYPTION_KEY, which is written to the key file the first time it is
 * needed. That is a compatibility shim for old data, not a security property.
 */

export const LEGACY_ENCRYPTION_KEY = "vellum-secure-storage";

const KEY_BYTES = 32;

export type EncryptionKeySource =
  /** Read from an existing key file. */
  | "existing"
  /** Pre-key-file install: legacy key written to the key file. */
  | "legacy"
  /** Fresh install: random key generated and written. */
  | "generated"
  /** Key file could not be read or written; legacy key used in memory only. */
  | "fallback";

export interface EncryptionKeyResolution {
  key: string;
  source: EncryptionKeySource;
  keyFile: string;
  /** False when the returned key exists only in memory. */
  persisted: boolean;
}

export function isLegacyKey(key: string): boolean {
  return key === LEGACY_ENCRYPTION_KEY;
}

function fallback(config: Config, reason: string, error?: unknown): EncryptionKeyResolution {
  log.warn(
    `[KeyManager] KEY_WRITE_FAILED: ${reason}; falling back to the legacy key for this session`,
    ...(error === undefined ? [] : [getErrorMessage(error)])
  );
  return {
    key: LEGACY_ENCRYPTION_KEY,
    source: "fallback",
    keyFile: config.encryptionKeyFile,
    persisted: false,
  };
}

/**
 * Read the key file, or null when it does not exist.
 */
function readKeyFile(keyFile: string): string | null {
  try {
    return fs.readFileSync(keyFile, "utf-8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
}

/**
 * Create the key file only if it does not exist yet ("wx"). Returns the key that
 * ended up on disk, which is the existing one if another writer got there first.
 */
function writeKeyFileExclusive(keyFile: string, key: string): string {
  try {
    fs.writeFileSync(keyFile, key, { encoding: "utf-8", mode: 0o600, flag: "wx" });
    return key;
  } catch (error) {
    if (hasErrorCode(error, "EEXIST")) {
      const onDisk = readKeyFile(keyFile);
      if (onDisk) {
        return onDisk;
      }
    }
    throw error;
  }
}

export function resolveEncryptionKey(config: Config): EncryptionKeyResolution {
  const keyFile = config.encryptionKeyFile;

  try {
    fs.mkdirSync(config.rootDir, { recursive: true, mode: 0o700 });
  } catch (error) {
    return fallback(config, `cannot create ${config.rootDir}`, error);
  }

  let existing: string | null;
  try {
    existing = readKeyFile(keyFile);
  } catch (error) {
    return fallback(config, `cannot read ${keyFile}`, error);
  }

  if (existing !== null) {
    if (existing.length === 0) {
      // Never overwrite a key file, even an empty one: it may be mid-restore.
      log.error(`[KeyManager] ${keyFile} is empty; using the legacy key in memory`);
      return { key: LEGACY_ENCRYPTION_KEY, source: "fallback", keyFile, persisted: false };
    }
    return { key: existing, source: "existing", keyFile, persisted: true };
  }

  const hasStoreDocuments = config.getStoreFiles().some((file) => fs.existsSync(file));

  try {
    if (hasStoreDocuments) {
      const key = writeKeyFileExclusive(keyFile, LEGACY_ENCRYPTION_KEY);
      log.info(`[KeyManager] Existing store without key file; recorded the legacy key in ${keyFile}`);
      return { key, source: isLegacyKey(key) ? "legacy" : "existing", keyFile, persisted: true };
    }

    const generated = crypto.randomBytes(KEY_BYTES).toString("hex");
    const key = writeKeyFileExclusive(keyFile, generated);
    log.info(`[KeyManager] Generated a new encryption key at ${keyFile}`);
    return { key, source: key === generated ? "generated" : "existing", keyFile, persisted: true };
  } catch (error) {
    return fallback(config, `cannot write ${keyFile}`, error);
  }
}
