/**
 * File names and document keys shared by the local store.
 * Every path under the store root is derived from these.
 */

export const ENCRYPTION_KEY_FILE_NAME = "encryption.key";
export const SETTINGS_FILE_NAME = "config.json";
export const CHATS_FILE_NAME = "chats.json";
export const AGENTS_FILE_NAME = "agents.json";

/** Store documents, in the order they are opened on startup. */
export const STORE_DOCUMENT_FILE_NAMES = [
  SETTINGS_FILE_NAME,
  CHATS_FILE_NAME,
  AGENTS_FILE_NAME,
] as const;

/** Everything a backup snapshot copies, key file included. */
export const BACKUP_FILE_NAMES = [...STORE_DOCUMENT_FILE_NAMES, ENCRYPTION_KEY_FILE_NAME] as const;

export const BACKUPS_DIR_NAME = "backups";
export const BACKUP_NAME_PREFIX = "backup-";
export const DEFAULT_BACKUP_RETENTION = 7;

export const LOGS_DIR_NAME = "logs";
export const LOG_FILE_NAME = "vellum.log";

/** Document key holding each store's schema version. */
export const SCHEMA_VERSION_KEY = "schemaVersion";
