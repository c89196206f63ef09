/**
 * Error unions for the local store.
 *
 * Every variant is discriminated on `type` so UI code can switch on it the same
 * way it switches on any other tagged union.
 */

export type StoreError =
  | {
      /** Decryption or JSON parsing failed: wrong key or damaged file. Never reset to defaults. */
      type: "store_corrupt_or_wrong_key";
      store: string;
      filePath: string;
      message: string;
    }
  | {
      /** The file exists but could not be read, or its directory could not be created. */
      type: "store_io_failed";
      store: string;
      filePath: string;
      message: string;
    }
  | {
      /** Registered migrations skip a version. Programmer error; fails before anything runs. */
      type: "migration_sequence_gap";
      store: string;
      missingVersion: number;
    }
  | {
      /** A migration threw. The document stays at `lastGoodVersion`. */
      type: "migration_step_failed";
      store: string;
      version: number;
      lastGoodVersion: number;
      message: string;
    };

export type ChatError =
  | { type: "cannot_delete_last_chat" }
  | { type: "chat_not_found"; chatId: string | null }
  | { type: "invalid_rename" }
  | { type: "no_messages_specified" }
  | { type: "invalid_message_role"; role: string };

export type AgentError =
  | { type: "agent_not_found"; agentId: string }
  | { type: "invalid_agent"; message: string }
  | { type: "settings_unavailable" };

export type BackupError =
  | { type: "backup_failed"; message: string }
  | { type: "restore_failed"; message: string }
  | { type: "backup_not_found"; name: string }
  | { type: "invalid_backup_name"; name: string };
