/**
 * Centralized user-facing messages for store, chat and backup errors.
 * Used by the maintenance CLI and by any UI that surfaces startup failures.
 */

import type { BackupError, ChatError, StoreError } from "@/common/types/errors";

export function formatStoreError(error: StoreError): string {
  switch (error.type) {
    case "store_corrupt_or_wrong_key":
      return `The ${error.store} store at ${error.filePath} could not be decrypted (${error.message}). Restore it from a backup.`;
    case "store_io_failed":
      return `The ${error.store} store at ${error.filePath} could not be read: ${error.message}`;
    case "migration_sequence_gap":
      return `Migrations for the ${error.store} store skip version ${error.missingVersion}.`;
    case "migration_step_failed":
      return `Upgrading the ${error.store} store to version ${error.version} failed: ${error.message}. The store is still at version ${error.lastGoodVersion}; restore from a backup before continuing.`;
  }
}

export function formatChatError(error: ChatError): string {
  switch (error.type) {
    case "cannot_delete_last_chat":
      return "Cannot delete the only chat";
    case "chat_not_found":
      return error.chatId ? `Chat ${error.chatId} not found` : "Chat not found";
    case "invalid_rename":
      return "Chat name cannot be empty";
    case "no_messages_specified":
      return "No messages specified";
    case "invalid_message_role":
      return `Invalid message role: ${error.role}`;
  }
}

export function formatBackupError(error: BackupError): string {
  switch (error.type) {
    case "backup_failed":
      return `Backup failed: ${error.message}`;
    case "restore_failed":
      return `Restore failed: ${error.message}`;
    case "backup_not_found":
      return `Backup ${error.name} not found`;
    case "invalid_backup_name":
      return `Invalid backup name: ${error.name}`;
  }
}
