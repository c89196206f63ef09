import { describe, test, expect } from "@jest/globals";
import { formatBackupError, formatChatError, formatStoreError } from "./formatStoreError";

describe("formatStoreError", () => {
  test("points a failed migration at the last good version", () => {
    expect(
      formatStoreError({
        type: "migration_step_failed",
        store: "chats",
        version: 2,
        lastGoodVersion: 1,
        message: "boom",
      })
    ).toBe(
      "Upgrading the chats store to version 2 failed: boom. The store is still at version 1; restore from a backup before continuing."
    );
  });

  test("names the missing migration", () => {
    expect(formatStoreError({ type: "migration_sequence_gap", store: "settings", missingVersion: 2 })).toBe(
      "Migrations for the settings store skip version 2."
    );
  });
});

describe("formatChatError", () => {
  test("falls back to a generic message without a chat id", () => {
    expect(formatChatError({ type: "chat_not_found", chatId: null })).toBe("Chat not found");
    expect(formatChatError({ type: "chat_not_found", chatId: "42" })).toBe("Chat 42 not found");
    expect(formatChatError({ type: "cannot_delete_last_chat" })).toBe("Cannot delete the only chat");
  });
});

describe("formatBackupError", () => {
  test("prefixes failures with the operation", () => {
    expect(formatBackupError({ type: "restore_failed", message: "disk full" })).toBe("Restore failed: disk full");
    expect(formatBackupError({ type: "invalid_backup_name", name: "../x" })).toBe("Invalid backup name: ../x");
  });
});
