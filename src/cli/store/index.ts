#!/usr/bin/env node

import { parseArgs } from "util";
import { Config } from "@/node/config";
import { getErrorMessage } from "@/common/utils/errors";
import { formatBackupError, formatStoreError } from "@/common/utils/errors/formatStoreError";
import { BackupService } from "@/node/services/backupService";
import { StoreContainer } from "@/node/services/storeContainer";
import { isLegacyKey, resolveEncryptionKey } from "@/node/storage/encryptionKey";
import { log } from "@/node/services/log";

const USAGE = [
  "Usage: vellum-store <command> [--dir <store-dir>]",
  "",
  "Commands:",
  "  status                 Key source, schema versions and store health",
  "  chats                  List chats with message counts",
  "  list-backups           List backups, newest first",
  "  backup                 Take a backup now",
  "  restore <name>         Replace the live store with a backup",
  "  delete-backup <name>   Delete one backup",
].join("\n");

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

async function listBackupsCommand(config: Config): Promise<boolean> {
  const backups = await new BackupService(config).listBackups();
  if (!backups.success) {
    console.error(`Error: ${backups.error}`);
    return false;
  }
  if (backups.data.length === 0) {
    console.log("No backups");
    return true;
  }
  for (const backup of backups.data) {
    console.log(
      `${backup.name}  ${backup.createdAt.toISOString()}  ${backup.files} files  ${formatSize(backup.sizeBytes)}`
    );
  }
  return true;
}

async function backupCommand(config: Config): Promise<boolean> {
  const created = await new BackupService(config).createBackup();
  if (!created.success) {
    console.error(`Error: ${formatBackupError(created.error)}`);
    return false;
  }
  console.log(`Created ${created.data.name} (${created.data.files} files)`);
  return true;
}

async function restoreCommand(config: Config, name: string): Promise<boolean> {
  const key = resolveEncryptionKey(config);
  const restored = await new BackupService(config, { encryptionKey: key.key }).restoreBackup(name);
  if (!restored.success) {
    console.error(`Error: ${formatBackupError(restored.error)}`);
    return false;
  }
  console.log(`Restored ${restored.data.files} files from ${name}. Restart any running app before using it.`);
  return true;
}

async function deleteBackupCommand(config: Config, name: string): Promise<boolean> {
  const deleted = await new BackupService(config).deleteBackup(name);
  if (!deleted.success) {
    console.error(`Error: ${formatBackupError(deleted.error)}`);
    return false;
  }
  console.log(`Deleted ${name}`);
  return true;
}

async function chatsCommand(config: Config): Promise<boolean> {
  const container = await StoreContainer.open(config, { startScheduler: false });
  try {
    if (!container.chats.success) {
      console.error(`Error: ${formatStoreError(container.chats.error)}`);
      return false;
    }
    const chats = container.chats.data;
    const currentChatId = chats.getCurrentChatId();
    for (const chat of chats.getAllChats()) {
      const marker = chat.id === currentChatId ? "*" : " ";
      const star = chat.starred ? " ★" : "";
      console.log(`${marker} ${chat.id}  ${chat.name}${star}  (${chat.messages.length} messages)`);
    }
    return true;
  } finally {
    await container.close();
  }
}

async function statusCommand(config: Config): Promise<boolean> {
  const container = await StoreContainer.open(config, { startScheduler: false });
  try {
    console.log(`Store:  ${config.rootDir}`);
    const persisted = container.key.persisted ? "" : ", in memory only";
    const legacy = isLegacyKey(container.key.key) ? ", legacy key" : "";
    console.log(`Key:    ${container.key.source}${legacy}${persisted}`);

    let healthy = true;
    for (const [name, result] of [
      ["settings", container.settings],
      ["chats", container.chats],
      ["agents", container.agents],
    ] as const) {
      if (result.success) {
        const document = result.data.document;
        const format = document.isLegacyFormat() ? ", legacy format" : "";
        console.log(`${name.padEnd(8)}ok, schema v${document.getSchemaVersion()}${format}`);
      } else {
        healthy = false;
        console.log(`${name.padEnd(8)}${formatStoreError(result.error)}`);
      }
    }

    const backups = await container.backups.listBackups();
    if (backups.success) {
      const total = backups.data.reduce((sum, backup) => sum + backup.sizeBytes, 0);
      console.log(`Backups: ${backups.data.length} (${formatSize(total)})`);
    }
    return healthy;
  } finally {
    await container.close();
  }
}

async function main(): Promise<boolean> {
  const { positionals, values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      dir: { type: "string", short: "d" },
      verbose: { type: "boolean", short: "v" },
    },
    allowPositionals: true,
  });

  // CLI output goes to stdout; keep routine log lines out of it unless asked
  log.setLevel(values.verbose ? "debug" : "error");
  const config = new Config(values.dir);
  const [command, name] = positionals;

  // Opening a store creates one; never do that in a directory that has none
  if ((command === "status" || command === "chats" || command === "backup") && !config.hasStore()) {
    console.error(`Error: no store found in ${config.rootDir}`);
    return false;
  }

  switch (command) {
    case "status":
      return statusCommand(config);
    case "chats":
      return chatsCommand(config);
    case "list-backups":
      return listBackupsCommand(config);
    case "backup":
      return backupCommand(config);
    case "restore":
    case "delete-backup":
      if (!name) {
        console.error("Error: backup name required");
        console.log(`Usage: vellum-store ${command} <name>`);
        return false;
      }
      return command === "restore" ? restoreCommand(config, name) : deleteBackupCommand(config, name);
    default:
      console.log(USAGE);
      return false;
  }
}

main()
  .then((ok) => {
    process.exitCode = ok ? 0 : 1;
  })
  .catch((error: unknown) => {
    console.error(`Error: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  });
