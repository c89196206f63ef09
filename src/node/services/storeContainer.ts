import type { Result } from "@/common/types/result";
import { Ok, Err } from "@/common/types/result";
import type { StoreError } from "@/common/types/errors";
import { Config } from "@/node/config";
import { resolveEncryptionKey, type EncryptionKeyResolution } from "@/node/storage/encryptionKey";
import type { EncryptedDocumentStore } from "@/node/storage/encryptedDocumentStore";
import { SettingsStore } from "@/node/services/settingsStore";
import { ChatStore } from "@/node/services/chatStore";
import { AgentStore } from "@/node/services/agentStore";
import { BackupService } from "@/node/services/backupService";
import { BackupScheduler } from "@/node/services/backupScheduler";
import { configureLogFile, log } from "@/node/services/log";

export interface StoreContainerOptions {
  /** Arm the backup scheduler (and take the startup backup). Default true. */
  startScheduler?: boolean;
  /** Cron pattern for automatic backups. Default "@daily". */
  backupSchedule?: string;
  /** Backups kept after each automatic or manual backup. */
  backupRetention?: number;
  /** Append log lines to <root>/logs/vellum.log. Default true. */
  logToFile?: boolean;
  /** Clock for chat timestamps and backup names. */
  now?: () => Date;
}

export interface OpenStores {
  settings: SettingsStore;
  chats: ChatStore;
  agents: AgentStore;
}

/**
 * Startup entry point for the local store. Resolves the key once and opens
 * every document with it; a store that fails to open is reported in its
 * Result while the others stay usable.
 *
 * AgentStore resolves the current agent through settings; when settings fail
 * to open it still opens, with the built-in persona as the current agent.
 */
export class StoreContainer {
  readonly config: Config;
  readonly key: EncryptionKeyResolution;
  readonly settings: Result<SettingsStore, StoreError>;
  readonly chats: Result<ChatStore, StoreError>;
  readonly agents: Result<AgentStore, StoreError>;
  readonly backups: BackupService;
  readonly scheduler: BackupScheduler;

  private constructor(
    config: Config,
    key: EncryptionKeyResolution,
    stores: Pick<StoreContainer, "settings" | "chats" | "agents">,
    backups: BackupService,
    scheduler: BackupScheduler
  ) {
    this.config = config;
    this.key = key;
    this.settings = stores.settings;
    this.chats = stores.chats;
    this.agents = stores.agents;
    this.backups = backups;
    this.scheduler = scheduler;
  }

  static async open(config: Config = new Config(), options: StoreContainerOptions = {}): Promise<StoreContainer> {
    if (options.logToFile ?? true) {
      configureLogFile(config.getLogFile());
    }

    const key = resolveEncryptionKey(config);
    log.info(`[StoreContainer] Opening store at ${config.rootDir} (key: ${key.source})`);

    const [settings, chats] = await Promise.all([
      SettingsStore.open(config, key.key),
      ChatStore.open(config, key.key, { now: options.now }),
    ]);
    const agents = await AgentStore.open(config, key.key, settings.success ? settings.data : null);

    if (settings.success && agents.success) {
      await importLegacyAgents(settings.data, agents.data);
    }

    for (const [name, result] of [
      ["settings", settings],
      ["chats", chats],
      ["agents", agents],
    ] as const) {
      if (!result.success) {
        log.error(`[StoreContainer] ${name} store unavailable`, result.error);
      }
    }

    const backups = new BackupService(config, {
      retain: options.backupRetention,
      encryptionKey: key.key,
      now: options.now,
    });
    const scheduler = new BackupScheduler(backups, { pattern: options.backupSchedule });
    const container = new StoreContainer(config, key, { settings, chats, agents }, backups, scheduler);

    if (options.startScheduler ?? true) {
      await scheduler.start();
    }
    return container;
  }

  /** All three stores, or the first store error (settings, chats, agents order). */
  requireStores(): Result<OpenStores, StoreError> {
    if (!this.settings.success) return Err(this.settings.error);
    if (!this.chats.success) return Err(this.chats.error);
    if (!this.agents.success) return Err(this.agents.error);
    return Ok({ settings: this.settings.data, chats: this.chats.data, agents: this.agents.data });
  }

  /** Stop automatic backups and wait for pending writes. */
  async close(): Promise<void> {
    this.scheduler.stop();
    const documents: EncryptedDocumentStore[] = [];
    for (const result of [this.settings, this.chats, this.agents]) {
      if (result.success) {
        documents.push(result.data.document);
      }
    }
    await Promise.all(documents.map((document) => document.flush()));
  }
}

/**
 * Move agents from the legacy settings key into agents.json. The settings key is
 * deleted only after the import is on disk; a crash in between re-imports on the
 * next start, and ids already present are skipped.
 */
async function importLegacyAgents(settings: SettingsStore, agents: AgentStore): Promise<void> {
  const legacy = settings.takeLegacyAgents();
  if (legacy === null) {
    return;
  }
  if (!agents.document.isFresh) {
    log.info("[StoreContainer] Legacy agent list found next to an existing agents.json; merging by id");
  }
  const imported = await agents.importAgents(legacy);
  await settings.clearLegacyAgents();
  log.info(`[StoreContainer] Imported ${imported} legacy agents`);
}
