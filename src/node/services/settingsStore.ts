/**
 * Settings Store
 *
 * Typed accessors over the settings document (config.json): provider, model,
 * local endpoint, first-run flag, API keys and the current-agent pointer.
 */

import type { Result } from "@/common/types/result";
import { Ok, Err } from "@/common/types/result";
import type { StoreError } from "@/common/types/errors";
import type { ProviderName, ProviderSettings, SettingsSnapshot } from "@/common/types/settings";
import { ApiKeysSchema, ProviderNameSchema, ProviderSettingsSchema } from "@/common/schemas/settings";
import { DEFAULT_AGENT_ID } from "@/common/constants/agents";
import {
  DEFAULT_LOCAL_ENDPOINT,
  DEFAULT_MODEL,
  DEFAULT_PROVIDER,
} from "@/common/constants/settings";
import type { Config } from "@/node/config";
import type { EncryptedDocumentStore } from "@/node/storage/encryptedDocumentStore";
import { openMigratedStore } from "@/node/storage/schemaMigrator";
import { SETTINGS_MIGRATIONS } from "@/node/storage/migrations/settingsMigrations";
import { stripTrailingSlashes } from "@/node/utils/pathUtils";
import { log } from "@/node/services/log";

const LEGACY_AGENTS_KEY = "customAgents";

export function createDefaultSettings(): Record<string, unknown> {
  const provider: ProviderSettings = {
    name: DEFAULT_PROVIDER,
    model: DEFAULT_MODEL,
    localEndpoint: DEFAULT_LOCAL_ENDPOINT,
  };
  return {
    provider,
    apiKeys: {},
    firstRun: true,
    currentAgentId: DEFAULT_AGENT_ID,
  };
}

export class SettingsStore {
  private readonly store: EncryptedDocumentStore;

  constructor(store: EncryptedDocumentStore) {
    this.store = store;
  }

  /** Open config.json with `encryptionKey` and bring it to the current schema. */
  static async open(config: Config, encryptionKey: string): Promise<Result<SettingsStore, StoreError>> {
    const opened = await openMigratedStore(
      {
        name: "settings",
        filePath: config.settingsFile,
        encryptionKey,
        defaults: createDefaultSettings,
      },
      SETTINGS_MIGRATIONS
    );
    return opened.success ? Ok(new SettingsStore(opened.data)) : opened;
  }

  get document(): EncryptedDocumentStore {
    return this.store;
  }

  private getProviderSettings(): ProviderSettings {
    const parsed = ProviderSettingsSchema.safeParse(this.store.get("provider"));
    if (parsed.success) {
      return parsed.data;
    }
    log.warn("[SettingsStore] Invalid provider settings on disk; using defaults", parsed.error.message);
    return { name: DEFAULT_PROVIDER, model: DEFAULT_MODEL, localEndpoint: DEFAULT_LOCAL_ENDPOINT };
  }

  // Provider

  getProvider(): ProviderName {
    return this.getProviderSettings().name;
  }

  async setProvider(provider: string): Promise<Result<void>> {
    const parsed = ProviderNameSchema.safeParse(provider);
    if (!parsed.success) {
      return Err(`Unknown provider "${provider}"`);
    }
    await this.store.set("provider.name", parsed.data);
    return Ok(undefined);
  }

  // Model

  getModel(): string {
    return this.getProviderSettings().model;
  }

  async setModel(model: string): Promise<void> {
    await this.store.set("provider.model", model);
  }

  // Local endpoint

  getLocalEndpoint(): string {
    return this.getProviderSettings().localEndpoint;
  }

  async setLocalEndpoint(endpoint: string): Promise<void> {
    await this.store.set("provider.localEndpoint", stripTrailingSlashes(endpoint.trim()));
  }

  hasValidConfig(): boolean {
    return this.getLocalEndpoint().length > 0;
  }

  // First run

  isFirstRun(): boolean {
    return this.store.get("firstRun", true) !== false;
  }

  async setFirstRunComplete(): Promise<void> {
    await this.store.set("firstRun", false);
  }

  async resetFirstRun(): Promise<void> {
    await this.store.set("firstRun", true);
  }

  // API keys (stored under apiKeys.<provider>, encrypted with the rest of the document)

  getApiKey(provider: ProviderName): string | undefined {
    const value = this.store.get(`apiKeys.${provider}`);
    return typeof value === "string" && value.length > 0 ? value : undefined;
  }

  async setApiKey(provider: ProviderName, apiKey: string): Promise<void> {
    const trimmed = apiKey.trim();
    if (trimmed.length === 0) {
      await this.deleteApiKey(provider);
      return;
    }
    await this.store.set(`apiKeys.${provider}`, trimmed);
  }

  async deleteApiKey(provider: ProviderName): Promise<void> {
    await this.store.delete(`apiKeys.${provider}`);
  }

  private getConfiguredApiKeys(): ProviderName[] {
    const parsed = ApiKeysSchema.safeParse(this.store.get("apiKeys", {}));
    if (!parsed.success) return [];
    return ProviderNameSchema.options.filter((name) => (parsed.data[name] ?? "").length > 0);
  }

  // Current agent pointer (resolved against the agent list by AgentStore)

  getCurrentAgentId(): string {
    const value = this.store.get("currentAgentId");
    return typeof value === "string" && value.length > 0 ? value : DEFAULT_AGENT_ID;
  }

  async setCurrentAgentId(agentId: string): Promise<void> {
    await this.store.set("currentAgentId", agentId);
  }

  getAll(): SettingsSnapshot {
    const provider = this.getProviderSettings();
    return {
      provider: provider.name,
      model: provider.model,
      localEndpoint: provider.localEndpoint,
      firstRun: this.isFirstRun(),
      currentAgentId: this.getCurrentAgentId(),
      configuredApiKeys: this.getConfiguredApiKeys(),
    };
  }

  // Legacy agent list (pre agents.json layouts kept agents in this document)

  /** Raw legacy agent records, or null when none remain in this document. */
  takeLegacyAgents(): unknown[] | null {
    if (!this.store.has(LEGACY_AGENTS_KEY)) {
      return null;
    }
    const value = this.store.get(LEGACY_AGENTS_KEY);
    return Array.isArray(value) ? value : [];
  }

  /** Drop the legacy list; call only after the agents are durably stored elsewhere. */
  async clearLegacyAgents(): Promise<void> {
    await this.store.delete(LEGACY_AGENTS_KEY);
  }
}
