import type { Result } from "@/common/types/result";
import { Ok, Err } from "@/common/types/result";
import type { AgentError, StoreError } from "@/common/types/errors";
import type { Agent, AgentInput, AgentUpdate } from "@/common/types/agent";
import { AgentInputSchema, AgentSchema, AgentUpdateSchema } from "@/common/schemas/agent";
import {
  BUILT_IN_AGENTS,
  DEFAULT_AGENT_EMOJI,
  DEFAULT_AGENT_ID,
  DEFAULT_PERSONA,
} from "@/common/constants/agents";
import type { Config } from "@/node/config";
import type { EncryptedDocumentStore } from "@/node/storage/encryptedDocumentStore";
import { openMigratedStore } from "@/node/storage/schemaMigrator";
import { AGENT_MIGRATIONS } from "@/node/storage/migrations/agentMigrations";
import { MonotonicIdGenerator } from "@/node/utils/ids";
import { isPlainObject } from "@/node/storage/dottedPath";
import type { SettingsStore } from "@/node/services/settingsStore";
import { log } from "@/node/services/log";

export function createDefaultAgentsDocument(): Record<string, unknown> {
  return { agents: [] };
}

/**
 * Custom agent definitions (agents.json).
 *
 * The current-agent pointer lives in settings; this store resolves it. A pointer
 * that no longer resolves falls back to DEFAULT_PERSONA at read time and is
 * never rewritten. Without settings (`null`, e.g. config.json failed to open)
 * the current agent is always DEFAULT_PERSONA and cannot be changed.
 *
 * Invalid agent records are logged and skipped on read, but writes keep them in
 * the document untouched.
 */
export class AgentStore {
  private readonly store: EncryptedDocumentStore;
  private readonly settings: SettingsStore | null;
  private readonly ids = new MonotonicIdGenerator();

  constructor(store: EncryptedDocumentStore, settings: SettingsStore | null) {
    this.store = store;
    this.settings = settings;
    this.ids.seed(this.readAgents().map((agent) => agent.id));
  }

  static async open(
    config: Config,
    encryptionKey: string,
    settings: SettingsStore | null
  ): Promise<Result<AgentStore, StoreError>> {
    const opened = await openMigratedStore(
      {
        name: "agents",
        filePath: config.agentsFile,
        encryptionKey,
        defaults: createDefaultAgentsDocument,
      },
      AGENT_MIGRATIONS
    );
    return opened.success ? Ok(new AgentStore(opened.data, settings)) : opened;
  }

  get document(): EncryptedDocumentStore {
    return this.store;
  }

  /** Raw agent records as stored, including any that fail validation. */
  private readRawAgents(): unknown[] {
    const raw = this.store.get("agents", []);
    if (!Array.isArray(raw)) {
      log.warn("[AgentStore] agents is not a list; treating it as empty");
      return [];
    }
    return raw;
  }

  private readAgents(): Agent[] {
    return parseAgents(this.readRawAgents());
  }

  /** Stored list; only a list with no records at all gets the built-in agents. */
  private readOrSeed(): { raw: unknown[]; seeding: Promise<void> } {
    const raw = this.readRawAgents();
    if (raw.length > 0) {
      return { raw, seeding: Promise.resolve() };
    }
    const seeded = BUILT_IN_AGENTS.map((agent) => ({ ...agent }));
    log.info(`[AgentStore] Seeding ${seeded.length} built-in agents`);
    return { raw: seeded, seeding: this.store.set("agents", seeded) };
  }

  /**
   * The agent list. An empty list is seeded with the built-in agents first; once
   * the list has entries (including after the user deletes some) nothing is
   * seeded again.
   */
  async getAgents(): Promise<Agent[]> {
    const { raw, seeding } = this.readOrSeed();
    await seeding;
    return parseAgents(raw);
  }

  getAgent(agentId: string): Agent | undefined {
    return this.readAgents().find((agent) => agent.id === agentId);
  }

  async addAgent(input: AgentInput): Promise<Result<Agent, AgentError>> {
    const parsed = AgentInputSchema.safeParse(input);
    if (!parsed.success) {
      return Err({ type: "invalid_agent", message: parsed.error.issues[0]?.message ?? "Invalid agent" });
    }

    const { raw, seeding } = this.readOrSeed();
    const agent: Agent = {
      id: this.ids.next(),
      emoji: parsed.data.emoji || DEFAULT_AGENT_EMOJI,
      name: parsed.data.name,
      description: parsed.data.description ?? "",
    };
    await Promise.all([seeding, this.store.set("agents", [...raw, agent])]);
    return Ok(agent);
  }

  async updateAgent(agentId: string, updates: AgentUpdate): Promise<Result<Agent, AgentError>> {
    const parsed = AgentUpdateSchema.safeParse(updates);
    if (!parsed.success) {
      return Err({ type: "invalid_agent", message: parsed.error.issues[0]?.message ?? "Invalid agent" });
    }

    const { raw, seeding } = this.readOrSeed();
    const index = raw.findIndex((entry) => isPlainObject(entry) && entry.id === agentId);
    const entry = raw[index];
    const existing = AgentSchema.safeParse(entry);
    if (index === -1 || !isPlainObject(entry) || !existing.success) {
      await seeding;
      return Err({ type: "agent_not_found", agentId });
    }

    const updated: Agent = {
      id: existing.data.id,
      emoji: parsed.data.emoji ?? existing.data.emoji,
      name: parsed.data.name ?? existing.data.name,
      description: parsed.data.description ?? existing.data.description,
    };
    raw[index] = { ...entry, ...updated };
    await Promise.all([seeding, this.store.set("agents", raw)]);
    return Ok(updated);
  }

  /** Remove an agent. A current-agent pointer to it falls back at read time. */
  async deleteAgent(agentId: string): Promise<Result<void, AgentError>> {
    const { raw, seeding } = this.readOrSeed();
    if (!parseAgents(raw).some((agent) => agent.id === agentId)) {
      await seeding;
      return Err({ type: "agent_not_found", agentId });
    }
    const remaining = raw.filter((entry) => !(isPlainObject(entry) && entry.id === agentId));
    await Promise.all([seeding, this.store.set("agents", remaining)]);
    return Ok(undefined);
  }

  getCurrentAgent(): Agent {
    const currentAgentId = this.settings?.getCurrentAgentId() ?? DEFAULT_AGENT_ID;
    if (currentAgentId === DEFAULT_AGENT_ID) {
      return DEFAULT_PERSONA;
    }
    return this.getAgent(currentAgentId) ?? DEFAULT_PERSONA;
  }

  /** Point settings at `agentId`; accepts the built-in persona id or an existing agent. */
  async setCurrentAgent(agentId: string): Promise<Result<void, AgentError>> {
    if (!this.settings) {
      return Err({ type: "settings_unavailable" });
    }
    if (agentId !== DEFAULT_AGENT_ID && !this.getAgent(agentId)) {
      return Err({ type: "agent_not_found", agentId });
    }
    await this.settings.setCurrentAgentId(agentId);
    return Ok(undefined);
  }

  /**
   * Append agent records from an older layout. Invalid records are skipped and
   * ids already present are not duplicated. Returns how many were added.
   */
  async importAgents(records: readonly unknown[]): Promise<number> {
    const raw = this.readRawAgents();
    const knownIds = new Set(parseAgents(raw).map((agent) => agent.id));
    let imported = 0;

    for (const record of records) {
      // Older layouts allowed agents without an emoji or description
      const candidate = isPlainObject(record)
        ? { emoji: DEFAULT_AGENT_EMOJI, description: "", ...record }
        : record;
      const parsed = AgentSchema.safeParse(candidate);
      if (!parsed.success) {
        log.warn("[AgentStore] Skipping legacy agent record", parsed.error.message);
        continue;
      }
      if (knownIds.has(parsed.data.id)) {
        continue;
      }
      raw.push(parsed.data);
      knownIds.add(parsed.data.id);
      imported++;
    }

    if (imported > 0) {
      this.ids.seed(knownIds);
      await this.store.set("agents", raw);
    }
    return imported;
  }
}

function parseAgents(raw: readonly unknown[]): Agent[] {
  const agents: Agent[] = [];
  for (const entry of raw) {
    const parsed = AgentSchema.safeParse(entry);
    if (parsed.success) {
      agents.push(parsed.data);
    } else {
      log.warn("[AgentStore] Skipping invalid agent record", parsed.error.message);
    }
  }
  return agents;
}
