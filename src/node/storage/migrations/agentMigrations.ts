import { DEFAULT_AGENT_EMOJI } from "@/common/constants/agents";
import { isPlainObject } from "@/node/storage/dottedPath";
import type { Migration } from "@/node/storage/schemaMigrator";

/**
 * Agents document (agents.json) history.
 *
 * v0: early agents.json files kept the list under `customAgents`, and agents
 *     could be saved without an emoji or description.
 * v1: list under `agents`; every agent has string `emoji` and `description`.
 */
export const AGENT_MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: "move customAgents to agents and backfill emoji/description",
    up: async (store) => {
      const current: unknown = store.get("agents", store.get("customAgents", []));
      const agents = (Array.isArray(current) ? current : []).map((agent: unknown): unknown => {
        if (!isPlainObject(agent)) return agent;
        return {
          ...agent,
          emoji: typeof agent.emoji === "string" && agent.emoji.length > 0 ? agent.emoji : DEFAULT_AGENT_EMOJI,
          description: typeof agent.description === "string" ? agent.description : "",
        };
      });
      await store.set("agents", agents);
      await store.delete("customAgents");
    },
  },
];
