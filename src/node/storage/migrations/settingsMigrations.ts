import { ProviderNameSchema } from "@/common/schemas/settings";
import { DEFAULT_AGENT_ID } from "@/common/constants/agents";
import {
  DEFAULT_LOCAL_ENDPOINT,
  DEFAULT_MODEL,
  DEFAULT_PROVIDER,
} from "@/common/constants/settings";
import { isPlainObject } from "@/node/storage/dottedPath";
import type { Migration } from "@/node/storage/schemaMigrator";

function nonEmptyString(...candidates: unknown[]): string | undefined {
  for (const candidate of candidates) {
    if (typeof candidate === "string" && candidate.trim().length > 0) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Settings document (config.json) history.
 *
 * v0: flat keys from the first releases: aiProvider, selectedModel,
 *     localModelEndpoint, firstRun, customAgents, currentAgent.
 * v1: provider fields nested under `provider`.
 * v2: `currentAgentId` pointer, `apiKeys` record.
 *
 * `customAgents` is not migrated here; it moves to agents.json through the
 * legacy agent import once both stores are open.
 */
export const SETTINGS_MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: "nest aiProvider/selectedModel/localModelEndpoint under provider",
    up: async (store) => {
      const parsedName = ProviderNameSchema.safeParse(
        store.get("provider.name", store.get("aiProvider"))
      );
      await store.set("provider", {
        name: parsedName.success ? parsedName.data : DEFAULT_PROVIDER,
        model: nonEmptyString(store.get("provider.model"), store.get("selectedModel")) ?? DEFAULT_MODEL,
        localEndpoint:
          nonEmptyString(store.get("provider.localEndpoint"), store.get("localModelEndpoint")) ??
          DEFAULT_LOCAL_ENDPOINT,
      });
      await store.delete("aiProvider");
      await store.delete("selectedModel");
      await store.delete("localModelEndpoint");
    },
  },
  {
    version: 2,
    description: "rename currentAgent to currentAgentId and add apiKeys",
    up: async (store) => {
      await store.set(
        "currentAgentId",
        nonEmptyString(store.get("currentAgentId"), store.get("currentAgent")) ?? DEFAULT_AGENT_ID
      );
      await store.delete("currentAgent");

      if (!isPlainObject(store.get("apiKeys"))) {
        await store.set("apiKeys", {});
      }
      if (typeof store.get("firstRun") !== "boolean") {
        await store.set("firstRun", true);
      }
    },
  },
];
