import type { z } from "zod";
import type { ProviderNameSchema, ProviderSettingsSchema } from "@/common/schemas/settings";

export type ProviderName = z.infer<typeof ProviderNameSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;

/** Settings snapshot handed to the UI. API key values never leave the store. */
export interface SettingsSnapshot {
  provider: ProviderName;
  model: string;
  localEndpoint: string;
  firstRun: boolean;
  currentAgentId: string;
  /** Providers with a stored API key. */
  configuredApiKeys: ProviderName[];
}
