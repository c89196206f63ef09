import { z } from "zod";

export const ProviderNameSchema = z.enum(["anthropic", "openai", "local"]);

export const ProviderSettingsSchema = z.object({
  name: ProviderNameSchema,
  model: z.string(),
  localEndpoint: z.string(),
});

export const ApiKeysSchema = z.record(z.string(), z.string());
