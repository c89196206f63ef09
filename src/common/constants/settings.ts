import type { ProviderName } from "@/common/types/settings";

export const DEFAULT_PROVIDER: ProviderName = "local";
export const DEFAULT_MODEL = "llama3";
export const DEFAULT_LOCAL_ENDPOINT = "http://localhost:11434";
