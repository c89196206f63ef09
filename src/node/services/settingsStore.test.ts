import { describe, test, expect, beforeEach, afterEach } from "@jest/globals";
import { Config } from "@/node/config";
import { SettingsStore } from "./settingsStore";
import {
  createTempDir,
  expectErr,
  expectOk,
  removeTempDir,
  TEST_KEY,
  writeSealedDocument,
} from "@/node/storage/testUtils";

describe("SettingsStore", () => {
  let tempDir: string;
  let config: Config;

  beforeEach(() => {
    tempDir = createTempDir();
    config = new Config(tempDir);
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  async function open(): Promise<SettingsStore> {
    return expectOk(await SettingsStore.open(config, TEST_KEY));
  }

  test("starts from defaults", async () => {
    const settings = await open();

    expect(settings.getAll()).toEqual({
      provider: "local",
      model: "llama3",
      localEndpoint: "http://localhost:11434",
      firstRun: true,
      currentAgentId: "default",
      configuredApiKeys: [],
    });
    expect(settings.document.getSchemaVersion()).toBe(2);
    expect(settings.hasValidConfig()).toBe(true);
  });

  test("changes persist across reopen", async () => {
    const settings = await open();
    expectOk(await settings.setProvider("anthropic"));
    await settings.setModel("test-model");
    await settings.setFirstRunComplete();
    await settings.setCurrentAgentId("1700000000000");

    const reopened = await open();
    expect(reopened.getProvider()).toBe("anthropic");
    expect(reopened.getModel()).toBe("test-model");
    expect(reopened.isFirstRun()).toBe(false);
    expect(reopened.getCurrentAgentId()).toBe("1700000000000");
  });

  test("rejects unknown providers", async () => {
    const settings = await open();

    expect(expectErr(await settings.setProvider("gemini"))).toBe('Unknown provider "gemini"');
    expect(settings.getProvider()).toBe("local");
  });

  test("normalizes the local endpoint", async () => {
    const settings = await open();
    await settings.setLocalEndpoint("  http://127.0.0.1:8080/// ");

    expect(settings.getLocalEndpoint()).toBe("http://127.0.0.1:8080");
  });

  test("an empty endpoint makes the configuration invalid", async () => {
    const settings = await open();
    await settings.setLocalEndpoint("   ");

    expect(settings.hasValidConfig()).toBe(false);
  });

  test("stores api keys per provider and deletes them when blanked", async () => {
    const settings = await open();
    await settings.setApiKey("anthropic", "  test-key  ");
    await settings.setApiKey("openai", "test-key-2");

    expect(settings.getApiKey("anthropic")).toBe("test-key");
    expect(settings.getAll().configuredApiKeys).toEqual(["anthropic", "openai"]);

    await settings.setApiKey("anthropic", " ");
    expect(settings.getApiKey("anthropic")).toBeUndefined();

    await settings.deleteApiKey("openai");
    expect(settings.getAll().configuredApiKeys).toEqual([]);
  });

  test("resetFirstRun brings the onboarding flag back", async () => {
    const settings = await open();
    await settings.setFirstRunComplete();
    await settings.resetFirstRun();

    expect(settings.isFirstRun()).toBe(true);
  });

  describe("migration from the flat legacy layout", () => {
    test("nests provider fields and renames the agent pointer", async () => {
      writeSealedDocument(config.settingsFile, {
        aiProvider: "openai",
        selectedModel: "test-model",
        localModelEndpoint: "http://localhost:1234",
        firstRun: false,
        currentAgent: "1700000000000",
      });

      const settings = await open();

      expect(settings.getAll()).toEqual({
        provider: "openai",
        model: "test-model",
        localEndpoint: "http://localhost:1234",
        firstRun: false,
        currentAgentId: "1700000000000",
        configuredApiKeys: [],
      });
      expect(settings.document.getSchemaVersion()).toBe(2);
      expect(settings.document.has("aiProvider")).toBe(false);
      expect(settings.document.has("currentAgent")).toBe(false);
    });

    test("falls back to defaults for unknown or missing values", async () => {
      writeSealedDocument(config.settingsFile, { aiProvider: "gemini" });

      const settings = await open();

      expect(settings.getProvider()).toBe("local");
      expect(settings.getModel()).toBe("llama3");
      expect(settings.isFirstRun()).toBe(true);
      expect(settings.getCurrentAgentId()).toBe("default");
    });

    test("keeps the legacy agent list for the agent import", async () => {
      writeSealedDocument(config.settingsFile, { customAgents: [{ id: "1", name: "Reviewer" }] });

      const settings = await open();

      expect(settings.takeLegacyAgents()).toEqual([{ id: "1", name: "Reviewer" }]);
      await settings.clearLegacyAgents();
      expect(settings.takeLegacyAgents()).toBeNull();
    });
  });
});
