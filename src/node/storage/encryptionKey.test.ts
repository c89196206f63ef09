import { describe, test, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs";
import * as path from "path";
import { Config } from "@/node/config";
import { isLegacyKey, LEGACY_ENCRYPTION_KEY, resolveEncryptionKey } from "./encryptionKey";
import { createTempDir, removeTempDir } from "./testUtils";

describe("resolveEncryptionKey", () => {
  let tempDir: string;
  let config: Config;

  beforeEach(() => {
    tempDir = createTempDir();
    config = new Config(tempDir);
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  test("generates and persists a random key on a fresh install", () => {
    const resolved = resolveEncryptionKey(config);

    expect(resolved.source).toBe("generated");
    expect(resolved.persisted).toBe(true);
    expect(resolved.key).toMatch(/^[0-9a-f]{64}$/);
    expect(fs.readFileSync(config.encryptionKeyFile, "utf-8")).toBe(resolved.key);
    expect(fs.statSync(config.encryptionKeyFile).mode & 0o777).toBe(0o600);
  });

  test("returns the same key on every later call", () => {
    const first = resolveEncryptionKey(config);
    const bytesAfterFirst = fs.readFileSync(config.encryptionKeyFile);

    const second = resolveEncryptionKey(config);

    expect(second.key).toBe(first.key);
    expect(second.source).toBe("existing");
    expect(fs.readFileSync(config.encryptionKeyFile).equals(bytesAfterFirst)).toBe(true);
  });

  test("records the legacy key for a store that predates key files", () => {
    fs.writeFileSync(config.settingsFile, "sealed-by-an-older-version");

    const resolved = resolveEncryptionKey(config);

    expect(resolved.source).toBe("legacy");
    expect(resolved.key).toBe(LEGACY_ENCRYPTION_KEY);
    expect(isLegacyKey(resolved.key)).toBe(true);
    expect(fs.readFileSync(config.encryptionKeyFile, "utf-8")).toBe(LEGACY_ENCRYPTION_KEY);
  });

  test("never overwrites an empty key file", () => {
    fs.writeFileSync(config.encryptionKeyFile, "");

    const resolved = resolveEncryptionKey(config);

    expect(resolved).toEqual({
      key: LEGACY_ENCRYPTION_KEY,
      source: "fallback",
      keyFile: config.encryptionKeyFile,
      persisted: false,
    });
    expect(fs.readFileSync(config.encryptionKeyFile, "utf-8")).toBe("");
  });

  test("falls back to the legacy key in memory when the root cannot be created", () => {
    const blocker = path.join(tempDir, "blocker");
    fs.writeFileSync(blocker, "");
    const blockedConfig = new Config(path.join(blocker, "store"));

    const resolved = resolveEncryptionKey(blockedConfig);

    expect(resolved.source).toBe("fallback");
    expect(resolved.key).toBe(LEGACY_ENCRYPTION_KEY);
    expect(resolved.persisted).toBe(false);
  });
});
