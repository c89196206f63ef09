import { describe, test, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs";
import * as path from "path";
import { Config } from "./config";
import { createTempDir, removeTempDir } from "@/node/storage/testUtils";

describe("Config", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  test("derives every store path from the root", () => {
    const config = new Config(tempDir);

    expect(config.encryptionKeyFile).toBe(path.join(tempDir, "encryption.key"));
    expect(config.getStoreFiles()).toEqual([
      path.join(tempDir, "config.json"),
      path.join(tempDir, "chats.json"),
      path.join(tempDir, "agents.json"),
    ]);
  });

  describe("hasStore", () => {
    test("is false for a missing or empty directory", () => {
      expect(new Config(path.join(tempDir, "elsewhere")).hasStore()).toBe(false);
      expect(new Config(tempDir).hasStore()).toBe(false);
    });

    test("accepts a key file or a document without one", () => {
      const config = new Config(tempDir);

      fs.writeFileSync(config.settingsFile, "sealed");
      expect(config.hasStore()).toBe(true);

      fs.rmSync(config.settingsFile);
      fs.writeFileSync(config.encryptionKeyFile, "test-secret");
      expect(config.hasStore()).toBe(true);
    });

    test("does not create anything", () => {
      const missing = path.join(tempDir, "elsewhere");

      new Config(missing).hasStore();

      expect(fs.existsSync(missing)).toBe(false);
    });
  });
});
