import { describe, test, expect, beforeEach, afterEach, jest } from "@jest/globals";
import * as path from "path";
import { EncryptedDocumentStore } from "./encryptedDocumentStore";
import { latestVersion, openMigratedStore, runMigrations, validateMigrations, type Migration } from "./schemaMigrator";
import { createTempDir, expectErr, expectOk, removeTempDir, TEST_KEY, writeSealedDocument } from "./testUtils";

describe("SchemaMigrator", () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(() => {
    tempDir = createTempDir();
    filePath = path.join(tempDir, "doc.json");
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  async function openAt(schemaVersion: number): Promise<EncryptedDocumentStore> {
    return expectOk(
      await EncryptedDocumentStore.open({
        name: "test",
        filePath,
        encryptionKey: TEST_KEY,
        schemaVersion,
        defaults: () => ({ count: 0 }),
      })
    );
  }

  function step(version: number, calls: number[]): Migration {
    return {
      version,
      description: `step ${version}`,
      up: async (store) => {
        calls.push(version);
        await store.set(`seen.v${version}`, true);
      },
    };
  }

  test("applies pending steps in ascending order and stamps the final version", async () => {
    const calls: number[] = [];
    const store = await openAt(0);

    const report = expectOk(await runMigrations(store, [step(3, calls), step(1, calls), step(2, calls)]));

    expect(report).toEqual({ from: 0, to: 3, applied: [1, 2, 3] });
    expect(calls).toEqual([1, 2, 3]);
    expect(store.getSchemaVersion()).toBe(3);
    expect(store.get("seen")).toEqual({ v1: true, v2: true, v3: true });
  });

  test("runs each migration exactly once across reopens", async () => {
    writeSealedDocument(filePath, { count: 1 });
    const up1 = jest.fn(async (store: EncryptedDocumentStore) => {
      await store.set("count", 2);
    });
    const up2 = jest.fn(async (store: EncryptedDocumentStore) => {
      await store.set("renamed", store.get("count"));
      await store.delete("count");
    });
    const migrations: Migration[] = [
      { version: 1, description: "bump count", up: up1 },
      { version: 2, description: "rename count", up: up2 },
    ];
    const options = { name: "test", filePath, encryptionKey: TEST_KEY, defaults: () => ({}) };

    const first = expectOk(await openMigratedStore(options, migrations));
    expect(first.getSchemaVersion()).toBe(2);
    expect(first.get("renamed")).toBe(2);
    expect(first.has("count")).toBe(false);

    const second = expectOk(await openMigratedStore(options, migrations));
    expect(second.getSchemaVersion()).toBe(2);
    expect(up1).toHaveBeenCalledTimes(1);
    expect(up2).toHaveBeenCalledTimes(1);
  });

  test("a fresh document is created at the latest version without running steps", async () => {
    const up = jest.fn(async () => {});

    const store = expectOk(
      await openMigratedStore(
        { name: "test", filePath, encryptionKey: TEST_KEY, defaults: () => ({}) },
        [
          { version: 1, description: "one", up },
          { version: 2, description: "two", up },
        ]
      )
    );

    expect(store.getSchemaVersion()).toBe(2);
    expect(up).not.toHaveBeenCalled();
  });

  test("refuses a registry with a gap before running anything", async () => {
    const calls: number[] = [];
    const store = await openAt(0);

    const error = expectErr(await runMigrations(store, [step(1, calls), step(3, calls)]));

    expect(error).toEqual({ type: "migration_sequence_gap", store: "test", missingVersion: 2 });
    expect(calls).toEqual([]);
    expect(store.getSchemaVersion()).toBe(0);
  });

  test("stops at the last good version when a step throws", async () => {
    const calls: number[] = [];
    const store = await openAt(0);
    const failing: Migration = {
      version: 2,
      description: "explodes",
      up: async () => {
        throw new Error("boom");
      },
    };

    const error = expectErr(await runMigrations(store, [step(1, calls), failing, step(3, calls)]));

    expect(error).toEqual({
      type: "migration_step_failed",
      store: "test",
      version: 2,
      lastGoodVersion: 1,
      message: "boom",
    });
    expect(calls).toEqual([1]);
    const reopened = await openAt(99);
    expect(reopened.getSchemaVersion()).toBe(1);
  });

  test("leaves a document from a newer build untouched", async () => {
    const calls: number[] = [];
    const store = await openAt(5);

    const report = expectOk(await runMigrations(store, [step(1, calls), step(2, calls)]));

    expect(report).toEqual({ from: 5, to: 5, applied: [] });
    expect(calls).toEqual([]);
    expect(store.getSchemaVersion()).toBe(5);
  });

  test("validateMigrations and latestVersion", () => {
    const calls: number[] = [];
    expect(latestVersion([])).toBe(0);
    expect(latestVersion([step(2, calls), step(1, calls)])).toBe(2);
    expect(expectOk(validateMigrations([], "test"))).toEqual([]);
    expect(expectErr(validateMigrations([step(2, calls)], "test"))).toEqual({
      type: "migration_sequence_gap",
      store: "test",
      missingVersion: 1,
    });
  });
});
