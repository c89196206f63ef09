import type { Result } from "@/common/types/result";
import { Ok, Err } from "@/common/types/result";
import type { StoreError } from "@/common/types/errors";
import { SCHEMA_VERSION_KEY } from "@/common/constants/storage";
import { getErrorMessage } from "@/common/utils/errors";
import { log } from "@/node/services/log";
import { EncryptedDocumentStore, type DocumentStoreOptions } from "./encryptedDocumentStore";

/**
 * A single forward step of a store's schema.
 *
 * `up` receives the raw document handle. It must read old fields with a default,
 * write the new shape, and delete old fields only after the new value is set;
 * it must never assume a field exists. A step may run again after a crash
 * between its writes and the version stamp, so it has to tolerate
 * already-migrated data.
 */
export interface Migration {
  /** Schema version this step produces. */
  version: number;
  description: string;
  up: (store: EncryptedDocumentStore) => Promise<void>;
}

export interface MigrationReport {
  from: number;
  to: number;
  /** Versions applied in this run, ascending. */
  applied: number[];
}

/** Highest registered version: the code's current schema version for the store. */
export function latestVersion(migrations: readonly Migration[]): number {
  return migrations.reduce((max, migration) => Math.max(max, migration.version), 0);
}

/**
 * Migrations must cover 1..N exactly once each. A gap is a programmer error and
 * is reported before anything runs, rather than applying steps out of order.
 */
export function validateMigrations(
  migrations: readonly Migration[],
  storeName: string
): Result<Migration[], StoreError> {
  const sorted = [...migrations].sort((a, b) => a.version - b.version);
  for (let index = 0; index < sorted.length; index++) {
    const expected = index + 1;
    if (sorted[index]?.version !== expected) {
      return Err({ type: "migration_sequence_gap", store: storeName, missingVersion: expected });
    }
  }
  return Ok(sorted);
}

/**
 * Bring `store` up to the latest registered version.
 *
 * Steps run in ascending order and the version is stamped and persisted after
 * every single step, so a crash resumes from the last completed step instead of
 * re-running it. A failing step stops the run and leaves the store at the last
 * good version.
 */
export async function runMigrations(
  store: EncryptedDocumentStore,
  migrations: readonly Migration[]
): Promise<Result<MigrationReport, StoreError>> {
  const validated = validateMigrations(migrations, store.name);
  if (!validated.success) {
    log.error(`[SchemaMigrator:${store.name}] Registered migrations are not contiguous`, validated.error);
    return validated;
  }

  const from = store.getSchemaVersion();
  const target = latestVersion(validated.data);

  if (from > target) {
    log.warn(
      `[SchemaMigrator:${store.name}] Document is at version ${from}, newer than this build (${target}); leaving it untouched`
    );
    return Ok({ from, to: from, applied: [] });
  }

  const pending = validated.data.filter((migration) => migration.version > from);
  const applied: number[] = [];
  let current = from;

  for (const migration of pending) {
    log.info(`[SchemaMigrator:${store.name}] Applying v${migration.version}: ${migration.description}`);
    try {
      await migration.up(store);
      await store.set(SCHEMA_VERSION_KEY, migration.version);
    } catch (error) {
      const message = getErrorMessage(error);
      log.error(
        `[SchemaMigrator:${store.name}] Migration to v${migration.version} failed; store remains at v${current}: ${message}`
      );
      return Err({
        type: "migration_step_failed",
        store: store.name,
        version: migration.version,
        lastGoodVersion: current,
        message,
      });
    }
    current = migration.version;
    applied.push(migration.version);
  }

  if (applied.length > 0) {
    log.info(`[SchemaMigrator:${store.name}] Migrated from v${from} to v${current}`);
  }
  return Ok({ from, to: current, applied });
}

/**
 * Open a document and migrate it before anyone else can read it. Fresh documents
 * are stamped with the latest version at creation and run no migrations.
 */
export async function openMigratedStore(
  options: Omit<DocumentStoreOptions, "schemaVersion">,
  migrations: readonly Migration[]
): Promise<Result<EncryptedDocumentStore, StoreError>> {
  const opened = await EncryptedDocumentStore.open({
    ...options,
    schemaVersion: latestVersion(migrations),
  });
  if (!opened.success) {
    return opened;
  }

  const migrated = await runMigrations(opened.data, migrations);
  if (!migrated.success) {
    return migrated;
  }
  return Ok(opened.data);
}
