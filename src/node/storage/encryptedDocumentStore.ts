import * as fs from "fs/promises";
import * as path from "path";
import writeFileAtomic from "write-file-atomic";
import type { Result } from "@/common/types/result";
import { Ok, Err } from "@/common/types/result";
import type { StoreError } from "@/common/types/errors";
import { SCHEMA_VERSION_KEY } from "@/common/constants/storage";
import { getErrorMessage, hasErrorCode } from "@/common/utils/errors";
import assert from "@/common/utils/assert";
import { log } from "@/node/services/log";
import { storeFileLocks } from "@/node/utils/concurrency/storeFileLocks";
import { decryptDocument, encryptDocument, isLegacyDocument } from "./documentCipher";
import {
  deleteAtPath,
  getAtPath,
  hasAtPath,
  isPlainObject,
  setAtPath,
  type JsonObject,
} from "./dottedPath";

export interface DocumentStoreOptions {
  /** Short name used in logs and errors ("settings", "chats", ...). */
  name: string;
  filePath: string;
  encryptionKey: string;
  /** Code-defined schema version stamped on a freshly created document. */
  schemaVersion: number;
  /** Shape of a brand-new document, without the version field. */
  defaults: () => JsonObject;
}

function cloneJson(value: unknown): unknown {
  if (value === undefined) return undefined;
  const cloned: unknown = JSON.parse(JSON.stringify(value));
  return cloned;
}

/**
 * Decrypt and parse a document file. Shared with backup verification so a restore
 * applies exactly the checks an open would.
 */
export function parseDocumentFile(content: Buffer, encryptionKey: string): Result<JsonObject> {
  let plaintext: string;
  try {
    plaintext = decryptDocument(content, encryptionKey);
  } catch (error) {
    return Err(getErrorMessage(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(plaintext);
  } catch (error) {
    return Err(`Decrypted content is not JSON: ${getErrorMessage(error)}`);
  }

  if (!isPlainObject(parsed)) {
    return Err("Decrypted content is not a JSON object");
  }
  return Ok(parsed);
}

/**
 * One encrypted JSON document on disk, held in memory and rewritten whole on
 * every change.
 *
 * - Mutations apply to the in-memory document synchronously, before the first
 *   await, so a caller's read-modify-write cannot interleave with another's.
 * - Persisting re-encrypts the full document and writes it with write-file-atomic
 *   (temp file + rename), serialized per file through storeFileLocks. A reader of
 *   the file (e.g. a backup copy) sees the old or the new document, never a mix.
 * - `set` and `delete` resolve once the change is on disk and reject if the write
 *   failed.
 *
 * Raw dotted-path access is meant for migrations; application code goes through
 * the typed domain stores.
 */
export class EncryptedDocumentStore {
  readonly name: string;
  readonly filePath: string;
  /** True when this open created the file from defaults. */
  readonly isFresh: boolean;
  /** True while the file on disk is still in the legacy encryption format. */
  private legacyFormat: boolean;

  private readonly encryptionKey: string;
  private readonly document: JsonObject;
  private revision = 0;
  private persistedRevision = 0;

  private constructor(
    options: DocumentStoreOptions,
    document: JsonObject,
    isFresh: boolean,
    legacyFormat: boolean
  ) {
    this.name = options.name;
    this.filePath = options.filePath;
    this.encryptionKey = options.encryptionKey;
    this.document = document;
    this.isFresh = isFresh;
    this.legacyFormat = legacyFormat;
  }

  /**
   * Open the document at `options.filePath`, creating it from defaults if missing.
   *
   * An unreadable or undecryptable file is reported, never replaced: resetting to
   * defaults here would silently destroy the user's data.
   */
  static async open(options: DocumentStoreOptions): Promise<Result<EncryptedDocumentStore, StoreError>> {
    const { name, filePath } = options;
    assert(
      Number.isInteger(options.schemaVersion) && options.schemaVersion >= 0,
      `${name}: schema version must be a non-negative integer`
    );

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
    } catch (error) {
      log.error(`[DocumentStore:${name}] Cannot create directory for ${filePath}:`, error);
      return Err({ type: "store_io_failed", store: name, filePath, message: getErrorMessage(error) });
    }

    let content: Buffer;
    try {
      content = await fs.readFile(filePath);
    } catch (error) {
      if (!hasErrorCode(error, "ENOENT")) {
        log.error(`[DocumentStore:${name}] Cannot read ${filePath}:`, error);
        return Err({ type: "store_io_failed", store: name, filePath, message: getErrorMessage(error) });
      }
      return EncryptedDocumentStore.create(options);
    }

    const parsed = parseDocumentFile(content, options.encryptionKey);
    if (!parsed.success) {
      log.error(`[DocumentStore:${name}] ${filePath} is corrupt or sealed with another key: ${parsed.error}`);
      return Err({ type: "store_corrupt_or_wrong_key", store: name, filePath, message: parsed.error });
    }

    const legacyFormat = isLegacyDocument(content);
    if (legacyFormat) {
      log.info(`[DocumentStore:${name}] Read legacy-format document; it will be re-encrypted on the next write`);
    }
    return Ok(new EncryptedDocumentStore(options, parsed.data, false, legacyFormat));
  }

  private static async create(options: DocumentStoreOptions): Promise<Result<EncryptedDocumentStore, StoreError>> {
    const defaults = cloneJson(options.defaults());
    const document: JsonObject = {
      ...(isPlainObject(defaults) ? defaults : {}),
      [SCHEMA_VERSION_KEY]: options.schemaVersion,
    };
    const store = new EncryptedDocumentStore(options, document, true, false);
    store.revision++;
    try {
      await store.persist();
    } catch (error) {
      return Err({
        type: "store_io_failed",
        store: options.name,
        filePath: options.filePath,
        message: getErrorMessage(error),
      });
    }
    log.info(`[DocumentStore:${options.name}] Created ${options.filePath} at schema version ${options.schemaVersion}`);
    return Ok(store);
  }

  /** Deep copy of the value at `dottedPath`, or `defaultValue` when absent. */
  get(dottedPath: string, defaultValue?: unknown): unknown {
    const value = getAtPath(this.document, dottedPath);
    return value === undefined ? defaultValue : cloneJson(value);
  }

  has(dottedPath: string): boolean {
    return hasAtPath(this.document, dottedPath);
  }

  /** Stored schema version; 0 when never set or not a non-negative integer. */
  getSchemaVersion(): number {
    const version = this.document[SCHEMA_VERSION_KEY];
    return typeof version === "number" && Number.isInteger(version) && version >= 0 ? version : 0;
  }

  isLegacyFormat(): boolean {
    return this.legacyFormat;
  }

  /** Deep copy of the whole document. */
  snapshot(): JsonObject {
    const copy = cloneJson(this.document);
    return isPlainObject(copy) ? copy : {};
  }

  /**
   * Write `value` at `dottedPath` (intermediate objects created as needed) and
   * persist. Setting `undefined` deletes the key.
   */
  async set(dottedPath: string, value: unknown): Promise<void> {
    if (value === undefined) {
      await this.delete(dottedPath);
      return;
    }
    setAtPath(this.document, dottedPath, cloneJson(value));
    this.revision++;
    await this.persist();
  }

  /** Remove `dottedPath` and persist; nothing is written when the key is absent. */
  async delete(dottedPath: string): Promise<void> {
    if (!deleteAtPath(this.document, dottedPath)) {
      return;
    }
    this.revision++;
    await this.persist();
  }

  /** Resolves once every write queued on this file so far has finished. */
  async flush(): Promise<void> {
    await storeFileLocks.drain(this.filePath);
  }

  private async persist(): Promise<void> {
    await storeFileLocks.withLock(this.filePath, async () => {
      // A write queued earlier may already have stored this revision
      if (this.persistedRevision === this.revision) {
        return;
      }
      const revision = this.revision;
      try {
        const sealed = encryptDocument(JSON.stringify(this.document), this.encryptionKey);
        await writeFileAtomic(this.filePath, sealed, { encoding: "utf-8", mode: 0o600 });
        this.persistedRevision = revision;
        this.legacyFormat = false;
      } catch (error) {
        log.error(`[DocumentStore:${this.name}] Failed to write ${this.filePath}:`, error);
        throw error;
      }
    });
  }
}
