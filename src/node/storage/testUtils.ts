import * as crypto from "crypto";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { Result } from "@/common/types/result";
import { encryptDocument } from "./documentCipher";

/** Helpers shared by the store test suites. */

export const TEST_KEY = "test-secret";

export function createTempDir(prefix = "vellum-store-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function expectOk<T, E>(result: Result<T, E>): T {
  if (!result.success) {
    throw new Error(`Expected success, got ${JSON.stringify(result.error)}`);
  }
  return result.data;
}

export function expectErr<T, E>(result: Result<T, E>): E {
  if (result.success) {
    throw new Error(`Expected failure, got ${JSON.stringify(result.data)}`);
  }
  return result.error;
}

/** Write `document` to `filePath` in the current envelope format. */
export function writeSealedDocument(filePath: string, document: unknown, key = TEST_KEY): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, encryptDocument(JSON.stringify(document), key));
}

/** Seal `plaintext` the way the previous app generation did: iv ":" AES-256-CBC. */
export function sealLegacyDocument(plaintext: string, key: string): Buffer {
  const iv = crypto.randomBytes(16);
  const password = crypto.pbkdf2Sync(key, iv.toString(), 10_000, 32, "sha512");
  const cipher = crypto.createCipheriv("aes-256-cbc", password, iv);
  return Buffer.concat([iv, Buffer.from(":"), cipher.update(plaintext, "utf8"), cipher.final()]);
}

/** Clock that advances one second per call, starting at `start`. */
export function createStepClock(start = "2026-01-01T00:00:00.000Z"): () => Date {
  let current = new Date(start).getTime();
  return () => {
    const now = new Date(current);
    current += 1000;
    return now;
  };
}
