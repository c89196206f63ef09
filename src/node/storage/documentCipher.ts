import * as crypto from "crypto";
import { z } from "zod";
import { getErrorMessage } from "@/common/utils/errors";

/**
 * Encryption of whole store documents.
 *
 * Current format: a JSON envelope sealed with AES-256-GCM. The AES key is derived
 * per write with HKDF-SHA256 from the store's key string and a random salt, so the
 * GCM tag doubles as the wrong-key / corruption check.
 *
 * Legacy format (read only): documents written by the previous generation of the
 * app are `iv (16 bytes) ":" ciphertext`, AES-256-CBC under
 * PBKDF2-SHA512(key, iv decoded as utf-8, 10000 rounds). They are rewritten in the
 * envelope format on the next write.
 */

const ENVELOPE_FORMAT = "vellum.encrypted";
const ENVELOPE_VERSION = 1;
const HKDF_INFO = "vellum-store-document";
const SALT_BYTES = 16;
const IV_BYTES = 12;
const KEY_BYTES = 32;

const LEGACY_IV_BYTES = 16;
const LEGACY_SEPARATOR = 0x3a; // ":"
const LEGACY_PBKDF2_ROUNDS = 10_000;

const EncryptedEnvelopeSchema = z.object({
  format: z.literal(ENVELOPE_FORMAT),
  version: z.literal(ENVELOPE_VERSION),
  salt: z.string(),
  iv: z.string(),
  tag: z.string(),
  data: z.string(),
});

type EncryptedEnvelope = z.infer<typeof EncryptedEnvelopeSchema>;

export class DocumentDecryptError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentDecryptError";
  }
}

function deriveKey(secret: string, salt: Buffer): Buffer {
  return Buffer.from(crypto.hkdfSync("sha256", secret, salt, HKDF_INFO, KEY_BYTES));
}

export function encryptDocument(plaintext: string, secret: string): string {
  const salt = crypto.randomBytes(SALT_BYTES);
  const iv = crypto.randomBytes(IV_BYTES);
  const cipher = crypto.createCipheriv("aes-256-gcm", deriveKey(secret, salt), iv);
  const data = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);

  const envelope: EncryptedEnvelope = {
    format: ENVELOPE_FORMAT,
    version: ENVELOPE_VERSION,
    salt: salt.toString("base64"),
    iv: iv.toString("base64"),
    tag: cipher.getAuthTag().toString("base64"),
    data: data.toString("base64"),
  };
  return JSON.stringify(envelope);
}

function parseEnvelope(content: Buffer): EncryptedEnvelope | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content.toString("utf8"));
  } catch {
    return null;
  }
  const parsed = EncryptedEnvelopeSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/** True when the bytes look like a document from the previous app generation. */
export function isLegacyDocument(content: Buffer): boolean {
  return content.length > LEGACY_IV_BYTES + 1 && content[LEGACY_IV_BYTES] === LEGACY_SEPARATOR;
}

function decryptEnvelope(envelope: EncryptedEnvelope, secret: string): string {
  const salt = Buffer.from(envelope.salt, "base64");
  const decipher = crypto.createDecipheriv(
    "aes-256-gcm",
    deriveKey(secret, salt),
    Buffer.from(envelope.iv, "base64")
  );
  decipher.setAuthTag(Buffer.from(envelope.tag, "base64"));
  return Buffer.concat([
    decipher.update(Buffer.from(envelope.data, "base64")),
    decipher.final(),
  ]).toString("utf8");
}

function decryptLegacy(content: Buffer, secret: string): string {
  const iv = content.subarray(0, LEGACY_IV_BYTES);
  const password = crypto.pbkdf2Sync(
    secret,
    iv.toString(),
    LEGACY_PBKDF2_ROUNDS,
    KEY_BYTES,
    "sha512"
  );
  const decipher = crypto.createDecipheriv("aes-256-cbc", password, iv);
  return Buffer.concat([
    decipher.update(content.subarray(LEGACY_IV_BYTES + 1)),
    decipher.final(),
  ]).toString("utf8");
}

/**
 * Decrypt a document file's raw bytes.
 * Throws DocumentDecryptError for a wrong key, a damaged file or an unknown format.
 */
export function decryptDocument(content: Buffer, secret: string): string {
  const envelope = parseEnvelope(content);
  if (envelope) {
    try {
      return decryptEnvelope(envelope, secret);
    } catch (error) {
      throw new DocumentDecryptError(
        `Authentication failed (wrong key or corrupted file): ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  if (isLegacyDocument(content)) {
    try {
      return decryptLegacy(content, secret);
    } catch (error) {
      throw new DocumentDecryptError(
        `Legacy document could not be decrypted: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  throw new DocumentDecryptError("Unrecognized document format");
}
