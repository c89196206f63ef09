import { describe, test, expect } from "@jest/globals";
import { decryptDocument, DocumentDecryptError, encryptDocument, isLegacyDocument } from "./documentCipher";
import { isPlainObject } from "./dottedPath";
import { sealLegacyDocument, TEST_KEY } from "./testUtils";

const PLAINTEXT = JSON.stringify({ chats: [{ id: "1", name: "Project X" }] });

describe("documentCipher", () => {
  test("decrypts what it encrypted", () => {
    const sealed = encryptDocument(PLAINTEXT, TEST_KEY);
    expect(decryptDocument(Buffer.from(sealed), TEST_KEY)).toBe(PLAINTEXT);
  });

  test("writes a versioned envelope without the plaintext", () => {
    const sealed = encryptDocument(PLAINTEXT, TEST_KEY);
    const envelope: unknown = JSON.parse(sealed);
    expect(envelope).toMatchObject({ format: "vellum.encrypted", version: 1 });
    expect(sealed.includes("Project X")).toBe(false);
  });

  test("uses a fresh salt and iv for every write", () => {
    expect(encryptDocument(PLAINTEXT, TEST_KEY)).not.toBe(encryptDocument(PLAINTEXT, TEST_KEY));
  });

  test("rejects the wrong key", () => {
    const sealed = Buffer.from(encryptDocument(PLAINTEXT, TEST_KEY));
    expect(() => decryptDocument(sealed, "other-secret")).toThrow(DocumentDecryptError);
    expect(() => decryptDocument(sealed, "other-secret")).toThrow(/^Authentication failed/);
  });

  test("rejects a tampered ciphertext", () => {
    const envelope: unknown = JSON.parse(encryptDocument(PLAINTEXT, TEST_KEY));
    if (!isPlainObject(envelope) || typeof envelope.data !== "string") {
      throw new Error("envelope without data");
    }
    const data = Buffer.from(envelope.data, "base64");
    data[0] = (data[0] ?? 0) ^ 0xff;
    const tampered = Buffer.from(JSON.stringify({ ...envelope, data: data.toString("base64") }));
    expect(() => decryptDocument(tampered, TEST_KEY)).toThrow(/^Authentication failed/);
  });

  test("rejects content in no known format", () => {
    expect(() => decryptDocument(Buffer.from("{\"plain\":true}"), TEST_KEY)).toThrow("Unrecognized document format");
  });

  test("reads documents in the legacy format", () => {
    const legacy = sealLegacyDocument(PLAINTEXT, "legacy-secret");
    expect(isLegacyDocument(legacy)).toBe(true);
    expect(decryptDocument(legacy, "legacy-secret")).toBe(PLAINTEXT);
  });

  test("does not mistake an envelope for the legacy format", () => {
    expect(isLegacyDocument(Buffer.from(encryptDocument(PLAINTEXT, TEST_KEY)))).toBe(false);
  });
});
