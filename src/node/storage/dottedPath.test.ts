import { describe, test, expect } from "@jest/globals";
import {
  deleteAtPath,
  getAtPath,
  hasAtPath,
  isPlainObject,
  parseDottedPath,
  setAtPath,
  type JsonObject,
} from "./dottedPath";

describe("parseDottedPath", () => {
  test("splits on dots", () => {
    expect(parseDottedPath("provider.model")).toEqual(["provider", "model"]);
  });

  test("keeps escaped dots inside a segment", () => {
    expect(parseDottedPath("hosts.api\\.example\\.com.token")).toEqual(["hosts", "api.example.com", "token"]);
  });

  test("rejects empty segments", () => {
    expect(() => parseDottedPath("a..b")).toThrow('Invalid path "a..b": empty segment');
    expect(() => parseDottedPath("")).toThrow("empty segment");
  });

  test("rejects segments that reach the prototype chain", () => {
    expect(() => parseDottedPath("__proto__.polluted")).toThrow('segment "__proto__" is not allowed');
    expect(() => parseDottedPath("a.constructor")).toThrow('segment "constructor" is not allowed');
  });
});

describe("path access", () => {
  test("getAtPath reads nested values and misses cleanly", () => {
    const root: JsonObject = { provider: { name: "local" }, list: [1, 2] };
    expect(getAtPath(root, "provider.name")).toBe("local");
    expect(getAtPath(root, "provider.model")).toBeUndefined();
    expect(getAtPath(root, "missing.deeper")).toBeUndefined();
    // Arrays are leaves, not containers
    expect(getAtPath(root, "list.0")).toBeUndefined();
  });

  test("setAtPath creates and replaces intermediate levels", () => {
    const root: JsonObject = { apiKeys: "not-an-object" };
    setAtPath(root, "apiKeys.openai", "test-key");
    setAtPath(root, "a.b.c", 1);
    expect(root).toEqual({ apiKeys: { openai: "test-key" }, a: { b: { c: 1 } } });
  });

  test("hasAtPath distinguishes null from absent", () => {
    const root: JsonObject = { currentChatId: null };
    expect(hasAtPath(root, "currentChatId")).toBe(true);
    expect(hasAtPath(root, "chats")).toBe(false);
    expect(hasAtPath(root, "currentChatId.id")).toBe(false);
  });

  test("deleteAtPath reports whether anything was removed", () => {
    const root: JsonObject = { apiKeys: { anthropic: "test-key" } };
    expect(deleteAtPath(root, "apiKeys.openai")).toBe(false);
    expect(deleteAtPath(root, "apiKeys.anthropic")).toBe(true);
    expect(root).toEqual({ apiKeys: {} });
  });

  test("isPlainObject rejects arrays, null and class instances", () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
  });
});
