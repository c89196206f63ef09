/**
 * Dotted-path access into plain JSON objects ("apiKeys.anthropic").
 *
 * `\.` escapes a literal dot inside a segment. Segments that would reach the
 * prototype chain are refused.
 */

export type JsonObject = Record<string, unknown>;

const FORBIDDEN_SEGMENTS = new Set(["__proto__", "prototype", "constructor"]);

export function isPlainObject(value: unknown): value is JsonObject {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function parseDottedPath(dottedPath: string): string[] {
  const segments: string[] = [];
  let current = "";
  for (let i = 0; i < dottedPath.length; i++) {
    const char = dottedPath[i];
    if (char === "\\" && dottedPath[i + 1] === ".") {
      current += ".";
      i++;
    } else if (char === ".") {
      segments.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  segments.push(current);

  for (const segment of segments) {
    if (segment === "") {
      throw new Error(`Invalid path "${dottedPath}": empty segment`);
    }
    if (FORBIDDEN_SEGMENTS.has(segment)) {
      throw new Error(`Invalid path "${dottedPath}": segment "${segment}" is not allowed`);
    }
  }
  return segments;
}

export function getAtPath(root: JsonObject, dottedPath: string): unknown {
  let current: unknown = root;
  for (const segment of parseDottedPath(dottedPath)) {
    if (!isPlainObject(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export function hasAtPath(root: JsonObject, dottedPath: string): boolean {
  const segments = parseDottedPath(dottedPath);
  const last = segments.pop();
  let current: unknown = root;
  for (const segment of segments) {
    if (!isPlainObject(current) || !Object.hasOwn(current, segment)) {
      return false;
    }
    current = current[segment];
  }
  return last !== undefined && isPlainObject(current) && Object.hasOwn(current, last);
}

/**
 * Set a value, creating (or replacing non-object) intermediate levels.
 */
export function setAtPath(root: JsonObject, dottedPath: string, value: unknown): void {
  const segments = parseDottedPath(dottedPath);
  const last = segments.pop();
  if (last === undefined) return;

  let current: JsonObject = root;
  for (const segment of segments) {
    const next = current[segment];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: JsonObject = {};
      current[segment] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Remove a key. Returns false (and changes nothing) when the path is absent.
 */
export function deleteAtPath(root: JsonObject, dottedPath: string): boolean {
  const segments = parseDottedPath(dottedPath);
  const last = segments.pop();
  let current: unknown = root;
  for (const segment of segments) {
    if (!isPlainObject(current) || !Object.hasOwn(current, segment)) {
      return false;
    }
    current = current[segment];
  }
  if (last === undefined || !isPlainObject(current) || !Object.hasOwn(current, last)) {
    return false;
  }
  delete current[last];
  return true;
}
