// ---------------------------------------------------------------------------
// Document tree helpers – path get/set, ensure, deep merge, clone
// ---------------------------------------------------------------------------

import type { JsonObject, JsonValue } from "./types.js";

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Own-property access. Plain assignment to "__proto__" would swap the
 * object's prototype instead of storing a key, and reading it would return
 * Object.prototype.
 */
export function readOwn(obj: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(obj, key) ? obj[key] : undefined;
}

export function writeOwn(obj: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(obj, key, { value, writable: true, enumerable: true, configurable: true });
}

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

/**
 * Walk `keys`, replacing any missing or non-object node with `{}`, and return
 * the innermost object.
 */
export function ensureObject(root: JsonObject, ...keys: string[]): JsonObject {
  let cur = root;
  for (const key of keys) {
    const next = readOwn(cur, key);
    if (isJsonObject(next)) {
      cur = next;
      continue;
    }
    const created: JsonObject = {};
    writeOwn(cur, key, created);
    cur = created;
  }
  return cur;
}

/**
 * Set `value` at `path`. Intermediate nodes that are missing or not objects
 * are replaced by empty objects; the leaf is replaced outright.
 */
export function setAtPath(root: JsonObject, path: readonly string[], value: JsonValue): void {
  if (path.length === 0) {
    throw new Error("setAtPath: path must not be empty");
  }
  const parent = ensureObject(root, ...path.slice(0, -1));
  writeOwn(parent, path[path.length - 1], value);
}

export function getAtPath(root: JsonValue, path: readonly string[]): JsonValue | undefined {
  let cur: JsonValue | undefined = root;
  for (const key of path) {
    if (!isJsonObject(cur)) {
      return undefined;
    }
    cur = readOwn(cur, key);
    if (cur === undefined) {
      return undefined;
    }
  }
  return cur;
}

/** Dot-path convenience for catalog mappings such as `actions.reactions`. */
export function splitDotPath(dotPath: string): string[] {
  return dotPath.split(".");
}

export function deleteAtPath(root: JsonObject, path: readonly string[]): boolean {
  const parent = getAtPath(root, path.slice(0, -1));
  const leaf = path[path.length - 1];
  if (!isJsonObject(parent) || leaf === undefined || !Object.hasOwn(parent, leaf)) {
    return false;
  }
  delete parent[leaf];
  return true;
}

/**
 * Merge `source` into `target` in place. Objects merge recursively; arrays and
 * scalars from `source` replace what `target` had.
 */
export function deepMerge(target: JsonObject, source: JsonObject): JsonObject {
  for (const [key, value] of Object.entries(source)) {
    const existing = readOwn(target, key);
    if (isJsonObject(value) && isJsonObject(existing)) {
      deepMerge(existing, value);
    } else {
      writeOwn(target, key, cloneJson(value));
    }
  }
  return target;
}

/** Stable serialization used for every persisted document. */
export function serializeDocument(doc: JsonObject): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}
