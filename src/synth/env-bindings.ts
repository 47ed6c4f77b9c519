// ---------------------------------------------------------------------------
// Convention bindings – GATEWAY_JSON__path__to__key=value
// ---------------------------------------------------------------------------
// Each matching variable names a leaf of the config document. Path segments
// are separated by a double underscore and used verbatim as object keys.
// ---------------------------------------------------------------------------

import type { EnvSnapshot } from "../infra/env.js";
import { setAtPath } from "./document.js";
import type { ConfigDocument, EnvBinding, JsonValue } from "./types.js";

export const BINDING_PREFIX = "GATEWAY_JSON__";
export const PATH_DELIMITER = "__";

const NUMERAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

export type BindingParseIssue = {
  name: string;
  reason: string;
};

export type ParsedBindings = {
  bindings: EnvBinding[];
  issues: BindingParseIssue[];
};

/**
 * Decompose a variable name into path segments, or return a reason why it
 * cannot address a document leaf.
 */
export function decodeBindingName(
  name: string,
  prefix: string = BINDING_PREFIX,
): string[] | { reason: string } {
  if (!name.startsWith(prefix)) {
    return { reason: `missing prefix ${prefix}` };
  }
  const remainder = name.slice(prefix.length);
  if (!remainder) {
    return { reason: "no path after prefix" };
  }
  const segments = remainder.split(PATH_DELIMITER);
  if (segments.some((segment) => segment.length === 0)) {
    return { reason: "empty path segment" };
  }
  return segments;
}

/**
 * Collect every binding in `env`, ordered lexically by variable name so that
 * two bindings addressing the same leaf always resolve the same way.
 */
export function parseEnvBindings(env: EnvSnapshot, prefix: string = BINDING_PREFIX): ParsedBindings {
  const bindings: EnvBinding[] = [];
  const issues: BindingParseIssue[] = [];
  const names = Object.keys(env)
    .filter((name) => name.startsWith(prefix))
    .sort();

  for (const name of names) {
    const decoded = decodeBindingName(name, prefix);
    if (!Array.isArray(decoded)) {
      issues.push({ name, reason: decoded.reason });
      continue;
    }
    bindings.push({ name, path: decoded, raw: env[name] ?? "" });
  }
  return { bindings, issues };
}

/**
 * Infer a typed value from its string form:
 * booleans, then numerals, then JSON objects/arrays, else the raw string.
 * Integers outside the safe range stay strings so long numeric IDs keep
 * every digit.
 */
export function inferValue(raw: string): JsonValue {
  const lowered = raw.toLowerCase();
  if (lowered === "true" || lowered === "false") {
    return lowered === "true";
  }

  if (NUMERAL_RE.test(raw)) {
    const num = Number(raw);
    const isInteger = !raw.includes(".");
    if (Number.isFinite(num) && (!isInteger || Number.isSafeInteger(num))) {
      return num;
    }
    return raw;
  }

  if (raw.startsWith("{") || raw.startsWith("[")) {
    try {
      const parsed: unknown = JSON.parse(raw);
      if (typeof parsed === "object" && parsed !== null) {
        return toJsonValue(parsed);
      }
    } catch {
      // Not JSON: keep it as a string.
    }
  }

  return raw;
}

function toJsonValue(parsed: object): JsonValue {
  // JSON.parse only ever produces JSON values; re-walk to give them a type.
  if (Array.isArray(parsed)) {
    return parsed.map((item: unknown) => normalizeParsed(item));
  }
  // fromEntries defines own properties, so a "__proto__" key stays a key.
  return Object.fromEntries(
    Object.entries(parsed).map(([key, value]): [string, JsonValue] => [key, normalizeParsed(value)]),
  );
}

function normalizeParsed(value: unknown): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "object") {
    return toJsonValue(value);
  }
  return null;
}

/**
 * Apply bindings to `doc` in order. Every binding fully replaces the value at
 * its path; keys it does not address are left alone.
 */
export function applyBindings(doc: ConfigDocument, bindings: readonly EnvBinding[]): ConfigDocument {
  for (const binding of bindings) {
    setAtPath(doc, binding.path, inferValue(binding.raw));
  }
  return doc;
}

/** Encode a path back into a variable name (inverse of `decodeBindingName`). */
export function encodeBindingName(path: readonly string[], prefix: string = BINDING_PREFIX): string {
  return `${prefix}${path.join(PATH_DELIMITER)}`;
}
