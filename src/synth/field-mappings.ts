// ---------------------------------------------------------------------------
// Typed field mappings – ENV_VAR -> document path with an explicit type hint
// ---------------------------------------------------------------------------

import type { EnvSnapshot } from "../infra/env.js";
import type { FieldMapping, FieldType } from "./catalog.js";
import { setAtPath, splitDotPath } from "./document.js";
import type { JsonObject, JsonValue } from "./types.js";

const INTEGER_RE = /^[+-]?\d+$/;

function splitCsv(raw: string): string[] {
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);
}

/**
 * Convert a raw env value according to its declared type:
 * - `str`: passthrough
 * - `int`: base-10 integer (throws on anything else)
 * - `bool_true`: on unless the value is "false"
 * - `bool_false`: off unless the value is "true"
 * - `csv`: comma-separated strings
 * - `csv_smart`: comma-separated, integers where an item is numeric
 */
export function parseFieldValue(raw: string, type: FieldType, envName = "value"): JsonValue {
  switch (type) {
    case "str":
      return raw;
    case "int": {
      const trimmed = raw.trim();
      if (!INTEGER_RE.test(trimmed)) {
        throw new Error(`${envName} must be an integer, got "${raw}"`);
      }
      return Number.parseInt(trimmed, 10);
    }
    case "bool_true":
      return raw.trim().toLowerCase() !== "false";
    case "bool_false":
      return raw.trim().toLowerCase() === "true";
    case "csv":
      return splitCsv(raw);
    case "csv_smart":
      return splitCsv(raw).map((item) => {
        if (INTEGER_RE.test(item)) {
          const num = Number.parseInt(item, 10);
          return Number.isSafeInteger(num) ? num : item;
        }
        return item;
      });
  }
}

/** Apply every mapping whose variable is set (even to ""). */
export function applyFieldMappings(
  target: JsonObject,
  fields: readonly FieldMapping[],
  env: EnvSnapshot,
): string[] {
  const applied: string[] = [];
  for (const field of fields) {
    const raw = env[field.env];
    if (raw === undefined) {
      continue;
    }
    setAtPath(target, splitDotPath(field.path), parseFieldValue(raw, field.type, field.env));
    applied.push(field.path);
  }
  return applied;
}
