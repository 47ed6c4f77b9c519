// ---------------------------------------------------------------------------
// Config document store – read (strict) / write (atomic, owner-only)
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import { writeFileAtomic } from "../infra/atomic-write.js";
import { formatErrorMessage, isNotFoundError } from "../infra/errors.js";
import { isJsonObject, serializeDocument } from "./document.js";
import type { ConfigDocument } from "./types.js";

export const CONFIG_FILE_MODE = 0o600;

export class MalformedDocumentError extends Error {
  readonly filePath: string;

  constructor(filePath: string, detail: string) {
    super(`Malformed config document ${filePath}: ${detail}`);
    this.name = "MalformedDocumentError";
    this.filePath = filePath;
  }
}

/**
 * Read a JSON document. Returns `undefined` when the file does not exist;
 * throws `MalformedDocumentError` when it exists but is not a JSON object.
 * A broken file is never treated as empty, since rewriting it would drop
 * everything it held.
 */
export async function readConfigDocument(filePath: string): Promise<ConfigDocument | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isNotFoundError(err)) {
      return undefined;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new MalformedDocumentError(filePath, formatErrorMessage(err));
  }
  if (!isJsonObject(parsed)) {
    throw new MalformedDocumentError(filePath, "top-level value must be an object");
  }
  return parsed;
}

export async function writeConfigDocument(filePath: string, doc: ConfigDocument): Promise<string> {
  const content = serializeDocument(doc);
  await writeFileAtomic(filePath, content, { mode: CONFIG_FILE_MODE });
  return content;
}
