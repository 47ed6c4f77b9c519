// ---------------------------------------------------------------------------
// Snippet directory – full rewrite on every boot
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { writeFileAtomic } from "../infra/atomic-write.js";
import { isNotFoundError } from "../infra/errors.js";
import { AUTH_SNIPPET_FILE } from "./snippets.js";
import type { ProxySnippet } from "./types.js";

export const SNIPPET_FILE_MODE = 0o600;

export async function readPreviousAuthSnippet(snippetDir: string): Promise<string | undefined> {
  try {
    return await fs.readFile(path.join(snippetDir, AUTH_SNIPPET_FILE), "utf-8");
  } catch (err) {
    if (isNotFoundError(err)) {
      return undefined;
    }
    throw err;
  }
}

/** Write every snippet, returning the absolute paths written. */
export async function writeSnippets(snippetDir: string, snippets: readonly ProxySnippet[]): Promise<string[]> {
  await fs.mkdir(snippetDir, { recursive: true });
  const written: string[] = [];
  for (const snippet of snippets) {
    const filePath = path.join(snippetDir, snippet.fileName);
    await writeFileAtomic(filePath, snippet.content, { mode: SNIPPET_FILE_MODE });
    written.push(filePath);
  }
  return written;
}
