// ---------------------------------------------------------------------------
// Stale lock markers
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import { isNotFoundError } from "../infra/errors.js";

/**
 * Remove lock markers left by a previous boot. They are never inspected: a
 * lock that survived a container restart cannot belong to a live process.
 * Returns the paths that actually existed.
 */
export async function clearStaleLocks(lockFiles: readonly string[]): Promise<string[]> {
  const removed: string[] = [];
  for (const file of lockFiles) {
    try {
      await fs.unlink(file);
      removed.push(file);
    } catch (err) {
      if (!isNotFoundError(err)) {
        throw err;
      }
    }
  }
  return removed;
}
