// ---------------------------------------------------------------------------
// Atomic file writes (temp file + rename in the same directory)
// ---------------------------------------------------------------------------

import { randomBytes } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";

export type AtomicWriteOptions = {
  /** File mode applied to the temp file before it is renamed into place. */
  mode?: number;
};

export async function writeFileAtomic(
  filePath: string,
  content: string,
  opts: AtomicWriteOptions = {},
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tmpPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`,
  );
  try {
    await fs.writeFile(tmpPath, content, { encoding: "utf-8", mode: opts.mode });
    if (opts.mode !== undefined) {
      // writeFile's mode is masked by the umask; chmod is not.
      await fs.chmod(tmpPath, opts.mode);
    }
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}
