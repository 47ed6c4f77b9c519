// ---------------------------------------------------------------------------
// State, workspace and snippet directories
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as path from "node:path";

export const STATE_DIR_MODE = 0o700;

export type DirectoryLayout = {
  stateDir: string;
  workspaceDir: string;
  snippetDir?: string;
};

/** Create the state (owner-only), credentials, workspace and snippet dirs. */
export async function ensureDirectories(layout: DirectoryLayout): Promise<string[]> {
  const dirs = [layout.stateDir, path.join(layout.stateDir, "credentials"), layout.workspaceDir];
  if (layout.snippetDir) {
    dirs.push(layout.snippetDir);
  }
  for (const dir of dirs) {
    await fs.mkdir(dir, { recursive: true });
  }
  await fs.chmod(layout.stateDir, STATE_DIR_MODE);
  return dirs;
}
