// ---------------------------------------------------------------------------
// Gateway token – resolve once per state directory, never rotate silently
// ---------------------------------------------------------------------------
// Precedence:
//   1. explicit value (GATEWAY_TOKEN), written through to the token file
//   2. <state>/gateway.token
//   3. freshly generated 32 random bytes as hex, persisted
// ---------------------------------------------------------------------------

import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { writeFileAtomic } from "../infra/atomic-write.js";
import { isNotFoundError } from "../infra/errors.js";
import { createSubsystemLogger, fingerprintSecret } from "../logging.js";

const log = createSubsystemLogger("token");

export const TOKEN_FILE_NAME = "gateway.token";
export const TOKEN_FILE_MODE = 0o600;
export const TOKEN_BYTES = 32;

export type GatewayTokenSource = "explicit" | "persisted" | "generated";

export type GatewayTokenResolution = {
  token: string;
  source: GatewayTokenSource;
  filePath: string;
};

export function resolveTokenFilePath(stateDir: string): string {
  return path.join(stateDir, TOKEN_FILE_NAME);
}

export function generateGatewayToken(): string {
  return crypto.randomBytes(TOKEN_BYTES).toString("hex");
}

async function readPersistedToken(filePath: string): Promise<string | undefined> {
  try {
    const content = (await fs.readFile(filePath, "utf-8")).trim();
    return content || undefined;
  } catch (err) {
    if (isNotFoundError(err)) {
      return undefined;
    }
    throw err;
  }
}

async function persistToken(filePath: string, token: string): Promise<void> {
  await writeFileAtomic(filePath, `${token}\n`, { mode: TOKEN_FILE_MODE });
}

/**
 * Resolve the gateway bearer token. Any failure to persist is thrown: a token
 * that only lives in memory would change on the next boot and invalidate
 * every client holding the old one.
 */
export async function resolveGatewayToken(
  explicitValue: string | undefined,
  filePath: string,
): Promise<GatewayTokenResolution> {
  const explicit = explicitValue?.trim();
  if (explicit) {
    await persistToken(filePath, explicit);
    log.info({ fingerprint: fingerprintSecret(explicit) }, "gateway token from environment");
    return { token: explicit, source: "explicit", filePath };
  }

  const persisted = await readPersistedToken(filePath);
  if (persisted) {
    log.info({ path: filePath, fingerprint: fingerprintSecret(persisted) }, "gateway token loaded");
    return { token: persisted, source: "persisted", filePath };
  }

  const generated = generateGatewayToken();
  await persistToken(filePath, generated);
  log.info(
    { path: filePath, fingerprint: fingerprintSecret(generated) },
    "gateway token generated and persisted",
  );
  return { token: generated, source: "generated", filePath };
}
