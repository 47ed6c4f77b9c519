// ---------------------------------------------------------------------------
// BootConfig – the environment, read once into an explicit struct
// ---------------------------------------------------------------------------
// Nothing downstream reads process.env: every component gets the slice of
// BootConfig it needs. The env snapshot travels along for the catalog-driven
// section mappings, which address variables by name.
// ---------------------------------------------------------------------------

import os from "node:os";
import path from "node:path";
import { Value } from "@sinclair/typebox/value";
import { resolveAssetPath } from "../infra/assets.js";
import { readEnvFlag, readEnvString, type EnvSnapshot } from "../infra/env.js";
import { BootstrapError } from "../infra/errors.js";
import { DEFAULT_PROXY_GRACE_MS } from "../proxy/process.js";
import { DEFAULT_AUTH_USERNAME, DEFAULT_BCRYPT_COST } from "../proxy/snippets.js";
import { resolveTokenFilePath } from "../secrets/gateway-token.js";
import { parseEnvBindings, type BindingParseIssue } from "../synth/env-bindings.js";
import { DEFAULT_GATEWAY_PORT } from "../synth/sections.js";
import type { EnvBinding } from "../synth/types.js";
import { BootConfigSchema, type BindScope, type BootSettings } from "./schema.js";

export const DEFAULT_STATE_DIR = "/data/.gateway";
export const DEFAULT_WORKSPACE_DIR = "/data/workspace";
export const DEFAULT_CUSTOM_CONFIG = "/app/config/gateway.json";
export const DEFAULT_SNIPPET_DIR = "/app/caddy.d";
export const CONFIG_FILE_NAME = "gateway.json";
export const LOCK_FILE_NAME = "gateway.lock";

export type BootConfig = BootSettings & {
  bindings: EnvBinding[];
  bindingIssues: BindingParseIssue[];
  env: EnvSnapshot;
};

function stripTrailingSlash(dir: string): string {
  return dir.length > 1 ? dir.replace(/\/+$/, "") : dir;
}

function parsePort(env: EnvSnapshot): { port: number; fromEnv: boolean } {
  const raw = readEnvString(env, "GATEWAY_PORT") ?? readEnvString(env, "PORT");
  if (raw === undefined) {
    return { port: DEFAULT_GATEWAY_PORT, fromEnv: false };
  }
  if (!/^\d+$/.test(raw)) {
    throw new BootstrapError(`GATEWAY_PORT must be a port number, got "${raw}"`, { step: "config" });
  }
  return { port: Number.parseInt(raw, 10), fromEnv: true };
}

function parseInteger(env: EnvSnapshot, key: string, fallback: number): number {
  const raw = readEnvString(env, key);
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new BootstrapError(`${key} must be a non-negative integer, got "${raw}"`, { step: "config" });
  }
  return Number.parseInt(raw, 10);
}

/** Behind the proxy the gateway only needs loopback; exposed directly it needs the LAN. */
function parseBindScope(env: EnvSnapshot, proxied: boolean): string {
  const fallback: BindScope = proxied ? "loopback" : "lan";
  return readEnvString(env, "GATEWAY_BIND") ?? fallback;
}

/**
 * Build and validate the BootConfig. Throws `BootstrapError` (step "config")
 * naming the first invalid setting.
 */
export function resolveBootConfig(env: EnvSnapshot): BootConfig {
  const stateDir = stripTrailingSlash(readEnvString(env, "GATEWAY_STATE_DIR") ?? DEFAULT_STATE_DIR);
  const workspaceDir = stripTrailingSlash(readEnvString(env, "GATEWAY_WORKSPACE_DIR") ?? DEFAULT_WORKSPACE_DIR);
  const proxyEnabled = readEnvFlag(env, "PROXY_ENABLED", true);
  const { port, fromEnv } = parsePort(env);
  const { bindings, issues } = parseEnvBindings(env);

  const candidate = {
    stateDir,
    workspaceDir,
    configPath: readEnvString(env, "GATEWAY_CONFIG_PATH") ?? path.join(stateDir, CONFIG_FILE_NAME),
    customConfigPath: readEnvString(env, "GATEWAY_CUSTOM_CONFIG") ?? DEFAULT_CUSTOM_CONFIG,
    templatePath: readEnvString(env, "GATEWAY_CONFIG_TEMPLATE") ?? resolveAssetPath("gateway.json.example"),
    tokenFilePath: resolveTokenFilePath(stateDir),
    explicitToken: readEnvString(env, "GATEWAY_TOKEN"),
    lockFiles: [path.join(os.tmpdir(), LOCK_FILE_NAME), path.join(stateDir, LOCK_FILE_NAME)],
    gateway: {
      command: readEnvString(env, "GATEWAY_BIN") ?? "gateway",
      subcommand: env.GATEWAY_SUBCOMMAND?.trim() ?? "serve",
      cwd: readEnvString(env, "GATEWAY_APP_DIR"),
      port,
      portFromEnv: fromEnv,
      bind: parseBindScope(env, proxyEnabled),
      verbose: readEnvFlag(env, "GATEWAY_VERBOSE", true),
      allowUnconfigured: readEnvFlag(env, "GATEWAY_ALLOW_UNCONFIGURED", true),
      selfHeal: readEnvFlag(env, "GATEWAY_SELF_HEAL", true),
    },
    proxy: {
      enabled: proxyEnabled,
      command: readEnvString(env, "PROXY_BIN") ?? "caddy",
      configPath: readEnvString(env, "PROXY_CONFIG") ?? resolveAssetPath("Caddyfile"),
      snippetDir: stripTrailingSlash(readEnvString(env, "PROXY_SNIPPET_DIR") ?? DEFAULT_SNIPPET_DIR),
      healthPath: readEnvString(env, "PROXY_HEALTH_PATH") ?? "/healthz",
      graceMs: parseInteger(env, "PROXY_START_GRACE_MS", DEFAULT_PROXY_GRACE_MS),
    },
    auth: {
      username: readEnvString(env, "AUTH_USERNAME") ?? DEFAULT_AUTH_USERNAME,
      password: env.AUTH_PASSWORD || undefined,
      bcryptCost: parseInteger(env, "AUTH_BCRYPT_COST", DEFAULT_BCRYPT_COST),
    },
  };

  if (!Value.Check(BootConfigSchema, candidate)) {
    const first = Value.Errors(BootConfigSchema, candidate).First();
    const detail = first ? `${first.path}: ${first.message}` : "invalid configuration";
    throw new BootstrapError(`Invalid bootstrap configuration (${detail})`, { step: "config" });
  }

  return { ...candidate, bindings, bindingIssues: issues, env };
}
