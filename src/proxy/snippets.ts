// ---------------------------------------------------------------------------
// ProxySnippetGenerator – Caddy auth and hooks fragments
// ---------------------------------------------------------------------------
// Both files are always written. An empty/permissive snippet is a valid,
// inert import for Caddy, so a missing password or disabled hooks never
// stops the proxy from starting.
// ---------------------------------------------------------------------------

import bcrypt from "bcrypt";
import { getAtPath } from "../synth/document.js";
import type { ConfigDocument } from "../synth/types.js";
import type { AuthConfig, HooksConfig, ProxySnippet } from "./types.js";

export const AUTH_SNIPPET_FILE = "auth.caddyfile";
export const HOOKS_SNIPPET_FILE = "hooks.caddyfile";
export const EMPTY_AUTH_SNIPPET = "(auth_block) {}\n";
export const DEFAULT_AUTH_USERNAME = "admin";
export const DEFAULT_HOOKS_PATH = "/hooks";
export const DEFAULT_BCRYPT_COST = 14;

const CADDY_WORD_RE = /^[^\s"{}#]+$/;
const AUTH_LINE_RE = /^\s*(\S+)\s+(\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53})\s*$/m;

function assertCaddyWord(value: string, label: string): void {
  if (!CADDY_WORD_RE.test(value)) {
    throw new Error(`${label} must not contain whitespace, quotes, braces or '#': "${value}"`);
  }
}

function quoteCaddyString(value: string): string {
  if (/[\r\n]/.test(value)) {
    throw new Error("value must not contain line breaks");
  }
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/** Pull the `username hash` pair out of a previously written auth snippet. */
export function parseAuthSnippet(content: string): { username: string; hash: string } | undefined {
  const match = AUTH_LINE_RE.exec(content);
  if (!match) {
    return undefined;
  }
  return { username: match[1], hash: match[2] };
}

async function resolvePasswordHash(
  username: string,
  password: string,
  cost: number,
  previous?: string,
): Promise<string> {
  const prior = previous ? parseAuthSnippet(previous) : undefined;
  if (prior && prior.username === username && (await bcrypt.compare(password, prior.hash))) {
    // Same credentials as last boot: keep the hash so the file is unchanged.
    return prior.hash;
  }
  return bcrypt.hash(password, cost);
}

export async function renderAuthSnippet(auth: AuthConfig, previous?: string): Promise<string> {
  if (!auth.password) {
    return EMPTY_AUTH_SNIPPET;
  }
  const username = auth.username || DEFAULT_AUTH_USERNAME;
  assertCaddyWord(username, "auth username");
  const hash = await resolvePasswordHash(
    username,
    auth.password,
    auth.bcryptCost ?? DEFAULT_BCRYPT_COST,
    previous,
  );

  const lines = ["(auth_block) {"];
  let matcher = "";
  if (auth.healthPath) {
    assertCaddyWord(auth.healthPath, "health path");
    lines.push(`    @protected not path ${auth.healthPath}`);
    matcher = " @protected";
  }
  lines.push(`    basic_auth${matcher} {`, `        ${username} ${hash}`, "    }", "}");
  return `${lines.join("\n")}\n`;
}

export function renderHooksSnippet(hooks: HooksConfig, token: string): string {
  if (!hooks.enabled) {
    return "";
  }
  assertCaddyWord(hooks.path, "hooks path");
  if (!hooks.path.startsWith("/")) {
    throw new Error(`hooks path must start with "/": "${hooks.path}"`);
  }
  const host = hooks.gatewayHost ?? "127.0.0.1";
  return [
    `handle ${hooks.path}* {`,
    `    reverse_proxy ${host}:${hooks.gatewayPort} {`,
    `        header_up Authorization ${quoteCaddyString(`Bearer ${token}`)}`,
    "    }",
    "}",
    "",
  ].join("\n");
}

export type GenerateSnippetsOptions = {
  /** Content of the auth snippet from the previous boot, if any. */
  previousAuthSnippet?: string;
};

export async function generateSnippets(
  auth: AuthConfig,
  hooks: HooksConfig,
  token: string,
  opts: GenerateSnippetsOptions = {},
): Promise<ProxySnippet[]> {
  return [
    {
      name: "auth",
      fileName: AUTH_SNIPPET_FILE,
      content: await renderAuthSnippet(auth, opts.previousAuthSnippet),
    },
    {
      name: "hooks",
      fileName: HOOKS_SNIPPET_FILE,
      content: renderHooksSnippet(hooks, token),
    },
  ];
}

/**
 * Hooks follow the synthesized document alone: HOOKS_ENABLED has already been
 * folded into `hooks.enabled`, and a convention binding may have overridden it.
 */
export function resolveHooksConfig(doc: ConfigDocument, opts: { gatewayPort: number }): HooksConfig {
  const docPath = getAtPath(doc, ["hooks", "path"]);
  return {
    enabled: getAtPath(doc, ["hooks", "enabled"]) === true,
    path: typeof docPath === "string" && docPath ? docPath : DEFAULT_HOOKS_PATH,
    gatewayPort: opts.gatewayPort,
  };
}
