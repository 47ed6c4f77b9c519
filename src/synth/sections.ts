// ---------------------------------------------------------------------------
// Sections – gateway defaults, channels, browser, hooks, audio
// ---------------------------------------------------------------------------

import { isTruthyEnvValue, readEnvString, type EnvSnapshot } from "../infra/env.js";
import { createSubsystemLogger } from "../logging.js";
import { loadSectionCatalog, type ChannelGate, type ChannelSpec, type SectionCatalog } from "./catalog.js";
import { ensureObject, getAtPath, isJsonObject } from "./document.js";
import { applyFieldMappings } from "./field-mappings.js";
import type { ConfigDocument, JsonObject } from "./types.js";

const log = createSubsystemLogger("sections");

export const DEFAULT_GATEWAY_PORT = 18789;

export type GatewaySectionInput = {
  /** Port from the environment; when undefined an existing document value is kept. */
  port?: number;
  token: string;
  workspaceDir: string;
};

// ---------------------------------------------------------------------------
// Gateway + agent defaults
// ---------------------------------------------------------------------------

/**
 * Settings the gateway needs to start behind the proxy. Values the document
 * already holds are kept; only the token is always written.
 */
export function applyCriticalGatewaySettings(doc: ConfigDocument, token: string): ConfigDocument {
  const gateway = ensureObject(doc, "gateway");
  if (!gateway.mode) {
    gateway.mode = "local";
  }
  if (token) {
    const auth = ensureObject(doc, "gateway", "auth");
    auth.mode = "token";
    auth.token = token;
  }
  const controlUi = ensureObject(doc, "gateway", "controlUi");
  if (controlUi.allowInsecureAuth === undefined || controlUi.allowInsecureAuth === null) {
    controlUi.allowInsecureAuth = true;
  }
  if (controlUi.enabled === undefined || controlUi.enabled === null) {
    controlUi.enabled = true;
  }
  return doc;
}

/**
 * Post-fixer variant: the values the proxy setup depends on are forced back
 * rather than filled in, so a fixer that rewrote them does not win.
 */
export function reassertCriticalGatewaySettings(doc: ConfigDocument, token: string): ConfigDocument {
  const gateway = ensureObject(doc, "gateway");
  gateway.mode = "local";
  if (token) {
    const auth = ensureObject(doc, "gateway", "auth");
    auth.mode = "token";
    auth.token = token;
  }
  const controlUi = ensureObject(doc, "gateway", "controlUi");
  controlUi.enabled = true;
  controlUi.allowInsecureAuth = true;
  return doc;
}

export function applyGatewaySection(doc: ConfigDocument, input: GatewaySectionInput): ConfigDocument {
  const gateway = ensureObject(doc, "gateway");
  if (input.port !== undefined) {
    gateway.port = input.port;
  } else if (!gateway.port) {
    gateway.port = DEFAULT_GATEWAY_PORT;
  }
  applyCriticalGatewaySettings(doc, input.token);

  const defaults = ensureObject(doc, "agents", "defaults");
  if (!defaults.workspace) {
    defaults.workspace = input.workspaceDir;
  }
  ensureObject(doc, "agents", "defaults", "model");
  return doc;
}

// ---------------------------------------------------------------------------
// Channels
// ---------------------------------------------------------------------------

function isGateOpen(gate: ChannelGate, env: EnvSnapshot): boolean {
  switch (gate.kind) {
    case "token":
      return readEnvString(env, gate.env) !== undefined;
    case "tokens":
      return gate.env.every((name) => readEnvString(env, name) !== undefined);
    case "flag":
      return isTruthyEnvValue(env[gate.env]);
  }
}

function writeGateTokens(channel: JsonObject, gate: ChannelGate, env: EnvSnapshot): void {
  if (gate.kind === "token") {
    channel[gate.field] = env[gate.env] ?? "";
    return;
  }
  if (gate.kind === "tokens") {
    for (let idx = 0; idx < gate.env.length && idx < gate.fields.length; idx++) {
      channel[gate.fields[idx]] = env[gate.env[idx]] ?? "";
    }
  }
}

function applyChannel(doc: ConfigDocument, spec: ChannelSpec, env: EnvSnapshot): void {
  if (!isGateOpen(spec.gate, env)) {
    if (getAtPath(doc, ["channels", spec.key]) !== undefined) {
      log.info({ channel: spec.key }, "channel configured (from document)");
    }
    return;
  }
  const channels = ensureObject(doc, "channels");
  let channel: JsonObject;
  if (spec.merge) {
    channel = ensureObject(channels, spec.key);
  } else {
    channel = {};
    channels[spec.key] = channel;
  }
  channel.enabled = true;
  writeGateTokens(channel, spec.gate, env);
  applyFieldMappings(channel, spec.fields, env);
  log.info({ channel: spec.key }, "configured channel (from env)");
}

export function applyChannels(
  doc: ConfigDocument,
  env: EnvSnapshot,
  catalog: SectionCatalog = loadSectionCatalog(),
): ConfigDocument {
  for (const spec of catalog.channels) {
    applyChannel(doc, spec, env);
  }
  const channels = doc.channels;
  if (isJsonObject(channels) && Object.keys(channels).length === 0) {
    delete doc.channels;
  }
  return doc;
}

// ---------------------------------------------------------------------------
// Browser, hooks, audio
// ---------------------------------------------------------------------------

export function applyBrowser(
  doc: ConfigDocument,
  env: EnvSnapshot,
  catalog: SectionCatalog = loadSectionCatalog(),
): ConfigDocument {
  if (readEnvString(env, catalog.browser.gate)) {
    applyFieldMappings(ensureObject(doc, "browser"), catalog.browser.fields, env);
    log.info("configured browser tool (remote CDP)");
  }
  return doc;
}

export function applyHooks(
  doc: ConfigDocument,
  env: EnvSnapshot,
  catalog: SectionCatalog = loadSectionCatalog(),
): ConfigDocument {
  if (isTruthyEnvValue(env[catalog.hooks.gate])) {
    const hooks = ensureObject(doc, "hooks");
    hooks.enabled = true;
    applyFieldMappings(hooks, catalog.hooks.fields, env);
    log.info("configured hooks (from env)");
  }
  return doc;
}

export function applyAudioTranscription(doc: ConfigDocument, env: EnvSnapshot): ConfigDocument {
  if (readEnvString(env, "DEEPGRAM_API_KEY")) {
    const audio = ensureObject(doc, "tools", "media", "audio");
    audio.enabled = true;
    audio.models = [{ provider: "deepgram", model: "nova-3" }];
    log.info("configured Deepgram transcription");
  }
  return doc;
}
