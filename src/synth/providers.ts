// ---------------------------------------------------------------------------
// Providers – models.providers entries, stale cleanup, primary model
// ---------------------------------------------------------------------------
// Built-in providers are picked up by the gateway from their env var alone and
// must not carry a models.providers entry. Custom providers, Bedrock and
// Ollama need explicit entries. Cleanup of stale entries is skipped when a
// custom overlay document is mounted, since that document owns them.
// ---------------------------------------------------------------------------

import { readEnvString, type EnvSnapshot } from "../infra/env.js";
import { createSubsystemLogger } from "../logging.js";
import { loadProviderCatalog, type CustomProviderSpec, type ProviderCatalog } from "./catalog.js";
import { ensureObject, getAtPath, isJsonObject } from "./document.js";
import type { ConfigDocument, JsonObject, JsonValue } from "./types.js";

const log = createSubsystemLogger("providers");

export const PRIMARY_MODEL_OVERRIDE_ENV = "GATEWAY_PRIMARY_MODEL";

export type ProviderOptions = {
  customOverlay: boolean;
  catalog?: ProviderCatalog;
};

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

export function resolveOpencodeKey(env: EnvSnapshot, catalog = loadProviderCatalog()): string | undefined {
  for (const name of catalog.opencode.env) {
    const value = readEnvString(env, name);
    if (value) {
      return value;
    }
  }
  return undefined;
}

export function hasBedrockCredentials(env: EnvSnapshot): boolean {
  return Boolean(readEnvString(env, "AWS_ACCESS_KEY_ID") && readEnvString(env, "AWS_SECRET_ACCESS_KEY"));
}

export function resolveOllamaUrl(env: EnvSnapshot, catalog = loadProviderCatalog()): string | undefined {
  const raw = readEnvString(env, catalog.ollama.env);
  return raw ? raw.replace(/\/+$/, "") : undefined;
}

/** Names of every recognized credential variable, for diagnostics. */
export function listCredentialVariables(catalog = loadProviderCatalog()): string[] {
  return [
    ...catalog.builtin.map((p) => p.env),
    ...catalog.opencode.env,
    ...catalog.custom.map((p) => p.env),
    "AWS_ACCESS_KEY_ID+AWS_SECRET_ACCESS_KEY",
    catalog.ollama.env,
  ];
}

/**
 * True when any recognized provider credential is present: a built-in or
 * custom API key, an OpenCode key, the AWS key pair, or an Ollama base URL.
 */
export function hasProvider(env: EnvSnapshot, catalog = loadProviderCatalog()): boolean {
  return (
    catalog.builtin.some((p) => readEnvString(env, p.env) !== undefined) ||
    resolveOpencodeKey(env, catalog) !== undefined ||
    catalog.custom.some((p) => readEnvString(env, p.env) !== undefined) ||
    hasBedrockCredentials(env) ||
    resolveOllamaUrl(env, catalog) !== undefined
  );
}

// ---------------------------------------------------------------------------
// Document updates
// ---------------------------------------------------------------------------

function providersNode(doc: ConfigDocument): JsonObject | undefined {
  const node = getAtPath(doc, ["models", "providers"]);
  return isJsonObject(node) ? node : undefined;
}

function removeProvider(doc: ConfigDocument, key: string, reason: string): void {
  const providers = providersNode(doc);
  if (providers && key in providers) {
    delete providers[key];
    log.info({ provider: key }, `removing provider entry (${reason})`);
  }
}

function modelsJson(models: CustomProviderSpec["models"]): JsonValue[] {
  return models.map((m) => ({ id: m.id, name: m.name, contextWindow: m.contextWindow }));
}

function resolveCustomBaseUrl(spec: CustomProviderSpec, env: EnvSnapshot): string | undefined {
  if (spec.baseUrl) {
    return spec.baseUrl;
  }
  if (spec.baseUrlEnv) {
    const url = readEnvString(env, spec.baseUrlEnv) ?? spec.baseUrlDefault;
    return url?.replace(/\/+$/, "");
  }
  return spec.baseUrlDefault;
}

function applyCustomProviders(doc: ConfigDocument, env: EnvSnapshot, opts: Required<ProviderOptions>): void {
  for (const spec of opts.catalog.custom) {
    const apiKey = readEnvString(env, spec.env);
    if (!apiKey) {
      if (!opts.customOverlay) {
        removeProvider(doc, spec.key, `${spec.env} not set`);
      }
      continue;
    }
    const entry: JsonObject = {
      api: spec.api,
      apiKey,
      models: modelsJson(spec.models),
    };
    const baseUrl = resolveCustomBaseUrl(spec, env);
    if (baseUrl) {
      entry.baseUrl = baseUrl;
    }
    ensureObject(doc, "models", "providers")[spec.key] = entry;
    log.info({ provider: spec.key }, "configured custom provider");
  }
}

function applyBedrock(doc: ConfigDocument, env: EnvSnapshot, opts: Required<ProviderOptions>): void {
  const bedrock = opts.catalog.bedrock;
  if (hasBedrockCredentials(env)) {
    const region =
      readEnvString(env, "AWS_REGION") ?? readEnvString(env, "AWS_DEFAULT_REGION") ?? bedrock.defaultRegion;
    ensureObject(doc, "models", "providers")[bedrock.key] = {
      api: bedrock.api,
      baseUrl: `https://bedrock-runtime.${region}.amazonaws.com`,
      models: modelsJson(bedrock.models),
    };
    ensureObject(doc, "models").bedrockDiscovery = {
      enabled: true,
      region,
      providerFilter: readEnvString(env, "BEDROCK_PROVIDER_FILTER") ?? bedrock.providerFilterDefault,
      refreshInterval: bedrock.refreshInterval,
    };
    log.info({ region }, "configured Amazon Bedrock provider");
    return;
  }
  if (opts.customOverlay) {
    return;
  }
  removeProvider(doc, bedrock.key, "AWS credentials not set");
  const models = doc.models;
  if (isJsonObject(models) && "bedrockDiscovery" in models) {
    delete models.bedrockDiscovery;
  }
}

function applyOllama(doc: ConfigDocument, env: EnvSnapshot, opts: Required<ProviderOptions>): void {
  const ollama = opts.catalog.ollama;
  const url = resolveOllamaUrl(env, opts.catalog);
  if (!url) {
    if (!opts.customOverlay) {
      removeProvider(doc, ollama.key, `${ollama.env} not set`);
    }
    return;
  }
  ensureObject(doc, "models", "providers")[ollama.key] = {
    api: ollama.api,
    baseUrl: url.endsWith("/v1") ? url : `${url}/v1`,
    models: modelsJson(ollama.models),
  };
  log.info("configured Ollama provider");
}

function removeBuiltinEntries(doc: ConfigDocument, env: EnvSnapshot, opts: Required<ProviderOptions>): void {
  for (const provider of opts.catalog.builtin) {
    if (readEnvString(env, provider.env)) {
      log.info({ provider: provider.key }, `${provider.label} enabled (${provider.env} set)`);
    }
    if (!opts.customOverlay) {
      removeProvider(doc, provider.key, "built-in, not needed");
    }
  }
  if (resolveOpencodeKey(env, opts.catalog)) {
    log.info({ provider: opts.catalog.opencode.key }, "OpenCode enabled");
  }
  if (!opts.customOverlay) {
    removeProvider(doc, opts.catalog.opencode.key, "built-in, not needed");
  }
}

function isSourceSet(source: string, env: EnvSnapshot, catalog: ProviderCatalog): boolean {
  switch (source) {
    case "@opencode":
      return resolveOpencodeKey(env, catalog) !== undefined;
    case "@bedrock":
      return hasBedrockCredentials(env);
    case "@ollama":
      return resolveOllamaUrl(env, catalog) !== undefined;
    default:
      return readEnvString(env, source) !== undefined;
  }
}

/**
 * Pick `agents.defaults.model.primary`: explicit override, then whatever the
 * document already has, then the first provider in priority order.
 */
export function selectPrimaryModel(
  doc: ConfigDocument,
  env: EnvSnapshot,
  catalog = loadProviderCatalog(),
): string | undefined {
  const model = ensureObject(doc, "agents", "defaults", "model");
  const override = readEnvString(env, PRIMARY_MODEL_OVERRIDE_ENV);
  if (override) {
    model.primary = override;
    log.info({ model: override }, "primary model (override)");
    return override;
  }
  const existing = model.primary;
  if (typeof existing === "string" && existing) {
    log.info({ model: existing }, "primary model (from config)");
    return existing;
  }
  const match = catalog.primaryModelPriority.find((entry) => isSourceSet(entry.source, env, catalog));
  if (!match) {
    return undefined;
  }
  model.primary = match.model;
  log.info({ model: match.model }, "primary model (auto)");
  return match.model;
}

export function applyProviders(doc: ConfigDocument, env: EnvSnapshot, opts: ProviderOptions): ConfigDocument {
  const resolved: Required<ProviderOptions> = {
    customOverlay: opts.customOverlay,
    catalog: opts.catalog ?? loadProviderCatalog(),
  };
  applyCustomProviders(doc, env, resolved);
  applyBedrock(doc, env, resolved);
  applyOllama(doc, env, resolved);
  removeBuiltinEntries(doc, env, resolved);
  selectPrimaryModel(doc, env, resolved.catalog);
  return doc;
}
