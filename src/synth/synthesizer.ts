// ---------------------------------------------------------------------------
// ConfigSynthesizer – environment -> gateway.json
// ---------------------------------------------------------------------------
// Layering, lowest to highest precedence:
//   1. base: custom overlay <- persisted document (or the shipped template)
//   2. gateway/agent defaults, providers, channels, browser, hooks, audio
//   3. convention bindings (GATEWAY_JSON__a__b=value), in name order
// The result is written back atomically. Identical inputs give identical bytes.
// ---------------------------------------------------------------------------

import type { EnvSnapshot } from "../infra/env.js";
import { createSubsystemLogger } from "../logging.js";
import { cloneJson, deepMerge } from "./document.js";
import { applyBindings, inferValue } from "./env-bindings.js";
import { applyProviders, hasProvider } from "./providers.js";
import {
  applyAudioTranscription,
  applyBrowser,
  applyChannels,
  applyGatewaySection,
  applyHooks,
} from "./sections.js";
import { readConfigDocument, writeConfigDocument } from "./store.js";
import type { ConfigDocument, DocumentSource, EnvBinding, SynthesisResult } from "./types.js";

const log = createSubsystemLogger("synth");

export type BaseDocumentPaths = {
  configPath: string;
  customConfigPath?: string;
  templatePath?: string;
};

export type SynthesizeOptions = BaseDocumentPaths & {
  env: EnvSnapshot;
  bindings: readonly EnvBinding[];
  token: string;
  workspaceDir: string;
  /** Port taken from the environment, if any. */
  port?: number;
};

export type BaseDocument = {
  document: ConfigDocument;
  source: DocumentSource;
  customOverlay: boolean;
};

/**
 * Apply `bindings` to a copy of `existing`. Keys no binding addresses are
 * untouched; an addressed key is replaced by the inferred value.
 */
export function synthesizeDocument(
  bindings: readonly EnvBinding[],
  existing: ConfigDocument,
): ConfigDocument {
  return applyBindings(cloneJson(existing), bindings);
}

export async function loadBaseDocument(paths: BaseDocumentPaths): Promise<BaseDocument> {
  const custom = paths.customConfigPath ? await readConfigDocument(paths.customConfigPath) : undefined;
  if (custom) {
    log.info({ path: paths.customConfigPath }, "loaded custom config overlay");
  }

  let source: DocumentSource = "empty";
  let seed = await readConfigDocument(paths.configPath);
  if (seed) {
    source = "persisted";
    log.info({ path: paths.configPath }, "merged persisted config");
  } else if (paths.templatePath) {
    seed = await readConfigDocument(paths.templatePath);
    if (seed) {
      source = "template";
      log.info({ path: paths.templatePath }, "seeded config from template");
    }
  }
  if (!seed) {
    log.info("no persisted config found");
  }

  const document = custom ? deepMerge(custom, seed ?? {}) : (seed ?? {});
  return { document, source, customOverlay: custom !== undefined };
}

/** Everything except I/O: base document in, synthesized document out. */
export function buildDocument(base: BaseDocument, opts: SynthesizeOptions): SynthesisResult {
  const doc = cloneJson(base.document);

  applyGatewaySection(doc, { port: opts.port, token: opts.token, workspaceDir: opts.workspaceDir });
  applyProviders(doc, opts.env, { customOverlay: base.customOverlay });
  applyChannels(doc, opts.env);
  applyBrowser(doc, opts.env);
  applyHooks(doc, opts.env);
  applyAudioTranscription(doc, opts.env);

  const document = synthesizeDocument(opts.bindings, doc);
  for (const binding of opts.bindings) {
    log.info(
      { path: binding.path.join("."), type: describeType(inferValue(binding.raw)) },
      "convention override",
    );
  }

  return {
    document,
    source: base.source,
    customOverlay: base.customOverlay,
    appliedBindings: [...opts.bindings],
    hasProvider: hasProvider(opts.env),
  };
}

function describeType(value: ReturnType<typeof inferValue>): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  return typeof value;
}

export async function synthesizeConfig(opts: SynthesizeOptions): Promise<SynthesisResult> {
  const base = await loadBaseDocument(opts);
  const result = buildDocument(base, opts);
  await writeConfigDocument(opts.configPath, result.document);
  log.info({ path: opts.configPath, bindings: result.appliedBindings.length }, "config written");
  return result;
}
