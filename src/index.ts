export { resolveBootConfig, type BootConfig } from "./config/boot-config.js";
export { BootstrapSequencer } from "./bootstrap/sequencer.js";
export { runBootstrap, runConfigure, createDefaultDeps } from "./bootstrap/run.js";
export type { BootContext, BootStep, BootStepName, StepOutcome, BootReport } from "./bootstrap/types.js";
export { resolveGatewayToken } from "./secrets/gateway-token.js";
export { parseEnvBindings, inferValue, applyBindings, BINDING_PREFIX } from "./synth/env-bindings.js";
export { synthesizeConfig, synthesizeDocument } from "./synth/synthesizer.js";
export type { ConfigDocument, EnvBinding, JsonValue } from "./synth/types.js";
export { generateSnippets, renderAuthSnippet, renderHooksSnippet } from "./proxy/snippets.js";
export type { ProxySnippet, AuthConfig, HooksConfig } from "./proxy/types.js";
export { BootstrapError } from "./infra/errors.js";
