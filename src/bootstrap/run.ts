// ---------------------------------------------------------------------------
// Entry points for the sequence: full boot, configure-only, token-only
// ---------------------------------------------------------------------------

import type { BootConfig } from "../config/boot-config.js";
import { ProxyProcess } from "../proxy/process.js";
import { resolveGatewayToken, type GatewayTokenResolution } from "../secrets/gateway-token.js";
import { superviseGateway } from "./gateway.js";
import { runSelfHeal } from "./self-heal.js";
import { BootstrapSequencer } from "./sequencer.js";
import { createBootSteps, type BootDeps } from "./steps.js";
import type { BootContext, BootReport, BootStepName } from "./types.js";

/** Steps that only prepare files; no process is started. */
export const CONFIGURE_STEPS: readonly BootStepName[] = [
  "resolve-token",
  "validate-providers",
  "ensure-directories",
  "synthesize-config",
  "generate-snippets",
];

export function createDefaultDeps(): BootDeps {
  const proxy = new ProxyProcess();
  return {
    startProxy: (opts) => proxy.start(opts),
    stopProxy: () => {
      proxy.stop();
    },
    selfHeal: runSelfHeal,
    handOff: superviseGateway,
  };
}

export type BootRun = {
  context: BootContext;
  report: BootReport;
};

/**
 * Full sequence; resolves once the gateway has exited. On a fatal step the
 * proxy is stopped before the error propagates, so the caller's exit does not
 * leave it orphaned.
 */
export async function runBootstrap(config: BootConfig, deps: BootDeps = createDefaultDeps()): Promise<BootRun> {
  const context: BootContext = { config };
  const sequencer = new BootstrapSequencer(createBootSteps(deps));
  try {
    const report = await sequencer.run(context);
    return { context, report };
  } catch (err) {
    deps.stopProxy();
    throw err;
  }
}

export async function runConfigure(config: BootConfig, deps: BootDeps = createDefaultDeps()): Promise<BootRun> {
  const context: BootContext = { config };
  const steps = createBootSteps(deps).filter((step) => CONFIGURE_STEPS.includes(step.name));
  const report = await new BootstrapSequencer(steps).run(context);
  return { context, report };
}

export function resolveTokenOnly(config: BootConfig): Promise<GatewayTokenResolution> {
  return resolveGatewayToken(config.explicitToken, config.tokenFilePath);
}
