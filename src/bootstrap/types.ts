// ---------------------------------------------------------------------------
// Bootstrap sequence types
// ---------------------------------------------------------------------------

import type { BootConfig } from "../config/boot-config.js";
import type { GatewayTokenResolution } from "../secrets/gateway-token.js";
import type { SynthesisResult } from "../synth/types.js";

export const BOOT_STEPS = [
  "resolve-token",
  "validate-providers",
  "ensure-directories",
  "synthesize-config",
  "generate-snippets",
  "self-heal",
  "start-proxy",
  "clear-stale-locks",
  "hand-off",
] as const;

export type BootStepName = (typeof BOOT_STEPS)[number];

export type StepStatus = "ok" | "warn" | "skipped" | "failed";

export type StepOutcome =
  | { status: "ok"; detail?: string }
  | { status: "warn"; detail: string }
  | { status: "skipped"; detail: string }
  | { status: "failed"; detail: string };

/** State threaded through the steps; each step fills in what it owns. */
export type BootContext = {
  config: BootConfig;
  token?: GatewayTokenResolution;
  hasProvider?: boolean;
  synthesis?: SynthesisResult;
  snippetFiles?: string[];
  proxyPid?: number;
  removedLocks?: string[];
  exitCode?: number;
};

export type BootStep = {
  name: BootStepName;
  /** A failing tolerant step is logged and the sequence moves on. */
  tolerant?: boolean;
  run: (ctx: BootContext) => Promise<StepOutcome>;
};

export type StepRecord = {
  name: BootStepName;
  status: StepStatus;
  detail?: string;
  durationMs: number;
};

export type BootReport = {
  steps: StepRecord[];
  exitCode?: number;
};
