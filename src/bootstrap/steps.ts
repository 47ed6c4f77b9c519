// ---------------------------------------------------------------------------
// Boot steps – one function per named state of the sequence
// ---------------------------------------------------------------------------

import * as path from "node:path";
import type { BootConfig } from "../config/boot-config.js";
import { BootstrapError } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging.js";
import { buildCaddyArgs, type ProxyLaunchOptions, type ProxyStartResult } from "../proxy/process.js";
import { generateSnippets, resolveHooksConfig } from "../proxy/snippets.js";
import { readPreviousAuthSnippet, writeSnippets } from "../proxy/writer.js";
import { resolveGatewayToken, type GatewayTokenResolution } from "../secrets/gateway-token.js";
import { serializeDocument } from "../synth/document.js";
import { hasProvider, listCredentialVariables } from "../synth/providers.js";
import { reassertCriticalGatewaySettings } from "../synth/sections.js";
import { readConfigDocument, writeConfigDocument } from "../synth/store.js";
import { synthesizeConfig } from "../synth/synthesizer.js";
import { ensureDirectories } from "./directories.js";
import { buildGatewayArgs, describeGatewayCommand, type SuperviseOptions } from "./gateway.js";
import { clearStaleLocks } from "./locks.js";
import type { SelfHealOptions, SelfHealResult } from "./self-heal.js";
import type { BootContext, BootStep } from "./types.js";

const log = createSubsystemLogger("bootstrap");

export type BootDeps = {
  startProxy: (opts: ProxyLaunchOptions) => Promise<ProxyStartResult>;
  stopProxy: () => void;
  selfHeal: (opts: SelfHealOptions) => Promise<SelfHealResult>;
  handOff: (opts: SuperviseOptions) => Promise<number>;
};

function requireToken(ctx: BootContext): GatewayTokenResolution {
  if (!ctx.token) {
    throw new BootstrapError("gateway token has not been resolved", { step: "resolve-token" });
  }
  return ctx.token;
}

/**
 * Environment handed to the gateway, its self-check and the proxy: the boot
 * snapshot plus the resolved locations, port and token. The Caddyfile reads
 * GATEWAY_PORT, PROXY_SNIPPET_DIR and PROXY_HEALTH_PATH, so they always
 * carry the resolved values, whichever variable or default they came from.
 */
export function buildChildEnv(config: BootConfig, token: string): NodeJS.ProcessEnv {
  return {
    ...config.env,
    GATEWAY_STATE_DIR: config.stateDir,
    GATEWAY_WORKSPACE_DIR: config.workspaceDir,
    GATEWAY_CONFIG_PATH: config.configPath,
    GATEWAY_PORT: String(config.gateway.port),
    GATEWAY_TOKEN: token,
    PROXY_SNIPPET_DIR: config.proxy.snippetDir,
    PROXY_HEALTH_PATH: config.proxy.healthPath,
    HOME: path.dirname(config.stateDir),
  };
}

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

const resolveTokenStep: BootStep = {
  name: "resolve-token",
  async run(ctx) {
    ctx.token = await resolveGatewayToken(ctx.config.explicitToken, ctx.config.tokenFilePath);
    return { status: "ok", detail: `source=${ctx.token.source}` };
  },
};

const validateProvidersStep: BootStep = {
  name: "validate-providers",
  async run(ctx) {
    ctx.hasProvider = hasProvider(ctx.config.env);
    if (ctx.hasProvider) {
      return { status: "ok" };
    }
    return {
      status: "warn",
      detail:
        "no AI provider credential detected; the gateway starts with --allow-unconfigured " +
        `and can be configured from its UI. Recognized: ${listCredentialVariables().join(", ")}`,
    };
  },
};

const ensureDirectoriesStep: BootStep = {
  name: "ensure-directories",
  async run(ctx) {
    const dirs = await ensureDirectories({
      stateDir: ctx.config.stateDir,
      workspaceDir: ctx.config.workspaceDir,
      snippetDir: ctx.config.proxy.enabled ? ctx.config.proxy.snippetDir : undefined,
    });
    return { status: "ok", detail: `${dirs.length} directories` };
  },
};

const synthesizeConfigStep: BootStep = {
  name: "synthesize-config",
  async run(ctx) {
    const { config } = ctx;
    for (const issue of config.bindingIssues) {
      log.warn({ variable: issue.name, reason: issue.reason }, "ignoring malformed binding");
    }
    ctx.synthesis = await synthesizeConfig({
      configPath: config.configPath,
      customConfigPath: config.customConfigPath,
      templatePath: config.templatePath,
      env: config.env,
      bindings: config.bindings,
      token: requireToken(ctx).token,
      workspaceDir: config.workspaceDir,
      port: config.gateway.portFromEnv ? config.gateway.port : undefined,
    });
    const detail = `source=${ctx.synthesis.source} bindings=${ctx.synthesis.appliedBindings.length}`;
    if (config.bindingIssues.length > 0) {
      return { status: "warn", detail: `${detail} ignored=${config.bindingIssues.length}` };
    }
    return { status: "ok", detail };
  },
};

const generateSnippetsStep: BootStep = {
  name: "generate-snippets",
  async run(ctx) {
    const { proxy, auth, gateway } = ctx.config;
    if (!proxy.enabled) {
      return { status: "skipped", detail: "proxy disabled" };
    }
    if (!ctx.synthesis) {
      throw new BootstrapError("config has not been synthesized", { step: "synthesize-config" });
    }
    const hooks = resolveHooksConfig(ctx.synthesis.document, { gatewayPort: gateway.port });
    const snippets = await generateSnippets(
      { username: auth.username, password: auth.password, healthPath: proxy.healthPath, bcryptCost: auth.bcryptCost },
      hooks,
      requireToken(ctx).token,
      { previousAuthSnippet: await readPreviousAuthSnippet(proxy.snippetDir) },
    );
    ctx.snippetFiles = await writeSnippets(proxy.snippetDir, snippets);
    return {
      status: "ok",
      detail: `auth=${auth.password ? "basic" : "open"} hooks=${hooks.enabled ? hooks.path : "off"}`,
    };
  },
};

/** Put back the settings the gateway cannot start without, if the fixer dropped or changed them. */
async function reassertGatewaySettings(config: BootConfig, token: string): Promise<boolean> {
  const doc = await readConfigDocument(config.configPath);
  if (!doc) {
    return false;
  }
  const before = serializeDocument(doc);
  reassertCriticalGatewaySettings(doc, token);
  if (serializeDocument(doc) === before) {
    return false;
  }
  await writeConfigDocument(config.configPath, doc);
  return true;
}

function createSelfHealStep(deps: BootDeps): BootStep {
  return {
    name: "self-heal",
    tolerant: true,
    async run(ctx) {
      const { config } = ctx;
      if (!config.gateway.selfHeal) {
        return { status: "skipped", detail: "disabled" };
      }
      const token = requireToken(ctx).token;
      const result = await deps.selfHeal({
        command: config.gateway.command,
        cwd: config.gateway.cwd,
        env: buildChildEnv(config, token),
      });
      const reasserted = await reassertGatewaySettings(config, token);
      if (reasserted) {
        log.info("reasserted gateway settings after self-heal");
      }
      if (!result.ok) {
        return { status: "failed", detail: result.error };
      }
      return { status: "ok", detail: reasserted ? "settings reasserted" : undefined };
    },
  };
}

function createStartProxyStep(deps: BootDeps): BootStep {
  return {
    name: "start-proxy",
    async run(ctx) {
      const { proxy } = ctx.config;
      if (!proxy.enabled) {
        return { status: "skipped", detail: "proxy disabled; gateway is exposed directly" };
      }
      const result = await deps.startProxy({
        command: proxy.command,
        args: buildCaddyArgs(proxy.configPath),
        env: buildChildEnv(ctx.config, requireToken(ctx).token),
        graceMs: proxy.graceMs,
      });
      if (!result.ok) {
        return { status: "failed", detail: result.error };
      }
      ctx.proxyPid = result.pid;
      return { status: "ok", detail: `pid=${result.pid}` };
    },
  };
}

const clearStaleLocksStep: BootStep = {
  name: "clear-stale-locks",
  async run(ctx) {
    ctx.removedLocks = await clearStaleLocks(ctx.config.lockFiles);
    return { status: "ok", detail: `removed=${ctx.removedLocks.length}` };
  },
};

function createHandOffStep(deps: BootDeps): BootStep {
  return {
    name: "hand-off",
    async run(ctx) {
      const { config } = ctx;
      const token = requireToken(ctx).token;
      const args = buildGatewayArgs({
        settings: config.gateway,
        token,
        unconfigured: ctx.hasProvider === false,
      });
      log.info({ command: describeGatewayCommand(config.gateway.command, args) }, "handing off to gateway");
      ctx.exitCode = await deps.handOff({
        command: config.gateway.command,
        args,
        cwd: config.gateway.cwd,
        env: buildChildEnv(config, token),
        onExit: deps.stopProxy,
      });
      return { status: "ok", detail: `gateway exited with ${ctx.exitCode}` };
    },
  };
}

/** The full sequence, in order. */
export function createBootSteps(deps: BootDeps): BootStep[] {
  return [
    resolveTokenStep,
    validateProvidersStep,
    ensureDirectoriesStep,
    synthesizeConfigStep,
    generateSnippetsStep,
    createSelfHealStep(deps),
    createStartProxyStep(deps),
    clearStaleLocksStep,
    createHandOffStep(deps),
  ];
}
