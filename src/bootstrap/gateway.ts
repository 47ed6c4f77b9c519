// ---------------------------------------------------------------------------
// Gateway hand-off – launch arguments and supervision
// ---------------------------------------------------------------------------
// Node has no exec(): the gateway runs as our only foreground child. Every
// termination signal we receive is passed straight through, and we exit with
// whatever the gateway exits with, so the container runtime sees the gateway's
// lifecycle as if it were PID 1 itself.
// ---------------------------------------------------------------------------

import { spawn, type ChildProcess } from "node:child_process";
import os from "node:os";
import type { GatewayLaunchSettings } from "../config/schema.js";
import { createSubsystemLogger } from "../logging.js";

const log = createSubsystemLogger("gateway");

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ["SIGTERM", "SIGINT", "SIGHUP", "SIGQUIT"];

export type GatewayArgsInput = {
  settings: GatewayLaunchSettings;
  token: string;
  /** Forces --allow-unconfigured on regardless of settings. */
  unconfigured: boolean;
};

export function buildGatewayArgs(input: GatewayArgsInput): string[] {
  const { settings } = input;
  const args: string[] = [];
  if (settings.subcommand) {
    args.push(settings.subcommand);
  }
  args.push("--port", String(settings.port));
  if (settings.verbose) {
    args.push("--verbose");
  }
  if (settings.allowUnconfigured || input.unconfigured) {
    args.push("--allow-unconfigured");
  }
  args.push("--bind", settings.bind, "--token", input.token);
  return args;
}

/** Redact the token for logging. */
export function describeGatewayCommand(command: string, args: readonly string[]): string {
  const shown = args.map((arg, idx) => (idx > 0 && args[idx - 1] === "--token" ? "<redacted>" : arg));
  return [command, ...shown].join(" ");
}

export function exitCodeForSignal(signal: NodeJS.Signals): number {
  return 128 + (os.constants.signals[signal] ?? 0);
}

export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export type SuperviseOptions = {
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Called once the gateway is gone, before the exit code is returned. */
  onExit?: () => void;
  signals?: SignalSource;
};

/**
 * Start the gateway and resolve with the exit code the bootstrap process
 * should exit with. Rejects only if the gateway cannot be spawned at all.
 */
export function superviseGateway(opts: SuperviseOptions): Promise<number> {
  const signals = opts.signals ?? process;

  return new Promise((resolve, reject) => {
    let child: ChildProcess;
    try {
      child = spawn(opts.command, opts.args, {
        cwd: opts.cwd,
        env: opts.env,
        stdio: "inherit",
      });
    } catch (err) {
      reject(err);
      return;
    }

    const forward = (signal: NodeJS.Signals) => {
      log.info({ signal }, "forwarding signal to gateway");
      child.kill(signal);
    };
    for (const signal of FORWARDED_SIGNALS) {
      signals.on(signal, forward);
    }
    const detach = () => {
      for (const signal of FORWARDED_SIGNALS) {
        signals.off(signal, forward);
      }
    };

    let spawned = false;
    child.on("spawn", () => {
      spawned = true;
      log.info({ pid: child.pid }, "gateway started");
    });

    child.on("error", (err) => {
      if (!spawned) {
        detach();
        reject(err);
        return;
      }
      log.error({ err: err.message }, "gateway process error");
    });

    child.on("exit", (code, signal) => {
      detach();
      opts.onExit?.();
      const exitCode = signal ? exitCodeForSignal(signal) : (code ?? 1);
      log.info({ code, signal, exitCode }, "gateway exited");
      resolve(exitCode);
    });
  });
}
