// ---------------------------------------------------------------------------
// Reverse proxy process – started before the gateway, stopped after it
// ---------------------------------------------------------------------------
// The proxy owns the externally exposed port, so a spawn error or an exit
// during the startup grace window is reported as a failed start.
// ---------------------------------------------------------------------------

import { spawn, type ChildProcess } from "node:child_process";
import { createSubsystemLogger } from "../logging.js";

const log = createSubsystemLogger("proxy");

export const DEFAULT_PROXY_GRACE_MS = 1500;

export interface ProxyLaunchOptions {
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** How long the process must stay up to count as started. */
  graceMs?: number;
}

export type ProxyStartResult =
  | { ok: true; pid: number }
  | { ok: false; error: string };

export function buildCaddyArgs(configPath: string): string[] {
  return ["run", "--config", configPath, "--adapter", "caddyfile"];
}

export class ProxyProcess {
  private child: ChildProcess | null = null;
  private exited = false;

  get pid(): number | undefined {
    return this.child?.pid;
  }

  get running(): boolean {
    return this.child !== null && !this.exited;
  }

  start(opts: ProxyLaunchOptions): Promise<ProxyStartResult> {
    if (this.child) {
      return Promise.resolve({ ok: false, error: "proxy already started" });
    }
    const graceMs = opts.graceMs ?? DEFAULT_PROXY_GRACE_MS;

    return new Promise((resolve) => {
      let settled = false;
      let graceTimer: NodeJS.Timeout | undefined;
      const settle = (result: ProxyStartResult) => {
        if (!settled) {
          settled = true;
          clearTimeout(graceTimer);
          resolve(result);
        }
      };

      let child: ChildProcess;
      try {
        child = spawn(opts.command, opts.args, {
          cwd: opts.cwd,
          env: opts.env,
          stdio: ["ignore", "inherit", "inherit"],
        });
      } catch (err) {
        settle({ ok: false, error: `failed to spawn ${opts.command}: ${String(err)}` });
        return;
      }
      this.child = child;

      child.on("error", (err) => {
        this.exited = true;
        settle({ ok: false, error: `failed to spawn ${opts.command}: ${err.message}` });
      });

      child.on("exit", (code, signal) => {
        this.exited = true;
        const how = signal ? `signal ${signal}` : `code ${code}`;
        if (settled) {
          log.warn({ code, signal }, `proxy exited (${how})`);
        }
        settle({ ok: false, error: `${opts.command} exited during startup (${how})` });
      });

      graceTimer = setTimeout(() => {
        if (!this.exited) {
          log.info({ pid: child.pid, command: opts.command }, "proxy started");
          settle({ ok: true, pid: child.pid ?? 0 });
        }
      }, graceMs);
    });
  }

  stop(signal: NodeJS.Signals = "SIGTERM"): boolean {
    if (!this.child || this.exited) {
      return false;
    }
    return this.child.kill(signal);
  }
}
