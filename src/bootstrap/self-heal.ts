// ---------------------------------------------------------------------------
// Self-heal – run the gateway's own "doctor --fix" before it starts
// ---------------------------------------------------------------------------

import { spawn } from "node:child_process";

export const SELF_HEAL_ARGS = ["doctor", "--fix"] as const;
export const DEFAULT_SELF_HEAL_TIMEOUT_MS = 120_000;

export type SelfHealOptions = {
  command: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
};

export type SelfHealResult = { ok: true } | { ok: false; error: string };

export function runSelfHeal(opts: SelfHealOptions): Promise<SelfHealResult> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_SELF_HEAL_TIMEOUT_MS;

  return new Promise((resolve) => {
    let done = false;
    const finish = (result: SelfHealResult) => {
      if (!done) {
        done = true;
        clearTimeout(timer);
        resolve(result);
      }
    };

    const child = spawn(opts.command, [...SELF_HEAL_ARGS], {
      cwd: opts.cwd,
      env: opts.env,
      stdio: ["ignore", "inherit", "inherit"],
    });

    const timer = setTimeout(() => {
      child.kill("SIGTERM");
      finish({ ok: false, error: `timed out after ${timeoutMs}ms` });
    }, timeoutMs);

    child.on("error", (err) => {
      finish({ ok: false, error: err.message });
    });
    child.on("exit", (code, signal) => {
      if (code === 0) {
        finish({ ok: true });
      } else {
        finish({ ok: false, error: signal ? `killed by ${signal}` : `exited with code ${code}` });
      }
    });
  });
}
