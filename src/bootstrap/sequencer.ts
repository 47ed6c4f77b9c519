// ---------------------------------------------------------------------------
// BootstrapSequencer – run named steps strictly in order
// ---------------------------------------------------------------------------
// No step starts before the previous one finished. A failed step aborts the
// sequence with a BootstrapError unless it is marked tolerant, in which case
// the failure is logged and the next step runs.
// ---------------------------------------------------------------------------

import { BootstrapError, formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging.js";
import type { BootContext, BootReport, BootStep, StepOutcome, StepRecord } from "./types.js";

const log = createSubsystemLogger("bootstrap");

export type SequencerDeps = {
  nowMs?: () => number;
};

export class BootstrapSequencer {
  private readonly steps: readonly BootStep[];
  private readonly nowMs: () => number;

  constructor(steps: readonly BootStep[], deps: SequencerDeps = {}) {
    const seen = new Set<string>();
    for (const step of steps) {
      if (seen.has(step.name)) {
        throw new Error(`duplicate boot step "${step.name}"`);
      }
      seen.add(step.name);
    }
    this.steps = steps;
    this.nowMs = deps.nowMs ?? Date.now;
  }

  get stepNames(): string[] {
    return this.steps.map((s) => s.name);
  }

  async run(ctx: BootContext): Promise<BootReport> {
    const records: StepRecord[] = [];

    for (const step of this.steps) {
      const startedAt = this.nowMs();
      const outcome = await this.runStep(step, ctx);
      const record: StepRecord = {
        name: step.name,
        status: outcome.status,
        detail: outcome.detail,
        durationMs: this.nowMs() - startedAt,
      };
      records.push(record);

      if (outcome.status === "failed" && !step.tolerant) {
        log.error({ step: step.name, detail: outcome.detail }, "boot step failed");
        throw new BootstrapError(`${step.name}: ${outcome.detail}`, { step: step.name });
      }
      this.logOutcome(step, outcome);
    }

    return { steps: records, exitCode: ctx.exitCode };
  }

  private async runStep(step: BootStep, ctx: BootContext): Promise<StepOutcome> {
    log.debug({ step: step.name }, "boot step starting");
    try {
      return await step.run(ctx);
    } catch (err) {
      if (err instanceof BootstrapError && !step.tolerant) {
        throw err;
      }
      return { status: "failed", detail: formatErrorMessage(err) };
    }
  }

  private logOutcome(step: BootStep, outcome: StepOutcome): void {
    switch (outcome.status) {
      case "ok":
        log.info({ step: step.name, detail: outcome.detail }, "boot step done");
        return;
      case "skipped":
        log.info({ step: step.name, detail: outcome.detail }, "boot step skipped");
        return;
      case "warn":
        log.warn({ step: step.name, detail: outcome.detail }, "boot step finished with warnings");
        return;
      case "failed":
        log.warn({ step: step.name, detail: outcome.detail }, "boot step failed (ignored)");
        return;
    }
  }
}
