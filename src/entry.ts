#!/usr/bin/env node
// ---------------------------------------------------------------------------
// CLI – run (default), configure, token
// ---------------------------------------------------------------------------

import { Command } from "commander";
import { runBootstrap, runConfigure, resolveTokenOnly } from "./bootstrap/run.js";
import { resolveBootConfig } from "./config/boot-config.js";
import { snapshotEnv } from "./infra/env.js";
import { BootstrapError, formatErrorMessage } from "./infra/errors.js";
import { createSubsystemLogger } from "./logging.js";

const log = createSubsystemLogger("cli");

function fail(err: unknown): never {
  if (err instanceof BootstrapError) {
    log.fatal({ step: err.step }, err.message);
    process.exit(err.exitCode);
  }
  log.fatal({ err: formatErrorMessage(err) }, "bootstrap failed");
  process.exit(1);
}

const program = new Command()
  .name("gateway-bootstrap")
  .description("Prepare the gateway's state, config and proxy, then run the gateway in the foreground.");

program
  .command("run", { isDefault: true })
  .description("Run the full boot sequence and hand off to the gateway")
  .action(async () => {
    const config = resolveBootConfig(snapshotEnv(process.env));
    const { report } = await runBootstrap(config);
    process.exit(report.exitCode ?? 0);
  });

program
  .command("configure")
  .description("Resolve the token, write gateway.json and the proxy snippets, then exit")
  .action(async () => {
    const config = resolveBootConfig(snapshotEnv(process.env));
    await runConfigure(config);
  });

program
  .command("token")
  .description("Print the gateway token (generating and persisting it on first use)")
  .action(async () => {
    const config = resolveBootConfig(snapshotEnv(process.env));
    const { token } = await resolveTokenOnly(config);
    process.stdout.write(`${token}\n`);
  });

program.parseAsync(process.argv).catch(fail);
