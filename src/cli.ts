#!/usr/bin/env node

import { Command } from "commander";
import { initWorkspace } from "./core/workspace.js";
import { buildAppContext, type AppContext, type AppContextOptions } from "./app-context.js";
import { handleList } from "./commands/list.js";
import { handleCheck } from "./commands/check.js";
import { handleUpdate, spinnerPhaseListener } from "./commands/update.js";
import { handleVerify } from "./commands/verify.js";
import { handleLog } from "./commands/log.js";
import { FleetError } from "./utils/errors.js";
import { configureOutputMode } from "./utils/logger.js";
import { stopSpinner } from "./utils/ui.js";
import * as log from "./utils/logger.js";

const program = new Command();

program
  .name("fleetfw")
  .description("Fleet firmware updates: check, deploy, verify and audit")
  .version("0.1.0")
  .option("-v, --verbose", "Debug logging");

/** Build the context, run one command, close the store, set the exit code */
async function run(
  handler: (ctx: AppContext) => Promise<number>,
  flags: { json?: boolean } = {},
  extra: AppContextOptions = {},
): Promise<void> {
  const verbose = program.opts<{ verbose?: boolean }>().verbose;
  if (flags.json) configureOutputMode("json");
  const ctx = buildAppContext({ verbose, ...extra });
  try {
    process.exitCode = await handler(ctx);
  } finally {
    ctx.close();
  }
}

// fleetfw init
program
  .command("init")
  .description("Initialize .fleetfw/ with a default config.yaml")
  .option("-f, --force", "Overwrite an existing config.yaml")
  .action((opts: { force?: boolean }) => {
    initWorkspace({ force: opts.force });
  });

// fleetfw list
program
  .command("list")
  .description("List recorded firmware per device and component")
  .option("-d, --device <device>", "Only this device")
  .option("-c, --component <component>", "Only this component")
  .option("-s, --status <status>", "Only records with this status")
  .option("--json", "Print records as JSON")
  .action(async (opts: { device?: string; component?: string; status?: string; json?: boolean }) => {
    await run((ctx) => handleList(opts, ctx), opts);
  });

// fleetfw check
program
  .command("check")
  .description("Report components whose latest release differs from the installed version")
  .option("-d, --device <device>", "Only this device")
  .option("--json", "Print the report as JSON")
  .action(async (opts: { device?: string; json?: boolean }) => {
    await run((ctx) => handleCheck(opts, ctx), opts);
  });

// fleetfw update
program
  .command("update")
  .description("Download, verify and install the latest releases")
  .option("-d, --device <device>", "Only this device")
  .option("-c, --component <component>", "Only this component")
  .option("--dry-run", "Resolve releases without installing anything")
  .action(async (opts: { device?: string; component?: string; dryRun?: boolean }) => {
    await run((ctx) => handleUpdate(opts, ctx), {}, { onPhase: spinnerPhaseListener });
  });

// fleetfw verify
program
  .command("verify")
  .description("Re-hash installed trees against their install manifests")
  .option("-d, --device <device>", "Only this device")
  .option("-c, --component <component>", "Only this component")
  .action(async (opts: { device?: string; component?: string }) => {
    await run((ctx) => handleVerify(opts, ctx));
  });

// fleetfw log
program
  .command("log")
  .description("Show the update audit log, most recent first")
  .option("-n, --limit <n>", "Number of entries", "20")
  .option("-d, --device <device>", "Only this device")
  .option("-c, --component <component>", "Only this component")
  .option("--json", "Print entries as JSON")
  .action(async (opts: { limit?: string; device?: string; component?: string; json?: boolean }) => {
    await run((ctx) => handleLog(opts, ctx), opts);
  });

program.parseAsync().catch((err: unknown) => {
  stopSpinner();
  if (err instanceof FleetError) {
    log.error(err.message);
  } else {
    log.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  }
  process.exitCode = 1;
});
