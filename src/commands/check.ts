import type { AppContext } from "../app-context.js";
import { assertScope, row } from "./shared.js";
import * as log from "../utils/logger.js";

export interface CheckOptions {
  device?: string;
  json?: boolean;
}

const WIDTHS = [18, 12, 14];

/** Report pending updates. Registry outages mark components unknown; the command itself succeeds. */
export async function handleCheck(opts: CheckOptions, ctx: AppContext): Promise<number> {
  assertScope(ctx, opts);
  const checks = await ctx.orchestrator.checkUpdates(opts.device);
  if (opts.json) {
    log.json(checks);
    return 0;
  }

  const pending = checks.filter((u) => u.state === "pending");
  const unknown = checks.filter((u) => u.state === "unknown");

  if (pending.length === 0 && unknown.length === 0) {
    log.success("All devices are up-to-date.");
    return 0;
  }

  if (pending.length > 0) {
    log.heading(`${pending.length} update(s) available:`);
    for (const u of pending) {
      log.output(row([u.device, u.component, u.current ?? "unknown"], WIDTHS) + `→ ${log.c("cyan", u.latest ?? "")}`);
      if (u.notes) log.output(`    ${log.c("gray", u.notes)}`);
    }
  }

  if (unknown.length > 0) {
    log.warn(`${unknown.length} component(s) could not be checked:`);
    for (const u of unknown) {
      log.output(row([u.device, u.component, u.current ?? "unknown"], WIDTHS) + log.c("yellow", u.error ?? "unknown"));
    }
  }
  return 0;
}
