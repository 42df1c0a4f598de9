import type { AppContext } from "../app-context.js";
import type { DeployResult, PhaseEvent } from "../core/orchestrator.js";
import { assertScope } from "./shared.js";
import { progressText, startSpinner, stopSpinner, updateSpinner } from "../utils/ui.js";
import * as log from "../utils/logger.js";

export interface UpdateOptions {
  device?: string;
  component?: string;
  dryRun?: boolean;
}

/** Spinner text for orchestrator phase events */
export function describePhase(event: PhaseEvent): string {
  const key = `${event.device}/${event.component}`;
  if (event.phase === "downloading" && event.receivedBytes !== undefined) {
    return progressText(`${key}: downloading`, event.receivedBytes, event.totalBytes);
  }
  return `${key}: ${event.phase}`;
}

export function describeResult(r: DeployResult): string {
  const key = `${r.device}/${r.component}`;
  const from = r.fromVersion ?? "unknown";
  switch (r.reason) {
    case "already_current":
      return `${key} is already up-to-date (${r.toVersion})`;
    case "dry_run":
      return `${key} ${from} → ${r.toVersion} [dry-run] no changes applied`;
    case "installed":
      return `${key} updated ${from} → ${r.toVersion}${r.verified ? "" : " (unverified)"}`;
    default:
      return `${key} ${r.reason.replace(/_/g, " ")}${r.error ? `: ${r.error}` : ""}`;
  }
}

/** Deploy the latest releases. Exit 1 when any attempted install failed. */
export async function handleUpdate(opts: UpdateOptions, ctx: AppContext): Promise<number> {
  assertScope(ctx, opts);
  startSpinner(opts.dryRun ? "Checking releases…" : "Updating fleet…");
  let results: DeployResult[];
  try {
    results = await ctx.orchestrator.deployAll({
      device: opts.device,
      component: opts.component,
      dryRun: opts.dryRun,
    });
  } finally {
    stopSpinner();
  }

  for (const r of results) {
    const text = describeResult(r);
    if (r.status === "failed") log.error(text);
    else if (r.status === "skipped") log.warn(text);
    else log.success(text);
  }

  const failed = results.filter((r) => r.status === "failed").length;
  const updated = results.filter((r) => r.reason === "installed").length;
  log.line();
  log.info(`${updated} updated, ${failed} failed, ${results.length} checked`);
  return failed > 0 ? 1 : 0;
}

/** Phase listener wired into the orchestrator by the CLI */
export function spinnerPhaseListener(event: PhaseEvent): void {
  updateSpinner(describePhase(event));
}
