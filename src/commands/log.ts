import type { AppContext } from "../app-context.js";
import { FleetError } from "../utils/errors.js";
import { assertScope, row } from "./shared.js";
import * as log from "../utils/logger.js";

export interface LogOptions {
  limit?: string | number;
  device?: string;
  component?: string;
  json?: boolean;
}

export const DEFAULT_LOG_LIMIT = 20;

export function parseLimit(value: string | number | undefined): number {
  if (value === undefined) return DEFAULT_LOG_LIMIT;
  const n = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new FleetError(`--limit must be a positive integer, got "${value}"`, "INVALID_LIMIT");
  }
  return n;
}

export async function handleLog(opts: LogOptions, ctx: AppContext): Promise<number> {
  assertScope(ctx, opts);
  const entries = ctx.orchestrator.history(parseLimit(opts.limit), {
    device: opts.device,
    component: opts.component,
  });
  if (opts.json) {
    log.json(entries);
    return 0;
  }
  if (entries.length === 0) {
    log.info("No update log entries found.");
    return 0;
  }

  log.heading("Update Log");
  log.line("─", 72);
  for (const e of entries) {
    const status = log.c(e.status === "success" ? "green" : "red", e.status);
    log.output(
      row([`#${e.id}`, e.appliedAt.slice(0, 19), e.device, e.component], [6, 20, 18, 12]) +
        `${e.fromVersion} → ${e.toVersion}  [${status}]` +
        (e.error ? `  ${log.c("gray", e.error)}` : ""),
    );
  }
  return 0;
}
