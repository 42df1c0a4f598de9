import type { AppContext } from "../app-context.js";
import { FirmwareStatusSchema, type FirmwareRecord } from "../schemas/firmware.schema.js";
import { FleetError } from "../utils/errors.js";
import { assertScope, row } from "./shared.js";
import * as log from "../utils/logger.js";

export interface ListOptions {
  device?: string;
  component?: string;
  status?: string;
  json?: boolean;
}

const WIDTHS = [18, 12, 14, 12];

const STATUS_COLORS: Record<FirmwareRecord["status"], log.Color> = {
  current: "green",
  available: "yellow",
  deprecated: "red",
  pending: "cyan",
};

export async function handleList(opts: ListOptions, ctx: AppContext): Promise<number> {
  assertScope(ctx, opts);
  let status: FirmwareRecord["status"] | undefined;
  if (opts.status) {
    const parsed = FirmwareStatusSchema.safeParse(opts.status);
    if (!parsed.success) {
      throw new FleetError(
        `Unknown status "${opts.status}". Use one of: ${FirmwareStatusSchema.options.join(", ")}`,
        "UNKNOWN_STATUS",
      );
    }
    status = parsed.data;
  }

  const records = ctx.store.list({ device: opts.device, component: opts.component, status });
  if (opts.json) {
    log.json(records);
    return 0;
  }
  if (records.length === 0) {
    log.info("No firmware records found.");
    return 0;
  }

  log.heading(row(["Device", "Component", "Version", "Date", "Status"], WIDTHS));
  log.line("─", 72);
  for (const r of records) {
    log.output(
      row([r.device, r.component, r.version, r.releaseDate || "-", ""], WIDTHS) +
        `[${log.c(STATUS_COLORS[r.status], r.status)}]`,
    );
  }
  return 0;
}
