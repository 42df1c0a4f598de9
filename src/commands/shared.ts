import type { AppContext } from "../app-context.js";
import { FleetError } from "../utils/errors.js";

export interface ScopeOptions {
  device?: string;
  component?: string;
}

/** Reject devices outside the roster and components outside the configured set */
export function assertScope(ctx: AppContext, scope: ScopeOptions): void {
  const { devices, components } = ctx.config.fleet;
  if (scope.device && !devices.includes(scope.device)) {
    throw new FleetError(
      `Unknown device "${scope.device}". Fleet: ${devices.join(", ") || "(empty; set fleet.devices)"}`,
      "UNKNOWN_DEVICE",
    );
  }
  if (scope.component && !components.includes(scope.component)) {
    throw new FleetError(
      `Unknown component "${scope.component}". Components: ${components.join(", ")}`,
      "UNKNOWN_COMPONENT",
    );
  }
}

/** Left-align cells into fixed-width columns */
export function row(cells: string[], widths: number[]): string {
  return cells.map((cell, i) => (i < widths.length ? cell.padEnd(widths[i]) : cell)).join("  ");
}
