import type { AppContext } from "../app-context.js";
import { assertScope, type ScopeOptions } from "./shared.js";
import * as log from "../utils/logger.js";

/** Check installed trees against their manifests. Exit 1 on any mismatch or missing record. */
export async function handleVerify(opts: ScopeOptions, ctx: AppContext): Promise<number> {
  assertScope(ctx, opts);
  const results = await ctx.orchestrator.verify(opts.device, opts.component);
  let failures = 0;

  for (const r of results) {
    const key = `${r.device}/${r.component}`;
    switch (r.status) {
      case "ok":
        log.success(`${key} ${r.version} checksum OK`);
        break;
      case "not_installed":
        log.warn(`${key} ${r.version} was never installed by fleetfw; nothing to verify`);
        break;
      case "missing_record":
        failures++;
        log.error(`${key}: no firmware record`);
        break;
      case "mismatch":
        failures++;
        log.error(`${key} ${r.version} mismatch`);
        for (const p of r.problems) log.output(`    ${p}`);
        break;
    }
  }

  if (failures > 0) {
    log.error(`${failures} of ${results.length} check(s) failed.`);
    return 1;
  }
  log.success("All checksums verified.");
  return 0;
}
