import path from "node:path";
import type { UpdatePolicy } from "../schemas/config.schema.js";
import type { FirmwareRecord, NewUpdateLogEntry, UpdateLogEntry } from "../schemas/firmware.schema.js";
import type { ReleaseMetadata } from "../schemas/release.schema.js";
import type { FirmwareStateStore, LogFilter } from "./state-store.js";
import { selectReleaseAssets, type ReleaseSource } from "./release-source.js";
import type { InstallResult, Installer } from "./installer.js";
import type { ChecksumLookup } from "./integrity.js";
import { KeyedMutex } from "./key-lock.js";
import { runPool } from "./worker-pool.js";
import { isNewer, versionsEqual } from "./version-order.js";
import {
  ChecksumMismatchError,
  ChecksumUnavailableError,
  NoAssetFoundError,
  SourceUnavailableError,
} from "../utils/errors.js";
import * as log from "../utils/logger.js";

export type DeployPhase =
  | "idle"
  | "checking"
  | "downloading"
  | "verifying"
  | "installing"
  | "success"
  | "failed";

export interface PhaseEvent {
  device: string;
  component: string;
  phase: DeployPhase;
  receivedBytes?: number;
  totalBytes?: number;
}

export type DeployReason =
  | "already_current"
  | "dry_run"
  | "installed"
  | "ahead_of_latest"
  | "release_not_found"
  | "no_asset"
  | "source_unavailable"
  | "checksum_unavailable"
  | "checksum_mismatch"
  | "install_failed";

export interface DeployResult {
  device: string;
  component: string;
  /** success and failed are terminal outcomes of an attempt; skipped means nothing was attempted */
  status: "success" | "failed" | "skipped";
  reason: DeployReason;
  fromVersion: string | null;
  toVersion: string | null;
  verified?: boolean;
  error?: string;
  /** Audit entry appended for this attempt, if any */
  logId?: number;
  attempts: number;
  duration_ms: number;
}

export interface UpdateCheck {
  device: string;
  component: string;
  current: string | null;
  latest: string | null;
  notes: string;
  /** unknown: the latest release could not be determined */
  state: "pending" | "unknown";
  error?: string;
}

export type VerifyStatus = "ok" | "mismatch" | "not_installed" | "missing_record";

export interface VerifyResult {
  device: string;
  component: string;
  status: VerifyStatus;
  version: string | null;
  problems: string[];
}

export interface DeployOptions {
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface SweepOptions extends DeployOptions {
  device?: string;
  component?: string;
}

export interface OrchestratorDeps {
  store: FirmwareStateStore;
  source: ReleaseSource;
  installer: Installer;
  /** Fleet roster */
  fleet: string[];
  components: string[];
  installRoot: string;
  policy: UpdatePolicy;
  now?: () => Date;
  onPhase?: (event: PhaseEvent) => void;
}

const UNKNOWN_VERSION = "unknown";

export class UpdateOrchestrator {
  private readonly store: FirmwareStateStore;
  private readonly source: ReleaseSource;
  private readonly installer: Installer;
  private readonly fleet: string[];
  private readonly components: string[];
  private readonly installRoot: string;
  private readonly policy: UpdatePolicy;
  private readonly now: () => Date;
  private readonly onPhase: ((event: PhaseEvent) => void) | undefined;
  private readonly locks = new KeyedMutex();

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.source = deps.source;
    this.installer = deps.installer;
    this.fleet = deps.fleet;
    this.components = deps.components;
    this.installRoot = deps.installRoot;
    this.policy = deps.policy;
    this.now = deps.now ?? (() => new Date());
    this.onPhase = deps.onPhase;
  }

  /** Install location of a (device, component) pair */
  targetDir(device: string, component: string): string {
    return path.join(this.installRoot, device, component);
  }

  /**
   * Every (device, component) whose recorded version differs from the latest
   * release, in either direction. Components whose latest release cannot be
   * determined are reported with state "unknown" rather than failing the check.
   */
  async checkUpdates(device?: string): Promise<UpdateCheck[]> {
    const devices = device ? [device] : this.fleet;
    const latest = new Map<string, { release: ReleaseMetadata | null; error?: string }>();

    for (const component of this.components) {
      try {
        latest.set(component, { release: await this.source.latestRelease(component) });
      } catch (err) {
        if (!(err instanceof SourceUnavailableError)) throw err;
        log.warn(err.message);
        latest.set(component, { release: null, error: err.message });
      }
    }

    const checks: UpdateCheck[] = [];
    for (const dev of devices) {
      for (const component of this.components) {
        const record = this.store.get(dev, component);
        const current = record?.version ?? null;
        const found = latest.get(component);
        const release = found?.release ?? null;

        if (!release) {
          checks.push({
            device: dev,
            component,
            current,
            latest: null,
            notes: "",
            state: "unknown",
            error: found?.error ?? `No published release for ${component}`,
          });
          continue;
        }
        if (current !== null && versionsEqual(current, release.version)) continue;

        checks.push({
          device: dev,
          component,
          current,
          latest: release.version,
          notes: release.notes,
          state: "pending",
        });
      }
    }
    return checks;
  }

  /**
   * Bring one (device, component) to the latest release. Idempotent: an
   * already-current pair returns success without side effects. Attempts for
   * the same pair are serialized; an install_failed attempt is retried from
   * the top up to policy.max_retry times.
   */
  async deploy(device: string, component: string, options: DeployOptions = {}): Promise<DeployResult> {
    const start = Date.now();
    return this.locks.runExclusive(`${device}/${component}`, async () => {
      let attempts = 0;
      let result: DeployResult;
      do {
        attempts++;
        result = await this.attempt(device, component, options);
        if (result.reason === "install_failed" && attempts <= this.policy.max_retry) {
          log.warn(`${device}/${component}: install failed, retrying (${attempts}/${this.policy.max_retry})`);
        }
      } while (result.reason === "install_failed" && attempts <= this.policy.max_retry);
      return { ...result, attempts, duration_ms: Date.now() - start };
    });
  }

  /** Deploy to every pair in scope through a pool bounded by policy.max_concurrency */
  async deployAll(options: SweepOptions = {}): Promise<DeployResult[]> {
    const devices = options.device ? [options.device] : this.fleet;
    const components = options.component ? [options.component] : this.components;
    const pairs = devices.flatMap((device) => components.map((component) => ({ device, component })));

    return runPool(pairs, this.policy.max_concurrency, ({ device, component }) =>
      this.deploy(device, component, { dryRun: options.dryRun, signal: options.signal }),
    );
  }

  /** Compare each installed tree against its manifest and the recorded checksum */
  async verify(device?: string, component?: string): Promise<VerifyResult[]> {
    const devices = device ? [device] : this.fleet;
    const components = component ? [component] : this.components;
    const results: VerifyResult[] = [];

    for (const dev of devices) {
      for (const comp of components) {
        const record = this.store.get(dev, comp);
        if (!record) {
          results.push({ device: dev, component: comp, status: "missing_record", version: null, problems: [] });
          continue;
        }
        const check = await this.installer.verifyInstalled(this.targetDir(dev, comp), record.checksum);
        results.push({
          device: dev,
          component: comp,
          status: check.status,
          version: record.version,
          problems: check.status === "mismatch" ? check.problems : [],
        });
      }
    }
    return results;
  }

  history(limit: number, filter?: LogFilter): UpdateLogEntry[] {
    return this.store.recentLog(limit, filter);
  }

  private async attempt(device: string, component: string, options: DeployOptions): Promise<DeployResult> {
    this.emit(device, component, "idle");
    this.emit(device, component, "checking");

    const record = this.store.get(device, component);
    const fromVersion = record?.version ?? null;
    const base = { device, component, fromVersion, attempts: 1, duration_ms: 0 };

    let release: ReleaseMetadata | null;
    try {
      release = await this.source.latestRelease(component);
    } catch (err) {
      if (!(err instanceof SourceUnavailableError)) throw err;
      return this.skip({ ...base, toVersion: null, reason: "source_unavailable", error: err.message });
    }
    if (!release) {
      return this.skip({ ...base, toVersion: null, reason: "release_not_found", error: `No published release for ${component}` });
    }
    const toVersion = release.version;

    if (fromVersion !== null && versionsEqual(fromVersion, toVersion)) {
      log.debug(`${device}/${component} is already at ${toVersion}`);
      this.emit(device, component, "success");
      return { ...base, toVersion, status: "success", reason: "already_current" };
    }
    if (fromVersion !== null && !this.policy.allow_downgrade && isNewer(fromVersion, toVersion)) {
      return this.skip({ ...base, toVersion, reason: "ahead_of_latest", error: `${fromVersion} is ahead of latest ${toVersion}` });
    }

    const assets = selectReleaseAssets(release);
    if (!assets) {
      return this.skip({ ...base, toVersion, reason: "no_asset", error: new NoAssetFoundError(component, release.tag).message });
    }

    if (options.dryRun) {
      this.emit(device, component, "success");
      return { ...base, toVersion, status: "success", reason: "dry_run" };
    }

    let expectedChecksum: string | null = null;
    if (assets.checksum) {
      let lookup: ChecksumLookup;
      try {
        lookup = await this.source.fetchChecksum(assets.checksum, assets.payload.name, component);
      } catch (err) {
        if (!(err instanceof SourceUnavailableError)) throw err;
        return this.skip({ ...base, toVersion, reason: "source_unavailable", error: err.message });
      }
      // a published digest that cannot be matched to the payload is a failed verification
      if (lookup.status === "no_entry") {
        return this.fail(base, toVersion, "checksum_mismatch", `Checksum asset ${assets.checksum.name} ${lookup.reason}`);
      }
      expectedChecksum = lookup.digest;
    } else if (this.policy.require_checksum) {
      return this.skip({
        ...base,
        toVersion,
        reason: "checksum_unavailable",
        error: new ChecksumUnavailableError(assets.payload.name).message,
      });
    } else {
      log.warn(`${device}/${component}: installing ${assets.payload.name} without checksum verification`);
    }

    const result: InstallResult = await this.installer.install({
      asset: assets.payload,
      targetDir: this.targetDir(device, component),
      version: toVersion,
      expectedChecksum,
      signal: options.signal,
      onPhase: (phase) => this.emit(device, component, phase),
      onProgress: (receivedBytes, totalBytes) =>
        this.onPhase?.({ device, component, phase: "downloading", receivedBytes, totalBytes }),
    });

    switch (result.status) {
      case "download_failed":
        return this.skip({ ...base, toVersion, reason: "source_unavailable", error: result.error });

      case "checksum_mismatch":
        return this.fail(
          base,
          toVersion,
          "checksum_mismatch",
          new ChecksumMismatchError(result.expected, result.actual).message,
        );

      case "install_failed":
        return this.fail(base, toVersion, "install_failed", result.error);

      case "installed": {
        const appliedAt = this.now().toISOString();
        const next: FirmwareRecord = {
          device,
          component,
          version: toVersion,
          releaseDate: release.releaseDate,
          checksum: result.checksum,
          status: "current",
          downloadUrl: assets.payload.downloadUrl,
          notes: release.notes,
          createdAt: appliedAt,
        };
        const entry = this.store.recordUpdate(next, {
          device,
          component,
          fromVersion: fromVersion ?? UNKNOWN_VERSION,
          toVersion,
          status: "success",
          appliedAt,
          error: "",
        });
        log.debug(`${device}/${component}: ${fromVersion ?? UNKNOWN_VERSION} → ${toVersion} (log #${entry.id})`);
        this.emit(device, component, "success");
        return {
          ...base,
          toVersion,
          status: "success",
          reason: "installed",
          verified: result.verified,
          logId: entry.id,
        };
      }
    }
  }

  private skip(result: Omit<DeployResult, "status">): DeployResult {
    log.debug(`${result.device}/${result.component}: skipped (${result.reason}) ${result.error ?? ""}`.trim());
    this.emit(result.device, result.component, "idle");
    return { ...result, status: "skipped" };
  }

  /** Failed install attempt: audit it, leave the record alone */
  private fail(
    base: Pick<DeployResult, "device" | "component" | "fromVersion" | "attempts" | "duration_ms">,
    toVersion: string,
    reason: "checksum_mismatch" | "install_failed",
    error: string,
  ): DeployResult {
    const entry: NewUpdateLogEntry = {
      device: base.device,
      component: base.component,
      fromVersion: base.fromVersion ?? UNKNOWN_VERSION,
      toVersion,
      status: "failed",
      appliedAt: this.now().toISOString(),
      error,
    };
    const stored = this.store.appendLog(entry);
    log.error(`${base.device}/${base.component}: ${error}`);
    this.emit(base.device, base.component, "failed");
    return { ...base, toVersion, status: "failed", reason, error, logId: stored.id };
  }

  private emit(device: string, component: string, phase: DeployPhase): void {
    this.onPhase?.({ device, component, phase });
  }
}
