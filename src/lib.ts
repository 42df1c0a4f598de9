/**
 * Public API surface for the fleetfw library.
 * Re-exports the orchestration core and its collaborators for programmatic use.
 */

// Config & workspace
export { loadConfig, resolveConfig } from "./core/config-loader.js";
export { initWorkspace } from "./core/workspace.js";
export { buildAppContext, seedRecords } from "./app-context.js";
export type { AppContext, AppContextOptions } from "./app-context.js";

// Orchestration
export { UpdateOrchestrator } from "./core/orchestrator.js";
export type {
  DeployPhase,
  DeployReason,
  DeployResult,
  DeployOptions,
  SweepOptions,
  PhaseEvent,
  UpdateCheck,
  VerifyResult,
} from "./core/orchestrator.js";

// Releases
export { GitHubReleaseSource, CatalogReleaseSource, createReleaseSource, selectReleaseAssets } from "./core/release-source.js";
export type { ReleaseSource } from "./core/release-source.js";
export { HttpClient } from "./core/http-client.js";
export type { FetchLike } from "./core/http-client.js";

// Install & integrity
export { StreamingInstaller, manifestPathFor, parkedPathFor, recoverInterruptedSwap, hashTree } from "./core/installer.js";
export type { Installer, InstallRequest, InstallResult, InstalledVerification } from "./core/installer.js";
export { Sha256Verifier, parseChecksumText } from "./core/integrity.js";
export type { IntegrityVerifier, ChecksumLookup } from "./core/integrity.js";

// State
export { SqliteStateStore } from "./core/state-store.js";
export type { FirmwareStateStore, FirmwareFilter, LogFilter } from "./core/state-store.js";

// Versions
export { compareVersions, isNewer, versionsEqual, normalizeTag } from "./core/version-order.js";

// Errors
export * from "./utils/errors.js";

// Schemas
export { ConfigSchema } from "./schemas/config.schema.js";
export type { Config } from "./schemas/config.schema.js";
export type { FirmwareRecord, UpdateLogEntry, InstallManifest } from "./schemas/firmware.schema.js";
export type { ReleaseMetadata, ReleaseAsset } from "./schemas/release.schema.js";
