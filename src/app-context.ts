import type { Config } from "./schemas/config.schema.js";
import type { FirmwareRecord } from "./schemas/firmware.schema.js";
import { loadConfig } from "./core/config-loader.js";
import { HttpClient, type FetchLike } from "./core/http-client.js";
import { createReleaseSource, type ReleaseSource } from "./core/release-source.js";
import { StreamingInstaller, type Installer } from "./core/installer.js";
import { SqliteStateStore, type FirmwareStateStore } from "./core/state-store.js";
import { UpdateOrchestrator, type PhaseEvent } from "./core/orchestrator.js";
import { resolveProjectPath } from "./utils/paths.js";
import * as log from "./utils/logger.js";

export interface AppContext {
  cwd: string;
  config: Config;
  store: FirmwareStateStore;
  orchestrator: UpdateOrchestrator;
  close(): void;
}

export interface AppContextOptions {
  cwd?: string;
  verbose?: boolean;
  /** Already-loaded config; skips the YAML layers */
  config?: Config;
  fetchImpl?: FetchLike;
  /** Substitutes for the configured collaborators */
  source?: ReleaseSource;
  installer?: Installer;
  store?: FirmwareStateStore;
  onPhase?: (event: PhaseEvent) => void;
  now?: () => Date;
}

/** Records for fleet.seed entries, believed installed before fleetfw managed them */
export function seedRecords(config: Config, now: Date): FirmwareRecord[] {
  const records: FirmwareRecord[] = [];
  for (const [device, components] of Object.entries(config.fleet.seed)) {
    if (!config.fleet.devices.includes(device)) {
      log.warn(`Seed entry for "${device}" which is not in fleet.devices`);
    }
    for (const [component, version] of Object.entries(components)) {
      records.push({
        device,
        component,
        version,
        releaseDate: "",
        checksum: "",
        status: "current",
        downloadUrl: "",
        notes: "seeded from configuration",
        createdAt: now.toISOString(),
      });
    }
  }
  return records;
}

export function buildAppContext(options: AppContextOptions = {}): AppContext {
  const cwd = options.cwd ?? process.cwd();
  const config = options.config ?? loadConfig({ cwd });
  log.configureLogger(options.verbose ? "debug" : config.logging.level, config.logging.color);

  const tokenEnv = config.registry.token_env;
  const http = new HttpClient({
    token: process.env[tokenEnv],
    timeoutMs: config.registry.timeout_ms,
    chunkSize: config.installer.chunk_size,
    fetchImpl: options.fetchImpl,
  });

  const store = options.store ?? SqliteStateStore.open(resolveProjectPath(config.state.db_path, cwd));
  const now = options.now ?? (() => new Date());
  const seeded = store.seed(seedRecords(config, now()));
  if (seeded > 0) log.debug(`Seeded ${seeded} firmware record(s) from configuration`);

  const orchestrator = new UpdateOrchestrator({
    store,
    source: options.source ?? createReleaseSource(config.registry, http),
    installer:
      options.installer ??
      new StreamingInstaller({
        http,
        downloadTimeoutMs: config.installer.download_timeout_ms,
        chunkSize: config.installer.chunk_size,
        now,
      }),
    fleet: config.fleet.devices,
    components: config.fleet.components,
    installRoot: resolveProjectPath(config.installer.install_root, cwd),
    policy: config.policy,
    now,
    onPhase: options.onPhase,
  });

  return {
    cwd,
    config,
    store,
    orchestrator,
    close: () => store.close(),
  };
}
