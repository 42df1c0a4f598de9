import fs from "node:fs";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { ZodError } from "zod";
import { ConfigSchema, type Config } from "../schemas/config.schema.js";
import { userConfigPath, workspacePath } from "../utils/paths.js";
import { ConfigValidationError, errorMessage } from "../utils/errors.js";
import * as log from "../utils/logger.js";

type YamlObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is YamlObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse a YAML file; undefined when it does not exist. Empty files count as {}. */
function readYamlLayer(filePath: string): YamlObject | undefined {
  if (!fs.existsSync(filePath)) return undefined;

  let data: unknown;
  try {
    data = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    const where = err instanceof YAMLParseError ? ` (line ${err.linePos?.[0]?.line ?? "?"})` : "";
    throw new ConfigValidationError(`${filePath}: invalid YAML${where}: ${errorMessage(err)}`, "YAML");
  }
  if (data === null || data === undefined) return {};
  if (!isPlainObject(data)) {
    throw new ConfigValidationError(`${filePath}: expected a mapping at the top level`, "ROOT");
  }
  return data;
}

/** Deep merge: b overrides a, arrays are replaced */
export function deepMerge(a: YamlObject, b: YamlObject): YamlObject {
  const result: YamlObject = { ...a };
  for (const key of Object.keys(b)) {
    const bVal = b[key];
    const aVal = a[key];
    if (isPlainObject(bVal) && isPlainObject(aVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}

export interface LoadConfigOptions {
  cwd?: string;
  /** Override for ~/.fleetfw/config.yaml; null skips the user layer */
  userConfig?: string | null;
}

export interface LoadedConfig {
  config: Config;
  /** Layers that contributed, lowest precedence first */
  layers: string[];
}

/**
 * Load config with 4-layer resolution:
 * 1. Schema defaults
 * 2. User global (~/.fleetfw/config.yaml)
 * 3. Project shared (.fleetfw/config.yaml)
 * 4. Project local (.fleetfw/config.local.yaml)
 *
 * Each layer deep-merges over the previous; the result is validated by zod.
 */
export function resolveConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const layers: string[] = ["defaults"];
  let merged: YamlObject = {};

  const candidates = [
    options.userConfig === null ? null : options.userConfig ?? userConfigPath(),
    workspacePath("config.yaml", options.cwd),
    workspacePath("config.local.yaml", options.cwd),
  ];
  for (const file of candidates) {
    if (!file) continue;
    const layer = readYamlLayer(file);
    if (!layer) continue;
    merged = deepMerge(merged, layer);
    layers.push(file);
    log.debug(`Loaded config layer ${file}`);
  }

  try {
    return { config: ConfigSchema.parse(merged), layers };
  } catch (err) {
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      const field = issue?.path.join(".") || "(root)";
      throw new ConfigValidationError(
        `Invalid configuration at ${field}: ${issue?.message ?? "validation failed"}`,
        field.toUpperCase().replace(/[^A-Z0-9]+/g, "_"),
      );
    }
    throw err;
  }
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return resolveConfig(options).config;
}
