import fs from "node:fs";
import { stringify as stringifyYaml } from "yaml";
import { ConfigSchema } from "../schemas/config.schema.js";
import { getWorkspaceDir, workspaceExists, workspacePath } from "../utils/paths.js";
import { FleetError } from "../utils/errors.js";
import * as log from "../utils/logger.js";

export interface InitOptions {
  force?: boolean;
  cwd?: string;
}

const CONFIG_HEADER = `# fleetfw configuration
# Layers: ~/.fleetfw/config.yaml < .fleetfw/config.yaml < .fleetfw/config.local.yaml
`;

/** Create .fleetfw/ with a config.yaml holding every default. Returns the config path. */
export function initWorkspace(options: InitOptions = {}): string {
  const wsDir = getWorkspaceDir(options.cwd);
  const configPath = workspacePath("config.yaml", options.cwd);

  if (workspaceExists(options.cwd) && fs.existsSync(configPath)) {
    if (!options.force) {
      throw new FleetError(`${configPath} already exists. Use --force to overwrite.`, "WORKSPACE_EXISTS");
    }
    log.warn(`Overwriting ${configPath} (--force)`);
  }

  fs.mkdirSync(wsDir, { recursive: true });
  const defaults = ConfigSchema.parse({});
  fs.writeFileSync(configPath, CONFIG_HEADER + stringifyYaml(defaults));

  // Local overrides and state never belong in version control
  fs.writeFileSync(workspacePath(".gitignore", options.cwd), "config.local.yaml\nstate.db*\ninstalls/\n");

  log.success(`Initialized ${wsDir}`);
  return configPath;
}
