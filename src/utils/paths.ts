import path from "node:path";
import fs from "node:fs";
import os from "node:os";

export const WORKSPACE_DIRNAME = ".fleetfw";

/** Resolve .fleetfw/ workspace root from cwd */
export function getWorkspaceDir(cwd?: string): string {
  return path.join(cwd ?? process.cwd(), WORKSPACE_DIRNAME);
}

export function workspaceExists(cwd?: string): boolean {
  return fs.existsSync(getWorkspaceDir(cwd));
}

/** Resolve a path relative to the workspace */
export function workspacePath(relative: string, cwd?: string): string {
  return path.join(getWorkspaceDir(cwd), relative);
}

/** ~/.fleetfw/<relative> */
export function userConfigPath(relative = "config.yaml"): string {
  return path.join(os.homedir(), WORKSPACE_DIRNAME, relative);
}

/** Resolve a configured path against the project root unless it is already absolute */
export function resolveProjectPath(p: string, cwd?: string): string {
  if (p === ":memory:") return p;
  return path.isAbsolute(p) ? p : path.resolve(cwd ?? process.cwd(), p);
}
