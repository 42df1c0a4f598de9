import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { initWorkspace } from "../../../src/core/workspace.js";
import { loadConfig } from "../../../src/core/config-loader.js";
import { ConfigSchema } from "../../../src/schemas/config.schema.js";
import { FleetError } from "../../../src/utils/errors.js";
import { configureOutputMode } from "../../../src/utils/logger.js";
import { makeTmpDir, removeDir } from "../../helpers/fixtures.js";

describe("initWorkspace", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = makeTmpDir();
    configureOutputMode("quiet");
  });

  afterEach(() => {
    configureOutputMode("normal");
    removeDir(cwd);
  });

  it("writes a config that loads back to the defaults", () => {
    const configPath = initWorkspace({ cwd });

    assert.equal(configPath, path.join(cwd, ".fleetfw", "config.yaml"));
    assert.ok(fs.readFileSync(configPath, "utf-8").startsWith("# fleetfw configuration\n"));
    assert.deepEqual(loadConfig({ cwd, userConfig: null }), ConfigSchema.parse({}));
  });

  it("keeps local overrides and state out of version control", () => {
    initWorkspace({ cwd });
    assert.equal(
      fs.readFileSync(path.join(cwd, ".fleetfw", ".gitignore"), "utf-8"),
      "config.local.yaml\nstate.db*\ninstalls/\n",
    );
  });

  it("refuses to overwrite without force", () => {
    const configPath = initWorkspace({ cwd });
    fs.writeFileSync(configPath, "fleet:\n  devices: [alice]\n");

    assert.throws(
      () => initWorkspace({ cwd }),
      (err: unknown) => err instanceof FleetError && err.code === "WORKSPACE_EXISTS",
    );
    assert.deepEqual(loadConfig({ cwd, userConfig: null }).fleet.devices, ["alice"]);

    initWorkspace({ cwd, force: true });
    assert.deepEqual(loadConfig({ cwd, userConfig: null }).fleet.devices, []);
  });
});
