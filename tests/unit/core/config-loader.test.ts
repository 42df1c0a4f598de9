import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { deepMerge, loadConfig, resolveConfig } from "../../../src/core/config-loader.js";
import { ConfigValidationError } from "../../../src/utils/errors.js";
import { makeTmpDir, removeDir } from "../../helpers/fixtures.js";

describe("resolveConfig", () => {
  let cwd: string;
  let userConfig: string;

  function writeLayer(file: string, text: string): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, text);
  }

  beforeEach(() => {
    cwd = makeTmpDir();
    userConfig = path.join(cwd, "home", ".fleetfw", "config.yaml");
  });

  afterEach(() => removeDir(cwd));

  it("falls back to schema defaults", () => {
    const { config, layers } = resolveConfig({ cwd, userConfig: null });
    assert.deepEqual(layers, ["defaults"]);
    assert.deepEqual(config.fleet, { devices: [], components: ["os", "kernel", "bootloader"], seed: {} });
    assert.deepEqual(config.policy, { require_checksum: true, allow_downgrade: true, max_retry: 0, max_concurrency: 2 });
    assert.equal(config.registry.kind, "github");
    assert.equal(config.registry.token_env, "FLEETFW_REGISTRY_TOKEN");
    assert.equal(config.installer.install_root, ".fleetfw/installs");
    assert.equal(config.state.db_path, ".fleetfw/state.db");
  });

  it("deep-merges user, project and local layers in order", () => {
    writeLayer(userConfig, "registry:\n  kind: catalog\npolicy:\n  max_retry: 2\n");
    writeLayer(path.join(cwd, ".fleetfw", "config.yaml"), "fleet:\n  devices: [alice, bob]\npolicy:\n  max_concurrency: 4\n");
    writeLayer(path.join(cwd, ".fleetfw", "config.local.yaml"), "fleet:\n  devices: [carol]\npolicy:\n  max_concurrency: 8\n");

    const { config, layers } = resolveConfig({ cwd, userConfig });

    assert.deepEqual(layers, [
      "defaults",
      userConfig,
      path.join(cwd, ".fleetfw", "config.yaml"),
      path.join(cwd, ".fleetfw", "config.local.yaml"),
    ]);
    assert.equal(config.registry.kind, "catalog");
    assert.deepEqual(config.fleet.devices, ["carol"]);
    assert.equal(config.policy.max_retry, 2);
    assert.equal(config.policy.max_concurrency, 8);
    assert.equal(config.policy.require_checksum, true);
  });

  it("treats an empty file as an empty layer", () => {
    writeLayer(path.join(cwd, ".fleetfw", "config.yaml"), "# nothing yet\n");
    const { layers } = resolveConfig({ cwd, userConfig: null });
    assert.equal(layers.length, 2);
  });

  it("rejects invalid YAML", () => {
    writeLayer(path.join(cwd, ".fleetfw", "config.yaml"), "fleet: [unclosed\n");
    assert.throws(
      () => loadConfig({ cwd, userConfig: null }),
      (err: unknown) => err instanceof ConfigValidationError && err.field === "YAML",
    );
  });

  it("rejects a top-level sequence", () => {
    writeLayer(path.join(cwd, ".fleetfw", "config.yaml"), "- alice\n- bob\n");
    assert.throws(
      () => loadConfig({ cwd, userConfig: null }),
      (err: unknown) => err instanceof ConfigValidationError && err.code === "CONFIG_INVALID_ROOT",
    );
  });

  it("names the first invalid field", () => {
    writeLayer(path.join(cwd, ".fleetfw", "config.yaml"), "policy:\n  max_concurrency: 0\n");
    assert.throws(() => loadConfig({ cwd, userConfig: null }), {
      name: "ConfigValidationError",
      message: "Invalid configuration at policy.max_concurrency: Number must be greater than 0",
      field: "POLICY_MAX_CONCURRENCY",
    });
  });

  it("rejects seed entries for unconfigured components", () => {
    writeLayer(
      path.join(cwd, ".fleetfw", "config.yaml"),
      "fleet:\n  devices: [alice]\n  seed:\n    alice:\n      firmware: '1.0'\n",
    );
    assert.throws(() => loadConfig({ cwd, userConfig: null }), {
      message: 'Invalid configuration at fleet.seed.alice.firmware: Unknown component "firmware"',
      field: "FLEET_SEED_ALICE_FIRMWARE",
    });
  });

  it("accepts seeds for configured components", () => {
    writeLayer(
      path.join(cwd, ".fleetfw", "config.yaml"),
      "fleet:\n  devices: [alice]\n  seed:\n    alice:\n      kernel: '6.6.31'\n",
    );
    assert.deepEqual(loadConfig({ cwd, userConfig: null }).fleet.seed, { alice: { kernel: "6.6.31" } });
  });
});

describe("deepMerge", () => {
  it("merges nested mappings and replaces arrays and scalars", () => {
    assert.deepEqual(
      deepMerge(
        { fleet: { devices: ["a"], components: ["os"] }, policy: { max_retry: 1 } },
        { fleet: { devices: ["b"] }, policy: { max_retry: 3 }, extra: true },
      ),
      { fleet: { devices: ["b"], components: ["os"] }, policy: { max_retry: 3 }, extra: true },
    );
  });

  it("ignores undefined overrides", () => {
    assert.deepEqual(deepMerge({ a: 1 }, { a: undefined }), { a: 1 });
  });
});
