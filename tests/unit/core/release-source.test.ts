import { describe, it, after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import {
  CatalogReleaseSource,
  GitHubReleaseSource,
  createReleaseSource,
  selectReleaseAssets,
} from "../../../src/core/release-source.js";
import { HttpClient } from "../../../src/core/http-client.js";
import { RegistryConfigSchema } from "../../../src/schemas/config.schema.js";
import { SourceUnavailableError } from "../../../src/utils/errors.js";
import type { RetryConfig } from "../../../src/utils/retry.js";
import { jsonResponse, makeTmpDir, releaseOf, removeDir, stubFetch } from "../../helpers/fixtures.js";

const DIGEST = "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";
const LATEST = "https://registry.test/repos/acme/kernel/releases/latest";

const noDelay: Partial<RetryConfig> = {
  maxAttempts: 3,
  initialDelayMs: 0,
  maxDelayMs: 0,
  jitter: false,
};

function asset(name: string) {
  return { name, downloadUrl: `https://assets.test/${name}` };
}

const releasePayload = {
  tag_name: "v6.6.51",
  name: "Linux 6.6.51",
  body: "Stable update",
  html_url: "https://registry.test/acme/kernel/releases/tag/v6.6.51",
  published_at: "2026-03-14T09:26:53Z",
  assets: [
    { name: "kernel-6.6.51.tar.gz", browser_download_url: "https://assets.test/kernel-6.6.51.tar.gz", size: 1024 },
    { name: "kernel-6.6.51.tar.gz.sha256", browser_download_url: "https://assets.test/kernel-6.6.51.tar.gz.sha256" },
  ],
};

function github(routes: Parameters<typeof stubFetch>[0]) {
  const stub = stubFetch(routes);
  const source = new GitHubReleaseSource({
    http: new HttpClient({ fetchImpl: stub.fetch }),
    apiUrl: "https://registry.test/",
    repos: { kernel: "acme/kernel" },
    retry: noDelay,
  });
  return { stub, source };
}

describe("selectReleaseAssets", () => {
  it("pairs the payload with its sibling digest", () => {
    const release = releaseOf("kernel", "6.6.51", [
      asset("SHA256SUMS"),
      asset("kernel-6.6.51.tar.gz"),
      asset("kernel-6.6.51.tar.gz.sha256"),
    ]);
    const selected = selectReleaseAssets(release);
    assert.equal(selected?.payload.name, "kernel-6.6.51.tar.gz");
    assert.equal(selected?.checksum?.name, "kernel-6.6.51.tar.gz.sha256");
  });

  it("falls back to a SHA256SUMS file", () => {
    const selected = selectReleaseAssets(releaseOf("os", "2.0", [asset("os-2.0.tgz"), asset("SHA256SUMS")]));
    assert.equal(selected?.payload.name, "os-2.0.tgz");
    assert.equal(selected?.checksum?.name, "SHA256SUMS");
  });

  it("prefers SHA256SUMS over a digest named for another payload", () => {
    const selected = selectReleaseAssets(
      releaseOf("os", "2.0", [asset("os-2.0.tar.gz"), asset("bootloader-1.tar.gz.sha256"), asset("SHA256SUMS")]),
    );
    assert.equal(selected?.checksum?.name, "SHA256SUMS");
  });

  it("uses a lone digest file only when it is the only one", () => {
    const lone = selectReleaseAssets(releaseOf("os", "2.0", [asset("os-2.0.tar.gz"), asset("release.sha256")]));
    assert.equal(lone?.checksum?.name, "release.sha256");

    const ambiguous = selectReleaseAssets(
      releaseOf("os", "2.0", [asset("os-2.0.tar.gz"), asset("bootloader-1.tar.gz.sha256"), asset("recovery-1.tar.gz.sha256")]),
    );
    assert.deepEqual(ambiguous, { payload: asset("os-2.0.tar.gz") });
  });

  it("returns the payload alone when no digest is published", () => {
    const selected = selectReleaseAssets(releaseOf("os", "2.0", [asset("os-2.0.tar.gz"), asset("notes.txt")]));
    assert.deepEqual(selected, { payload: asset("os-2.0.tar.gz") });
  });

  it("returns null without a tarball", () => {
    assert.equal(selectReleaseAssets(releaseOf("os", "2.0", [asset("os-2.0.zip")])), null);
  });
});

describe("GitHubReleaseSource", () => {
  it("maps the latest release", async () => {
    const { source, stub } = github({ [LATEST]: jsonResponse(releasePayload) });
    const release = await source.latestRelease("kernel");
    assert.deepEqual(release, {
      component: "kernel",
      version: "6.6.51",
      tag: "v6.6.51",
      releaseDate: "2026-03-14",
      notes: "Linux 6.6.51",
      url: "https://registry.test/acme/kernel/releases/tag/v6.6.51",
      assets: [
        { name: "kernel-6.6.51.tar.gz", downloadUrl: "https://assets.test/kernel-6.6.51.tar.gz", size: 1024 },
        { name: "kernel-6.6.51.tar.gz.sha256", downloadUrl: "https://assets.test/kernel-6.6.51.tar.gz.sha256", size: undefined },
      ],
    });
    assert.equal(stub.calls.length, 1);
  });

  it("uses the body as notes when the release is unnamed", async () => {
    const { source } = github({ [LATEST]: jsonResponse({ ...releasePayload, name: null }) });
    assert.equal((await source.latestRelease("kernel"))?.notes, "Stable update");
  });

  it("returns null for an unconfigured component without a request", async () => {
    const { source, stub } = github({});
    assert.equal(await source.latestRelease("bootloader"), null);
    assert.equal(stub.calls.length, 0);
  });

  it("returns null when the repository has no release", async () => {
    const { source, stub } = github({});
    assert.equal(await source.latestRelease("kernel"), null);
    assert.equal(stub.calls.length, 1);
  });

  it("rejects a malformed payload", async () => {
    const { source } = github({ [LATEST]: jsonResponse({ assets: [] }) });
    await assert.rejects(() => source.latestRelease("kernel"), {
      name: "SourceUnavailableError",
      message: "Malformed release payload for kernel: tag_name Required",
    });
  });

  it("fetches the digest for the payload", async () => {
    const checksumUrl = "https://assets.test/kernel-6.6.51.tar.gz.sha256";
    const { source } = github({ [checksumUrl]: new Response(`${DIGEST}  kernel-6.6.51.tar.gz\n`) });
    const digest = await source.fetchChecksum(
      { name: "kernel-6.6.51.tar.gz.sha256", downloadUrl: checksumUrl },
      "kernel-6.6.51.tar.gz",
      "kernel",
    );
    assert.deepEqual(digest, { status: "found", digest: DIGEST });
  });

  it("reports a digest file without an entry for the payload", async () => {
    const checksumUrl = "https://assets.test/SHA256SUMS";
    const { source } = github({ [checksumUrl]: new Response(`${DIGEST}  os-2.0.tar.gz\n${DIGEST}  bootloader-1.tar.gz\n`) });
    const digest = await source.fetchChecksum({ name: "SHA256SUMS", downloadUrl: checksumUrl }, "kernel-6.6.51.tar.gz", "kernel");
    assert.deepEqual(digest, { status: "no_entry", reason: "has no entry for kernel-6.6.51.tar.gz" });
  });

  it("reports an unreachable digest as an outage", async () => {
    const { source } = github({});
    await assert.rejects(
      () => source.fetchChecksum(asset("kernel.tar.gz.sha256"), "kernel.tar.gz", "kernel"),
      (err: unknown) =>
        err instanceof SourceUnavailableError && err.message.startsWith("Cannot fetch checksum kernel.tar.gz.sha256:"),
    );
  });
});

describe("CatalogReleaseSource", () => {
  const tmp = makeTmpDir();
  after(() => removeDir(tmp));

  it("serves releases declared in configuration", async () => {
    const source = new CatalogReleaseSource(
      {
        os: {
          version: "v2.0",
          release_date: "2026-02-01",
          notes: "Maintenance release",
          url: "",
          assets: [{ name: "os-2.0.tar.gz", url: "file:///srv/mirror/os-2.0.tar.gz", size: 10 }],
        },
      },
      new HttpClient(),
    );
    assert.deepEqual(await source.latestRelease("os"), {
      component: "os",
      version: "2.0",
      tag: "v2.0",
      releaseDate: "2026-02-01",
      notes: "Maintenance release",
      url: "",
      assets: [{ name: "os-2.0.tar.gz", downloadUrl: "file:///srv/mirror/os-2.0.tar.gz", size: 10 }],
    });
    assert.equal(await source.latestRelease("kernel"), null);
  });

  it("reads digests from a mirror directory", async () => {
    const file = path.join(tmp, "os-2.0.tar.gz.sha256");
    fs.writeFileSync(file, `${DIGEST.toUpperCase()}\n`);
    const source = new CatalogReleaseSource({}, new HttpClient());
    const digest = await source.fetchChecksum(
      { name: "os-2.0.tar.gz.sha256", downloadUrl: pathToFileURL(file).href },
      "os-2.0.tar.gz",
      "os",
    );
    assert.deepEqual(digest, { status: "found", digest: DIGEST });
  });
});

describe("createReleaseSource", () => {
  it("builds the configured kind", () => {
    const http = new HttpClient();
    assert.ok(createReleaseSource(RegistryConfigSchema.parse({}), http) instanceof GitHubReleaseSource);
    assert.ok(createReleaseSource(RegistryConfigSchema.parse({ kind: "catalog" }), http) instanceof CatalogReleaseSource);
  });
});
