import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { pathToFileURL } from "node:url";
import * as tar from "tar";
import type { FetchLike } from "../../src/core/http-client.js";
import type { ReleaseSource } from "../../src/core/release-source.js";
import { Sha256Verifier, parseChecksumText, type ChecksumLookup } from "../../src/core/integrity.js";
import { SqliteStateStore } from "../../src/core/state-store.js";
import { UpdatePolicySchema, type UpdatePolicy } from "../../src/schemas/config.schema.js";
import type { FirmwareRecord } from "../../src/schemas/firmware.schema.js";
import type { ReleaseAsset, ReleaseMetadata } from "../../src/schemas/release.schema.js";

export function makeTmpDir(prefix = "fleetfw-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write `files` under <dir>/<topDir>/ and pack them into <dir>/<archiveName>
 * with the single top-level directory that release tarballs carry.
 */
export async function buildTarball(
  dir: string,
  archiveName: string,
  topDir: string,
  files: Record<string, string>,
): Promise<string> {
  const srcRoot = path.join(dir, `${archiveName}.src`);
  fs.mkdirSync(path.join(srcRoot, topDir), { recursive: true });
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(srcRoot, topDir, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
  const archive = path.join(dir, archiveName);
  await tar.c({ gzip: true, file: archive, cwd: srcRoot, portable: true }, [topDir]);
  return archive;
}

export interface PublishedPayload {
  asset: ReleaseAsset;
  checksumAsset: ReleaseAsset;
  checksum: string;
  bytes: Buffer;
}

/** Build <component>-<version>.tar.gz in dir and describe it as a file:// release asset */
export async function publishPayload(
  dir: string,
  component: string,
  version: string,
  files: Record<string, string>,
): Promise<PublishedPayload> {
  const name = `${component}-${version}.tar.gz`;
  const archive = await buildTarball(dir, name, `${component}-${version}`, files);
  const bytes = fs.readFileSync(archive);
  const checksum = new Sha256Verifier().digest(bytes);
  const checksumFile = `${archive}.sha256`;
  fs.writeFileSync(checksumFile, `${checksum}  ${name}\n`);
  return {
    asset: { name, downloadUrl: pathToFileURL(archive).href, size: bytes.length },
    checksumAsset: { name: `${name}.sha256`, downloadUrl: pathToFileURL(checksumFile).href },
    checksum,
    bytes,
  };
}

export function releaseOf(component: string, version: string, assets: ReleaseAsset[]): ReleaseMetadata {
  return {
    component,
    version,
    tag: `v${version}`,
    releaseDate: "2026-01-01",
    notes: `${component} ${version}`,
    url: `https://registry.test/${component}/releases/v${version}`,
    assets,
  };
}

type Route = Response | (() => Response | Promise<Response>);

export interface StubFetch {
  fetch: FetchLike;
  calls: { url: string; init?: RequestInit }[];
}

/** In-process fetch answering from a URL table; anything else is a 404 */
export function stubFetch(routes: Record<string, Route>): StubFetch {
  const calls: { url: string; init?: RequestInit }[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    const route = routes[url];
    if (route === undefined) return new Response("not found", { status: 404, statusText: "Not Found" });
    return typeof route === "function" ? route() : route.clone();
  };
  return { fetch: fetchImpl, calls };
}

export function jsonResponse(value: unknown, status = 200): Response {
  return new Response(JSON.stringify(value), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function bytesResponse(bytes: Uint8Array, contentLength = bytes.length): Response {
  return new Response(bytes, {
    status: 200,
    headers: { "content-length": String(contentLength) },
  });
}

/** Scriptable release source */
export class FakeReleaseSource implements ReleaseSource {
  readonly releases = new Map<string, ReleaseMetadata>();
  /** checksum asset name -> file text */
  readonly checksums = new Map<string, string>();
  readonly failures = new Map<string, Error>();
  readonly checksumFailures = new Map<string, Error>();
  readonly calls: string[] = [];

  async latestRelease(component: string): Promise<ReleaseMetadata | null> {
    this.calls.push(component);
    const failure = this.failures.get(component);
    if (failure) throw failure;
    return this.releases.get(component) ?? null;
  }

  async fetchChecksum(asset: ReleaseAsset, payloadName: string): Promise<ChecksumLookup> {
    const failure = this.checksumFailures.get(asset.name);
    if (failure) throw failure;
    return parseChecksumText(this.checksums.get(asset.name) ?? "", payloadName);
  }

  /** Register a release whose payload and companion digest are both published */
  publish(component: string, version: string, payload: PublishedPayload): ReleaseMetadata {
    const release = releaseOf(component, version, [payload.asset, payload.checksumAsset]);
    this.releases.set(component, release);
    this.checksums.set(payload.checksumAsset.name, payload.checksum);
    return release;
  }
}

export function testPolicy(overrides: Partial<UpdatePolicy> = {}): UpdatePolicy {
  return { ...UpdatePolicySchema.parse({}), ...overrides };
}

export function memoryStore(): SqliteStateStore {
  return SqliteStateStore.open(":memory:");
}

export function firmwareRecord(overrides: Partial<FirmwareRecord> & Pick<FirmwareRecord, "device" | "component" | "version">): FirmwareRecord {
  return {
    releaseDate: "",
    checksum: "",
    status: "current",
    downloadUrl: "",
    notes: "",
    createdAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export const FIXED_NOW = new Date("2026-01-02T03:04:05.000Z");
