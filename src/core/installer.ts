/**
 * Streaming installer.
 *
 * download (bounded chunks, per-attempt timeout) → verify digest → extract into
 * a staging directory → swap staging into place. Every intermediate file lives
 * in a work directory created next to the target, so the final renames stay on
 * one filesystem. The live target is only touched by the swap. During the swap
 * the previous tree is parked in a sibling `.<target>.fleetfw-previous`
 * directory, never inside the work directory, so it survives the work
 * directory's removal. A parked tree left behind by a failed restore or a
 * crash is moved back before the next install of the same target.
 */

import fs from "node:fs";
import path from "node:path";
import { Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import * as tar from "tar";
import type { ReleaseAsset } from "../schemas/release.schema.js";
import { InstallManifestSchema, type InstallManifest } from "../schemas/firmware.schema.js";
import { HttpClient } from "./http-client.js";
import { Sha256Verifier, type IntegrityVerifier } from "./integrity.js";
import { InstallFailedError, errorMessage } from "../utils/errors.js";
import * as log from "../utils/logger.js";

const fsp = fs.promises;

export type InstallPhase = "downloading" | "verifying" | "installing";

export interface InstallRequest {
  asset: ReleaseAsset;
  targetDir: string;
  version: string;
  /** Published digest; null/undefined means the payload is installed unverified */
  expectedChecksum?: string | null;
  signal?: AbortSignal;
  onPhase?: (phase: InstallPhase) => void;
  onProgress?: (receivedBytes: number, totalBytes?: number) => void;
}

export type InstallResult =
  | { status: "installed"; checksum: string; verified: boolean; bytes: number; manifestPath: string }
  | { status: "download_failed"; error: string }
  | { status: "checksum_mismatch"; expected: string; actual: string }
  | { status: "install_failed"; error: string };

export type InstalledVerification =
  | { status: "ok"; manifest: InstallManifest }
  | { status: "not_installed" }
  | { status: "mismatch"; problems: string[] };

export interface Installer {
  install(request: InstallRequest): Promise<InstallResult>;
  verifyInstalled(targetDir: string, expectedChecksum: string): Promise<InstalledVerification>;
}

export interface StreamingInstallerOptions {
  http: HttpClient;
  verifier?: IntegrityVerifier;
  downloadTimeoutMs?: number;
  /** Write-stream high-water mark in bytes */
  chunkSize?: number;
  /** Runs after extraction, before the swap. A throw aborts the install. */
  beforeSwap?: (stagingDir: string, targetDir: string) => void | Promise<void>;
  now?: () => Date;
}

/** Manifest lives beside the target so the installed tree holds only payload files */
export function manifestPathFor(targetDir: string): string {
  return `${targetDir}.manifest.json`;
}

function workPrefix(targetDir: string): string {
  return `.${path.basename(targetDir)}.fleetfw-`;
}

/** Where the live tree waits while a swap is in progress */
export function parkedPathFor(targetDir: string): string {
  return path.join(path.dirname(targetDir), `${workPrefix(targetDir)}previous`);
}

/**
 * Undo the leftovers of an interrupted install of targetDir: a parked previous
 * tree goes back into place when the target is missing (and is dropped when the
 * swap got far enough to put a new target there), and stale work directories
 * are removed. Returns true when a parked tree was restored.
 */
export async function recoverInterruptedSwap(targetDir: string): Promise<boolean> {
  const parent = path.dirname(targetDir);
  if (!fs.existsSync(parent)) return false;

  let restored = false;
  const parked = parkedPathFor(targetDir);
  if (fs.existsSync(parked)) {
    if (fs.existsSync(targetDir)) {
      await fsp.rm(parked, { recursive: true, force: true });
    } else {
      await fsp.rename(parked, targetDir);
      log.warn(`Restored ${targetDir} from an interrupted install`);
      restored = true;
    }
  }

  const prefix = workPrefix(targetDir);
  for (const entry of await fsp.readdir(parent)) {
    if (!entry.startsWith(prefix)) continue;
    log.debug(`Removing stale work directory ${entry}`);
    await fsp.rm(path.join(parent, entry), { recursive: true, force: true });
  }
  return restored;
}

export class StreamingInstaller implements Installer {
  private readonly http: HttpClient;
  private readonly verifier: IntegrityVerifier;
  private readonly downloadTimeoutMs: number;
  private readonly chunkSize: number;
  private readonly beforeSwap: StreamingInstallerOptions["beforeSwap"];
  private readonly now: () => Date;

  constructor(options: StreamingInstallerOptions) {
    this.http = options.http;
    this.verifier = options.verifier ?? new Sha256Verifier();
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? 600000;
    this.chunkSize = options.chunkSize ?? 64 * 1024;
    this.beforeSwap = options.beforeSwap;
    this.now = options.now ?? (() => new Date());
  }

  async install(request: InstallRequest): Promise<InstallResult> {
    const { targetDir } = request;
    let workDir: string;
    try {
      await recoverInterruptedSwap(targetDir);
    } catch (err) {
      return { status: "install_failed", error: `Cannot recover interrupted install: ${errorMessage(err)}` };
    }
    try {
      await fsp.mkdir(path.dirname(targetDir), { recursive: true });
      workDir = await fsp.mkdtemp(path.join(path.dirname(targetDir), workPrefix(targetDir)));
    } catch (err) {
      return { status: "install_failed", error: `Cannot create work directory: ${errorMessage(err)}` };
    }

    try {
      return await this.installIn(workDir, request);
    } finally {
      await fsp.rm(workDir, { recursive: true, force: true }).catch((err: unknown) => {
        log.warn(`Could not remove work directory ${workDir}: ${errorMessage(err)}`);
      });
    }
  }

  private async installIn(workDir: string, request: InstallRequest): Promise<InstallResult> {
    const { asset, targetDir } = request;
    const payloadPath = path.join(workDir, "payload.tar.gz");

    request.onPhase?.("downloading");
    let bytes: number;
    try {
      bytes = await this.download(request, payloadPath);
      log.debug(`Downloaded ${asset.name} (${bytes} bytes) to ${payloadPath}`);
    } catch (err) {
      return { status: "download_failed", error: errorMessage(err) };
    }

    request.onPhase?.("verifying");
    let checksum: string;
    try {
      checksum = await this.verifier.digestFile(payloadPath);
    } catch (err) {
      return { status: "install_failed", error: `Cannot hash payload: ${errorMessage(err)}` };
    }
    const expected = request.expectedChecksum?.trim().toLowerCase() || null;
    if (expected && !this.verifier.verify(checksum, expected)) {
      return { status: "checksum_mismatch", expected, actual: checksum };
    }

    request.onPhase?.("installing");
    try {
      const stagingDir = path.join(workDir, "staging");
      await fsp.mkdir(stagingDir);
      await tar.x({ file: payloadPath, cwd: stagingDir, strip: 1, strict: true });

      const files = await hashTree(stagingDir, this.verifier);
      if (Object.keys(files).length === 0) {
        throw new InstallFailedError(targetDir, `${asset.name} has no files below its top-level directory`);
      }

      await this.beforeSwap?.(stagingDir, targetDir);

      const manifest: InstallManifest = {
        version: request.version,
        checksum,
        verified: expected !== null,
        installedAt: this.now().toISOString(),
        files,
      };
      const manifestTmp = path.join(workDir, "manifest.json");
      await fsp.writeFile(manifestTmp, JSON.stringify(manifest, null, 2) + "\n");

      await swapInto({
        stagingDir,
        targetDir,
        parkedDir: parkedPathFor(targetDir),
        manifestTmp,
      });

      return {
        status: "installed",
        checksum,
        verified: expected !== null,
        bytes,
        manifestPath: manifestPathFor(targetDir),
      };
    } catch (err) {
      return { status: "install_failed", error: errorMessage(err) };
    }
  }

  /** Stream the asset to `dest`. Rejects on timeout, abort, HTTP error or short read. */
  private async download(request: InstallRequest, dest: string): Promise<number> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.downloadTimeoutMs);
    const onAbort = () => controller.abort();
    if (request.signal?.aborted) controller.abort();
    else request.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const { stream, size } = await this.http.openStream(request.asset.downloadUrl, controller.signal);
      const total = size ?? request.asset.size;
      let received = 0;
      const counter = new Transform({
        transform(chunk: Uint8Array, _encoding, callback) {
          received += chunk.length;
          request.onProgress?.(received, total);
          callback(null, chunk);
        },
      });

      await pipeline(
        stream,
        counter,
        fs.createWriteStream(dest, { flags: "wx", highWaterMark: this.chunkSize }),
        { signal: controller.signal },
      );

      if (size !== undefined && received !== size) {
        throw new Error(`Truncated download: received ${received} of ${size} bytes`);
      }
      return received;
    } catch (err) {
      if (timedOut) throw new Error(`Download of ${request.asset.name} timed out after ${this.downloadTimeoutMs}ms`);
      if (request.signal?.aborted) throw new Error(`Download of ${request.asset.name} was cancelled`);
      throw err;
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", onAbort);
    }
  }

  async verifyInstalled(targetDir: string, expectedChecksum: string): Promise<InstalledVerification> {
    const manifestPath = manifestPathFor(targetDir);
    if (!fs.existsSync(manifestPath)) return { status: "not_installed" };

    let manifest: InstallManifest;
    try {
      const parsed = InstallManifestSchema.safeParse(JSON.parse(await fsp.readFile(manifestPath, "utf-8")));
      if (!parsed.success) return { status: "mismatch", problems: [`${manifestPath}: invalid manifest`] };
      manifest = parsed.data;
    } catch (err) {
      return { status: "mismatch", problems: [`${manifestPath}: ${errorMessage(err)}`] };
    }

    const problems: string[] = [];
    if (expectedChecksum && !this.verifier.verify(manifest.checksum, expectedChecksum)) {
      problems.push(`payload checksum ${manifest.checksum} differs from recorded ${expectedChecksum}`);
    }

    if (!fs.existsSync(targetDir)) {
      problems.push(`${targetDir} is missing`);
      return { status: "mismatch", problems };
    }

    const actual = await hashTree(targetDir, this.verifier);
    for (const [file, digest] of Object.entries(manifest.files)) {
      const found = actual[file];
      if (found === undefined) problems.push(`missing: ${file}`);
      else if (found !== digest) problems.push(`modified: ${file}`);
    }
    for (const file of Object.keys(actual)) {
      if (!(file in manifest.files)) problems.push(`unexpected: ${file}`);
    }

    return problems.length === 0 ? { status: "ok", manifest } : { status: "mismatch", problems };
  }
}

interface SwapPaths {
  stagingDir: string;
  targetDir: string;
  /** Where the live tree waits during the swap; outside the work directory */
  parkedDir: string;
  manifestTmp: string;
}

/**
 * Replace targetDir with stagingDir. The previous tree is parked beside the
 * target and moved back if either the directory or the manifest rename fails.
 * When moving it back fails too, it stays parked and the error names it.
 */
async function swapInto({ stagingDir, targetDir, parkedDir, manifestTmp }: SwapPaths): Promise<void> {
  const hadPrevious = fs.existsSync(targetDir);
  if (hadPrevious) await fsp.rename(targetDir, parkedDir);

  const restore = async (reason: string): Promise<never> => {
    if (hadPrevious) {
      try {
        await fsp.rename(parkedDir, targetDir);
      } catch (err) {
        throw new InstallFailedError(
          targetDir,
          `${reason}; previous install left at ${parkedDir} (restore failed: ${errorMessage(err)})`,
        );
      }
    }
    throw new InstallFailedError(targetDir, reason);
  };

  try {
    await fsp.rename(stagingDir, targetDir);
  } catch (err) {
    return restore(`Swap into ${targetDir} failed: ${errorMessage(err)}`);
  }

  try {
    await fsp.rename(manifestTmp, manifestPathFor(targetDir));
  } catch (err) {
    const reason = `Writing install manifest failed: ${errorMessage(err)}`;
    try {
      await fsp.rename(targetDir, stagingDir);
    } catch (undoErr) {
      throw new InstallFailedError(targetDir, `${reason}; new tree left in place (${errorMessage(undoErr)})`);
    }
    return restore(reason);
  }

  if (hadPrevious) {
    await fsp.rm(parkedDir, { recursive: true, force: true }).catch((err: unknown) => {
      log.warn(`Could not remove previous install ${parkedDir}: ${errorMessage(err)}`);
    });
  }
}

/** SHA-256 of every regular file under root, keyed by POSIX-style relative path */
export async function hashTree(root: string, verifier: IntegrityVerifier): Promise<Record<string, string>> {
  const result: Record<string, string> = {};

  async function walk(dir: string): Promise<void> {
    const entries = await fsp.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      const rel = path.relative(root, full).split(path.sep).join("/");
      if (entry.isDirectory()) {
        await walk(full);
      } else if (entry.isSymbolicLink()) {
        result[rel] = `link:${await fsp.readlink(full)}`;
      } else if (entry.isFile()) {
        result[rel] = await verifier.digestFile(full);
      }
    }
  }

  await walk(root);
  return result;
}
