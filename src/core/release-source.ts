import type { CatalogRelease, RegistryConfig } from "../schemas/config.schema.js";
import {
  RegistryReleaseSchema,
  type ReleaseAsset,
  type ReleaseMetadata,
} from "../schemas/release.schema.js";
import { HttpClient } from "./http-client.js";
import { parseChecksumText, type ChecksumLookup } from "./integrity.js";
import { normalizeTag } from "./version-order.js";
import { HttpError, SourceUnavailableError, errorMessage } from "../utils/errors.js";
import { withRetry, isTransientHttpError, type RetryConfig } from "../utils/retry.js";
import * as log from "../utils/logger.js";

export interface ReleaseSource {
  /** Latest published release of a component, or null when none exists. Throws SourceUnavailableError on outages. */
  latestRelease(component: string): Promise<ReleaseMetadata | null>;
  /** Expected digest for payloadName from a companion checksum asset. Throws SourceUnavailableError on outages. */
  fetchChecksum(asset: ReleaseAsset, payloadName: string, component: string): Promise<ChecksumLookup>;
}

export interface ResolvedAssets {
  payload: ReleaseAsset;
  checksum?: ReleaseAsset;
}

const PAYLOAD_SUFFIXES = [".tar.gz", ".tgz"];
const CHECKSUM_SUFFIXES = [".sha256", ".sha256sum"];

const isChecksumFile = (a: ReleaseAsset) => CHECKSUM_SUFFIXES.some((suffix) => a.name.endsWith(suffix));

/**
 * Pick the firmware tarball and its companion digest out of a release's assets.
 * The companion is `<payload>.sha256` (or `.sha256sum`), else a SHA256SUMS
 * file, else a `*.sha256` asset when it is the only one in the release.
 */
export function selectReleaseAssets(release: ReleaseMetadata): ResolvedAssets | null {
  const payload = release.assets.find((a) =>
    PAYLOAD_SUFFIXES.some((suffix) => a.name.endsWith(suffix)),
  );
  if (!payload) return null;

  const sibling = release.assets.find((a) =>
    CHECKSUM_SUFFIXES.some((suffix) => a.name === `${payload.name}${suffix}`),
  );
  const sums = release.assets.find((a) => a.name === "SHA256SUMS");
  const singles = release.assets.filter(isChecksumFile);
  const checksum = sibling ?? sums ?? (singles.length === 1 ? singles[0] : undefined);

  return checksum ? { payload, checksum } : { payload };
}

/** Shared checksum download for sources whose assets are reachable over HttpClient */
async function downloadChecksum(
  http: HttpClient,
  asset: ReleaseAsset,
  payloadName: string,
  component: string,
): Promise<ChecksumLookup> {
  let text: string;
  try {
    text = await http.getText(asset.downloadUrl);
  } catch (err) {
    throw new SourceUnavailableError(
      component,
      `Cannot fetch checksum ${asset.name}: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  return parseChecksumText(text, payloadName);
}

export interface GitHubReleaseSourceOptions {
  http: HttpClient;
  apiUrl: string;
  /** component -> owner/name */
  repos: Record<string, string>;
  retry?: Partial<RetryConfig>;
}

/** Releases published on a GitHub-compatible registry, one repository per component */
export class GitHubReleaseSource implements ReleaseSource {
  private readonly http: HttpClient;
  private readonly apiUrl: string;
  private readonly repos: Record<string, string>;
  private readonly retry: Partial<RetryConfig> | undefined;

  constructor(options: GitHubReleaseSourceOptions) {
    this.http = options.http;
    this.apiUrl = options.apiUrl.replace(/\/+$/, "");
    this.repos = options.repos;
    this.retry = options.retry;
  }

  async latestRelease(component: string): Promise<ReleaseMetadata | null> {
    const repo = this.repos[component];
    if (!repo) {
      log.debug(`No registry repository configured for ${component}`);
      return null;
    }
    const url = `${this.apiUrl}/repos/${repo}/releases/latest`;

    let data: unknown;
    try {
      data = await withRetry(
        () => this.http.getJson(url),
        isTransientHttpError,
        this.retry,
        (attempt, delay, err) =>
          log.warn(`Registry query for ${component} failed (${errorMessage(err)}), retry ${attempt} in ${delay}ms`),
      );
    } catch (err) {
      if (err instanceof HttpError && err.statusCode === 404) return null;
      throw new SourceUnavailableError(
        component,
        `Registry unavailable for ${component}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    const parsed = RegistryReleaseSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new SourceUnavailableError(
        component,
        `Malformed release payload for ${component}: ${issue?.path.join(".") || "(root)"} ${issue?.message ?? ""}`.trim(),
      );
    }

    const release = parsed.data;
    return {
      component,
      version: normalizeTag(release.tag_name),
      tag: release.tag_name,
      releaseDate: release.published_at ? release.published_at.slice(0, 10) : "",
      notes: release.name ?? release.body ?? "",
      url: release.html_url ?? "",
      assets: release.assets.map((a) => ({
        name: a.name,
        downloadUrl: a.browser_download_url,
        size: a.size,
      })),
    };
  }

  fetchChecksum(asset: ReleaseAsset, payloadName: string, component: string): Promise<ChecksumLookup> {
    return downloadChecksum(this.http, asset, payloadName, component);
  }
}

/** Releases declared in configuration; deterministic, no registry round-trips */
export class CatalogReleaseSource implements ReleaseSource {
  private readonly catalog: Record<string, CatalogRelease>;
  private readonly http: HttpClient;

  constructor(catalog: Record<string, CatalogRelease>, http: HttpClient) {
    this.catalog = catalog;
    this.http = http;
  }

  async latestRelease(component: string): Promise<ReleaseMetadata | null> {
    const entry = this.catalog[component];
    if (!entry) return null;
    return {
      component,
      version: normalizeTag(entry.version),
      tag: entry.tag ?? entry.version,
      releaseDate: entry.release_date,
      notes: entry.notes,
      url: entry.url,
      assets: entry.assets.map((a) => ({ name: a.name, downloadUrl: a.url, size: a.size })),
    };
  }

  fetchChecksum(asset: ReleaseAsset, payloadName: string, component: string): Promise<ChecksumLookup> {
    return downloadChecksum(this.http, asset, payloadName, component);
  }
}

export function createReleaseSource(config: RegistryConfig, http: HttpClient): ReleaseSource {
  switch (config.kind) {
    case "github":
      return new GitHubReleaseSource({
        http,
        apiUrl: config.api_url,
        repos: config.repos,
        retry: { maxAttempts: config.max_attempts },
      });
    case "catalog":
      return new CatalogReleaseSource(config.catalog, http);
  }
}
