import fs from "node:fs";
import { Readable } from "node:stream";
import { fileURLToPath } from "node:url";
import { HttpError, errorMessage } from "../utils/errors.js";
import { parseRetryAfter } from "../utils/retry.js";

/** The slice of the global fetch that fleetfw calls; tests substitute a stub */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  /** Bearer credential for the registry; sourcing it is the caller's business */
  token?: string;
  /** Per-request timeout for JSON/text requests */
  timeoutMs?: number;
  /** High-water mark for file:// streams */
  chunkSize?: number;
  userAgent?: string;
  fetchImpl?: FetchLike;
}

export interface StreamResponse {
  stream: Readable;
  /** Content-Length when the server sent one */
  size?: number;
}

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Minimal HTTP access for the registry and asset downloads.
 * `file://` URLs are served from the local filesystem so a mirror directory
 * can stand in for the registry's asset host.
 */
export class HttpClient {
  private readonly token: string | undefined;
  private readonly timeoutMs: number;
  private readonly chunkSize: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpClientOptions = {}) {
    this.token = options.token || undefined;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.userAgent = options.userAgent ?? "fleetfw";
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  /** GET and parse JSON. Non-2xx responses throw HttpError carrying the status. */
  async getJson(url: string): Promise<unknown> {
    const res = await this.request(url, "application/vnd.github+json", AbortSignal.timeout(this.timeoutMs));
    try {
      return await res.json();
    } catch (err) {
      throw new HttpError(`Invalid JSON from ${url}: ${errorMessage(err)}`, url, res.status);
    }
  }

  async getText(url: string, signal?: AbortSignal): Promise<string> {
    if (isFileUrl(url)) {
      try {
        return await fs.promises.readFile(fileURLToPath(url), "utf-8");
      } catch (err) {
        throw new HttpError(`Cannot read ${url}: ${errorMessage(err)}`, url, 404);
      }
    }
    const res = await this.request(url, "text/plain, */*", signal ?? AbortSignal.timeout(this.timeoutMs));
    return res.text();
  }

  /** Open a streaming download. The caller owns the timeout through `signal`. */
  async openStream(url: string, signal?: AbortSignal): Promise<StreamResponse> {
    if (isFileUrl(url)) {
      const filePath = fileURLToPath(url);
      let size: number;
      try {
        size = (await fs.promises.stat(filePath)).size;
      } catch (err) {
        throw new HttpError(`Cannot read ${url}: ${errorMessage(err)}`, url, 404);
      }
      return {
        stream: fs.createReadStream(filePath, { highWaterMark: this.chunkSize, signal }),
        size,
      };
    }

    const res = await this.request(url, "application/octet-stream", signal);
    if (!res.body) {
      throw new HttpError(`Empty response body from ${url}`, url, res.status);
    }
    const length = Number(res.headers.get("content-length"));
    return {
      stream: Readable.fromWeb(res.body),
      size: Number.isFinite(length) && length > 0 ? length : undefined,
    };
  }

  private async request(url: string, accept: string, signal?: AbortSignal): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: accept,
      "User-Agent": this.userAgent,
    };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, { headers, signal, redirect: "follow" });
    } catch (err) {
      throw new HttpError(`Request to ${url} failed: ${errorMessage(err)}`, url);
    }
    if (!res.ok) {
      throw new HttpError(
        `HTTP ${res.status} ${res.statusText} from ${url}`,
        url,
        res.status,
        parseRetryAfter(res.headers.get("retry-after")),
      );
    }
    return res;
  }
}

function isFileUrl(url: string): boolean {
  return url.startsWith("file:");
}
