/**
 * Typed error classes for fleetfw.
 *
 * Hierarchy:
 *   FleetError (base)
 *   ├── SourceUnavailableError   — registry unreachable or errored (component)
 *   ├── NoAssetFoundError        — release has no installable payload
 *   ├── ChecksumUnavailableError — no companion digest to verify against
 *   ├── ChecksumMismatchError    — payload digest differs from the published one
 *   ├── InstallFailedError       — extraction or swap failed (targetDir)
 *   ├── StoreUnavailableError    — persistence layer failure (operation)
 *   ├── HttpError                — transport errors (statusCode, isRetryable)
 *   └── ConfigValidationError    — config/schema validation failures
 */

/** Base error for all fleetfw-specific errors */
export class FleetError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "FleetError";
    this.code = code;
  }
}

/** Registry unreachable, rate-limited, or returned garbage. Retry next cycle. */
export class SourceUnavailableError extends FleetError {
  readonly component: string;

  constructor(component: string, message: string, options?: { cause?: unknown }) {
    super(message, "SOURCE_UNAVAILABLE");
    this.name = "SourceUnavailableError";
    this.component = component;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class NoAssetFoundError extends FleetError {
  readonly component: string;
  readonly tag: string;

  constructor(component: string, tag: string) {
    super(`Release ${tag} of ${component} has no .tar.gz payload`, "NO_ASSET_FOUND");
    this.name = "NoAssetFoundError";
    this.component = component;
    this.tag = tag;
  }
}

export class ChecksumUnavailableError extends FleetError {
  readonly assetName: string;

  constructor(assetName: string) {
    super(`No published SHA-256 digest for ${assetName}`, "CHECKSUM_UNAVAILABLE");
    this.name = "ChecksumUnavailableError";
    this.assetName = assetName;
  }
}

export class ChecksumMismatchError extends FleetError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`Checksum mismatch: expected ${expected}, got ${actual}`, "CHECKSUM_MISMATCH");
    this.name = "ChecksumMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class InstallFailedError extends FleetError {
  readonly targetDir: string;

  constructor(targetDir: string, message: string) {
    super(message, "INSTALL_FAILED");
    this.name = "InstallFailedError";
    this.targetDir = targetDir;
  }
}

/** Database errors. Never swallowed: an update attempt must not vanish silently. */
export class StoreUnavailableError extends FleetError {
  readonly operation: string;

  constructor(operation: string, message: string) {
    super(`State store ${operation} failed: ${message}`, "STORE_UNAVAILABLE");
    this.name = "StoreUnavailableError";
    this.operation = operation;
  }
}

/** HTTP transport errors */
export class HttpError extends FleetError {
  readonly statusCode: number | undefined;
  readonly url: string;
  /** Server-requested wait from a Retry-After header */
  readonly retryAfterMs: number | undefined;

  /** HTTP status codes that are safe to retry */
  static readonly RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504];

  constructor(message: string, url: string, statusCode?: number, retryAfterMs?: number) {
    super(message, statusCode ? `HTTP_${statusCode}` : "HTTP_NETWORK");
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.url = url;
    this.retryAfterMs = retryAfterMs;
  }

  /** Network failures (no status) and 429/5xx responses */
  get isRetryable(): boolean {
    return (
      this.statusCode === undefined ||
      HttpError.RETRYABLE_STATUS_CODES.includes(this.statusCode)
    );
  }
}

/** Config or schema validation failures */
export class ConfigValidationError extends FleetError {
  readonly field: string;

  constructor(message: string, field: string) {
    super(message, `CONFIG_INVALID_${field}`);
    this.name = "ConfigValidationError";
    this.field = field;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
