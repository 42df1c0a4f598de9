import { HttpError } from "./errors.js";

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  jitter: true,
};

/**
 * Run `fn`, retrying the failures `shouldRetry` accepts until
 * `config.maxAttempts` calls have been made. The last error is rethrown.
 *
 * @param onRetry Called with the 1-based retry number and the chosen delay before each sleep.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (err: unknown) => boolean,
  config?: Partial<RetryConfig>,
  onRetry?: (attempt: number, delay: number, err: unknown) => void,
): Promise<T> {
  const cfg: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (!shouldRetry(err)) throw err;
      if (attempt + 1 >= cfg.maxAttempts) break;

      const delay = computeDelay(attempt, cfg, err);
      onRetry?.(attempt + 1, delay, err);
      await sleep(delay);
    }
  }

  throw lastError;
}

/** Transient registry failures: connection errors, 429 and 5xx */
export function isTransientHttpError(err: unknown): boolean {
  return err instanceof HttpError && err.isRetryable;
}

/**
 * Wait before the next call. A registry that sent Retry-After is obeyed;
 * otherwise min(initial * multiplier^attempt, maxDelay), ±25% with jitter.
 * Never longer than maxDelayMs.
 */
export function computeDelay(attempt: number, config: RetryConfig, err?: unknown): number {
  if (err instanceof HttpError && err.retryAfterMs !== undefined) {
    return Math.min(err.retryAfterMs, config.maxDelayMs);
  }
  const base = Math.min(
    config.initialDelayMs * config.backoffMultiplier ** attempt,
    config.maxDelayMs,
  );
  if (!config.jitter) return base;
  return Math.round(base * (0.75 + Math.random() * 0.5));
}

/** Retry-After as delta-seconds or an HTTP-date, in ms from `now` */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const at = Date.parse(trimmed);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
