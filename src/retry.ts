/**
 * Cloud Billing — Retry Utilities
 *
 * Clients never retry on their own; this is the opt-in helper callers wrap
 * around a client call to back off on throttling and server errors.
 */

import { BillingError, InvalidResponseError, ProviderError, RateLimitError } from "./errors.js";
import type { BillingResult, BillingRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<BillingRetryOptions>;

export const BILLING_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

export function resolveRetryConfig(options?: BillingRetryOptions): RetryConfig {
  return {
    maxAttempts: options?.maxAttempts ?? BILLING_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? BILLING_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? BILLING_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? BILLING_RETRY_DEFAULTS.jitterFactor,
  };
}

// =============================================================================
// Error Checking
// =============================================================================

/**
 * Throttling and 5xx responses are worth another attempt. Validation,
 * authentication, malformed payloads and report failures are not.
 */
export function shouldRetryBillingError(error: BillingError): boolean {
  if (error instanceof RateLimitError) return true;
  if (!(error instanceof ProviderError) || error instanceof InvalidResponseError) return false;
  const status = error.statusCode ?? 0;
  return status >= 500 && status < 600;
}

/**
 * Parse a Retry-After header value (delta-seconds or HTTP date) into ms.
 */
export function parseRetryAfterMs(retryAfter: string | null | undefined, now: number = Date.now()): number | null {
  if (!retryAfter) return null;

  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return Math.max(0, seconds * 1000);

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - now);
  }

  return null;
}

// =============================================================================
// Delays
// =============================================================================

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Exponential backoff with jitter for the given 1-based attempt. */
export function computeBackoffDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
  const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (random() * 2 - 1);
  return Math.max(config.minDelayMs, cappedDelay + jitter);
}

// =============================================================================
// Retry Execution
// =============================================================================

export type RetryHooks = {
  /** Replaces the timer wait; tests pass a no-op. */
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, error: BillingError, delayMs: number) => void;
};

/**
 * Re-run a result-returning call while it fails with a retryable error.
 * The last result, successful or not, is returned as-is.
 */
export async function retryBillingResult<T>(
  fn: () => Promise<BillingResult<T>>,
  options?: BillingRetryOptions,
  hooks: RetryHooks = {},
): Promise<BillingResult<T>> {
  const config = resolveRetryConfig(options);
  const wait = hooks.sleep ?? sleep;

  let result = await fn();
  for (let attempt = 1; attempt < config.maxAttempts; attempt++) {
    if (result.success || !shouldRetryBillingError(result.error)) return result;

    const error = result.error;
    const delayMs =
      error instanceof RateLimitError && error.retryAfterMs !== undefined
        ? Math.min(error.retryAfterMs, config.maxDelayMs)
        : computeBackoffDelay(attempt, config);

    hooks.onRetry?.(attempt, error, delayMs);
    await wait(delayMs);
    result = await fn();
  }

  return result;
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an error into a single human-readable line.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  if (error instanceof BillingError) {
    const parts: string[] = [`[${error.code}]`];
    if (error.statusCode) parts.push(`(HTTP ${error.statusCode})`);
    parts.push(error.message);
    return parts.join(" ");
  }

  if (error instanceof Error) return error.message;
  return String(error);
}
