/**
 * Cloud Billing — Error Taxonomy
 *
 * Every failure surfaced by a client is a BillingError subclass, carried in the
 * `error` slot of a failed BillingResult.
 */

import type { BillingProvider } from "./types.js";

export type BillingErrorCode =
  | "VALIDATION_ERROR"
  | "AUTHENTICATION_ERROR"
  | "PROVIDER_ERROR"
  | "INVALID_RESPONSE"
  | "RATE_LIMITED"
  | "REPORT_GENERATION_FAILED"
  | "TIMEOUT"
  | "ROW_PARSE_ERROR";

export type BillingErrorOptions = {
  provider?: BillingProvider;
  statusCode?: number;
  /** Raw provider payload or SDK error code, kept for diagnosis. */
  details?: unknown;
  cause?: unknown;
};

export class BillingError extends Error {
  readonly code: BillingErrorCode;
  readonly provider?: BillingProvider;
  readonly statusCode?: number;
  readonly details?: unknown;

  constructor(code: BillingErrorCode, message: string, options: BillingErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.provider = options.provider;
    this.statusCode = options.statusCode;
    this.details = options.details;
  }
}

/** Malformed input. Never retried. */
export class ValidationError extends BillingError {
  constructor(message: string, options?: BillingErrorOptions) {
    super("VALIDATION_ERROR", message, options);
  }
}

/** Credentials were rejected. Never retried. */
export class AuthenticationError extends BillingError {
  constructor(message: string, options?: BillingErrorOptions) {
    super("AUTHENTICATION_ERROR", message, options);
  }
}

/** Non-success response with no more specific meaning. */
export class ProviderError extends BillingError {
  constructor(message: string, options?: BillingErrorOptions, code: BillingErrorCode = "PROVIDER_ERROR") {
    super(code, message, options);
  }
}

/** The provider answered, but not in the documented shape. */
export class InvalidResponseError extends ProviderError {
  constructor(message: string, options?: BillingErrorOptions) {
    super(message, options, "INVALID_RESPONSE");
  }
}

/** The provider is throttling; backing off is up to the caller. */
export class RateLimitError extends BillingError {
  readonly retryAfterMs?: number;

  constructor(message: string, options: BillingErrorOptions & { retryAfterMs?: number } = {}) {
    super("RATE_LIMITED", message, options);
    this.retryAfterMs = options.retryAfterMs;
  }
}

/** An asynchronous report job reached a terminal failure state. */
export class ReportGenerationError extends BillingError {
  constructor(message: string, options?: BillingErrorOptions) {
    super("REPORT_GENERATION_FAILED", message, options);
  }
}

/**
 * A pending operation outlived its retry budget. Unlike ReportGenerationError
 * the job may still finish; polling again with a larger budget can succeed.
 */
export class TimeoutError extends BillingError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: BillingErrorOptions) {
    super("TIMEOUT", message, options);
    this.attempts = attempts;
  }
}

/** A single CSV row could not be mapped. Scoped to that row only. */
export class RowParseError extends BillingError {
  readonly rowNumber: number;

  constructor(message: string, rowNumber: number, options?: BillingErrorOptions) {
    super("ROW_PARSE_ERROR", message, options);
    this.rowNumber = rowNumber;
  }
}

export function isBillingError(error: unknown): error is BillingError {
  return error instanceof BillingError;
}

/** Wrap anything thrown into a BillingError, preserving existing ones. */
export function toBillingError(error: unknown, provider?: BillingProvider): BillingError {
  if (error instanceof BillingError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(message, { provider, cause: error });
}
