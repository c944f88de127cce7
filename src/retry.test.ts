import { describe, expect, it, vi } from "vitest";
import { AuthenticationError, InvalidResponseError, ProviderError, RateLimitError, ValidationError } from "./errors.js";
import { fail, ok } from "./result.js";
import {
  BILLING_RETRY_DEFAULTS,
  computeBackoffDelay,
  formatErrorMessage,
  parseRetryAfterMs,
  resolveRetryConfig,
  retryBillingResult,
  shouldRetryBillingError,
} from "./retry.js";
import type { BillingResult } from "./types.js";

describe("shouldRetryBillingError", () => {
  it("retries throttling and server errors only", () => {
    expect(shouldRetryBillingError(new RateLimitError("slow"))).toBe(true);
    expect(shouldRetryBillingError(new ProviderError("down", { statusCode: 503 }))).toBe(true);
    expect(shouldRetryBillingError(new ProviderError("missing", { statusCode: 404 }))).toBe(false);
    expect(shouldRetryBillingError(new ProviderError("no status"))).toBe(false);
    expect(shouldRetryBillingError(new InvalidResponseError("shape", { statusCode: 500 }))).toBe(false);
    expect(shouldRetryBillingError(new AuthenticationError("denied", { statusCode: 401 }))).toBe(false);
    expect(shouldRetryBillingError(new ValidationError("bad"))).toBe(false);
  });
});

describe("parseRetryAfterMs", () => {
  it("reads seconds and HTTP dates", () => {
    expect(parseRetryAfterMs("3")).toBe(3000);
    expect(parseRetryAfterMs("0")).toBe(0);
    const now = Date.parse("Wed, 21 Oct 2015 07:28:00 GMT");
    expect(parseRetryAfterMs("Wed, 21 Oct 2015 07:28:10 GMT", now)).toBe(10_000);
    expect(parseRetryAfterMs("Wed, 21 Oct 2015 07:27:00 GMT", now)).toBe(0);
  });

  it("returns null for missing or unreadable values", () => {
    expect(parseRetryAfterMs(null)).toBeNull();
    expect(parseRetryAfterMs("")).toBeNull();
    expect(parseRetryAfterMs("soon")).toBeNull();
  });
});

describe("computeBackoffDelay", () => {
  const config = resolveRetryConfig({ minDelayMs: 100, maxDelayMs: 1000, jitterFactor: 0.2 });

  it("doubles per attempt and caps at the maximum", () => {
    expect(computeBackoffDelay(1, config, () => 0.5)).toBe(100);
    expect(computeBackoffDelay(3, config, () => 0.5)).toBe(400);
    expect(computeBackoffDelay(10, config, () => 0.5)).toBe(1000);
  });

  it("applies jitter without going below the minimum", () => {
    expect(computeBackoffDelay(3, config, () => 1)).toBe(480);
    expect(computeBackoffDelay(1, config, () => 0)).toBe(100);
  });

  it("fills unset options from the defaults", () => {
    expect(resolveRetryConfig()).toEqual(BILLING_RETRY_DEFAULTS);
  });
});

describe("retryBillingResult", () => {
  it("honors Retry-After and returns the eventual success", async () => {
    const fn = vi
      .fn<() => Promise<BillingResult<string>>>()
      .mockResolvedValueOnce(fail(new RateLimitError("throttled", { retryAfterMs: 2000 })))
      .mockResolvedValueOnce(ok("done"));
    const sleep = vi.fn(async () => {});
    const onRetry = vi.fn();

    const result = await retryBillingResult(fn, { maxAttempts: 3 }, { sleep, onRetry });

    expect(result).toEqual({ success: true, data: "done" });
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(RateLimitError), 2000);
  });

  it("caps Retry-After at the maximum delay", async () => {
    const fn = vi
      .fn<() => Promise<BillingResult<string>>>()
      .mockResolvedValueOnce(fail(new RateLimitError("throttled", { retryAfterMs: 90_000 })))
      .mockResolvedValueOnce(ok("done"));
    const sleep = vi.fn(async () => {});

    await retryBillingResult(fn, { maxAttempts: 2, maxDelayMs: 5000 }, { sleep });

    expect(sleep).toHaveBeenCalledWith(5000);
  });

  it("stops at the attempt budget with the last failure", async () => {
    const error = new ProviderError("bad gateway", { statusCode: 502 });
    const fn = vi.fn(async (): Promise<BillingResult<string>> => fail(error));
    const sleep = vi.fn(async () => {});

    const result = await retryBillingResult(fn, { maxAttempts: 3 }, { sleep });

    expect(result).toEqual({ success: false, error });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("does not retry permanent failures", async () => {
    const fn = vi.fn(async (): Promise<BillingResult<string>> => fail(new AuthenticationError("denied")));
    const sleep = vi.fn(async () => {});

    await retryBillingResult(fn, { maxAttempts: 5 }, { sleep });

    expect(fn).toHaveBeenCalledOnce();
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe("formatErrorMessage", () => {
  it("formats billing errors with code and status", () => {
    expect(formatErrorMessage(new ProviderError("upstream failed", { statusCode: 502 }))).toBe(
      "[PROVIDER_ERROR] (HTTP 502) upstream failed",
    );
    expect(formatErrorMessage(new ValidationError("bad month"))).toBe("[VALIDATION_ERROR] bad month");
  });

  it("formats anything else", () => {
    expect(formatErrorMessage(new Error("plain"))).toBe("plain");
    expect(formatErrorMessage("text")).toBe("text");
    expect(formatErrorMessage(undefined)).toBe("Unknown error");
    expect(formatErrorMessage(7)).toBe("7");
  });
});
