import { toBillingError, type BillingError } from "./errors.js";
import type { BillingFailure, BillingProvider, BillingResult, BillingSuccess } from "./types.js";

export function ok<T>(data: T): BillingSuccess<T> {
  return { success: true, data };
}

export function fail<E extends BillingError>(error: E): BillingFailure<E> {
  return { success: false, error };
}

/**
 * Run an async body that throws BillingErrors and fold the outcome into a
 * BillingResult. Anything foreign is wrapped as a ProviderError.
 */
export async function captureResult<T>(
  fn: () => Promise<T>,
  provider?: BillingProvider,
): Promise<BillingResult<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    return fail(toBillingError(error, provider));
  }
}

/** Return the data of a successful result or throw its error. */
export function unwrap<T>(result: BillingResult<T>): T {
  if (!result.success) throw result.error;
  return result.data;
}
