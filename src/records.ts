/**
 * BillingRecord construction.
 *
 * Records are frozen on creation; cost and quantity must be finite and
 * non-negative.
 */

import { InvalidResponseError, ValidationError } from "./errors.js";
import type { BillingProvider, BillingRecord } from "./types.js";

export type BillingRecordInput = {
  provider: BillingProvider;
  productName: string;
  resourceId?: string;
  billingPeriod: string;
  usageQuantity?: number;
  usageUnit?: string;
  pretaxCost: number;
  currency: string;
  extensions?: Record<string, string>;
};

function assertAmount(value: number, field: string, provider: BillingProvider): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative number, got ${value}`, { provider });
  }
}

export function createBillingRecord(input: BillingRecordInput): BillingRecord {
  const usageQuantity = input.usageQuantity ?? 0;
  assertAmount(input.pretaxCost, "pretaxCost", input.provider);
  assertAmount(usageQuantity, "usageQuantity", input.provider);

  return Object.freeze({
    provider: input.provider,
    productName: input.productName,
    resourceId: input.resourceId ?? "",
    billingPeriod: input.billingPeriod,
    usageQuantity,
    usageUnit: input.usageUnit ?? "",
    pretaxCost: input.pretaxCost,
    currency: input.currency,
    extensions: Object.freeze({ ...input.extensions }),
  });
}

/**
 * Parse a numeric field as providers send it: number, numeric string, or
 * blank. Blank and missing become 0; anything unparseable becomes NaN so the
 * record check rejects it.
 */
export function parseAmount(value: string | number | null | undefined): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === "number") return value;
  const trimmed = value.trim();
  if (trimmed === "") return 0;
  return Number(trimmed);
}

/** Stringify the leftover fields of a provider payload for `extensions`. */
export function collectExtensions(
  source: Record<string, unknown>,
  consumed: ReadonlySet<string>,
): Record<string, string> {
  const extensions: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (consumed.has(key) || value === null || value === undefined) continue;
    extensions[key] = typeof value === "object" ? JSON.stringify(value) : String(value);
  }
  return extensions;
}

/**
 * Build a record from a provider payload. A payload whose amounts fail the
 * record checks is reported as a malformed response carrying the payload.
 */
export function recordFromPayload(input: BillingRecordInput, payload: unknown): BillingRecord {
  try {
    return createBillingRecord(input);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    throw new InvalidResponseError(`${input.provider} returned an unusable line item: ${error.message}`, {
      provider: input.provider,
      details: payload,
      cause: error,
    });
  }
}
