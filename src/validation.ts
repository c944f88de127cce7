/**
 * TypeBox checks for configuration input and provider payloads.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { InvalidResponseError, ValidationError } from "./errors.js";
import type { BillingProvider } from "./types.js";

/** Every violation as `path: message`. */
export function describeSchemaErrors(schema: TSchema, value: unknown): string[] {
  return [...Value.Errors(schema, value)].map((e) => `${e.path || "/"}: ${e.message}`);
}

/**
 * Check caller input against `schema`, throwing a ValidationError that lists
 * every violation by path.
 */
export function assertSchema<T extends TSchema>(
  schema: T,
  value: unknown,
  label: string,
  provider?: BillingProvider,
): Static<T> {
  if (Value.Check(schema, value)) return value;
  const problems = describeSchemaErrors(schema, value);
  throw new ValidationError(`Invalid ${label}: ${problems.join("; ")}`, { provider, details: problems });
}

/**
 * Check a provider payload against `schema`. A mismatch is an
 * InvalidResponseError carrying the raw payload.
 */
export function parseResponse<T extends TSchema>(
  schema: T,
  payload: unknown,
  provider: BillingProvider,
  label: string,
): Static<T> {
  if (Value.Check(schema, payload)) return payload;
  const problems = describeSchemaErrors(schema, payload).slice(0, 5);
  throw new InvalidResponseError(`Invalid ${label} response: ${problems.join("; ")}`, {
    provider,
    details: payload,
  });
}
