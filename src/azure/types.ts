/**
 * Azure Cost Management — Types
 */

import { Type, type Static } from "@sinclair/typebox";
import type { BillingLogger } from "../types.js";

export type { AzureCredentials } from "../config.js";

export const AZURE_MANAGEMENT_ENDPOINT = "https://management.azure.com";
export const AZURE_MANAGEMENT_SCOPE = "https://management.azure.com/.default";
export const AZURE_COST_DETAILS_API_VERSION = "2023-11-01";

export const AZURE_COST_METRICS = ["ActualCost", "AmortizedCost"] as const;
export type AzureCostMetric = (typeof AZURE_COST_METRICS)[number];

// =============================================================================
// Polling
// =============================================================================

export type AzurePollStatus = "requested" | "running" | "succeeded" | "failed" | "timed-out";

/** Progress of one report operation. Terminal once succeeded, failed or timed-out. */
export type AzurePollState = {
  operationUrl: string;
  attempts: number;
  status: AzurePollStatus;
};

/** Classification of a single status check. */
export type AzurePollOutcome =
  | { status: "running"; retryAfterMs?: number }
  | { status: "succeeded"; downloadUrl: string; blobLinks: string[] }
  | { status: "failed"; reason: string; details?: unknown };

export const CostDetailsOperationSchema = Type.Object({
  status: Type.Optional(Type.String()),
  manifest: Type.Optional(
    Type.Object({
      blobCount: Type.Optional(Type.Integer()),
      blobs: Type.Optional(Type.Array(Type.Object({ blobLink: Type.Optional(Type.String()) }))),
    }),
  ),
  error: Type.Optional(
    Type.Object({
      code: Type.Optional(Type.String()),
      message: Type.Optional(Type.String()),
    }),
  ),
});

export type CostDetailsOperation = Static<typeof CostDetailsOperationSchema>;

// =============================================================================
// Clients
// =============================================================================

/** Supplies ARM bearer tokens; AzureCredentialsManager is the stock implementation. */
export interface AzureTokenProvider {
  getAccessToken(): Promise<string>;
}

export type AzureReportClientOptions = {
  tokenProvider: AzureTokenProvider;
  logger?: BillingLogger;
  /** ARM endpoint (default: management.azure.com). */
  endpoint?: string;
  apiVersion?: string;
  /** Per-request timeout in ms (default: 30000). */
  timeoutMs?: number;
  /** Replaces the timer wait between status checks. */
  sleep?: (ms: number) => Promise<void>;
  /** Called after every status check with a copy of the poll state. */
  onPoll?: (state: Readonly<AzurePollState>) => void;
};

export type AzureBillingManagerOptions = Omit<AzureReportClientOptions, "tokenProvider"> & {
  billingAccountId: string;
  metric?: AzureCostMetric;
  /** Status checks before giving up (default: 60). */
  maxRetries?: number;
  /** Seconds between status checks (default: 10). */
  intervalSeconds?: number;
};
