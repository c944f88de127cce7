/**
 * Cloud Billing — Shared Types
 *
 * Core type definitions used across all provider modules.
 */

import type { BillingError } from "./errors.js";

// =============================================================================
// Providers
// =============================================================================

export type BillingProvider = "alibaba" | "azure" | "aws" | "huawei" | "kubecost";

export const BILLING_PROVIDERS: readonly BillingProvider[] = ["alibaba", "azure", "aws", "huawei", "kubecost"];

// =============================================================================
// Records
// =============================================================================

/**
 * One line item of cost or usage.
 *
 * `billingPeriod` is `YYYY-MM` for Alibaba Cloud and an inclusive
 * `YYYY-MM-DD/YYYY-MM-DD` range for every other provider.
 */
export type BillingRecord = Readonly<{
  provider: BillingProvider;
  productName: string;
  resourceId: string;
  billingPeriod: string;
  usageQuantity: number;
  usageUnit: string;
  pretaxCost: number;
  currency: string;
  /** Provider-specific fields that have no slot of their own. */
  extensions: Readonly<Record<string, string>>;
}>;

// =============================================================================
// Results
// =============================================================================

export type BillingSuccess<T> = { success: true; data: T };
export type BillingFailure<E extends BillingError = BillingError> = { success: false; error: E };

export type BillingResult<T, E extends BillingError = BillingError> = BillingSuccess<T> | BillingFailure<E>;

// =============================================================================
// Logging
// =============================================================================

export type BillingLogger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

// =============================================================================
// Retry
// =============================================================================

export type BillingRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

// =============================================================================
// Sources
// =============================================================================

/** Basic capability: every provider can produce a month of records. */
export interface BillingSource {
  readonly provider: BillingProvider;
  fetchBilling(billingCycle: string): Promise<BillingResult<BillingRecord[]>>;
}

/** Providers whose API hands out fixed-size pages. */
export interface PaginatedBillingSource extends BillingSource {
  fetchAllPages(billingCycle: string, pageSize?: number): Promise<BillingResult<BillingRecord[]>>;
}

/** Providers that generate a report asynchronously and expose it for download. */
export interface AsyncReportBillingSource<TMetric extends string = string> extends BillingSource {
  requestReport(
    billingAccountId: string,
    startDate: string,
    endDate: string,
    metric: TMetric,
  ): Promise<BillingResult<string>>;
  pollUntilReady(operationUrl: string, maxRetries: number, intervalSeconds: number): Promise<BillingResult<string>>;
  downloadAndParse(downloadUrl: string): AsyncGenerator<BillingResult<BillingRecord>, void, undefined>;
}
