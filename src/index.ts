/**
 * Multi-cloud billing retrieval: provider clients, shared record model and
 * CSV export.
 */

export * from "./types.js";
export * from "./errors.js";
export { captureResult, fail, ok, unwrap } from "./result.js";
export {
  assertBillingCycle,
  assertDateRange,
  formatPeriod,
  isBillingCycle,
  monthRange,
  nextMonthStart,
  normalizeDate,
  previousBillingCycle,
  type DateRange,
} from "./dates.js";
export { collectExtensions, createBillingRecord, parseAmount, type BillingRecordInput } from "./records.js";
export {
  computeBackoffDelay,
  formatErrorMessage,
  parseRetryAfterMs,
  retryBillingResult,
  shouldRetryBillingError,
  type RetryHooks,
} from "./retry.js";
export { createConsoleLogger, noopLogger, theme } from "./logger.js";
export { createPollProgress, createReportPollProgress, formatPollLine, type PollProgress } from "./progress.js";
export * from "./config.js";
export { collectNumberedPages, collectTokenPages, hasMoreData, validatePageSize } from "./pagination.js";
export * from "./csv/index.js";
export * from "./alibaba/index.js";
export * from "./azure/index.js";
export * from "./aws/index.js";
export * from "./huawei/index.js";
export * from "./kubecost/index.js";
export { registerBillingCli, type BillingCliContext, type BillingSourceFactories } from "./register-cli.js";
