/**
 * Azure Cost Management — Cost Details Report Workflow
 *
 * Requested → Running* → Succeeded | Failed, or TimedOut once the status
 * check budget is spent. A report is requested with a POST, its operation URL
 * is polled, and the finished CSV is streamed from a pre-signed blob link.
 */

import { decodeStream, parseCsvRows, type CsvRow } from "../csv/parser.js";
import { normalizeDate, assertDateRange } from "../dates.js";
import {
  InvalidResponseError,
  ProviderError,
  ReportGenerationError,
  RowParseError,
  TimeoutError,
  ValidationError,
  toBillingError,
} from "../errors.js";
import { openBillingStream, parseJsonBody, sendBillingRequest } from "../http.js";
import { noopLogger } from "../logger.js";
import { createBillingRecord, parseAmount } from "../records.js";
import { captureResult, fail, ok } from "../result.js";
import { parseRetryAfterMs, sleep } from "../retry.js";
import type { BillingLogger, BillingRecord, BillingResult } from "../types.js";
import { parseResponse } from "../validation.js";
import {
  AZURE_COST_DETAILS_API_VERSION,
  AZURE_COST_METRICS,
  AZURE_MANAGEMENT_ENDPOINT,
  CostDetailsOperationSchema,
  type AzureCostMetric,
  type AzurePollOutcome,
  type AzurePollState,
  type AzureReportClientOptions,
} from "./types.js";

const RUNNING_STATUSES = new Set(["inprogress", "queued", "running", "notstarted"]);
const FAILED_STATUSES = new Set(["failed", "nodatafound", "canceled", "cancelled", "timedout"]);

// =============================================================================
// CSV Row Mapping
// =============================================================================

const CONSUMED_COLUMNS = new Set([
  "ProductName",
  "productName",
  "meterCategory",
  "ResourceId",
  "resourceId",
  "quantity",
  "unitOfMeasure",
  "costInBillingCurrency",
  "billingCurrency",
  "billingCurrencyCode",
  "billingPeriodStartDate",
  "billingPeriodEndDate",
]);

const DATE_COLUMNS = new Set(["date", "servicePeriodStartDate", "servicePeriodEndDate", "exchangeRateDate"]);

function firstNonEmpty(values: Record<string, string>, ...columns: string[]): string {
  for (const column of columns) {
    const value = values[column]?.trim();
    if (value) return value;
  }
  return "";
}

function rowPeriod(values: Record<string, string>): string | null {
  const start = normalizeDate(values.billingPeriodStartDate ?? "");
  const end = normalizeDate(values.billingPeriodEndDate ?? "");
  if (start && end) return `${start}/${end}`;
  const day = normalizeDate(values.date ?? "");
  return day ? `${day}/${day}` : null;
}

/**
 * Map one row of a cost details export. Dates are normalized to
 * `YYYY-MM-DD`; columns without a record field go to `extensions`.
 */
export function azureRowToRecord(row: CsvRow): BillingRecord {
  const { values, rowNumber } = row;
  const billingPeriod = rowPeriod(values);
  if (!billingPeriod) {
    throw new RowParseError(`Row ${rowNumber}: no billing period or usage date`, rowNumber, { provider: "azure" });
  }

  const extensions: Record<string, string> = {};
  for (const [column, raw] of Object.entries(values)) {
    const value = raw.trim();
    if (!column || !value || CONSUMED_COLUMNS.has(column)) continue;
    extensions[column] = DATE_COLUMNS.has(column) ? (normalizeDate(value) ?? value) : value;
  }

  try {
    return createBillingRecord({
      provider: "azure",
      productName: firstNonEmpty(values, "ProductName", "productName", "meterCategory"),
      resourceId: firstNonEmpty(values, "ResourceId", "resourceId"),
      billingPeriod,
      usageQuantity: parseAmount(values.quantity),
      usageUnit: firstNonEmpty(values, "unitOfMeasure"),
      pretaxCost: parseAmount(values.costInBillingCurrency),
      currency: firstNonEmpty(values, "billingCurrency", "billingCurrencyCode"),
      extensions,
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RowParseError(`Row ${rowNumber}: ${reason}`, rowNumber, {
      provider: "azure",
      details: values,
      cause: error,
    });
  }
}

// =============================================================================
// Status Classification
// =============================================================================

/** Classify a status-check response. */
export function classifyOperation(status: number, body: unknown, retryAfter: string | null): AzurePollOutcome {
  if (status === 202) {
    return { status: "running", retryAfterMs: parseRetryAfterMs(retryAfter) ?? undefined };
  }

  const operation = parseResponse(CostDetailsOperationSchema, body, "azure", "cost details operation");
  const state = (operation.status ?? "").toLowerCase();

  if (RUNNING_STATUSES.has(state)) {
    return { status: "running", retryAfterMs: parseRetryAfterMs(retryAfter) ?? undefined };
  }
  if (state === "completed") {
    const blobLinks = (operation.manifest?.blobs ?? [])
      .map((blob) => blob.blobLink ?? "")
      .filter((link) => link !== "");
    if (blobLinks.length === 0) {
      return { status: "failed", reason: "Report completed without a download link", details: body };
    }
    return { status: "succeeded", downloadUrl: blobLinks[0], blobLinks };
  }
  if (FAILED_STATUSES.has(state)) {
    const reason = operation.error?.message ?? `Report generation ended with status ${operation.status}`;
    return { status: "failed", reason, details: body };
  }

  throw new InvalidResponseError(`Unrecognized report status: ${operation.status ?? "(none)"}`, {
    provider: "azure",
    statusCode: status,
    details: body,
  });
}

// =============================================================================
// Report Client
// =============================================================================

export class AzureCostReportClient {
  private readonly logger: BillingLogger;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly options: AzureReportClientOptions) {
    this.logger = options.logger ?? noopLogger;
    this.wait = options.sleep ?? sleep;
  }

  /**
   * Ask Cost Management to generate a cost details report for an inclusive
   * date range. Resolves to the operation URL to poll.
   */
  async requestReport(
    billingAccountId: string,
    startDate: string,
    endDate: string,
    metric: AzureCostMetric = "ActualCost",
  ): Promise<BillingResult<string>> {
    return captureResult(async () => {
      if (!billingAccountId.trim()) {
        throw new ValidationError("Billing account ID is required", { provider: "azure" });
      }
      assertDateRange(startDate, endDate, "azure");
      if (!AZURE_COST_METRICS.includes(metric)) {
        throw new ValidationError(`Invalid metric: ${metric}, expected one of ${AZURE_COST_METRICS.join(", ")}`, {
          provider: "azure",
        });
      }

      const token = await this.options.tokenProvider.getAccessToken();
      const endpoint = this.options.endpoint ?? AZURE_MANAGEMENT_ENDPOINT;
      const url =
        `${endpoint}/providers/Microsoft.Billing/billingAccounts/${billingAccountId}` +
        "/providers/Microsoft.CostManagement/generateCostDetailsReport";

      this.logger.info(`Requesting Azure ${metric} report for ${startDate}..${endDate}`);
      const res = await sendBillingRequest(url, {
        provider: "azure",
        method: "POST",
        token,
        query: { "api-version": this.options.apiVersion ?? AZURE_COST_DETAILS_API_VERSION },
        body: { metric, timePeriod: { start: startDate, end: endDate } },
        timeoutMs: this.options.timeoutMs,
      });

      const operationUrl = res.headers.get("location") ?? res.headers.get("azure-asyncoperation");
      if (!operationUrl) {
        throw new ProviderError("Report request was accepted without an operation URL", {
          provider: "azure",
          statusCode: res.status,
          details: res.body,
        });
      }
      return operationUrl;
    }, "azure");
  }

  /** One status check of a report operation. */
  async checkReportOnce(operationUrl: string): Promise<BillingResult<AzurePollOutcome>> {
    return captureResult(() => this.checkStatus(operationUrl), "azure");
  }

  private async checkStatus(operationUrl: string): Promise<AzurePollOutcome> {
    if (!operationUrl.trim()) {
      throw new ValidationError("Operation URL is required", { provider: "azure" });
    }
    const token = await this.options.tokenProvider.getAccessToken();
    const res = await sendBillingRequest(operationUrl, {
      provider: "azure",
      token,
      timeoutMs: this.options.timeoutMs,
    });
    const body = res.status === 202 ? null : parseJsonBody(res, "azure");
    return classifyOperation(res.status, body, res.headers.get("retry-after"));
  }

  /**
   * Check the operation until the report is ready, waiting `intervalSeconds`
   * between checks (or the server's Retry-After, when it sends one). At most
   * `maxRetries` checks are made; there is no wait after the last one.
   */
  async pollUntilReady(
    operationUrl: string,
    maxRetries: number,
    intervalSeconds: number,
  ): Promise<BillingResult<string>> {
    return captureResult(async () => {
      const report = await this.pollReport(operationUrl, maxRetries, intervalSeconds);
      return report.downloadUrl;
    }, "azure");
  }

  /**
   * Same checks as {@link pollUntilReady}, resolving to every blob link of
   * the manifest. Large reports are split across several blobs.
   */
  async pollUntilReadyParts(
    operationUrl: string,
    maxRetries: number,
    intervalSeconds: number,
  ): Promise<BillingResult<string[]>> {
    return captureResult(async () => {
      const report = await this.pollReport(operationUrl, maxRetries, intervalSeconds);
      return report.blobLinks;
    }, "azure");
  }

  private async pollReport(
    operationUrl: string,
    maxRetries: number,
    intervalSeconds: number,
  ): Promise<Extract<AzurePollOutcome, { status: "succeeded" }>> {
    if (!Number.isInteger(maxRetries) || maxRetries < 1) {
      throw new ValidationError(`maxRetries must be a positive integer, got ${maxRetries}`, { provider: "azure" });
    }
    if (!Number.isFinite(intervalSeconds) || intervalSeconds < 0) {
      throw new ValidationError(`intervalSeconds must be a non-negative number, got ${intervalSeconds}`, {
        provider: "azure",
      });
    }

    const state: AzurePollState = { operationUrl, attempts: 0, status: "requested" };

    while (state.attempts < maxRetries) {
      const outcome = await this.checkStatus(operationUrl);
      state.attempts++;
      state.status = outcome.status;
      this.options.onPoll?.({ ...state });

      if (outcome.status === "succeeded") {
        this.logger.info(`Azure report ready after ${state.attempts} status check(s)`);
        return outcome;
      }
      if (outcome.status === "failed") {
        throw new ReportGenerationError(outcome.reason, { provider: "azure", details: outcome.details });
      }

      this.logger.debug(`Azure report still running (check ${state.attempts}/${maxRetries})`);
      if (state.attempts < maxRetries) {
        await this.wait(outcome.retryAfterMs ?? intervalSeconds * 1000);
      }
    }

    state.status = "timed-out";
    this.options.onPoll?.({ ...state });
    throw new TimeoutError(`Azure report was not ready after ${maxRetries} status checks`, state.attempts, {
      provider: "azure",
    });
  }

  /**
   * Stream the report CSV and yield one result per row. A row that cannot be
   * mapped yields a RowParseError and the rest continue; a failed download
   * yields a single error and ends the sequence.
   */
  async *downloadAndParse(downloadUrl: string): AsyncGenerator<BillingResult<BillingRecord>, void, undefined> {
    let stream: ReadableStream<Uint8Array>;
    try {
      if (!downloadUrl.trim()) {
        throw new ValidationError("Download URL is required", { provider: "azure" });
      }
      stream = await openBillingStream(downloadUrl, { provider: "azure", timeoutMs: this.options.timeoutMs });
    } catch (error) {
      yield fail(toBillingError(error, "azure"));
      return;
    }

    const rows = parseCsvRows(decodeStream(stream));
    try {
      while (true) {
        let next: IteratorResult<CsvRow, void>;
        try {
          next = await rows.next();
        } catch (error) {
          yield fail(
            new ProviderError(`Azure report download was interrupted: ${toBillingError(error).message}`, {
              provider: "azure",
              cause: error,
            }),
          );
          return;
        }
        if (next.done) return;

        let result: BillingResult<BillingRecord>;
        try {
          result = ok(azureRowToRecord(next.value));
        } catch (error) {
          result = fail(toBillingError(error, "azure"));
        }
        yield result;
      }
    } finally {
      await rows.return();
    }
  }
}
