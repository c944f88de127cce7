/**
 * Azure Billing Manager
 *
 * Month-level billing retrieval on top of the cost details report workflow.
 */

import { monthRange } from "../dates.js";
import { RowParseError } from "../errors.js";
import { noopLogger } from "../logger.js";
import { captureResult, fail, ok } from "../result.js";
import type { AsyncReportBillingSource, BillingLogger, BillingRecord, BillingResult } from "../types.js";
import { AzureCredentialsManager } from "./credentials.js";
import { AzureCostReportClient } from "./report.js";
import type {
  AzureBillingManagerOptions,
  AzureCostMetric,
  AzureCredentials,
  AzurePollOutcome,
  AzureTokenProvider,
} from "./types.js";

export const DEFAULT_MAX_POLLS = 60;
export const DEFAULT_POLL_INTERVAL_SECONDS = 10;

export class AzureBillingManager implements AsyncReportBillingSource<AzureCostMetric> {
  readonly provider = "azure" as const;
  private readonly reports: AzureCostReportClient;
  private readonly logger: BillingLogger;

  constructor(
    tokenProvider: AzureTokenProvider,
    private readonly options: AzureBillingManagerOptions,
  ) {
    this.logger = options.logger ?? noopLogger;
    this.reports = new AzureCostReportClient({ ...options, tokenProvider });
  }

  requestReport(
    billingAccountId: string,
    startDate: string,
    endDate: string,
    metric: AzureCostMetric = this.options.metric ?? "ActualCost",
  ): Promise<BillingResult<string>> {
    return this.reports.requestReport(billingAccountId, startDate, endDate, metric);
  }

  checkReportOnce(operationUrl: string): Promise<BillingResult<AzurePollOutcome>> {
    return this.reports.checkReportOnce(operationUrl);
  }

  pollUntilReady(operationUrl: string, maxRetries: number, intervalSeconds: number): Promise<BillingResult<string>> {
    return this.reports.pollUntilReady(operationUrl, maxRetries, intervalSeconds);
  }

  pollUntilReadyParts(
    operationUrl: string,
    maxRetries: number,
    intervalSeconds: number,
  ): Promise<BillingResult<string[]>> {
    return this.reports.pollUntilReadyParts(operationUrl, maxRetries, intervalSeconds);
  }

  downloadAndParse(downloadUrl: string): AsyncGenerator<BillingResult<BillingRecord>, void, undefined> {
    return this.reports.downloadAndParse(downloadUrl);
  }

  /**
   * Request, await and download the report for a whole month, reading every
   * blob of the manifest in order. Rows that cannot be mapped are logged and
   * skipped; any other failure is returned.
   */
  async fetchBilling(billingCycle: string): Promise<BillingResult<BillingRecord[]>> {
    const range = await captureResult(async () => monthRange(billingCycle), "azure");
    if (!range.success) return range;

    const operation = await this.requestReport(this.options.billingAccountId, range.data.start, range.data.end);
    if (!operation.success) return operation;

    const download = await this.pollUntilReadyParts(
      operation.data,
      this.options.maxRetries ?? DEFAULT_MAX_POLLS,
      this.options.intervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS,
    );
    if (!download.success) return download;

    const records: BillingRecord[] = [];
    let skipped = 0;
    for (const blobLink of download.data) {
      for await (const row of this.downloadAndParse(blobLink)) {
        if (row.success) {
          records.push(row.data);
        } else if (row.error instanceof RowParseError) {
          skipped++;
          this.logger.warn(`Skipping Azure report row: ${row.error.message}`);
        } else {
          return fail(row.error);
        }
      }
    }

    this.logger.info(`Parsed ${records.length} Azure billing rows for ${billingCycle} (${skipped} skipped)`);
    return ok(records);
  }
}

export function createAzureBillingManager(
  credentials: AzureCredentials,
  options: AzureBillingManagerOptions,
): AzureBillingManager {
  return new AzureBillingManager(new AzureCredentialsManager(credentials), options);
}
