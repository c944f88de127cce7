/**
 * Huawei Cloud Billing Manager
 *
 * Resource-level fee records from the BSS API through the official SDK.
 */

import { monthRange, assertBillingCycle, formatPeriod } from "../dates.js";
import { AuthenticationError, BillingError, ProviderError, RateLimitError } from "../errors.js";
import { noopLogger } from "../logger.js";
import { collectNumberedPages, validatePageSize } from "../pagination.js";
import { collectExtensions, recordFromPayload } from "../records.js";
import { captureResult } from "../result.js";
import type { BillingLogger, BillingRecord, BillingResult, PaginatedBillingSource } from "../types.js";
import { parseResponse } from "../validation.js";
import {
  HUAWEI_BSS_ENDPOINT,
  HUAWEI_MAX_PAGE_SIZE,
  ListResourceRecordsResponseSchema,
  type HuaweiBillingManagerOptions,
  type HuaweiCredentials,
  type HuaweiFeeRecord,
} from "./types.js";

type BssClient = {
  listCustomerselfResourceRecords(request: unknown): Promise<unknown>;
};

const CONSUMED_FIELDS = new Set(["cloud_service_type_name", "resource_id", "usage", "amount"]);

function numberField(error: Error, field: string): number | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === "number" ? value : undefined;
}

function stringField(error: Error, field: string): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

/**
 * Map an SDK exception. Service errors carry `httpStatusCode`, `errorCode`
 * and `errorMsg`.
 */
export function mapHuaweiError(error: unknown): BillingError {
  if (error instanceof BillingError) return error;
  if (!(error instanceof Error)) return new ProviderError(String(error), { provider: "huawei" });

  const statusCode = numberField(error, "httpStatusCode") ?? numberField(error, "status");
  const errorCode = stringField(error, "errorCode");
  const message = stringField(error, "errorMsg") ?? error.message;
  const options = { provider: "huawei" as const, statusCode, details: errorCode, cause: error };

  if (statusCode === 401 || statusCode === 403) {
    return new AuthenticationError(`Huawei Cloud rejected the credentials: ${message}`, options);
  }
  if (statusCode === 429) {
    return new RateLimitError(`Huawei Cloud is throttling requests: ${message}`, options);
  }
  return new ProviderError(`Huawei Cloud BSS request failed: ${message}`, options);
}

/**
 * Usage is reported against a numeric measure ID with no unit name; the ID is
 * kept in `extensions.usage_measure_id`.
 */
export function feeRecordToRecord(record: HuaweiFeeRecord, period: string, currency: string): BillingRecord {
  return recordFromPayload(
    {
      provider: "huawei",
      productName: record.cloud_service_type_name ?? record.resource_type_name ?? record.cloud_service_type ?? "",
      resourceId: record.resource_id ?? "",
      billingPeriod: period,
      usageQuantity: record.usage ?? 0,
      pretaxCost: record.amount,
      currency,
      extensions: collectExtensions(record, CONSUMED_FIELDS),
    },
    record,
  );
}

export class HuaweiBillingManager implements PaginatedBillingSource {
  readonly provider = "huawei" as const;
  private client: BssClient | null = null;
  private readonly logger: BillingLogger;

  constructor(
    private readonly credentials: HuaweiCredentials,
    private readonly options: HuaweiBillingManagerOptions = {},
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  private async getClient(): Promise<BssClient> {
    if (this.client) return this.client;
    const core = await import("@huaweicloud/huaweicloud-sdk-core");
    const bss = await import("@huaweicloud/huaweicloud-sdk-bss");
    const credential = new core.GlobalCredentials().withAk(this.credentials.accessKey).withSk(this.credentials.secretKey);
    if (this.credentials.domainId) credential.withDomainId(this.credentials.domainId);
    this.client = bss.BssClient.newBuilder()
      .withCredential(credential)
      .withEndpoint(this.options.endpoint ?? HUAWEI_BSS_ENDPOINT)
      .build();
    return this.client;
  }

  private async listPage(billingCycle: string, offset: number, limit: number): Promise<unknown> {
    const client = await this.getClient();
    const bss = await import("@huaweicloud/huaweicloud-sdk-bss");
    const request = new bss.ListCustomerselfResourceRecordsRequest()
      .withCycle(billingCycle)
      .withOffset(offset)
      .withLimit(limit);
    try {
      return await client.listCustomerselfResourceRecords(request);
    } catch (error) {
      throw mapHuaweiError(error);
    }
  }

  async fetchBilling(billingCycle: string): Promise<BillingResult<BillingRecord[]>> {
    return this.fetchAllPages(billingCycle);
  }

  /** Every fee record of a month, paging by offset until a short page. */
  async fetchAllPages(
    billingCycle: string,
    pageSize: number = HUAWEI_MAX_PAGE_SIZE,
  ): Promise<BillingResult<BillingRecord[]>> {
    return captureResult(async () => {
      assertBillingCycle(billingCycle, "huawei");
      validatePageSize(pageSize, HUAWEI_MAX_PAGE_SIZE, "huawei");

      let currency = "CNY";
      const records = await collectNumberedPages(async (page, limit) => {
        const payload = await this.listPage(billingCycle, (page - 1) * limit, limit);
        const response = parseResponse(ListResourceRecordsResponseSchema, payload, "huawei", "ListCustomerselfResourceRecords");
        if (response.currency) currency = response.currency;
        return { items: response.fee_records ?? [], totalCount: response.total_count };
      }, pageSize);

      this.logger.info(`Fetched ${records.length} Huawei Cloud fee records for ${billingCycle}`);
      const period = formatPeriod(monthRange(billingCycle));
      return records.map((record) => feeRecordToRecord(record, period, currency));
    }, "huawei");
  }
}

export function createHuaweiBillingManager(
  credentials: HuaweiCredentials,
  options?: HuaweiBillingManagerOptions,
): HuaweiBillingManager {
  return new HuaweiBillingManager(credentials, options);
}
