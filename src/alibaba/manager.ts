/**
 * Alibaba Cloud Billing Manager
 *
 * Instance bills and amortized costs from the BSS OpenAPI through the
 * `@alicloud/pop-core` RPC client, which signs each request.
 */

import {
  AuthenticationError,
  BillingError,
  InvalidResponseError,
  ProviderError,
  RateLimitError,
  ValidationError,
} from "../errors.js";
import { assertBillingCycle, assertIsoDate } from "../dates.js";
import { noopLogger } from "../logger.js";
import { collectNumberedPages, collectTokenPages, validatePageSize } from "../pagination.js";
import { collectExtensions, parseAmount, recordFromPayload } from "../records.js";
import { captureResult } from "../result.js";
import type { BillingLogger, BillingRecord, BillingResult, PaginatedBillingSource } from "../types.js";
import { parseResponse } from "../validation.js";
import {
  ALIBABA_BSS_API_VERSION,
  ALIBABA_BSS_ENDPOINT,
  ALIBABA_BSS_INTL_ENDPOINT,
  ALIBABA_MAX_PAGE_SIZE,
  AmortizedCostResponseSchema,
  DescribeInstanceBillResponseSchema,
  QueryInstanceBillResponseSchema,
  type AlibabaAmortizedItem,
  type AlibabaBillItem,
  type AlibabaBillingManagerOptions,
  type AlibabaCredentials,
  type AlibabaRpcClient,
  type InstanceBillOptions,
} from "./types.js";

const AUTH_ERROR_CODE = /^(InvalidAccessKeyId|InvalidAccessKeySecret|SignatureDoesNotMatch|Forbidden|NoPermission)/;

const BILL_ITEM_FIELDS = new Set(["ProductName", "InstanceID", "PretaxAmount", "Currency", "Usage", "UsageUnit"]);
const AMORTIZED_ITEM_FIELDS = new Set(["ProductName", "InstanceId", "CurrentAmortizationPretaxAmount", "Currency"]);

// =============================================================================
// Error Mapping
// =============================================================================

/**
 * Map a pop-core rejection onto the error taxonomy. pop-core raises an Error
 * whose `code` is the API error code (e.g. `Throttling.User`).
 */
export function mapAlibabaError(error: unknown, action: string): BillingError {
  if (error instanceof BillingError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;
  const statusCode =
    error instanceof Error && "statusCode" in error && typeof error.statusCode === "number"
      ? error.statusCode
      : undefined;
  const options = { provider: "alibaba" as const, statusCode, details: code, cause: error };

  if (code && AUTH_ERROR_CODE.test(code)) {
    return new AuthenticationError(`Alibaba Cloud rejected the credentials: ${message}`, options);
  }
  if (code?.startsWith("Throttling")) {
    return new RateLimitError(`Alibaba Cloud is throttling ${action}: ${message}`, options);
  }
  return new ProviderError(`Alibaba Cloud ${action} failed: ${message}`, options);
}

/** Mainland China regions bill through the China site; every other region through the international one. */
export function bssEndpointForRegion(regionId: string): string {
  return regionId.startsWith("cn-") ? ALIBABA_BSS_ENDPOINT : ALIBABA_BSS_INTL_ENDPOINT;
}

function assertSuccess(response: { Success: boolean; Code?: string; Message?: string }, action: string): void {
  if (response.Success) return;
  throw new ProviderError(`Alibaba Cloud ${action} failed: ${response.Message ?? "unknown error"}`, {
    provider: "alibaba",
    details: response.Code,
  });
}

// =============================================================================
// Record Mapping
// =============================================================================

export function billItemToRecord(item: AlibabaBillItem, billingCycle: string): BillingRecord {
  return recordFromPayload(
    {
      provider: "alibaba",
      productName: item.ProductName,
      resourceId: item.InstanceID ?? "",
      billingPeriod: billingCycle,
      usageQuantity: parseAmount(item.Usage),
      usageUnit: item.UsageUnit ?? "",
      pretaxCost: item.PretaxAmount,
      currency: item.Currency,
      extensions: collectExtensions(item, BILL_ITEM_FIELDS),
    },
    item,
  );
}

export function amortizedItemToRecord(item: AlibabaAmortizedItem, billingCycle: string): BillingRecord {
  return recordFromPayload(
    {
      provider: "alibaba",
      productName: item.ProductName,
      resourceId: item.InstanceId ?? "",
      billingPeriod: billingCycle,
      pretaxCost: parseAmount(item.CurrentAmortizationPretaxAmount),
      currency: item.Currency || "CNY",
      extensions: collectExtensions(item, AMORTIZED_ITEM_FIELDS),
    },
    item,
  );
}

// =============================================================================
// Manager
// =============================================================================

export class AlibabaBillingManager implements PaginatedBillingSource {
  readonly provider = "alibaba" as const;
  private client: AlibabaRpcClient | null = null;
  private readonly logger: BillingLogger;

  constructor(
    private readonly credentials: AlibabaCredentials,
    private readonly options: AlibabaBillingManagerOptions = {},
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  private async getClient(): Promise<AlibabaRpcClient> {
    if (this.client) return this.client;
    const { default: RPCClient } = await import("@alicloud/pop-core");
    this.client = new RPCClient({
      accessKeyId: this.credentials.accessKeyId,
      accessKeySecret: this.credentials.accessKeySecret,
      endpoint: this.options.endpoint ?? bssEndpointForRegion(this.credentials.regionId),
      apiVersion: ALIBABA_BSS_API_VERSION,
    });
    return this.client;
  }

  private async call(action: string, params: Record<string, string>): Promise<unknown> {
    const client = await this.getClient();
    this.logger.debug(`Alibaba Cloud ${action} ${JSON.stringify(params)}`);
    try {
      return await client.request(action, params, { method: "POST", timeout: this.options.timeoutMs ?? 30_000 });
    } catch (error) {
      throw mapAlibabaError(error, action);
    }
  }

  async fetchBilling(billingCycle: string): Promise<BillingResult<BillingRecord[]>> {
    return this.fetchAllPages(billingCycle);
  }

  /**
   * Every QueryInstanceBill item of a month, in provider order. Pages are
   * requested until one comes back short or the total count is zero.
   */
  async fetchAllPages(
    billingCycle: string,
    pageSize: number = ALIBABA_MAX_PAGE_SIZE,
  ): Promise<BillingResult<BillingRecord[]>> {
    return captureResult(async () => {
      assertBillingCycle(billingCycle, "alibaba");
      validatePageSize(pageSize, ALIBABA_MAX_PAGE_SIZE, "alibaba");

      const items = await collectNumberedPages(
        async (page, size) => {
          const payload = await this.call("QueryInstanceBill", {
            BillingCycle: billingCycle,
            PageNum: String(page),
            PageSize: String(size),
          });
          const response = parseResponse(QueryInstanceBillResponseSchema, payload, "alibaba", "QueryInstanceBill");
          assertSuccess(response, "QueryInstanceBill");
          if (!response.Data) {
            throw new InvalidResponseError("QueryInstanceBill returned no Data", { provider: "alibaba", details: payload });
          }
          return { items: response.Data.Items.Item, totalCount: response.Data.TotalCount };
        },
        pageSize,
        (page, count) => this.logger.debug(`QueryInstanceBill page ${page}: ${count} items`),
      );

      this.logger.info(`Fetched ${items.length} Alibaba Cloud bill items for ${billingCycle}`);
      return items.map((item) => billItemToRecord(item, billingCycle));
    }, "alibaba");
  }

  /** DescribeInstanceBill, optionally narrowed to a single day. */
  async fetchInstanceBill(
    billingCycle: string,
    options: InstanceBillOptions = {},
  ): Promise<BillingResult<BillingRecord[]>> {
    return captureResult(async () => {
      assertBillingCycle(billingCycle, "alibaba");
      const maxResults = options.maxResults ?? ALIBABA_MAX_PAGE_SIZE;
      validatePageSize(maxResults, ALIBABA_MAX_PAGE_SIZE, "alibaba");
      if (options.billingDate !== undefined) {
        assertIsoDate(options.billingDate, "billing date", "alibaba");
        if (!options.billingDate.startsWith(`${billingCycle}-`)) {
          throw new ValidationError(`Billing date ${options.billingDate} is outside billing cycle ${billingCycle}`, {
            provider: "alibaba",
          });
        }
      }

      const items = await collectTokenPages(async (nextToken) => {
        const params: Record<string, string> = { BillingCycle: billingCycle, MaxResults: String(maxResults) };
        if (options.billingDate) {
          params.BillingDate = options.billingDate;
          params.Granularity = "DAILY";
        }
        if (nextToken) params.NextToken = nextToken;

        const payload = await this.call("DescribeInstanceBill", params);
        const response = parseResponse(DescribeInstanceBillResponseSchema, payload, "alibaba", "DescribeInstanceBill");
        assertSuccess(response, "DescribeInstanceBill");
        if (!response.Data) {
          throw new InvalidResponseError("DescribeInstanceBill returned no Data", { provider: "alibaba", details: payload });
        }
        return { items: response.Data.Items, nextToken: response.Data.NextToken };
      }, "alibaba");

      this.logger.info(`Fetched ${items.length} Alibaba Cloud instance bill items for ${billingCycle}`);
      return items.map((item) => billItemToRecord(item, billingCycle));
    }, "alibaba");
  }

  /** Amortized cost of prepaid instances, by amortization period. */
  async fetchAmortizedCost(billingCycle: string): Promise<BillingResult<BillingRecord[]>> {
    const action = "DescribeInstanceAmortizedCostByAmortizationPeriod";
    return captureResult(async () => {
      assertBillingCycle(billingCycle, "alibaba");

      const items = await collectTokenPages(async (nextToken) => {
        const params: Record<string, string> = {
          BillingCycle: billingCycle,
          MaxResults: String(ALIBABA_MAX_PAGE_SIZE),
        };
        if (nextToken) params.NextToken = nextToken;

        const payload = await this.call(action, params);
        const response = parseResponse(AmortizedCostResponseSchema, payload, "alibaba", action);
        assertSuccess(response, action);
        if (!response.Data) {
          throw new InvalidResponseError(`${action} returned no Data`, { provider: "alibaba", details: payload });
        }
        return { items: response.Data.Items, nextToken: response.Data.NextToken };
      }, "alibaba");

      return items.map((item) => amortizedItemToRecord(item, billingCycle));
    }, "alibaba");
  }
}

export function createAlibabaBillingManager(
  credentials: AlibabaCredentials,
  options?: AlibabaBillingManagerOptions,
): AlibabaBillingManager {
  return new AlibabaBillingManager(credentials, options);
}
