/**
 * Alibaba Cloud BSS OpenAPI — Response Schemas & Types
 */

import { Type, type Static } from "@sinclair/typebox";
import type { BillingLogger } from "../types.js";

export type { AlibabaCredentials } from "../config.js";

export const ALIBABA_BSS_ENDPOINT = "https://business.aliyuncs.com";
/** BSS endpoint of the international site, used for regions outside mainland China. */
export const ALIBABA_BSS_INTL_ENDPOINT = "https://business.ap-southeast-1.aliyuncs.com";
export const ALIBABA_BSS_API_VERSION = "2017-12-14";
export const ALIBABA_MAX_PAGE_SIZE = 300;

// =============================================================================
// Line items
// =============================================================================

const NullableString = Type.Optional(Type.Union([Type.String(), Type.Null()]));
const Amount = Type.Union([Type.Number(), Type.String()]);

/** Fields shared by QueryInstanceBill and DescribeInstanceBill items. */
export const AlibabaBillItemSchema = Type.Object({
  ProductName: Type.String(),
  InstanceID: NullableString,
  PretaxAmount: Type.Number({ minimum: 0 }),
  Currency: Type.String(),
  Usage: NullableString,
  UsageUnit: NullableString,
  Tag: NullableString,
  BillingDate: NullableString,
});

export type AlibabaBillItem = Static<typeof AlibabaBillItemSchema>;

export const AlibabaAmortizedItemSchema = Type.Object({
  ProductName: Type.String(),
  InstanceId: NullableString,
  CurrentAmortizationPretaxAmount: Amount,
  Currency: NullableString,
  ConsumePeriod: NullableString,
  AmortizationPeriod: NullableString,
});

export type AlibabaAmortizedItem = Static<typeof AlibabaAmortizedItemSchema>;

// =============================================================================
// Envelopes
// =============================================================================

const Envelope = {
  Code: Type.Optional(Type.String()),
  Message: Type.Optional(Type.String()),
  RequestId: Type.Optional(Type.String()),
  Success: Type.Boolean(),
};

/** QueryInstanceBill: page-number pagination. */
export const QueryInstanceBillResponseSchema = Type.Object({
  ...Envelope,
  Data: Type.Optional(
    Type.Object({
      BillingCycle: Type.Optional(Type.String()),
      TotalCount: Type.Integer({ minimum: 0 }),
      PageNum: Type.Optional(Type.Integer()),
      PageSize: Type.Optional(Type.Integer()),
      Items: Type.Object({ Item: Type.Array(AlibabaBillItemSchema) }),
    }),
  ),
});

/** DescribeInstanceBill: continuation-token pagination. */
export const DescribeInstanceBillResponseSchema = Type.Object({
  ...Envelope,
  Data: Type.Optional(
    Type.Object({
      BillingCycle: Type.Optional(Type.String()),
      NextToken: NullableString,
      MaxResults: Type.Optional(Type.Integer()),
      TotalCount: Type.Optional(Type.Integer()),
      Items: Type.Array(AlibabaBillItemSchema),
    }),
  ),
});

export const AmortizedCostResponseSchema = Type.Object({
  ...Envelope,
  Data: Type.Optional(
    Type.Object({
      NextToken: NullableString,
      TotalCount: Type.Optional(Type.Integer()),
      Items: Type.Array(AlibabaAmortizedItemSchema),
    }),
  ),
});

// =============================================================================
// Client
// =============================================================================

/** The slice of the `@alicloud/pop-core` RPC client this module calls. */
export type AlibabaRpcClient = {
  request(action: string, params: Record<string, string>, options?: { method?: string; timeout?: number }): Promise<unknown>;
};

export type AlibabaBillingManagerOptions = {
  logger?: BillingLogger;
  /** BSS endpoint (default: derived from the credentials' region). */
  endpoint?: string;
  /** Per-request timeout in ms (default: 30000). */
  timeoutMs?: number;
};

export type InstanceBillOptions = {
  /** `YYYY-MM-DD` inside the cycle; switches to daily granularity. */
  billingDate?: string;
  /** Page size, 1..300 (default: 300). */
  maxResults?: number;
};
