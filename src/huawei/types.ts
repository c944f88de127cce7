/**
 * Huawei Cloud BSS — Response Schemas & Types
 */

import { Type, type Static } from "@sinclair/typebox";
import type { BillingLogger } from "../types.js";

export type { HuaweiCredentials } from "../config.js";

export const HUAWEI_BSS_ENDPOINT = "https://bss.myhuaweicloud.com";
export const HUAWEI_MAX_PAGE_SIZE = 1000;

const OptionalString = Type.Optional(Type.Union([Type.String(), Type.Null()]));

/** One ResFeeRecordV2 entry of ListCustomerselfResourceRecords. */
export const HuaweiFeeRecordSchema = Type.Object({
  bill_date: OptionalString,
  cloud_service_type: OptionalString,
  cloud_service_type_name: OptionalString,
  resource_type_name: OptionalString,
  resource_id: OptionalString,
  resource_name: OptionalString,
  region: OptionalString,
  usage: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
  usage_measure_id: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
  amount: Type.Number({ minimum: 0 }),
});

export type HuaweiFeeRecord = Static<typeof HuaweiFeeRecordSchema>;

export const ListResourceRecordsResponseSchema = Type.Object({
  fee_records: Type.Optional(Type.Array(HuaweiFeeRecordSchema)),
  total_count: Type.Optional(Type.Integer({ minimum: 0 })),
  currency: Type.Optional(Type.String()),
});

export type HuaweiBillingManagerOptions = {
  logger?: BillingLogger;
  /** BSS endpoint (default: bss.myhuaweicloud.com). */
  endpoint?: string;
};
