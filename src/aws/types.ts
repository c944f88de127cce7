import type { BillingLogger } from "../types.js";

export type { AwsCredentials } from "../config.js";

export const AWS_COST_METRICS = ["UnblendedCost", "UsageQuantity"] as const;

export type AwsBillingManagerOptions = {
  logger?: BillingLogger;
  /** Cost dimension to group by (default: SERVICE). */
  groupBy?: "SERVICE" | "LINKED_ACCOUNT" | "REGION" | "USAGE_TYPE";
};
