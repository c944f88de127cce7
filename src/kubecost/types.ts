/**
 * Kubecost — Allocation Types
 */

import { Type, type Static } from "@sinclair/typebox";
import type { BillingLogger } from "../types.js";

export type KubecostCloudProvider = "alibaba" | "azure" | "aws" | "gcp" | "unknown";

/** Cost and resource allocation of one workload slice over one window. */
export type KubecostAllocation = {
  clusterId: string;
  clusterName: string;
  namespace: string;
  workloadName: string | null;
  workloadType: string | null;
  containerName: string | null;

  /** Requested window, `YYYY-MM-DDTHH:MM:SSZ`. */
  startDate: string;
  endDate: string;
  /** Window Kubecost actually reported for this allocation. */
  windowStart: string;
  windowEnd: string;

  cpuCoresAllocated: number | null;
  cpuCoresUsed: number | null;
  memoryGbAllocated: number | null;
  memoryGbUsed: number | null;
  storageGbAllocated: number | null;

  totalCost: number;
  cpuCost: number | null;
  memoryCost: number | null;
  storageCost: number | null;
  /** Network plus load balancer cost. */
  networkCost: number | null;

  labels: Record<string, string>;
  annotations: Record<string, string>;
  cloudProvider: KubecostCloudProvider;
  region: string | null;
};

export type AllocationQueryOptions = {
  /** Resolution of each allocation set (default: 1d). */
  step?: string;
  /** Aggregation dimensions (default: cluster, namespace). */
  aggregate?: string[];
  /** Collapse the window into a single set (default: false). */
  accumulate?: boolean;
  filter?: string;
};

export type KubecostCostSummary = {
  cpuCost: number;
  memoryCost: number;
  storageCost: number;
  networkCost: number;
  totalCost: number;
};

export type NamespaceCost = KubecostCostSummary & {
  namespace: string;
  cpuHours: number;
  memoryGbHours: number;
};

export type WorkloadCost = KubecostCostSummary & {
  pod: string;
  namespace: string;
  controllerKind: string;
};

/** One cluster-level allocation with the node's instance type. */
export type ResourceCost = KubecostCostSummary & {
  name: string;
  instanceType: string;
  nodeType: string;
};

/** Month costs split by the Alibaba Cloud service behind each node. */
export type AlibabaResourceCosts = {
  ecsCost: number;
  rdsCost: number;
  slbCost: number;
  totalCost: number;
  resources: ResourceCost[];
};

export type KubecostManagerOptions = {
  baseUrl: string;
  /** Scope every query to this cluster. */
  clusterName?: string;
  /** Extra headers sent with every request (auth proxies and the like). */
  headers?: Record<string, string>;
  /** Per-request timeout in ms (default: 30000). */
  timeoutMs?: number;
  /** Currency of Kubecost's cost figures (default: USD). */
  currency?: string;
  logger?: BillingLogger;
};

// =============================================================================
// Response schemas
// =============================================================================

const OptionalNumber = Type.Optional(Type.Union([Type.Number(), Type.Null()]));
const OptionalString = Type.Optional(Type.Union([Type.String(), Type.Null()]));
const StringMap = Type.Optional(Type.Union([Type.Record(Type.String(), Type.String()), Type.Null()]));

export const AllocationValueSchema = Type.Object({
  name: OptionalString,
  minutes: OptionalNumber,
  cpuCoreHours: OptionalNumber,
  cpuCoreUsageAverage: OptionalNumber,
  ramByteHours: OptionalNumber,
  ramByteUsageAverage: OptionalNumber,
  pvByteHours: OptionalNumber,
  totalCost: OptionalNumber,
  cpuCost: OptionalNumber,
  ramCost: OptionalNumber,
  pvCost: OptionalNumber,
  networkCost: OptionalNumber,
  loadBalancerCost: OptionalNumber,
  properties: Type.Optional(
    Type.Union([
      Type.Object({
        cluster: OptionalString,
        namespace: OptionalString,
        container: OptionalString,
        controller: OptionalString,
        controllerKind: OptionalString,
        pod: OptionalString,
        instanceType: OptionalString,
        nodeType: OptionalString,
        labels: StringMap,
        annotations: StringMap,
      }),
      Type.Null(),
    ]),
  ),
  window: Type.Optional(Type.Object({ start: OptionalString, end: OptionalString })),
});

export type AllocationValue = Static<typeof AllocationValueSchema>;

export const AllocationResponseSchema = Type.Object({
  code: Type.Optional(Type.Number()),
  message: Type.Optional(Type.String()),
  data: Type.Array(Type.Unknown()),
});
