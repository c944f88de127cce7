/**
 * Kubecost Allocation Manager
 *
 * Reads cost allocations from the Kubecost `/model/allocation` API and rolls
 * them up into cluster, namespace and workload summaries.
 */

import { Value } from "@sinclair/typebox/value";
import { assertBillingCycle, formatPeriod, monthRange, nextMonthStart } from "../dates.js";
import { InvalidResponseError, ProviderError, ValidationError, toBillingError } from "../errors.js";
import { DEFAULT_TIMEOUT_MS, parseJsonBody, sendBillingRequest } from "../http.js";
import { noopLogger } from "../logger.js";
import { recordFromPayload } from "../records.js";
import { captureResult, fail, ok } from "../result.js";
import type { BillingLogger, BillingRecord, BillingResult, BillingSource } from "../types.js";
import { describeSchemaErrors, parseResponse } from "../validation.js";
import {
  AllocationResponseSchema,
  AllocationValueSchema,
  type AlibabaResourceCosts,
  type AllocationQueryOptions,
  type AllocationValue,
  type KubecostAllocation,
  type KubecostCloudProvider,
  type KubecostCostSummary,
  type KubecostManagerOptions,
  type NamespaceCost,
  type ResourceCost,
  type WorkloadCost,
} from "./types.js";

const GIB = 1024 ** 3;
const MINUTES_PER_DAY = 1440;

const REGION_LABELS = [
  "topology.kubernetes.io/region",
  "failure-domain.beta.kubernetes.io/region",
  "kubernetes.io/region",
];

const LABEL_PROVIDER_HINTS: ReadonlyArray<[KubecostCloudProvider, string[]]> = [
  ["alibaba", ["alibaba", "aliyun"]],
  ["azure", ["azure", "microsoft"]],
  ["aws", ["aws", "amazon"]],
  ["gcp", ["gcp", "google"]],
];

const CLUSTER_PROVIDER_HINTS: ReadonlyArray<[KubecostCloudProvider, string[]]> = [
  ["alibaba", ["alibaba", "aliyun"]],
  ["azure", ["azure", "aks"]],
  ["aws", ["aws", "eks"]],
  ["gcp", ["gcp", "gke"]],
];

type AllocationSet = Record<string, unknown>;

const ALIBABA_SERVICES: ReadonlyArray<["ecsCost" | "rdsCost" | "slbCost", string]> = [
  ["ecsCost", "ecs"],
  ["rdsCost", "rds"],
  ["slbCost", "slb"],
];

// =============================================================================
// Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `YYYY-MM-DDTHH:MM:SSZ`, the window format Kubecost accepts. */
export function formatKubecostTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function normalizeWindowTime(value: string | null | undefined, fallback: string): string {
  if (!value) return fallback;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? fallback : formatKubecostTime(new Date(parsed));
}

function positiveOrNull(value: number): number | null {
  return Number.isFinite(value) && value > 0 ? value : null;
}

function matchHint(
  text: string,
  hints: ReadonlyArray<[KubecostCloudProvider, string[]]>,
): KubecostCloudProvider | undefined {
  const lower = text.toLowerCase();
  return hints.find(([, words]) => words.some((word) => lower.includes(word)))?.[0];
}

/** Label keys are checked first, in order; the cluster name is the fallback. */
export function detectCloudProvider(labels: Record<string, string>, clusterName: string): KubecostCloudProvider {
  for (const key of Object.keys(labels)) {
    const provider = matchHint(key, LABEL_PROVIDER_HINTS);
    if (provider) return provider;
  }
  return matchHint(clusterName, CLUSTER_PROVIDER_HINTS) ?? "unknown";
}

export function extractRegion(labels: Record<string, string>): string | null {
  for (const key of REGION_LABELS) {
    const value = labels[key];
    if (value !== undefined) return value;
  }
  for (const [key, value] of Object.entries(labels)) {
    const lower = key.toLowerCase();
    if (lower.includes("region") || lower.includes("zone")) return value;
  }
  return null;
}

export function extractWorkloadType(labels: Record<string, string>): string | null {
  const component = labels["app.kubernetes.io/component"];
  if (component !== undefined) return component;
  if ("workload.user.cattle.io/workloadselector" in labels) return "Deployment";
  for (const [key, value] of Object.entries(labels)) {
    const lower = key.toLowerCase();
    if (lower.includes("workload") || lower.includes("component")) return value;
  }
  return null;
}

/**
 * Map one entry of an allocation set. Returns null for entries that are not
 * workload slices: keys with fewer than two `/` segments, or non-object
 * values.
 */
export function toKubecostAllocation(
  key: string,
  value: unknown,
  startDate: string,
  endDate: string,
): KubecostAllocation | null {
  const parts = key.split("/");
  if (parts.length < 2 || !isRecord(value)) return null;

  if (!Value.Check(AllocationValueSchema, value)) {
    const problems = describeSchemaErrors(AllocationValueSchema, value).slice(0, 5);
    throw new InvalidResponseError(`Invalid allocation ${key}: ${problems.join("; ")}`, {
      provider: "kubecost",
      details: value,
    });
  }

  const properties: NonNullable<AllocationValue["properties"]> = value.properties ?? {};
  const labels = properties.labels ?? {};
  const annotations = properties.annotations ?? {};

  let clusterName = parts[0];
  let namespace = parts[1];
  if (Object.keys(labels).length === 0) {
    clusterName = properties.cluster ?? clusterName;
    namespace = properties.namespace ?? namespace;
  }

  const hours = (value.minutes ?? MINUTES_PER_DAY) / 60;
  const perHour = (amount: number | null | undefined) => (hours > 0 ? (amount ?? 0) / hours : 0);
  const networkCost = (value.networkCost ?? 0) + (value.loadBalancerCost ?? 0);

  return {
    clusterId: clusterName,
    clusterName,
    namespace,
    workloadName: parts[2] ?? null,
    workloadType: extractWorkloadType(labels),
    containerName: properties.container ?? null,
    startDate,
    endDate,
    windowStart: normalizeWindowTime(value.window?.start, startDate),
    windowEnd: normalizeWindowTime(value.window?.end, endDate),
    cpuCoresAllocated: positiveOrNull(perHour(value.cpuCoreHours)),
    cpuCoresUsed: positiveOrNull(value.cpuCoreUsageAverage ?? 0),
    memoryGbAllocated: positiveOrNull(perHour(value.ramByteHours) / GIB),
    memoryGbUsed: positiveOrNull((value.ramByteUsageAverage ?? 0) / GIB),
    storageGbAllocated: positiveOrNull(perHour(value.pvByteHours) / GIB),
    totalCost: value.totalCost ?? 0,
    cpuCost: positiveOrNull(value.cpuCost ?? 0),
    memoryCost: positiveOrNull(value.ramCost ?? 0),
    storageCost: positiveOrNull(value.pvCost ?? 0),
    networkCost: positiveOrNull(networkCost),
    labels,
    annotations,
    cloudProvider: detectCloudProvider(labels, clusterName),
    region: extractRegion(labels),
  };
}

function emptySummary(): KubecostCostSummary {
  return { cpuCost: 0, memoryCost: 0, storageCost: 0, networkCost: 0, totalCost: 0 };
}

function costsOf(value: AllocationValue): KubecostCostSummary {
  return {
    cpuCost: value.cpuCost ?? 0,
    memoryCost: value.ramCost ?? 0,
    storageCost: value.pvCost ?? 0,
    networkCost: (value.networkCost ?? 0) + (value.loadBalancerCost ?? 0),
    totalCost: value.totalCost ?? 0,
  };
}

function addCosts<T extends KubecostCostSummary>(target: T, costs: KubecostCostSummary): T {
  target.cpuCost += costs.cpuCost;
  target.memoryCost += costs.memoryCost;
  target.storageCost += costs.storageCost;
  target.networkCost += costs.networkCost;
  target.totalCost += costs.totalCost;
  return target;
}

function byTotalCostDescending(a: KubecostCostSummary, b: KubecostCostSummary): number {
  return b.totalCost - a.totalCost;
}

function formatMoney(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

type BreakdownItem = NamespaceCost | WorkloadCost | ResourceCost;

function isBreakdown(data: KubecostCostSummary | ReadonlyArray<BreakdownItem>): data is ReadonlyArray<BreakdownItem> {
  return Array.isArray(data);
}

function breakdownName(item: BreakdownItem): string {
  if ("pod" in item) return item.pod;
  if ("namespace" in item) return item.namespace;
  return item.name;
}

/**
 * Render a summary as five labelled lines, or a breakdown list as its ten
 * most expensive entries.
 */
export function formatCostReport(data: KubecostCostSummary | ReadonlyArray<BreakdownItem>): string {
  if (!isBreakdown(data)) {
    return [
      `Total Cost: ${formatMoney(data.totalCost)}`,
      `CPU Cost: ${formatMoney(data.cpuCost)}`,
      `Memory Cost: ${formatMoney(data.memoryCost)}`,
      `Storage Cost: ${formatMoney(data.storageCost)}`,
      `Network Cost: ${formatMoney(data.networkCost)}`,
    ].join("\n");
  }

  let report = "Cost Breakdown:\n";
  data.slice(0, 10).forEach((item, index) => {
    report += `${String(index + 1).padStart(2)}. ${breakdownName(item)}: ${formatMoney(item.totalCost)}\n`;
  });
  return report;
}

/** ECS, RDS and SLB totals followed by the per-allocation breakdown. */
export function formatResourceCosts(costs: AlibabaResourceCosts): string {
  const totals = [
    `ECS Cost: ${formatMoney(costs.ecsCost)}`,
    `RDS Cost: ${formatMoney(costs.rdsCost)}`,
    `SLB Cost: ${formatMoney(costs.slbCost)}`,
    `Total Cost: ${formatMoney(costs.totalCost)}`,
  ].join("\n");
  return `${totals}\n${formatCostReport(costs.resources)}`;
}

// =============================================================================
// Manager
// =============================================================================

export class KubecostBillingManager implements BillingSource {
  readonly provider = "kubecost" as const;
  private readonly baseUrl: string;
  private readonly logger: BillingLogger;

  constructor(private readonly options: KubecostManagerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.logger = options.logger ?? noopLogger;
  }

  get allocationUrl(): string {
    return `${this.baseUrl}/model/allocation`;
  }

  /** Join the configured cluster scope onto a query filter. */
  private scopedFilter(filter: string | undefined): string | undefined {
    const cluster = this.options.clusterName ? `cluster:"${this.options.clusterName}"` : undefined;
    if (cluster && filter) return `${cluster}+${filter}`;
    return cluster ?? filter;
  }

  /** Fetch the raw allocation sets for a window, one per step. */
  private async queryAllocations(start: Date, end: Date, options: AllocationQueryOptions): Promise<AllocationSet[]> {
    if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
      throw new ValidationError("Invalid allocation window: start and end must be valid dates", {
        provider: "kubecost",
      });
    }
    if (start >= end) {
      throw new ValidationError(
        `Allocation window start ${formatKubecostTime(start)} must be before end ${formatKubecostTime(end)}`,
        { provider: "kubecost" },
      );
    }

    const response = await sendBillingRequest(this.allocationUrl, {
      provider: "kubecost",
      query: {
        window: `${formatKubecostTime(start)},${formatKubecostTime(end)}`,
        step: options.step ?? "1d",
        aggregate: (options.aggregate ?? ["cluster", "namespace"]).join(","),
        accumulate: String(options.accumulate ?? false),
        filter: this.scopedFilter(options.filter),
      },
      headers: this.options.headers,
      timeoutMs: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });

    const body = parseResponse(AllocationResponseSchema, parseJsonBody(response, "kubecost"), "kubecost", "allocation");
    if (body.code !== undefined && body.code !== 200) {
      throw new ProviderError(`Kubecost returned code ${body.code}: ${body.message ?? "no message"}`, {
        provider: "kubecost",
        statusCode: body.code,
        details: body,
      });
    }

    const sets = body.data.filter(isRecord);
    this.logger.debug(`Kubecost returned ${sets.length} allocation sets`);
    return sets;
  }

  /** Validated allocation values of every set, keyed as Kubecost keyed them. */
  private async queryAllocationValues(
    start: Date,
    end: Date,
    options: AllocationQueryOptions,
  ): Promise<Array<[string, AllocationValue]>> {
    const entries: Array<[string, AllocationValue]> = [];
    for (const set of await this.queryAllocations(start, end, options)) {
      for (const [key, value] of Object.entries(set)) {
        if (!isRecord(value)) continue;
        entries.push([key, parseResponse(AllocationValueSchema, value, "kubecost", `allocation ${key}`)]);
      }
    }
    return entries;
  }

  /**
   * Stream allocations for a window. A request failure is yielded once and
   * ends the stream; a malformed allocation is yielded as a failure and
   * skipped.
   */
  async *getAllocationData(
    start: Date,
    end: Date,
    options: AllocationQueryOptions = {},
  ): AsyncGenerator<BillingResult<KubecostAllocation>, void, undefined> {
    let sets: AllocationSet[];
    try {
      sets = await this.queryAllocations(start, end, options);
    } catch (error) {
      yield fail(toBillingError(error, "kubecost"));
      return;
    }

    const startDate = formatKubecostTime(start);
    const endDate = formatKubecostTime(end);
    for (const set of sets) {
      for (const [key, value] of Object.entries(set)) {
        let result: BillingResult<KubecostAllocation> | null;
        try {
          const allocation = toKubecostAllocation(key, value, startDate, endDate);
          result = allocation ? ok(allocation) : null;
        } catch (error) {
          result = fail(toBillingError(error, "kubecost"));
        }
        if (result) yield result;
      }
    }
  }

  /** Query the last day of allocations to confirm the API answers. */
  async testConnection(): Promise<BillingResult<true>> {
    const end = new Date();
    const start = new Date(end.getTime() - 24 * 60 * 60 * 1000);
    return captureResult(async () => {
      await this.queryAllocations(start, end, { step: "1d", aggregate: ["cluster", "namespace"] });
      this.logger.info(`Connected to Kubecost at ${this.baseUrl}`);
      return true as const;
    }, "kubecost");
  }

  /** Check the base URL shape, then that the allocation endpoint is reachable. */
  async validateConfig(): Promise<BillingResult<true>> {
    if (!/^https?:\/\//.test(this.baseUrl)) {
      return fail(
        new ValidationError(`Kubecost base URL must start with http:// or https://: ${this.baseUrl}`, {
          provider: "kubecost",
        }),
      );
    }
    return captureResult(async () => {
      await sendBillingRequest(this.allocationUrl, {
        provider: "kubecost",
        method: "HEAD",
        headers: this.options.headers,
        timeoutMs: Math.min(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS, 5000),
      });
      return true as const;
    }, "kubecost");
  }

  private monthWindow(billingCycle: string): [Date, Date] {
    assertBillingCycle(billingCycle, "kubecost");
    const { start } = monthRange(billingCycle);
    return [new Date(`${start}T00:00:00Z`), new Date(`${nextMonthStart(billingCycle)}T00:00:00Z`)];
  }

  /** Cost totals across every cluster for a month. */
  async summarizeAllocations(billingCycle: string): Promise<BillingResult<KubecostCostSummary>> {
    return captureResult(async () => {
      const [start, end] = this.monthWindow(billingCycle);
      const entries = await this.queryAllocationValues(start, end, { aggregate: ["cluster"], accumulate: true });
      return entries.reduce((summary, [, value]) => addCosts(summary, costsOf(value)), emptySummary());
    }, "kubecost");
  }

  /** Per-namespace costs for a month, most expensive first. */
  async namespaceCosts(billingCycle: string): Promise<BillingResult<NamespaceCost[]>> {
    return captureResult(async () => {
      const [start, end] = this.monthWindow(billingCycle);
      const entries = await this.queryAllocationValues(start, end, { aggregate: ["namespace"], accumulate: true });

      const byNamespace = new Map<string, NamespaceCost>();
      for (const [key, value] of entries) {
        const namespace = value.properties?.namespace ?? key;
        const entry = byNamespace.get(namespace) ?? {
          namespace,
          ...emptySummary(),
          cpuHours: 0,
          memoryGbHours: 0,
        };
        addCosts(entry, costsOf(value));
        entry.cpuHours += value.cpuCoreHours ?? 0;
        entry.memoryGbHours += (value.ramByteHours ?? 0) / GIB;
        byNamespace.set(namespace, entry);
      }
      return [...byNamespace.values()].sort(byTotalCostDescending);
    }, "kubecost");
  }

  /** Per-pod costs for a month, optionally within one namespace, most expensive first. */
  async workloadCosts(billingCycle: string, namespace?: string): Promise<BillingResult<WorkloadCost[]>> {
    return captureResult(async () => {
      const [start, end] = this.monthWindow(billingCycle);
      const entries = await this.queryAllocationValues(start, end, {
        aggregate: ["pod"],
        accumulate: true,
        filter: namespace ? `namespace:"${namespace}"` : undefined,
      });

      const workloads: WorkloadCost[] = [];
      for (const [key, value] of entries) {
        const workload: WorkloadCost = {
          pod: value.properties?.pod ?? key,
          namespace: value.properties?.namespace ?? "",
          controllerKind: value.properties?.controllerKind ?? "",
          ...costsOf(value),
        };
        if (namespace && workload.namespace !== namespace) continue;
        workloads.push(workload);
      }
      return workloads.sort(byTotalCostDescending);
    }, "kubecost");
  }

  /**
   * Cluster-level costs for a month with each allocation's node instance
   * type, totalled into ECS, RDS and SLB by that type.
   */
  async resourceCosts(billingCycle: string): Promise<BillingResult<AlibabaResourceCosts>> {
    return captureResult(async () => {
      const [start, end] = this.monthWindow(billingCycle);
      const entries = await this.queryAllocationValues(start, end, { aggregate: ["cluster"], accumulate: true });

      const costs: AlibabaResourceCosts = { ecsCost: 0, rdsCost: 0, slbCost: 0, totalCost: 0, resources: [] };
      for (const [key, value] of entries) {
        const resource: ResourceCost = {
          name: key,
          instanceType: value.properties?.instanceType ?? "",
          nodeType: value.properties?.nodeType ?? "",
          ...costsOf(value),
        };
        costs.resources.push(resource);
        costs.totalCost += resource.totalCost;

        const instanceType = resource.instanceType.toLowerCase();
        const service = ALIBABA_SERVICES.find(([, hint]) => instanceType.includes(hint));
        if (service) costs[service[0]] += resource.totalCost;
      }
      return costs;
    }, "kubecost");
  }

  /**
   * One record per cluster/namespace for the month. Costs are Kubecost's
   * totals; the breakdown lives in `extensions`.
   */
  async fetchBilling(billingCycle: string): Promise<BillingResult<BillingRecord[]>> {
    let window: [Date, Date];
    try {
      window = this.monthWindow(billingCycle);
    } catch (error) {
      return fail(toBillingError(error, "kubecost"));
    }

    const period = formatPeriod(monthRange(billingCycle));
    const currency = this.options.currency ?? "USD";
    const records: BillingRecord[] = [];

    for await (const result of this.getAllocationData(window[0], window[1], { accumulate: true })) {
      if (!result.success) return result;
      const allocation = result.data;
      try {
        records.push(allocationToRecord(allocation, period, currency));
      } catch (error) {
        return fail(toBillingError(error, "kubecost"));
      }
    }

    this.logger.info(`Fetched ${records.length} Kubecost allocations for ${billingCycle}`);
    return ok(records);
  }
}

export function allocationToRecord(allocation: KubecostAllocation, period: string, currency: string): BillingRecord {
  const extensions: Record<string, string> = {
    cluster: allocation.clusterName,
    namespace: allocation.namespace,
    cloudProvider: allocation.cloudProvider,
  };
  if (allocation.region) extensions.region = allocation.region;
  const breakdown = {
    cpuCost: allocation.cpuCost,
    memoryCost: allocation.memoryCost,
    storageCost: allocation.storageCost,
    networkCost: allocation.networkCost,
  };
  for (const [field, amount] of Object.entries(breakdown)) {
    if (amount !== null) extensions[field] = String(amount);
  }

  const resourceId = [allocation.clusterName, allocation.namespace, allocation.workloadName]
    .filter((part): part is string => part !== null)
    .join("/");

  return recordFromPayload(
    {
      provider: "kubecost",
      productName: "Kubernetes",
      resourceId,
      billingPeriod: period,
      pretaxCost: allocation.totalCost,
      currency,
      extensions,
    },
    allocation,
  );
}

export function createKubecostBillingManager(options: KubecostManagerOptions): KubecostBillingManager {
  return new KubecostBillingManager(options);
}
