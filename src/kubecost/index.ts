export {
  allocationToRecord,
  createKubecostBillingManager,
  detectCloudProvider,
  extractRegion,
  extractWorkloadType,
  formatCostReport,
  formatKubecostTime,
  formatResourceCosts,
  KubecostBillingManager,
  toKubecostAllocation,
} from "./manager.js";
export * from "./types.js";
