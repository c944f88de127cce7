export { AzureCredentialsManager } from "./credentials.js";
export {
  AzureBillingManager,
  createAzureBillingManager,
  DEFAULT_MAX_POLLS,
  DEFAULT_POLL_INTERVAL_SECONDS,
} from "./manager.js";
export { AzureCostReportClient, azureRowToRecord, classifyOperation } from "./report.js";
export * from "./types.js";
