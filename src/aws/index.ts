export { AwsBillingManager, costGroupToRecord, createAwsBillingManager, mapAwsError } from "./manager.js";
export * from "./types.js";
