export {
  AlibabaBillingManager,
  amortizedItemToRecord,
  billItemToRecord,
  bssEndpointForRegion,
  createAlibabaBillingManager,
  mapAlibabaError,
} from "./manager.js";
export { parseAlibabaTag } from "./tags.js";
export * from "./types.js";
