export { createHuaweiBillingManager, feeRecordToRecord, HuaweiBillingManager, mapHuaweiError } from "./manager.js";
export * from "./types.js";
