export { CsvTokenizer, decodeStream, parseCsvRows, parseCsvText, stripBom } from "./parser.js";
export type { CsvRow } from "./parser.js";
export {
  BILLING_CSV_COLUMNS,
  billingRecordToRow,
  escapeCsvField,
  formatBillingRecordsCsv,
  formatCsvRow,
  readBillingRecordsCsv,
  rowToBillingRecord,
  writeBillingRecordsCsv,
} from "./writer.js";
export type { BillingCsvColumn } from "./writer.js";
