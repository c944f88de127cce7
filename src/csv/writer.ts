/**
 * BillingRecord CSV export and re-import.
 */

import { createReadStream } from "node:fs";
import { open } from "node:fs/promises";
import { ValidationError } from "../errors.js";
import { createBillingRecord, parseAmount } from "../records.js";
import { BILLING_PROVIDERS, type BillingProvider, type BillingRecord } from "../types.js";
import { parseCsvRows, stripBom } from "./parser.js";

/** Column order of an exported file. `extensions` holds a JSON object. */
export const BILLING_CSV_COLUMNS = [
  "provider",
  "productName",
  "resourceId",
  "billingPeriod",
  "usageQuantity",
  "usageUnit",
  "pretaxCost",
  "currency",
  "extensions",
] as const;

export type BillingCsvColumn = (typeof BILLING_CSV_COLUMNS)[number];

/**
 * Quote a field when it contains a comma, quote, or line break.
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(values: readonly string[]): string {
  return values.map(escapeCsvField).join(",");
}

export function billingRecordToRow(record: BillingRecord): string[] {
  return BILLING_CSV_COLUMNS.map((column) => {
    switch (column) {
      case "usageQuantity":
        return String(record.usageQuantity);
      case "pretaxCost":
        return String(record.pretaxCost);
      case "extensions":
        return Object.keys(record.extensions).length > 0 ? JSON.stringify(record.extensions) : "";
      default:
        return record[column];
    }
  });
}

function isProvider(value: string): value is BillingProvider {
  return BILLING_PROVIDERS.some((provider) => provider === value);
}

function parseExtensions(raw: string, rowNumber: number): Record<string, string> {
  if (raw.trim() === "") return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Row ${rowNumber}: extensions is not valid JSON`, { cause: error });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError(`Row ${rowNumber}: extensions must be a JSON object`);
  }
  const extensions: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    extensions[key] = typeof value === "string" ? value : JSON.stringify(value);
  }
  return extensions;
}

/** Rebuild a record from a row of an exported file. */
export function rowToBillingRecord(values: Record<string, string>, rowNumber: number): BillingRecord {
  const provider = values.provider ?? "";
  if (!isProvider(provider)) {
    throw new ValidationError(`Row ${rowNumber}: unknown provider "${provider}"`);
  }
  return createBillingRecord({
    provider,
    productName: values.productName ?? "",
    resourceId: values.resourceId ?? "",
    billingPeriod: values.billingPeriod ?? "",
    usageQuantity: parseAmount(values.usageQuantity),
    usageUnit: values.usageUnit ?? "",
    pretaxCost: parseAmount(values.pretaxCost),
    currency: values.currency ?? "",
    extensions: parseExtensions(values.extensions ?? "", rowNumber),
  });
}

/**
 * Write records to `path`, replacing any existing file. The header row is
 * written even when there are no records. Returns the number of records.
 */
export async function writeBillingRecordsCsv(
  path: string,
  records: Iterable<BillingRecord> | AsyncIterable<BillingRecord>,
): Promise<number> {
  const handle = await open(path, "w");
  let count = 0;
  try {
    await handle.write(`${formatCsvRow(BILLING_CSV_COLUMNS)}\n`);
    for await (const record of records) {
      await handle.write(`${formatCsvRow(billingRecordToRow(record))}\n`);
      count++;
    }
  } finally {
    await handle.close();
  }
  return count;
}

/** Render records to a CSV string, header included. */
export function formatBillingRecordsCsv(records: Iterable<BillingRecord>): string {
  const lines = [formatCsvRow(BILLING_CSV_COLUMNS)];
  for (const record of records) lines.push(formatCsvRow(billingRecordToRow(record)));
  return `${lines.join("\n")}\n`;
}

/** Read a file produced by writeBillingRecordsCsv back into records. */
export async function readBillingRecordsCsv(path: string): Promise<BillingRecord[]> {
  const stream = createReadStream(path, { encoding: "utf8" });
  const records: BillingRecord[] = [];
  let first = true;

  async function* chunks(): AsyncGenerator<string, void, undefined> {
    for await (const chunk of stream) {
      const text = String(chunk);
      yield first ? stripBom(text) : text;
      first = false;
    }
  }

  for await (const row of parseCsvRows(chunks())) {
    records.push(rowToBillingRecord(row.values, row.rowNumber));
  }
  return records;
}
