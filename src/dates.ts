/**
 * Billing cycle and date helpers.
 *
 * All arithmetic is done in UTC so results do not depend on the host timezone.
 */

import { ValidationError } from "./errors.js";
import type { BillingProvider } from "./types.js";

const BILLING_CYCLE_PATTERN = /^(\d{4})-(\d{2})$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const US_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

export type DateRange = { start: string; end: string };

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function formatUtcDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export function isBillingCycle(value: string): boolean {
  const match = BILLING_CYCLE_PATTERN.exec(value);
  if (!match) return false;
  const month = Number(match[2]);
  return month >= 1 && month <= 12;
}

/** Throw a ValidationError unless `value` is a `YYYY-MM` month. */
export function assertBillingCycle(value: string, provider?: BillingProvider): void {
  if (!isBillingCycle(value)) {
    throw new ValidationError(`Invalid billing cycle format: ${value}, expected YYYY-MM`, { provider });
  }
}

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;
  return isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/** Throw a ValidationError unless `value` is a real `YYYY-MM-DD` date. */
export function assertIsoDate(value: string, field: string, provider?: BillingProvider): void {
  if (!isIsoDate(value)) {
    throw new ValidationError(`Invalid ${field}: ${value}, expected YYYY-MM-DD`, { provider });
  }
}

/** Validate an inclusive date range; `start` may equal `end`. */
export function assertDateRange(start: string, end: string, provider?: BillingProvider): void {
  assertIsoDate(start, "start date", provider);
  assertIsoDate(end, "end date", provider);
  if (start > end) {
    throw new ValidationError(`Start date ${start} is after end date ${end}`, { provider });
  }
}

/** First and last day of a billing cycle, e.g. `2024-02` → 2024-02-01 / 2024-02-29. */
export function monthRange(billingCycle: string): DateRange {
  assertBillingCycle(billingCycle);
  const [year, month] = billingCycle.split("-").map(Number);
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return { start: `${billingCycle}-01`, end: `${billingCycle}-${pad(lastDay)}` };
}

/** First day of the month after the cycle; the exclusive end some APIs want. */
export function nextMonthStart(billingCycle: string): string {
  assertBillingCycle(billingCycle);
  const [year, month] = billingCycle.split("-").map(Number);
  return formatUtcDate(new Date(Date.UTC(year, month, 1)));
}

/** The month before `now`, which is the most recent closed billing cycle. */
export function previousBillingCycle(now: Date = new Date()): string {
  const date = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - 1, 1));
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}`;
}

/** `YYYY-MM-DD/YYYY-MM-DD`, the period format for range-based providers. */
export function formatPeriod(range: DateRange): string {
  return `${range.start}/${range.end}`;
}

/**
 * Normalize a `MM/DD/YYYY` (Azure export) or `YYYY-MM-DD` date to ISO form.
 * Returns null for anything else.
 */
export function normalizeDate(value: string): string | null {
  const trimmed = value.trim();
  if (isIsoDate(trimmed)) return trimmed;
  const iso = /^(\d{4}-\d{2}-\d{2})T/.exec(trimmed);
  if (iso && isIsoDate(iso[1])) return iso[1];
  const us = US_DATE_PATTERN.exec(trimmed);
  if (!us) return null;
  const month = Number(us[1]);
  const day = Number(us[2]);
  const year = Number(us[3]);
  if (!isCalendarDate(year, month, day)) return null;
  return `${year}-${pad(month)}-${pad(day)}`;
}

/** The day before an ISO date; turns an exclusive end date into an inclusive one. */
export function previousDay(isoDate: string): string {
  assertIsoDate(isoDate, "date");
  const [year, month, day] = isoDate.split("-").map(Number);
  return formatUtcDate(new Date(Date.UTC(year, month - 1, day - 1)));
}
