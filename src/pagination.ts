/**
 * Cloud Billing — Pagination Accumulators
 *
 * Billing APIs page either by page number (Alibaba QueryInstanceBill, Huawei
 * BSS offsets) or by continuation token (Alibaba Describe* calls, AWS Cost
 * Explorer). Both helpers return every item in the order the provider served
 * them.
 */

import { ProviderError, ValidationError } from "./errors.js";
import type { BillingProvider } from "./types.js";

// =============================================================================
// Page-number pagination
// =============================================================================

export type NumberedPage<T> = {
  items: T[];
  /** Total record count as reported by the provider, when it reports one. */
  totalCount?: number;
};

/**
 * Validate a page size against a provider maximum. Throws if it is not an
 * integer in 1..max.
 */
export function validatePageSize(pageSize: number, max: number, provider?: BillingProvider): void {
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > max) {
    throw new ValidationError(`Invalid page size: ${pageSize}. Must be an integer between 1 and ${max}.`, {
      provider,
    });
  }
}

/**
 * Request page 1, 2, … until a page comes back shorter than `pageSize` or
 * the provider reports zero records in total.
 *
 * @param fetchPage Fetch one page; `page` is 1-based.
 * @param onPage    Observer called after each page with its number and size.
 */
export async function collectNumberedPages<T>(
  fetchPage: (page: number, pageSize: number) => Promise<NumberedPage<T>>,
  pageSize: number,
  onPage?: (page: number, count: number) => void,
): Promise<T[]> {
  const items: T[] = [];

  for (let page = 1; ; page++) {
    const result = await fetchPage(page, pageSize);
    items.push(...result.items);
    onPage?.(page, result.items.length);

    if (result.totalCount === 0) break;
    if (result.items.length < pageSize) break;
  }

  return items;
}

// =============================================================================
// Continuation-token pagination
// =============================================================================

export type TokenPage<T> = {
  items: T[];
  nextToken?: string | null;
};

/** A blank or missing token means the last page has been served. */
export function hasMoreData(nextToken: string | null | undefined): nextToken is string {
  return typeof nextToken === "string" && nextToken.trim() !== "";
}

/**
 * Follow continuation tokens until the provider stops returning one. A token
 * repeated back-to-back is treated as a provider fault rather than looped on.
 */
export async function collectTokenPages<T>(
  fetchPage: (nextToken: string | undefined) => Promise<TokenPage<T>>,
  provider?: BillingProvider,
): Promise<T[]> {
  const items: T[] = [];
  let token: string | undefined;

  while (true) {
    const result = await fetchPage(token);
    items.push(...result.items);

    if (!hasMoreData(result.nextToken)) break;
    if (result.nextToken === token) {
      throw new ProviderError(`Provider returned the same continuation token twice: ${token}`, { provider });
    }
    token = result.nextToken;
  }

  return items;
}
