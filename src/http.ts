/**
 * Cloud Billing — REST Request Helpers
 *
 * Shared transport for providers reached over plain REST (Azure Cost
 * Management, Kubecost). Uses native `fetch()`; authentication is a bearer
 * token obtained by the caller.
 */

import {
  AuthenticationError,
  BillingError,
  ProviderError,
  RateLimitError,
} from "./errors.js";
import { parseRetryAfterMs } from "./retry.js";
import type { BillingProvider } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type BillingRequestOptions = {
  provider: BillingProvider;
  method?: string;
  /** OAuth2 access token sent as `Authorization: Bearer`. */
  token?: string;
  query?: Record<string, string | undefined>;
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
};

export type BillingHttpResponse = {
  status: number;
  headers: Headers;
  body: string;
};

export const DEFAULT_TIMEOUT_MS = 30_000;

// =============================================================================
// URL & Error Mapping
// =============================================================================

export function buildUrl(url: string, query?: Record<string, string | undefined>): string {
  if (!query) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) target.searchParams.set(key, value);
  }
  return target.toString();
}

/** Pull a readable message out of a JSON error envelope, if there is one. */
export function extractErrorMessage(body: string): string | undefined {
  if (!body) return undefined;
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed !== "object" || parsed === null) return undefined;
    const envelope = "error" in parsed ? parsed.error : parsed;
    if (typeof envelope === "string") return envelope;
    if (typeof envelope === "object" && envelope !== null && "message" in envelope) {
      return typeof envelope.message === "string" ? envelope.message : undefined;
    }
  } catch {
    return body.length > 500 ? `${body.slice(0, 500)}…` : body;
  }
  return undefined;
}

/**
 * Map a non-success HTTP status onto the error taxonomy:
 * 401/403 → AuthenticationError, 429 → RateLimitError, anything else →
 * ProviderError.
 */
export function classifyHttpError(
  status: number,
  body: string,
  headers: Headers,
  provider: BillingProvider,
): BillingError {
  const message = extractErrorMessage(body) ?? `HTTP ${status}`;
  const options = { provider, statusCode: status, details: body };

  if (status === 401 || status === 403) {
    return new AuthenticationError(`${provider} rejected the credentials: ${message}`, options);
  }
  if (status === 429) {
    return new RateLimitError(`${provider} is throttling requests: ${message}`, {
      ...options,
      retryAfterMs: parseRetryAfterMs(headers.get("retry-after")) ?? undefined,
    });
  }
  return new ProviderError(`${provider} request failed: ${message}`, options);
}

// =============================================================================
// Core Request
// =============================================================================

async function dispatch(
  url: string,
  opts: BillingRequestOptions,
  controller: AbortController,
): Promise<Response> {
  const headers: Record<string, string> = { Accept: "application/json", ...opts.headers };
  if (opts.token) headers.Authorization = `Bearer ${opts.token}`;
  if (opts.body !== undefined) headers["Content-Type"] = "application/json";

  try {
    return await fetch(buildUrl(url, opts.query), {
      method: opts.method ?? "GET",
      headers,
      body: opts.body !== undefined ? JSON.stringify(opts.body) : undefined,
      signal: controller.signal,
    });
  } catch (error) {
    const reason = controller.signal.aborted
      ? `timed out after ${opts.timeoutMs ?? DEFAULT_TIMEOUT_MS}ms`
      : error instanceof Error
        ? error.message
        : String(error);
    throw new ProviderError(`${opts.provider} request to ${url} failed: ${reason}`, {
      provider: opts.provider,
      cause: error,
    });
  }
}

/**
 * Issue a request and read the whole body as text. Non-2xx responses throw a
 * classified BillingError.
 */
export async function sendBillingRequest(url: string, opts: BillingRequestOptions): Promise<BillingHttpResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);

  try {
    const res = await dispatch(url, opts, controller);
    const body = await res.text();
    if (!res.ok) throw classifyHttpError(res.status, body, res.headers, opts.provider);
    return { status: res.status, headers: res.headers, body };
  } finally {
    clearTimeout(timer);
  }
}

/** Parse a JSON response body; an empty body yields `{}`. */
export function parseJsonBody(response: BillingHttpResponse, provider: BillingProvider): unknown {
  if (response.body.trim() === "") return {};
  try {
    return JSON.parse(response.body);
  } catch (error) {
    throw new ProviderError(`${provider} returned a body that is not JSON`, {
      provider,
      statusCode: response.status,
      details: response.body,
      cause: error,
    });
  }
}

/**
 * Open a streamed download. The timeout covers the response headers and then
 * each body read: a body that delivers nothing for `timeoutMs` is cancelled
 * and the stream errors with a ProviderError.
 */
export async function openBillingStream(
  url: string,
  opts: BillingRequestOptions,
): Promise<ReadableStream<Uint8Array>> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);

  let res: Response;
  try {
    res = await dispatch(url, { ...opts, headers: { Accept: "*/*", ...opts.headers } }, controller);
  } finally {
    clearTimeout(timer);
  }

  if (!res.ok) {
    const body = await res.text();
    throw classifyHttpError(res.status, body, res.headers, opts.provider);
  }
  if (!res.body) {
    throw new ProviderError(`${opts.provider} download from ${url} returned no body`, {
      provider: opts.provider,
      statusCode: res.status,
    });
  }
  return withIdleTimeout(res.body, url, opts.provider, opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);
}

function withIdleTimeout(
  body: ReadableStream<Uint8Array>,
  url: string,
  provider: BillingProvider,
  idleMs: number,
): ReadableStream<Uint8Array> {
  const reader = body.getReader();

  return new ReadableStream<Uint8Array>({
    async pull(out) {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const stalled = new Promise<"stalled">((resolve) => {
        timer = setTimeout(() => resolve("stalled"), idleMs);
      });

      try {
        const chunk = await Promise.race([reader.read(), stalled]);
        if (chunk === "stalled") {
          const error = new ProviderError(`${provider} download from ${url} stalled for ${idleMs}ms`, { provider });
          await reader.cancel(error);
          throw error;
        }
        if (chunk.done) out.close();
        else out.enqueue(chunk.value);
      } finally {
        clearTimeout(timer);
      }
    },
    cancel(reason) {
      return reader.cancel(reason);
    },
  });
}
