// CHANGE: Provide retrying HTTP utilities around one shared axios instance.
// WHY: Catalog queries and transfers share timeouts, user agent and the backoff rule.

import axios, { AxiosInstance, AxiosResponse } from "axios";
import { NET } from "../config.js";
import { PatchDownloaderError } from "../errors.js";
import { debug } from "../logger.js";

const TRANSIENT_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNABORTED", "ECONNREFUSED", "EPIPE", "EAI_AGAIN", "ERR_NETWORK"]);

const httpClient: AxiosInstance = axios.create({
  timeout: NET.TIMEOUT,
  maxRedirects: 5,
  headers: {
    "User-Agent": NET.USER_AGENT
  }
});

/**
 * Bounded retry settings.
 *
 * Invariant: `attempts >= 1`.
 */
export interface RetryPolicy {
  readonly attempts: number;
  readonly baseDelayMs: number;
}

export function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

/**
 * HTTP status carried by an axios error, if any.
 */
export function statusOf(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}

function codeOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Whether the failure is a rejected session rather than a transport problem.
 */
export function isAuthRejection(error: unknown): boolean {
  const status = statusOf(error);
  return status === 401 || status === 403;
}

/**
 * Connection resets, timeouts, 408/429 and 5xx responses are worth another attempt,
 * as is any downloader error flagged `retryable`.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof PatchDownloaderError) {
    return error.retryable;
  }
  const status = statusOf(error);
  if (typeof status === "number") {
    return status === 408 || status === 429 || (status >= 500 && status < 600);
  }
  const code = codeOf(error);
  return code !== undefined && TRANSIENT_CODES.has(code);
}

/**
 * Run `operation` until it succeeds, a non-transient error occurs, or attempts run out.
 * Backoff doubles from `baseDelayMs` on each retry.
 */
export async function executeWithRetry<T>(operation: () => Promise<T>, policy: RetryPolicy, label: string): Promise<T> {
  const attempts = Math.max(1, policy.attempts);
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      const nextAttempt = attempt + 1;
      if (nextAttempt >= attempts || !isTransientError(error)) {
        throw error;
      }
      const backoff = policy.baseDelayMs * 2 ** attempt;
      debug(`HTTP retry (${nextAttempt}/${attempts}) after ${backoff}ms for ${label}`);
      await sleep(backoff);
    }
  }
}

/**
 * Lower-case header names and join multi-valued headers.
 */
export function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}

/**
 * Perform GET request expecting JSON payload.
 */
export async function getJson<T>(
  url: string,
  options: { readonly headers?: Record<string, string>; readonly params?: Record<string, string> } = {}
): Promise<{ readonly data: T; readonly headers: Record<string, string>; readonly status: number }> {
  const response = await httpClient.get<T>(url, {
    headers: { Accept: "application/json", ...options.headers },
    params: options.params
  });
  return {
    data: response.data,
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

export { httpClient };
