/**
 * HTTP client wrapper — general-purpose client using native fetch
 * Supports timeouts, query params, retries with exponential backoff,
 * JSON or text bodies, and structured error handling.
 * Redirects are followed (fetch default), which GitHub release downloads need.
 */

import type { HttpRequest, HttpResponseType } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  RETRYABLE_HTTP_METHODS,
  RETRYABLE_STATUS_CODES,
  USER_AGENT,
} from "@/constants/clients/http";
import * as logger from "@/logger";

/**
 * Build URL with query parameters (supports arrays for repeated params)
 */
function buildUrl(
  baseUrl: string,
  query?: Record<string, string | number | boolean | Array<string | number | boolean>>,
): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    if (Array.isArray(value)) {
      value.forEach((item) => url.searchParams.append(key, String(item)));
    } else {
      url.searchParams.append(key, String(value));
    }
  });

  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    return undefined;
  }
}

/**
 * Check if a request is safe to retry (idempotent)
 */
function isRequestRetryable(req: HttpRequest): boolean {
  return req.idempotent === true || RETRYABLE_HTTP_METHODS.includes(req.method);
}

/**
 * Check if an error is retryable
 * Returns true for network errors, timeouts, and retryable HTTP status codes
 */
function isErrorRetryable(error: unknown, req: HttpRequest): boolean {
  if (!isRequestRetryable(req)) {
    return false;
  }

  if (error instanceof HttpError) {
    return RETRYABLE_STATUS_CODES.includes(error.status);
  }

  // AbortError (timeout), TypeError (network)
  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TypeError";
  }

  return false;
}

/**
 * Parse Retry-After header value
 * Supports both delay-seconds (number) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
function parseRetryAfter(retryAfterHeader: string | null): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const seconds = parseInt(retryAfterHeader, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  const date = new Date(retryAfterHeader);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Compute exponential backoff delay with jitter
 * Formula: min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random(0.5))
 */
function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isJsonContentType(contentType: string | null): boolean {
  return (
    contentType !== null &&
    (contentType.includes("application/json") || contentType.includes("+json"))
  );
}

/**
 * Read the body according to the requested response type
 */
async function readBody(
  response: Response,
  responseType: HttpResponseType,
  req: HttpRequest,
  url: string,
): Promise<unknown> {
  if (response.status === 204) {
    return undefined;
  }

  if (responseType === "text") {
    return response.text();
  }

  if (responseType === "auto" && !isJsonContentType(response.headers.get("content-type"))) {
    return response.text();
  }

  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch (parseError) {
    // A 200 with an unparseable body is not retryable; surface it to the caller
    throw new SyntaxError(
      `Invalid JSON from ${req.method} ${url}: ${
        parseError instanceof Error ? parseError.message : String(parseError)
      }`,
    );
  }
}

/**
 * Perform a single HTTP request attempt (no retries)
 */
async function performRequest(
  req: HttpRequest,
  url: string,
  timeoutMs: number,
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Defaults first, caller headers override
    const headers: Record<string, string> = { "User-Agent": USER_AGENT };
    if (req.json !== undefined) {
      Object.assign(headers, DEFAULT_JSON_HEADERS);
    }
    Object.assign(headers, req.headers);

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
      redirect: "follow",
    };

    if (req.json !== undefined) {
      options.body = JSON.stringify(req.json);
    }

    const response = await fetch(url, options);

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: response.headers,
      });
    }

    return await readBody(response, req.responseType ?? "auto", req, url);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Perform an HTTP request with timeout, retries, and error handling
 *
 * Retries are only performed for idempotent requests (GET, HEAD, or
 * `idempotent: true`) on:
 * - Network errors (no response received)
 * - Timeout errors
 * - HTTP 408 (Request Timeout)
 * - HTTP 429 (Too Many Requests) - respects Retry-After header
 * - HTTP 5xx (Server errors)
 *
 * The body is returned as parsed JSON or text; callers validate the shape.
 *
 * @throws {HttpError} On non-2xx status codes (after all retries exhausted)
 * @throws {Error} On network errors or timeouts (after all retries exhausted)
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  const maxAttempts = req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const maxRetryAfterMs = req.retry?.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      // The body is untyped JSON or text; T is the caller's contract
      return (await performRequest(req, url, timeoutMs)) as T;
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts) {
        break;
      }

      if (!isErrorRetryable(error, req)) {
        throw error;
      }

      let retryAfterHeader: string | null = null;
      if (error instanceof HttpError && error.headers) {
        if (error.status === 429 || error.status === 503) {
          retryAfterHeader = error.headers.get("retry-after");
        }
      }

      const retryAfterMs = parseRetryAfter(retryAfterHeader);
      const delayMs =
        retryAfterMs !== null
          ? Math.min(retryAfterMs, maxRetryAfterMs)
          : computeBackoffDelay(attempt, baseDelayMs, maxDelayMs);

      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts,
        delayMs,
        reason:
          error instanceof HttpError
            ? `status ${error.status}`
            : error instanceof Error
              ? error.name
              : String(error),
      });

      await sleep(delayMs);
    }
  }

  throw lastError;
}
