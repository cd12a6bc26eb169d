/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "HEAD";

/**
 * How the response body is read.
 * - "auto": JSON when the content-type says so, text otherwise
 * - "json": always parsed as JSON (release assets are served as octet-stream)
 * - "text": always returned as a string
 */
export type HttpResponseType = "auto" | "json" | "text";

/**
 * Retry configuration for HTTP requests
 */
export interface HttpRetryConfig {
  /** Maximum number of attempts (including initial request). Default from constants. */
  maxAttempts?: number;
  /** Base delay in ms for exponential backoff. Default from constants. */
  baseDelayMs?: number;
  /** Maximum delay in ms between retries. Default from constants. */
  maxDelayMs?: number;
  /** Maximum time in ms to wait for Retry-After header. Default from constants. */
  maxRetryAfterMs?: number;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | Array<string | number | boolean>>;
  json?: unknown;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
  responseType?: HttpResponseType;
  /** Marks a POST as safe to retry (e.g. embedding requests) */
  idempotent?: boolean;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * Signature shared by httpRequest and its test doubles
 */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<T>;
