/**
 * HTTP client public API
 */

export { httpRequest } from "./httpClient";
export { HttpError, isNotFound } from "./httpError";
export type {
  HttpRequest,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
  HttpRequestFn,
  HttpResponseType,
} from "@/types";
