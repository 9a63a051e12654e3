/**
 * HTTP client public API
 */

export { httpRequest, buildUrl } from "./httpClient";
export { HttpError } from "./httpError";
export type {
  HttpRequest,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
  HttpRequestFn,
} from "@/types";
