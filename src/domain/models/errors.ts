import { API_KEY_ENV } from "../../config/env.ts";

/**
 * Failure kinds produced by the access layer
 */
export type NewsApiError =
  | { type: "configuration" } // Missing credential
  | { type: "auth" } // 401
  | { type: "rate_limit" } // 429
  | { type: "bad_request" } // 400
  | { type: "upstream"; status: number } // 5xx
  | { type: "http"; status: number } // Any other non-2xx
  | { type: "timeout"; timeoutSeconds: number }
  | { type: "network"; cause: string }
  | { type: "validation"; field: string };

export type NewsApiErrorType = NewsApiError["type"];

/**
 * Classify a non-2xx HTTP status
 */
export function errorFromStatus(status: number): NewsApiError {
  if (status === 401) return { type: "auth" };
  if (status === 429) return { type: "rate_limit" };
  if (status === 400) return { type: "bad_request" };
  if (status >= 500) return { type: "upstream", status };
  return { type: "http", status };
}

/**
 * The user-facing text for every failure kind
 */
export function describeNewsApiError(error: NewsApiError): string {
  switch (error.type) {
    case "configuration":
      return `${API_KEY_ENV} environment variable is required`;
    case "auth":
      return `Invalid API key. Please check your ${API_KEY_ENV}.`;
    case "rate_limit":
      return "Rate limit exceeded. Free tier allows 600 requests per hour.";
    case "bad_request":
      return "Bad request. Please check your parameters.";
    case "upstream":
      return "API server error. Please try again later.";
    case "http":
      return `HTTP error ${error.status}`;
    case "timeout":
      return `Request timeout after ${error.timeoutSeconds} seconds`;
    case "network":
      return `Network error: ${error.cause}`;
    case "validation":
      return `Invalid ${error.field} format. Use ISO 8601: YYYY-MM-DDTHH:MM:SS+00:00`;
  }
}

export type ErrorStatusCode = 400 | 401 | 429 | 502 | 503 | 504;

export function getErrorStatusCode(type: NewsApiErrorType): ErrorStatusCode {
  switch (type) {
    case "validation":
    case "bad_request":
      return 400;
    case "auth":
      return 401;
    case "rate_limit":
      return 429;
    case "upstream":
    case "http":
      return 502;
    case "configuration":
    case "network":
      return 503;
    case "timeout":
      return 504;
  }
}
