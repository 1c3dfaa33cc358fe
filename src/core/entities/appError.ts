import type { DataOperation } from "./provider";

export type FetchErrorCode =
  | "timeout"
  | "transport_error"
  | "rate_limited"
  | "auth_invalid"
  | "provider_error"
  | "invalid_json"
  | "invalid_request";

/**
 * A single provider call that did not produce a usable payload.
 */
export type FetchError = {
  kind: "fetch";
  code: FetchErrorCode;
  provider: string;
  operation: DataOperation;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * The payload arrived but its overall shape could not be mapped to canonical records.
 */
export type NormalizationError = {
  kind: "normalization";
  code: "malformed_response";
  provider: string;
  operation: DataOperation;
  message: string;
  retryable: false;
  cause?: unknown;
};

export type DataAccessError = FetchError | NormalizationError;

/**
 * Raised when a provider cannot be constructed or resolved. Never retried or failed over.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly provider?: string,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}
