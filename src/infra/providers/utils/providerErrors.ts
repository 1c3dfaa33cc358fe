import type {
  FetchError,
  NormalizationError,
} from "../../../core/entities/appError";
import type { DataOperation } from "../../../core/entities/provider";
import type { HttpClientError } from "../../http/httpJsonClient";

const mapHttpCode = (error: HttpClientError): FetchError["code"] => {
  if (error.code === "timeout") return "timeout";
  if (error.code === "transport_error") return "transport_error";
  if (error.code === "invalid_json") return "invalid_json";
  if (error.httpStatus === 429) return "rate_limited";
  if (error.httpStatus === 401 || error.httpStatus === 403) {
    return "auth_invalid";
  }
  return "provider_error";
};

export const fromHttpError = (
  error: HttpClientError,
  provider: string,
  operation: DataOperation,
): FetchError => ({
  kind: "fetch",
  code: mapHttpCode(error),
  provider,
  operation,
  message: error.message,
  retryable: error.retryable,
  httpStatus: error.httpStatus,
  cause: error.cause,
});

export const malformedResponse = (
  provider: string,
  operation: DataOperation,
  message: string,
): NormalizationError => ({
  kind: "normalization",
  code: "malformed_response",
  provider,
  operation,
  message,
  retryable: false,
});

export const invalidRequest = (
  provider: string,
  operation: DataOperation,
  message: string,
): FetchError => ({
  kind: "fetch",
  code: "invalid_request",
  provider,
  operation,
  message,
  retryable: false,
});
