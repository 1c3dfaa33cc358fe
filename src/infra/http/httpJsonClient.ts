import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import { logger as rootLogger } from "../../shared/logger/logger";

type HttpMethod = "GET" | "POST";

export type QueryValue = string | number | undefined;

export type HttpJsonRequest = {
  url: string;
  method?: HttpMethod;
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  retries?: number;
  retryDelayMs?: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

/**
 * Appends a path to a base URL that may itself carry a path prefix such as `/api/v1`.
 */
export const joinUrl = (base: string, path: string): string =>
  `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;

/**
 * Appends defined query values; undefined entries are dropped so optional filters can be passed through as-is.
 */
export const buildUrl = (
  base: string,
  query: Record<string, QueryValue> = {},
): string => {
  const url = new URL(base);
  Object.entries(query).forEach(([key, value]) => {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  });
  return url.toString();
};

/**
 * Shared JSON transport for provider adapters: one timeout, status and parse policy.
 * Bodies are returned as `unknown`; each adapter narrows its own payload shape.
 */
export class HttpJsonClient {
  constructor(
    private readonly log: Logger = rootLogger.child({ component: "http" }),
  ) {}

  async requestJson(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const url = buildUrl(request.url, request.query);
    const maxAttempts = (request.retries ?? 0) + 1;
    let last: Result<unknown, HttpClientError> = err({
      code: "transport_error",
      message: "HTTP request was never attempted.",
      retryable: false,
    });

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      last = await this.performRequest(url, request);
      if (last.isOk() || !last.error.retryable || attempt === maxAttempts) {
        break;
      }

      this.log.debug(
        { url: redactUrl(url), attempt, code: last.error.code },
        "Retrying HTTP request",
      );
      await this.delay((request.retryDelayMs ?? 250) * attempt);
    }

    return last;
  }

  private async performRequest(
    url: string,
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
    const method = request.method ?? "GET";

    try {
      const response = await fetch(url, {
        method,
        headers:
          request.body === undefined
            ? request.headers
            : { "Content-Type": "application/json", ...request.headers },
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      this.log.debug(
        { method, url: redactUrl(url), status: response.status },
        "HTTP response received",
      );

      if (!response.ok) {
        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable: response.status === 429 || response.status >= 500,
        });
      }

      try {
        const payload: unknown = await response.json();
        return ok(payload);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}

const SECRET_PARAMS = ["token", "apikey", "api_key"];

/**
 * Strips credential query parameters before a URL reaches the logs.
 */
export const redactUrl = (raw: string): string => {
  const url = new URL(raw);
  SECRET_PARAMS.forEach((name) => {
    if (url.searchParams.has(name)) {
      url.searchParams.set(name, "***");
    }
  });
  return url.toString();
};
