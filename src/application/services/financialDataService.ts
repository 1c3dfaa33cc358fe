import { err } from "neverthrow";
import type { Logger } from "pino";
import type { DataAccessError } from "../../core/entities/appError";
import type { CompanyNews } from "../../core/entities/companyNews";
import type { FinancialMetrics } from "../../core/entities/financialMetrics";
import type { InsiderTrade } from "../../core/entities/insiderTrade";
import type { LineItem } from "../../core/entities/lineItem";
import type { Price } from "../../core/entities/price";
import type { DataOperation } from "../../core/entities/provider";
import type {
  CompanyNewsRequest,
  FinancialDataProviderPort,
  FinancialMetricsRequest,
  InsiderTradesRequest,
  LineItemSearchRequest,
  MarketCapRequest,
  PriceRequest,
  ProviderResult,
} from "../../core/ports/inboundPorts";
import type { ProviderRegistry } from "../bootstrap/providerRegistry";
import { logger as rootLogger } from "../../shared/logger/logger";
import { toPriceFrame, type PriceFrame } from "./priceFrame";

export type ProviderDirectory = Pick<
  ProviderRegistry,
  "getHandler" | "fallbackProviders"
>;

type ProviderCall<T> = (handler: FinancialDataProviderPort) => ProviderResult<T>;

/**
 * Caller-facing data access. Tries the primary provider, then at most one fallback, then gives up with an empty value.
 * Only a ConfigurationError for the primary provider escapes.
 */
export class FinancialDataService {
  constructor(
    private readonly providers: ProviderDirectory,
    private readonly log: Logger = rootLogger.child({ component: "financial-data" }),
  ) {}

  getPrices(request: PriceRequest, provider?: string): Promise<Price[]> {
    return this.dispatch<Price[]>("getPrices", request.ticker, provider, [], (handler) =>
      handler.getPrices(request),
    );
  }

  async getPriceFrame(request: PriceRequest, provider?: string): Promise<PriceFrame> {
    return toPriceFrame(await this.getPrices(request, provider));
  }

  getFinancialMetrics(
    request: FinancialMetricsRequest,
    provider?: string,
  ): Promise<FinancialMetrics[]> {
    return this.dispatch<FinancialMetrics[]>("getFinancialMetrics", request.ticker, provider, [], (handler) =>
      handler.getFinancialMetrics(request),
    );
  }

  searchLineItems(
    request: LineItemSearchRequest,
    provider?: string,
  ): Promise<LineItem[]> {
    return this.dispatch<LineItem[]>("searchLineItems", request.ticker, provider, [], (handler) =>
      handler.searchLineItems(request),
    );
  }

  getInsiderTrades(
    request: InsiderTradesRequest,
    provider?: string,
  ): Promise<InsiderTrade[]> {
    return this.dispatch<InsiderTrade[]>("getInsiderTrades", request.ticker, provider, [], (handler) =>
      handler.getInsiderTrades(request),
    );
  }

  getCompanyNews(
    request: CompanyNewsRequest,
    provider?: string,
  ): Promise<CompanyNews[]> {
    return this.dispatch<CompanyNews[]>("getCompanyNews", request.ticker, provider, [], (handler) =>
      handler.getCompanyNews(request),
    );
  }

  getMarketCap(request: MarketCapRequest, provider?: string): Promise<number | null> {
    return this.dispatch<number | null>("getMarketCap", request.ticker, provider, null, (handler) =>
      handler.getMarketCap(request),
    );
  }

  private async dispatch<T>(
    operation: DataOperation,
    ticker: string,
    providerId: string | undefined,
    empty: T,
    call: ProviderCall<T>,
  ): Promise<T> {
    if (!ticker.trim()) {
      this.log.debug({ operation }, "Blank ticker; returning empty result");
      return empty;
    }

    const primary = this.providers.getHandler(providerId);
    const first = await this.attempt(primary, operation, call);
    if (first.isOk()) {
      return first.value;
    }

    this.log.warn(
      { operation, ticker, provider: primary.id, code: first.error.code, err: first.error.message },
      "Primary provider failed; trying fallback",
    );

    const fallbackId = this.providers.fallbackProviders(primary.id).at(0);
    if (!fallbackId) {
      this.log.error(
        { operation, ticker, provider: primary.id },
        "No fallback provider available; returning empty result",
      );
      return empty;
    }

    let fallback: FinancialDataProviderPort;
    try {
      fallback = this.providers.getHandler(fallbackId);
    } catch (error) {
      this.log.error(
        { operation, ticker, provider: fallbackId, err: error },
        "Fallback provider could not be created; returning empty result",
      );
      return empty;
    }

    const second = await this.attempt(fallback, operation, call);
    if (second.isOk()) {
      return second.value;
    }

    this.log.error(
      {
        operation,
        ticker,
        provider: fallback.id,
        code: second.error.code,
        err: second.error.message,
      },
      "All providers failed; returning empty result",
    );
    return empty;
  }

  /**
   * Handlers report failures as values; a throw is folded into the same shape so it follows the same path.
   */
  private async attempt<T>(
    handler: FinancialDataProviderPort,
    operation: DataOperation,
    call: ProviderCall<T>,
  ): ProviderResult<T> {
    try {
      return await call(handler);
    } catch (cause) {
      const error: DataAccessError = {
        kind: "fetch",
        code: "provider_error",
        provider: handler.id,
        operation,
        message: cause instanceof Error ? cause.message : String(cause),
        retryable: false,
        cause,
      };
      return err(error);
    }
  }
}
