import { err, ok, type Result } from "neverthrow";
import type { CompanyNews } from "../../../core/entities/companyNews";
import type {
  FinancialMetricName,
  FinancialMetrics,
  ReportPeriodType,
} from "../../../core/entities/financialMetrics";
import type { InsiderTrade } from "../../../core/entities/insiderTrade";
import type { LineItem } from "../../../core/entities/lineItem";
import type { Price } from "../../../core/entities/price";
import type { DataOperation } from "../../../core/entities/provider";
import { filterRecords } from "../../../core/entities/recordKinds";
import type { DataAccessError } from "../../../core/entities/appError";
import type {
  CompanyNewsRequest,
  FinancialDataProviderPort,
  FinancialMetricsRequest,
  InsiderTradesRequest,
  LineItemSearchRequest,
  MarketCapRequest,
  PriceRequest,
  ProviderResult,
} from "../../../core/ports/inboundPorts";
import type { ProviderConnection } from "../../../shared/config/env";
import { joinUrl, type HttpJsonRequest } from "../../http/httpJsonClient";
import type { ProviderDependencies } from "../providerDependencies";
import { toDateKey, toIsoDate } from "../utils/dateUtils";
import { buildMetricValues } from "../utils/metricValues";
import {
  isJsonObject,
  readNumber,
  readObjects,
  readString,
  type JsonObject,
} from "../utils/payload";
import {
  missingPriceWindows,
  settledPriceRanges,
  type DateWindow,
} from "../utils/priceWindows";
import {
  fromHttpError,
  invalidRequest,
  malformedResponse,
} from "../utils/providerErrors";
import {
  coversLineItems,
  DEFAULT_EVENTS_LIMIT,
  DEFAULT_FUNDAMENTALS_LIMIT,
  DEFAULT_REPORT_PERIOD,
  lineItemRanges,
  selectLineItems,
  selectMetrics,
} from "../utils/requestSelection";

const PROVIDER = "financial_datasets";

const metricFields: Readonly<Partial<Record<FinancialMetricName, string>>> = {
  marketCap: "market_cap",
  enterpriseValue: "enterprise_value",
  priceToEarningsRatio: "price_to_earnings_ratio",
  priceToBookRatio: "price_to_book_ratio",
  priceToSalesRatio: "price_to_sales_ratio",
  enterpriseValueToEbitdaRatio: "enterprise_value_to_ebitda_ratio",
  enterpriseValueToRevenueRatio: "enterprise_value_to_revenue_ratio",
  freeCashFlowYield: "free_cash_flow_yield",
  grossMargin: "gross_margin",
  operatingMargin: "operating_margin",
  netMargin: "net_margin",
  returnOnEquity: "return_on_equity",
  returnOnAssets: "return_on_assets",
  currentRatio: "current_ratio",
  quickRatio: "quick_ratio",
  debtToEquity: "debt_to_equity",
  interestCoverage: "interest_coverage",
  payoutRatio: "payout_ratio",
  revenueGrowth: "revenue_growth",
  earningsGrowth: "earnings_growth",
  earningsPerShare: "earnings_per_share",
  bookValuePerShare: "book_value_per_share",
};

/**
 * Line items the search endpoint understands; the API already uses the canonical snake_case names.
 */
const supportedLineItems: ReadonlySet<string> = new Set([
  "revenue",
  "net_income",
  "operating_income",
  "gross_profit",
  "ebit",
  "ebitda",
  "free_cash_flow",
  "capital_expenditure",
  "depreciation_and_amortization",
  "research_and_development",
  "operating_expense",
  "outstanding_shares",
  "total_assets",
  "total_liabilities",
  "current_assets",
  "current_liabilities",
  "shareholders_equity",
  "cash_and_equivalents",
  "total_debt",
  "working_capital",
  "goodwill_and_intangible_assets",
  "dividends_and_other_cash_distributions",
  "issuance_or_purchase_of_equity_shares",
  "earnings_per_share",
  "book_value_per_share",
]);

const isReportPeriod = (value: string | undefined): value is ReportPeriodType =>
  value === "ttm" || value === "annual" || value === "quarterly";

/**
 * Reference handler. Works without an API key for the free tickers the service exposes.
 */
export class FinancialDatasetsProvider implements FinancialDataProviderPort {
  readonly id = PROVIDER;

  constructor(
    private readonly connection: ProviderConnection,
    private readonly deps: ProviderDependencies,
  ) {}

  async getPrices(request: PriceRequest): ProviderResult<Price[]> {
    const ticker = request.ticker.trim().toUpperCase();
    if (!ticker || request.startDate > request.endDate) {
      return err(
        invalidRequest(PROVIDER, "getPrices", "Ticker and an ordered date range are required."),
      );
    }

    const window: DateWindow = {
      startDate: request.startDate,
      endDate: request.endDate,
    };

    return this.deps.reader.read({
      kind: "prices",
      ticker,
      select: (records) => filterRecords("prices", records, window),
      isSatisfied: (view, fetchedRanges) =>
        missingPriceWindows(view, window, fetchedRanges).length === 0,
      answeredRanges: (view, fetchedRanges) =>
        settledPriceRanges(
          missingPriceWindows(view, window, fetchedRanges),
          toIsoDate(this.deps.clock.now()),
        ),
      fetch: async (view, fetchedRanges) => {
        const fetched: Price[] = [];
        for (const missing of missingPriceWindows(view, window, fetchedRanges)) {
          const result = await this.fetchPrices(ticker, missing);
          if (result.isErr()) {
            return err(result.error);
          }
          fetched.push(...result.value);
        }
        return ok(fetched);
      },
    });
  }

  async getFinancialMetrics(
    request: FinancialMetricsRequest,
  ): ProviderResult<FinancialMetrics[]> {
    const ticker = request.ticker.trim().toUpperCase();
    if (!ticker) {
      return err(invalidRequest(PROVIDER, "getFinancialMetrics", "Ticker is required."));
    }

    const period = request.period ?? DEFAULT_REPORT_PERIOD;
    const limit = request.limit ?? DEFAULT_FUNDAMENTALS_LIMIT;

    return this.deps.reader.read({
      kind: "financial_metrics",
      ticker,
      select: (records) => selectMetrics(records, request.endDate, period, limit),
      fetch: async () => {
        const payload = await this.get("getFinancialMetrics", "/financial-metrics/", {
          ticker,
          report_period_lte: request.endDate,
          limit,
          period,
        });
        return payload.andThen((body) =>
          this.mapRows(body, "financial_metrics", "getFinancialMetrics", (row) =>
            this.toMetrics(ticker, row, period),
          ),
        );
      },
    });
  }

  async searchLineItems(
    request: LineItemSearchRequest,
  ): ProviderResult<LineItem[]> {
    const ticker = request.ticker.trim().toUpperCase();
    if (!ticker) {
      return err(invalidRequest(PROVIDER, "searchLineItems", "Ticker is required."));
    }

    const names = request.lineItems.filter((name) => {
      if (supportedLineItems.has(name)) {
        return true;
      }
      this.deps.log.debug({ provider: PROVIDER, lineItem: name }, "Skipping unmapped line item");
      return false;
    });
    if (names.length === 0) {
      return ok([]);
    }

    const period = request.period ?? DEFAULT_REPORT_PERIOD;
    const limit = request.limit ?? DEFAULT_FUNDAMENTALS_LIMIT;

    return this.deps.reader.read({
      kind: "line_items",
      ticker,
      select: (records) =>
        selectLineItems(records, names, request.endDate, period, limit),
      isSatisfied: (view, fetchedRanges) =>
        coversLineItems(view, names, fetchedRanges, period, request.endDate),
      answeredRanges: () => lineItemRanges(names, period, request.endDate),
      fetch: async () => {
        const payload = await this.send("searchLineItems", {
          url: this.endpoint("/financials/search/line-items"),
          method: "POST",
          body: {
            tickers: [ticker],
            line_items: names,
            end_date: request.endDate,
            period,
            limit,
          },
        });
        return payload.andThen((body) =>
          this.mapRows(body, "search_results", "searchLineItems", (row) =>
            this.toLineItems(ticker, row, names, period),
          ).map((groups) => groups.flat()),
        );
      },
    });
  }

  async getInsiderTrades(
    request: InsiderTradesRequest,
  ): ProviderResult<InsiderTrade[]> {
    const ticker = request.ticker.trim().toUpperCase();
    if (!ticker) {
      return err(invalidRequest(PROVIDER, "getInsiderTrades", "Ticker is required."));
    }

    const limit = request.limit ?? DEFAULT_EVENTS_LIMIT;
    const window = { startDate: request.startDate, endDate: request.endDate };

    return this.deps.reader.read({
      kind: "insider_trades",
      ticker,
      select: (records) => filterRecords("insider_trades", records, window, limit),
      fetch: async () => {
        const payload = await this.get("getInsiderTrades", "/insider-trades/", {
          ticker,
          filing_date_lte: request.endDate,
          filing_date_gte: request.startDate,
          limit,
        });
        return payload.andThen((body) =>
          this.mapRows(body, "insider_trades", "getInsiderTrades", (row) =>
            this.toInsiderTrade(ticker, row),
          ),
        );
      },
    });
  }

  async getCompanyNews(
    request: CompanyNewsRequest,
  ): ProviderResult<CompanyNews[]> {
    const ticker = request.ticker.trim().toUpperCase();
    if (!ticker) {
      return err(invalidRequest(PROVIDER, "getCompanyNews", "Ticker is required."));
    }

    const limit = request.limit ?? DEFAULT_EVENTS_LIMIT;
    const window = { startDate: request.startDate, endDate: request.endDate };

    return this.deps.reader.read({
      kind: "company_news",
      ticker,
      select: (records) => filterRecords("company_news", records, window, limit),
      fetch: async () => {
        const payload = await this.get("getCompanyNews", "/news/", {
          ticker,
          end_date: request.endDate,
          start_date: request.startDate,
          limit,
        });
        return payload.andThen((body) =>
          this.mapRows(body, "news", "getCompanyNews", (row) =>
            this.toNews(ticker, row),
          ),
        );
      },
    });
  }

  /**
   * Current market cap comes from company facts; historical values from the latest ttm metrics row.
   * Never cached.
   */
  async getMarketCap(request: MarketCapRequest): ProviderResult<number | null> {
    const ticker = request.ticker.trim().toUpperCase();
    if (!ticker) {
      return err(invalidRequest(PROVIDER, "getMarketCap", "Ticker is required."));
    }

    const today = toIsoDate(this.deps.clock.now());
    if (request.endDate >= today) {
      const payload = await this.get("getMarketCap", "/company/facts/", { ticker });
      return payload.andThen((body) => {
        const facts = isJsonObject(body) ? body.company_facts : undefined;
        if (!isJsonObject(facts)) {
          return err(
            malformedResponse(PROVIDER, "getMarketCap", "Response has no company_facts object."),
          );
        }
        return ok(readNumber(facts, "market_cap"));
      });
    }

    const payload = await this.get("getMarketCap", "/financial-metrics/", {
      ticker,
      report_period_lte: request.endDate,
      limit: 1,
      period: "ttm",
    });
    return payload.andThen((body) => {
      const rows = isJsonObject(body) ? readObjects(body.financial_metrics) : null;
      if (!rows) {
        return err(
          malformedResponse(PROVIDER, "getMarketCap", "Response has no financial_metrics array."),
        );
      }
      const latest = rows.at(0);
      return ok(latest ? readNumber(latest, "market_cap") : null);
    });
  }

  private async fetchPrices(
    ticker: string,
    window: DateWindow,
  ): ProviderResult<Price[]> {
    const payload = await this.get("getPrices", "/prices/", {
      ticker,
      interval: "day",
      interval_multiplier: 1,
      start_date: window.startDate,
      end_date: window.endDate,
    });

    return payload.andThen((body) =>
      this.mapRows(body, "prices", "getPrices", (row) => this.toPrice(ticker, row)),
    );
  }

  private endpoint(path: string): string {
    return joinUrl(this.connection.baseUrl, path);
  }

  private get(
    operation: DataOperation,
    path: string,
    query: HttpJsonRequest["query"],
  ): Promise<Result<unknown, DataAccessError>> {
    return this.send(operation, { url: this.endpoint(path), query });
  }

  private async send(
    operation: DataOperation,
    request: Pick<HttpJsonRequest, "url" | "method" | "query" | "body">,
  ): Promise<Result<unknown, DataAccessError>> {
    const apiKey = this.connection.apiKey;
    const result = await this.deps.httpClient.requestJson({
      ...request,
      headers: apiKey ? { "X-API-KEY": apiKey } : undefined,
      timeoutMs: this.connection.timeoutMs,
      retries: this.deps.httpRetries,
    });

    return result.mapErr((error) => fromHttpError(error, PROVIDER, operation));
  }

  /**
   * Fails on a missing collection; skips individual rows the mapper rejects.
   */
  private mapRows<T>(
    body: unknown,
    field: string,
    operation: DataOperation,
    map: (row: JsonObject) => T | null,
  ): Result<T[], DataAccessError> {
    const rows = isJsonObject(body) ? readObjects(body[field]) : null;
    if (!rows) {
      return err(
        malformedResponse(PROVIDER, operation, `Response has no ${field} array.`),
      );
    }

    const records: T[] = [];
    rows.forEach((row, index) => {
      const mapped = map(row);
      if (mapped === null) {
        this.deps.log.debug({ provider: PROVIDER, operation, index }, "Skipping malformed row");
        return;
      }
      records.push(mapped);
    });
    return ok(records);
  }

  private toPrice(ticker: string, row: JsonObject): Price | null {
    const time = readString(row, "time");
    const open = readNumber(row, "open");
    const high = readNumber(row, "high");
    const low = readNumber(row, "low");
    const close = readNumber(row, "close");
    const volume = readNumber(row, "volume");
    if (!time || open === null || high === null || low === null || close === null || volume === null) {
      return null;
    }

    return { ticker, time: toDateKey(time), open, high, low, close, volume };
  }

  private toMetrics(
    ticker: string,
    row: JsonObject,
    requestedPeriod: ReportPeriodType,
  ): FinancialMetrics | null {
    const reportPeriod = readString(row, "report_period");
    if (!reportPeriod) {
      return null;
    }

    const period = readString(row, "period");
    return {
      ticker,
      reportPeriod: toDateKey(reportPeriod),
      period: isReportPeriod(period) ? period : requestedPeriod,
      currency: readString(row, "currency"),
      ...buildMetricValues((name) => {
        const field = metricFields[name];
        return field ? readNumber(row, field) : null;
      }),
    };
  }

  private toLineItems(
    ticker: string,
    row: JsonObject,
    names: readonly string[],
    requestedPeriod: ReportPeriodType,
  ): LineItem[] | null {
    const reportPeriod = readString(row, "report_period");
    if (!reportPeriod) {
      return null;
    }

    const period = readString(row, "period");
    const currency = readString(row, "currency");
    return names
      .filter((name) => name in row)
      .map((name) => ({
        ticker,
        lineItem: name,
        value: readNumber(row, name),
        reportPeriod: toDateKey(reportPeriod),
        period: isReportPeriod(period) ? period : requestedPeriod,
        currency,
      }));
  }

  private toInsiderTrade(ticker: string, row: JsonObject): InsiderTrade | null {
    const filingDate = readString(row, "filing_date");
    const insiderName = readString(row, "name");
    if (!filingDate || !insiderName) {
      return null;
    }

    const transactionDate = readString(row, "transaction_date");
    const shares = readNumber(row, "transaction_shares") ?? 0;
    const price = readNumber(row, "transaction_price_per_share") ?? 0;
    return {
      ticker,
      insiderName,
      title: readString(row, "title"),
      transactionType: readString(row, "transaction_type"),
      filingDate: toDateKey(filingDate),
      transactionDate: transactionDate ? toDateKey(transactionDate) : null,
      shares,
      price,
      value: readNumber(row, "transaction_value") ?? Math.abs(shares) * price,
    };
  }

  private toNews(ticker: string, row: JsonObject): CompanyNews | null {
    const date = readString(row, "date");
    const headline = readString(row, "title");
    if (!date || !headline) {
      return null;
    }

    return {
      ticker,
      date: toDateKey(date),
      headline,
      summary: readString(row, "summary") ?? "",
      source: readString(row, "source") ?? "",
      url: readString(row, "url") ?? "",
      author: readString(row, "author"),
      sentiment: readString(row, "sentiment"),
    };
  }
}
