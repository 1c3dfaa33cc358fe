import { err, ok, type Result } from "neverthrow";
import { ConfigurationError, type DataAccessError } from "../../../core/entities/appError";
import type { CompanyNews } from "../../../core/entities/companyNews";
import type {
  FinancialMetricName,
  FinancialMetrics,
} from "../../../core/entities/financialMetrics";
import type { InsiderTrade } from "../../../core/entities/insiderTrade";
import type { LineItem } from "../../../core/entities/lineItem";
import type { Price } from "../../../core/entities/price";
import type { DataOperation } from "../../../core/entities/provider";
import { filterRecords } from "../../../core/entities/recordKinds";
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
import {
  fromUnixSeconds,
  shiftDays,
  toDateKey,
  toIsoDate,
  toUnixSeconds,
} from "../utils/dateUtils";
import { buildMetricValues } from "../utils/metricValues";
import {
  isJsonObject,
  readNumber,
  readNumbers,
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

const PROVIDER = "finnhub";
const MILLION = 1_000_000;
const DEFAULT_NEWS_LOOKBACK_DAYS = 30;

const candleColumns = {
  open: "o",
  high: "h",
  low: "l",
  close: "c",
  volume: "v",
} as const;

type MetricField = { key: string; scale?: number };

/**
 * Finnhub reports margins and returns as percentages and market values in millions.
 * `/stock/metric` is a current snapshot: these values are today's, whatever end date or period the
 * request names, and the row is only labelled with the latest annual period and the requested period.
 */
const metricFields: Readonly<Partial<Record<FinancialMetricName, MetricField>>> = {
  marketCap: { key: "marketCapitalization", scale: MILLION },
  enterpriseValue: { key: "enterpriseValue", scale: MILLION },
  priceToEarningsRatio: { key: "peBasicExclExtraTTM" },
  priceToBookRatio: { key: "pbQuarterly" },
  priceToSalesRatio: { key: "psTTM" },
  grossMargin: { key: "grossMarginTTM", scale: 0.01 },
  operatingMargin: { key: "operatingMarginTTM", scale: 0.01 },
  netMargin: { key: "netProfitMarginTTM", scale: 0.01 },
  returnOnEquity: { key: "roeTTM", scale: 0.01 },
  returnOnAssets: { key: "roaTTM", scale: 0.01 },
  currentRatio: { key: "currentRatioQuarterly" },
  quickRatio: { key: "quickRatioQuarterly" },
  debtToEquity: { key: "totalDebt/totalEquityQuarterly" },
  interestCoverage: { key: "netInterestCoverageTTM" },
  payoutRatio: { key: "payoutRatioTTM", scale: 0.01 },
  dividendYield: { key: "dividendYieldIndicatedAnnual", scale: 0.01 },
  revenueGrowth: { key: "revenueGrowthTTMYoy", scale: 0.01 },
  earningsGrowth: { key: "epsGrowthTTMYoy", scale: 0.01 },
  earningsPerShare: { key: "epsTTM" },
  bookValuePerShare: { key: "bookValuePerShareQuarterly" },
};

/** Canonical line item name → field of an annual `/stock/financials` row. */
const lineItemFields: Readonly<Record<string, string>> = {
  capital_expenditure: "capitalExpenditures",
  depreciation_and_amortization: "depreciationAndAmortization",
  net_income: "netIncome",
  outstanding_shares: "outstandingShares",
  total_assets: "totalAssets",
  total_liabilities: "totalLiabilities",
  dividends_and_other_cash_distributions: "dividendsPaid",
  issuance_or_purchase_of_equity_shares: "issuanceOfCapitalStock",
};

/**
 * Finnhub handler. Every call needs a token, so construction fails fast without one.
 */
export class FinnhubProvider implements FinancialDataProviderPort {
  readonly id = PROVIDER;

  constructor(
    private readonly connection: ProviderConnection,
    private readonly deps: ProviderDependencies,
  ) {
    if (!connection.apiKey.trim()) {
      throw new ConfigurationError(
        "FINNHUB_API_KEY is required when the finnhub provider is used.",
        PROVIDER,
      );
    }
  }

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
          const result = await this.fetchCandles(ticker, missing);
          if (result.isErr()) {
            return err(result.error);
          }
          fetched.push(...result.value);
        }
        return ok(fetched);
      },
    });
  }

  /**
   * Finnhub only exposes the current metric snapshot; it is stamped with the latest annual period it reports.
   */
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
        const payload = await this.get("getFinancialMetrics", "/stock/metric", {
          symbol: ticker,
          metric: "all",
        });

        return payload.andThen((body): Result<FinancialMetrics[], DataAccessError> => {
          const snapshot = isJsonObject(body) ? body.metric : undefined;
          if (!isJsonObject(body) || !isJsonObject(snapshot)) {
            return err(
              malformedResponse(PROVIDER, "getFinancialMetrics", "Response has no metric object."),
            );
          }
          const metric: JsonObject = snapshot;

          return ok([
            {
              ticker,
              reportPeriod: this.latestAnnualPeriod(body),
              period,
              currency: readString(body, "currency"),
              ...buildMetricValues((name) => {
                const field = metricFields[name];
                const value = field ? readNumber(metric, field.key) : null;
                return value === null || !field ? null : value * (field.scale ?? 1);
              }),
            },
          ]);
        });
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
      if (Object.hasOwn(lineItemFields, name)) {
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
        const payload = await this.get("searchLineItems", "/stock/financials", {
          symbol: ticker,
          statement: "all",
          freq: "annual",
        });

        return payload.andThen((body): Result<LineItem[], DataAccessError> => {
          const rows = isJsonObject(body) ? readObjects(body.financials) : null;
          if (!rows) {
            return err(
              malformedResponse(PROVIDER, "searchLineItems", "Response has no financials array."),
            );
          }

          return ok(
            rows.flatMap((row) => {
              const year = readNumber(row, "year");
              if (year === null) {
                this.deps.log.debug({ provider: PROVIDER }, "Skipping financials row without year");
                return [];
              }

              return names.flatMap((name) => {
                const field = lineItemFields[name];
                if (!field || !(field in row)) {
                  return [];
                }
                return [
                  {
                    ticker,
                    lineItem: name,
                    value: readNumber(row, field),
                    reportPeriod: `${year}-12-31`,
                    period,
                  },
                ];
              });
            }),
          );
        });
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
        const payload = await this.get("getInsiderTrades", "/stock/insider-transactions", {
          symbol: ticker,
          from: request.startDate,
          to: request.endDate,
        });

        return payload.andThen((body) => {
          const rows = isJsonObject(body) ? readObjects(body.data) : null;
          if (!rows) {
            return err(
              malformedResponse(PROVIDER, "getInsiderTrades", "Response has no data array."),
            );
          }
          return ok(this.mapRows(rows, "getInsiderTrades", (row) => this.toInsiderTrade(ticker, row)));
        });
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
        const payload = await this.get("getCompanyNews", "/company-news", {
          symbol: ticker,
          from:
            request.startDate ??
            shiftDays(request.endDate, -DEFAULT_NEWS_LOOKBACK_DAYS),
          to: request.endDate,
        });

        return payload.andThen((body) => {
          const rows = readObjects(body);
          if (!rows) {
            return err(
              malformedResponse(PROVIDER, "getCompanyNews", "Response was not an array."),
            );
          }
          return ok(this.mapRows(rows, "getCompanyNews", (row) => this.toNews(ticker, row)));
        });
      },
    });
  }

  /**
   * Profile market cap is the current value in millions; `endDate` is not honoured by this endpoint.
   */
  async getMarketCap(request: MarketCapRequest): ProviderResult<number | null> {
    const ticker = request.ticker.trim().toUpperCase();
    if (!ticker) {
      return err(invalidRequest(PROVIDER, "getMarketCap", "Ticker is required."));
    }

    const payload = await this.get("getMarketCap", "/stock/profile2", {
      symbol: ticker,
    });

    return payload.andThen((body) => {
      if (!isJsonObject(body)) {
        return err(
          malformedResponse(PROVIDER, "getMarketCap", "Response was not an object."),
        );
      }
      const millions = readNumber(body, "marketCapitalization");
      return ok(millions === null ? null : millions * MILLION);
    });
  }

  private async fetchCandles(
    ticker: string,
    window: DateWindow,
  ): ProviderResult<Price[]> {
    const payload = await this.get("getPrices", "/stock/candle", {
      symbol: ticker,
      resolution: "D",
      from: toUnixSeconds(window.startDate),
      to: toUnixSeconds(shiftDays(window.endDate, 1)),
    });

    return payload.andThen((body): Result<Price[], DataAccessError> => {
      if (!isJsonObject(body)) {
        return err(malformedResponse(PROVIDER, "getPrices", "Response was not an object."));
      }
      if (body.s === "no_data") {
        return ok([]);
      }

      const times = readNumbers(body, "t");
      if (!times) {
        return err(malformedResponse(PROVIDER, "getPrices", "Response has no t column."));
      }

      const columns = {
        open: readNumbers(body, candleColumns.open) ?? [],
        high: readNumbers(body, candleColumns.high) ?? [],
        low: readNumbers(body, candleColumns.low) ?? [],
        close: readNumbers(body, candleColumns.close) ?? [],
        volume: readNumbers(body, candleColumns.volume) ?? [],
      };

      const prices: Price[] = [];
      times.forEach((seconds, index) => {
        const price = {
          ticker,
          time: Number.isFinite(seconds) ? fromUnixSeconds(seconds) : "",
          open: columns.open[index] ?? Number.NaN,
          high: columns.high[index] ?? Number.NaN,
          low: columns.low[index] ?? Number.NaN,
          close: columns.close[index] ?? Number.NaN,
          volume: columns.volume[index] ?? Number.NaN,
        };
        const complete =
          price.time !== "" &&
          [price.open, price.high, price.low, price.close, price.volume].every(Number.isFinite);

        if (complete) {
          prices.push(price);
        } else {
          this.deps.log.debug({ provider: PROVIDER, index }, "Skipping incomplete candle");
        }
      });
      return ok(prices);
    });
  }

  private latestAnnualPeriod(body: JsonObject): string {
    const series = isJsonObject(body.series) ? body.series.annual : undefined;
    const periods = isJsonObject(series)
      ? Object.values(series)
          .flatMap((points) => readObjects(points) ?? [])
          .map((point) => readString(point, "period"))
          .filter((period): period is string => period !== undefined)
          .map(toDateKey)
      : [];

    return periods.sort().at(-1) ?? toIsoDate(this.deps.clock.now());
  }

  private get(
    operation: DataOperation,
    path: string,
    query: HttpJsonRequest["query"],
  ): Promise<Result<unknown, DataAccessError>> {
    return this.deps.httpClient
      .requestJson({
        url: joinUrl(this.connection.baseUrl, path),
        query,
        headers: { "X-Finnhub-Token": this.connection.apiKey },
        timeoutMs: this.connection.timeoutMs,
        retries: this.deps.httpRetries,
      })
      .then((result) => result.mapErr((error) => fromHttpError(error, PROVIDER, operation)));
  }

  private mapRows<T>(
    rows: JsonObject[],
    operation: DataOperation,
    map: (row: JsonObject) => T | null,
  ): T[] {
    return rows.flatMap((row, index) => {
      const mapped = map(row);
      if (mapped === null) {
        this.deps.log.debug({ provider: PROVIDER, operation, index }, "Skipping malformed row");
        return [];
      }
      return [mapped];
    });
  }

  private toInsiderTrade(ticker: string, row: JsonObject): InsiderTrade | null {
    const insiderName = readString(row, "name");
    const filingDate = readString(row, "filingDate");
    if (!insiderName || !filingDate) {
      return null;
    }

    const transactionDate = readString(row, "transactionDate");
    const shares = readNumber(row, "change") ?? 0;
    const price = readNumber(row, "transactionPrice") ?? 0;
    return {
      ticker,
      insiderName,
      transactionType: readString(row, "transactionCode"),
      filingDate: toDateKey(filingDate),
      transactionDate: transactionDate ? toDateKey(transactionDate) : null,
      shares,
      price,
      value: Math.abs(shares) * price,
    };
  }

  private toNews(ticker: string, row: JsonObject): CompanyNews | null {
    const seconds = readNumber(row, "datetime");
    const headline = readString(row, "headline");
    if (seconds === null || !headline) {
      return null;
    }

    return {
      ticker,
      date: fromUnixSeconds(seconds),
      headline,
      summary: readString(row, "summary") ?? "",
      source: readString(row, "source") ?? "",
      url: readString(row, "url") ?? "",
    };
  }
}
