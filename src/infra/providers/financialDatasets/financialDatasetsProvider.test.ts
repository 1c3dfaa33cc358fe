import { afterEach, describe, expect, it } from "vitest";
import {
  createProviderDependencies,
  expectOk,
  jsonResponse,
  restoreFetch,
  stubFetch,
} from "../testing/providerHarness";
import { FinancialDatasetsProvider } from "./financialDatasetsProvider";

const connection = {
  baseUrl: "https://fd.test",
  apiKey: "test-key",
  timeoutMs: 1_000,
};

const bar = (time: string, close: number) => ({
  ticker: "AAPL",
  time,
  open: close - 1,
  high: close + 1,
  low: close - 2,
  close,
  volume: 5_000,
});

const createProvider = () => {
  const { cache, deps } = createProviderDependencies();
  return { cache, provider: new FinancialDatasetsProvider(connection, deps) };
};

afterEach(() => {
  restoreFetch();
});

describe("FinancialDatasetsProvider prices", () => {
  it("reuses cached bars and fetches only the missing tail of a wider range", async () => {
    const calls = stubFetch(({ url }) => {
      const range = `${url.searchParams.get("start_date")}..${url.searchParams.get("end_date")}`;
      if (range === "2024-01-01..2024-01-05") {
        return jsonResponse({
          prices: [bar("2024-01-03", 100), bar("2024-01-04", 101), bar("2024-01-05", 102)],
        });
      }
      if (range === "2024-01-06..2024-01-10") {
        return jsonResponse({
          prices: [
            bar("2024-01-05", 999),
            { ...bar("2024-01-08", 103), time: "2024-01-08T05:00:00Z" },
            bar("2024-01-09", 104),
            bar("2024-01-10", 105),
          ],
        });
      }
      return jsonResponse({ prices: [] });
    });
    const { provider } = createProvider();

    const first = expectOk(
      await provider.getPrices({ ticker: "AAPL", startDate: "2024-01-01", endDate: "2024-01-05" }),
    );
    expect(first.map((price) => price.time)).toEqual([
      "2024-01-03",
      "2024-01-04",
      "2024-01-05",
    ]);

    const second = expectOk(
      await provider.getPrices({ ticker: "AAPL", startDate: "2024-01-01", endDate: "2024-01-10" }),
    );

    expect(calls).toHaveLength(2);
    expect(calls.slice(1).map(({ url }) => [
      url.searchParams.get("start_date"),
      url.searchParams.get("end_date"),
    ])).toEqual([["2024-01-06", "2024-01-10"]]);
    expect(second.map((price) => price.time)).toEqual([
      "2024-01-03",
      "2024-01-04",
      "2024-01-05",
      "2024-01-08",
      "2024-01-09",
      "2024-01-10",
    ]);
    expect(second[2]?.close).toBe(999);
  });

  it("does not touch the network when the cache covers the range", async () => {
    const calls = stubFetch(() =>
      jsonResponse({
        prices: [bar("2024-01-03", 100), bar("2024-01-04", 101), bar("2024-01-05", 102)],
      }),
    );
    const { provider } = createProvider();

    await provider.getPrices({ ticker: "AAPL", startDate: "2024-01-03", endDate: "2024-01-05" });
    const repeat = expectOk(
      await provider.getPrices({ ticker: "aapl", startDate: "2024-01-03", endDate: "2024-01-05" }),
    );
    const inner = expectOk(
      await provider.getPrices({ ticker: "AAPL", startDate: "2024-01-04", endDate: "2024-01-05" }),
    );

    expect(calls).toHaveLength(1);
    expect(repeat).toHaveLength(3);
    expect(inner.map((price) => price.time)).toEqual(["2024-01-04", "2024-01-05"]);
  });

  it("fetches a range with a holiday edge only once", async () => {
    const calls = stubFetch(() =>
      jsonResponse({
        prices: [bar("2024-01-02", 100), bar("2024-01-03", 101), bar("2024-01-04", 102)],
      }),
    );
    const { provider } = createProvider();
    const request = { ticker: "AAPL", startDate: "2024-01-01", endDate: "2024-01-05" };

    for (let attempt = 0; attempt < 4; attempt += 1) {
      const prices = expectOk(await provider.getPrices(request));
      expect(prices.map((price) => price.time)).toEqual([
        "2024-01-02",
        "2024-01-03",
        "2024-01-04",
      ]);
    }

    expect(calls).toHaveLength(1);
  });

  it("asks again for today's bar until the day is over", async () => {
    const calls = stubFetch(() =>
      jsonResponse({
        prices: [
          bar("2024-06-10", 100),
          bar("2024-06-11", 101),
          bar("2024-06-12", 102),
          bar("2024-06-13", 103),
        ],
      }),
    );
    const { provider } = createProvider();
    const request = { ticker: "AAPL", startDate: "2024-06-10", endDate: "2024-06-14" };

    await provider.getPrices(request);
    await provider.getPrices(request);

    expect(calls.map(({ url }) => [
      url.searchParams.get("start_date"),
      url.searchParams.get("end_date"),
    ])).toEqual([
      ["2024-06-10", "2024-06-14"],
      ["2024-06-14", "2024-06-14"],
    ]);
  });

  it("treats a weekend-only gap as covered", async () => {
    const calls = stubFetch(() =>
      jsonResponse({ prices: [bar("2024-01-04", 101), bar("2024-01-05", 102)] }),
    );
    const { provider } = createProvider();

    await provider.getPrices({ ticker: "AAPL", startDate: "2024-01-04", endDate: "2024-01-05" });
    const widened = expectOk(
      await provider.getPrices({ ticker: "AAPL", startDate: "2024-01-04", endDate: "2024-01-07" }),
    );

    expect(calls).toHaveLength(1);
    expect(widened).toHaveLength(2);
  });

  it("sends the API key header and the daily interval query", async () => {
    const calls = stubFetch(() => jsonResponse({ prices: [] }));
    const { provider } = createProvider();

    await provider.getPrices({ ticker: "msft", startDate: "2024-02-01", endDate: "2024-02-02" });

    const request = calls[0];
    expect(request?.url.pathname).toBe("/prices/");
    expect(request?.url.searchParams.get("ticker")).toBe("MSFT");
    expect(request?.url.searchParams.get("interval")).toBe("day");
    expect(request?.url.searchParams.get("interval_multiplier")).toBe("1");
    expect(request?.headers.get("X-API-KEY")).toBe("test-key");
  });

  it("skips malformed rows and keeps the rest of the batch", async () => {
    stubFetch(() =>
      jsonResponse({
        prices: [bar("2024-01-03", 100), { time: "2024-01-04", open: "n/a" }, "noise"],
      }),
    );
    const { provider } = createProvider();

    const prices = expectOk(
      await provider.getPrices({ ticker: "AAPL", startDate: "2024-01-03", endDate: "2024-01-04" }),
    );

    expect(prices).toEqual([bar("2024-01-03", 100)]);
  });

  it("reports a payload without a prices array as a normalization error", async () => {
    stubFetch(() => jsonResponse({ detail: "unexpected" }));
    const { provider } = createProvider();

    const result = await provider.getPrices({
      ticker: "AAPL",
      startDate: "2024-01-03",
      endDate: "2024-01-04",
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected an error");
    }
    expect(result.error.kind).toBe("normalization");
    expect(result.error.code).toBe("malformed_response");
  });

  it("maps an unauthorized status to auth_invalid", async () => {
    stubFetch(() => jsonResponse({ error: "bad key" }, 401));
    const { provider, cache } = createProvider();

    const result = await provider.getPrices({
      ticker: "AAPL",
      startDate: "2024-01-03",
      endDate: "2024-01-04",
    });

    if (result.isOk()) {
      throw new Error("expected an error");
    }
    expect(result.error).toMatchObject({
      kind: "fetch",
      code: "auth_invalid",
      provider: "financial_datasets",
      operation: "getPrices",
      httpStatus: 401,
    });
    expect(await cache.get("prices", "AAPL")).toEqual([]);
  });

  it("rejects a blank ticker without calling the provider", async () => {
    const calls = stubFetch(() => jsonResponse({ prices: [] }));
    const { provider } = createProvider();

    const result = await provider.getPrices({
      ticker: "  ",
      startDate: "2024-01-03",
      endDate: "2024-01-04",
    });

    if (result.isOk()) {
      throw new Error("expected an error");
    }
    expect(result.error.code).toBe("invalid_request");
    expect(calls).toHaveLength(0);
  });
});

describe("FinancialDatasetsProvider fundamentals", () => {
  it("maps metrics rows and serves repeats from cache", async () => {
    const calls = stubFetch(() =>
      jsonResponse({
        financial_metrics: [
          {
            ticker: "AAPL",
            report_period: "2024-03-30",
            period: "ttm",
            currency: "USD",
            market_cap: 100,
            price_to_earnings_ratio: "25.5",
            gross_margin: null,
          },
          { ticker: "AAPL", period: "ttm" },
        ],
      }),
    );
    const { provider } = createProvider();

    const metrics = expectOk(
      await provider.getFinancialMetrics({ ticker: "AAPL", endDate: "2024-06-01" }),
    );
    await provider.getFinancialMetrics({ ticker: "AAPL", endDate: "2024-06-01" });

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url.searchParams.get("report_period_lte")).toBe("2024-06-01");
    expect(calls[0]?.url.searchParams.get("limit")).toBe("10");
    expect(calls[0]?.url.searchParams.get("period")).toBe("ttm");
    expect(metrics).toHaveLength(1);
    expect(metrics[0]).toMatchObject({
      ticker: "AAPL",
      reportPeriod: "2024-03-30",
      period: "ttm",
      currency: "USD",
      marketCap: 100,
      priceToEarningsRatio: 25.5,
      grossMargin: null,
      dividendYield: null,
    });
  });

  it("posts a line item search and skips names it cannot map", async () => {
    const calls = stubFetch(() =>
      jsonResponse({
        search_results: [
          {
            ticker: "AAPL",
            report_period: "2023-12-31",
            period: "ttm",
            currency: "USD",
            revenue: 1_000,
            net_income: 200,
          },
        ],
      }),
    );
    const { provider } = createProvider();

    const items = expectOk(
      await provider.searchLineItems({
        ticker: "AAPL",
        lineItems: ["revenue", "net_income", "made_up_metric"],
        endDate: "2024-06-01",
      }),
    );
    await provider.searchLineItems({
      ticker: "AAPL",
      lineItems: ["revenue"],
      endDate: "2024-06-01",
    });

    expect(calls).toHaveLength(1);
    expect(calls[0]?.method).toBe("POST");
    expect(calls[0]?.url.pathname).toBe("/financials/search/line-items");
    expect(calls[0]?.body).toEqual({
      tickers: ["AAPL"],
      line_items: ["revenue", "net_income"],
      end_date: "2024-06-01",
      period: "ttm",
      limit: 10,
    });
    expect(items.map((item) => [item.lineItem, item.value])).toEqual([
      ["net_income", 200],
      ["revenue", 1_000],
    ]);
  });

  it("does not ask again for a line item the provider left out", async () => {
    const calls = stubFetch(() =>
      jsonResponse({
        search_results: [
          { ticker: "AAPL", report_period: "2023-12-31", period: "ttm", revenue: 1_000 },
        ],
      }),
    );
    const { provider } = createProvider();
    const request = {
      ticker: "AAPL",
      lineItems: ["revenue", "goodwill_and_intangible_assets"],
      endDate: "2024-06-01",
    };

    for (let attempt = 0; attempt < 3; attempt += 1) {
      const items = expectOk(await provider.searchLineItems(request));
      expect(items.map((item) => [item.lineItem, item.value])).toEqual([["revenue", 1_000]]);
    }

    expect(calls).toHaveLength(1);
  });

  it("fetches again when a line item was never asked for", async () => {
    const calls = stubFetch(() =>
      jsonResponse({
        search_results: [
          { ticker: "AAPL", report_period: "2023-12-31", period: "ttm", revenue: 1_000 },
        ],
      }),
    );
    const { provider } = createProvider();

    await provider.searchLineItems({ ticker: "AAPL", lineItems: ["revenue"], endDate: "2024-06-01" });
    await provider.searchLineItems({
      ticker: "AAPL",
      lineItems: ["revenue", "net_income"],
      endDate: "2024-06-01",
    });
    await provider.searchLineItems({
      ticker: "AAPL",
      lineItems: ["net_income"],
      endDate: "2024-06-01",
    });

    expect(calls.map(({ body }) => body)).toEqual([
      { tickers: ["AAPL"], line_items: ["revenue"], end_date: "2024-06-01", period: "ttm", limit: 10 },
      {
        tickers: ["AAPL"],
        line_items: ["revenue", "net_income"],
        end_date: "2024-06-01",
        period: "ttm",
        limit: 10,
      },
    ]);
  });

  it("returns nothing without a request when no line item can be mapped", async () => {
    const calls = stubFetch(() => jsonResponse({ search_results: [] }));
    const { provider } = createProvider();

    const items = expectOk(
      await provider.searchLineItems({
        ticker: "AAPL",
        lineItems: ["made_up_metric"],
        endDate: "2024-06-01",
      }),
    );

    expect(items).toEqual([]);
    expect(calls).toHaveLength(0);
  });

  it("maps insider trades and derives a missing value", async () => {
    const calls = stubFetch(() =>
      jsonResponse({
        insider_trades: [
          {
            ticker: "AAPL",
            name: "Jane Doe",
            title: "CFO",
            filing_date: "2024-02-01",
            transaction_date: "2024-01-30",
            transaction_shares: -100,
            transaction_price_per_share: 190,
            transaction_value: null,
          },
        ],
      }),
    );
    const { provider } = createProvider();

    const trades = expectOk(
      await provider.getInsiderTrades({ ticker: "AAPL", endDate: "2024-02-29" }),
    );

    expect(calls[0]?.url.searchParams.get("filing_date_lte")).toBe("2024-02-29");
    expect(calls[0]?.url.searchParams.has("filing_date_gte")).toBe(false);
    expect(calls[0]?.url.searchParams.get("limit")).toBe("1000");
    expect(trades).toEqual([
      {
        ticker: "AAPL",
        insiderName: "Jane Doe",
        title: "CFO",
        transactionType: undefined,
        filingDate: "2024-02-01",
        transactionDate: "2024-01-30",
        shares: -100,
        price: 190,
        value: 19_000,
      },
    ]);
  });

  it("maps news rows to calendar dates", async () => {
    stubFetch(() =>
      jsonResponse({
        news: [
          {
            ticker: "AAPL",
            title: "Apple ships a thing",
            author: "A. Writer",
            source: "Newswire",
            date: "2024-02-01T14:00:00Z",
            url: "https://news.test/a",
            sentiment: "positive",
          },
        ],
      }),
    );
    const { provider } = createProvider();

    const news = expectOk(
      await provider.getCompanyNews({
        ticker: "AAPL",
        startDate: "2024-01-01",
        endDate: "2024-02-29",
      }),
    );

    expect(news).toEqual([
      {
        ticker: "AAPL",
        date: "2024-02-01",
        headline: "Apple ships a thing",
        summary: "",
        source: "Newswire",
        url: "https://news.test/a",
        author: "A. Writer",
        sentiment: "positive",
      },
    ]);
  });
});

describe("FinancialDatasetsProvider market cap", () => {
  it("reads company facts for today and never caches", async () => {
    const calls = stubFetch(() =>
      jsonResponse({ company_facts: { ticker: "AAPL", market_cap: 3_000_000 } }),
    );
    const { provider } = createProvider();

    const first = expectOk(
      await provider.getMarketCap({ ticker: "AAPL", endDate: "2024-06-14" }),
    );
    await provider.getMarketCap({ ticker: "AAPL", endDate: "2024-06-14" });

    expect(first).toBe(3_000_000);
    expect(calls).toHaveLength(2);
    expect(calls[0]?.url.pathname).toBe("/company/facts/");
  });

  it("reads the latest ttm metrics row for a past date", async () => {
    const calls = stubFetch(() =>
      jsonResponse({
        financial_metrics: [{ report_period: "2023-12-30", market_cap: 2_900_000 }],
      }),
    );
    const { provider } = createProvider();

    const marketCap = expectOk(
      await provider.getMarketCap({ ticker: "AAPL", endDate: "2024-01-31" }),
    );

    expect(marketCap).toBe(2_900_000);
    expect(calls[0]?.url.pathname).toBe("/financial-metrics/");
    expect(calls[0]?.url.searchParams.get("limit")).toBe("1");
    expect(calls[0]?.url.searchParams.get("period")).toBe("ttm");
  });

  it("returns null when the metrics history is empty", async () => {
    stubFetch(() => jsonResponse({ financial_metrics: [] }));
    const { provider } = createProvider();

    expect(
      expectOk(await provider.getMarketCap({ ticker: "AAPL", endDate: "2020-01-31" })),
    ).toBeNull();
  });
});
