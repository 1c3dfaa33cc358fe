import { describe, expect, it } from "vitest";
import type { CompanyNews } from "./companyNews";
import type { InsiderTrade } from "./insiderTrade";
import type { Price } from "./price";
import {
  dedupKeyOf,
  filterRecords,
  isWithinWindow,
  mergeRecords,
  temporalKeyOf,
} from "./recordKinds";

const bar = (time: string): Price => ({
  ticker: "AAPL",
  time,
  open: 1,
  high: 2,
  low: 0.5,
  close: 1.5,
  volume: 10,
});

const trade = (
  filingDate: string,
  transactionDate: string | null,
  insiderName = "Jane Doe",
): InsiderTrade => ({
  ticker: "AAPL",
  insiderName,
  filingDate,
  transactionDate,
  shares: 100,
  price: 10,
  value: 1_000,
});

const news = (date: string, url: string, headline = "headline"): CompanyNews => ({
  ticker: "AAPL",
  date,
  headline,
  summary: "",
  source: "Wire",
  url,
});

describe("isWithinWindow", () => {
  it("treats both bounds as inclusive and a missing start as unbounded", () => {
    expect(isWithinWindow("2024-01-01", { startDate: "2024-01-01", endDate: "2024-01-05" })).toBe(true);
    expect(isWithinWindow("2024-01-05", { startDate: "2024-01-01", endDate: "2024-01-05" })).toBe(true);
    expect(isWithinWindow("2024-01-06", { startDate: "2024-01-01", endDate: "2024-01-05" })).toBe(false);
    expect(isWithinWindow("1999-12-31", { endDate: "2024-01-05" })).toBe(true);
  });
});

describe("filterRecords", () => {
  const bars = ["2024-01-08", "2024-01-02", "2024-01-05", "2024-01-03", "2024-01-04"].map(bar);

  it("returns exactly the prices inside the window in ascending order", () => {
    const windows = [
      { startDate: "2024-01-01", endDate: "2024-01-31" },
      { startDate: "2024-01-03", endDate: "2024-01-05" },
      { startDate: "2024-01-06", endDate: "2024-01-07" },
      { startDate: "2024-01-08", endDate: "2024-01-08" },
    ];

    windows.forEach((window) => {
      const expected = bars
        .map((price) => price.time)
        .filter((time) => time >= window.startDate && time <= window.endDate)
        .sort();

      expect(filterRecords("prices", bars, window).map((price) => price.time)).toEqual(expected);
    });
  });

  it("sorts non-price kinds newest first and applies the limit after sorting", () => {
    const items = [
      news("2024-02-01", "https://news.example/a"),
      news("2024-02-03", "https://news.example/b"),
      news("2024-02-02", "https://news.example/c"),
    ];

    const filtered = filterRecords("company_news", items, { endDate: "2024-02-03" }, 2);

    expect(filtered.map((item) => item.date)).toEqual(["2024-02-03", "2024-02-02"]);
  });

  it("falls back to the filing date when the transaction date is absent", () => {
    const trades = [trade("2024-03-10", null), trade("2024-03-12", "2024-02-20")];

    const filtered = filterRecords("insider_trades", trades, {
      startDate: "2024-03-01",
      endDate: "2024-03-31",
    });

    expect(filtered).toEqual([trade("2024-03-10", null)]);
    expect(temporalKeyOf("insider_trades", trade("2024-03-10", null))).toBe("2024-03-10");
  });
});

describe("mergeRecords", () => {
  it("keeps several news items published on the same day", () => {
    const merged = mergeRecords(
      "company_news",
      [news("2024-02-01", "https://news.example/a")],
      [news("2024-02-01", "https://news.example/b"), news("2024-02-01", "https://news.example/a")],
    );

    expect(merged.map((item) => item.url)).toEqual([
      "https://news.example/a",
      "https://news.example/b",
    ]);
  });

  it("uses the headline as identity for news without a url", () => {
    expect(dedupKeyOf("company_news", news("2024-02-01", "", "Earnings beat"))).toBe(
      "AAPL|2024-02-01|Earnings beat",
    );
  });

  it("distinguishes trades by insider on the same day", () => {
    const merged = mergeRecords(
      "insider_trades",
      [trade("2024-03-10", "2024-03-08", "Jane Doe")],
      [trade("2024-03-10", "2024-03-08", "John Roe")],
    );

    expect(merged).toHaveLength(2);
  });
});
