import { describe, expect, it } from "vitest";
import { recordSchemas } from "./recordSchemas";

const storedBar = {
  ticker: "AAPL",
  time: "2024-01-02",
  open: 187.15,
  high: 188.44,
  low: 183.89,
  close: 185.64,
  volume: 82_488_700,
};

describe("recordSchemas", () => {
  it("accepts a stored price payload and drops unknown columns", () => {
    const parsed = recordSchemas.prices.parse({ ...storedBar, vwap: 186.1 });

    expect(parsed).toEqual(storedBar);
  });

  it("rejects a price payload missing its close", () => {
    const { close: _close, ...partial } = storedBar;

    expect(recordSchemas.prices.safeParse(partial).success).toBe(false);
  });

  it("accepts an insider trade without a transaction date", () => {
    const trade = {
      ticker: "AAPL",
      insiderName: "Jane Doe",
      filingDate: "2024-03-04",
      transactionDate: null,
      shares: -1_000,
      price: 170,
      value: -170_000,
    };

    expect(recordSchemas.insider_trades.parse(trade)).toEqual(trade);
  });

  it("rejects a line item with an unknown period", () => {
    const result = recordSchemas.line_items.safeParse({
      ticker: "AAPL",
      lineItem: "revenue",
      value: 1,
      reportPeriod: "2023-12-31",
      period: "monthly",
    });

    expect(result.success).toBe(false);
  });
});
