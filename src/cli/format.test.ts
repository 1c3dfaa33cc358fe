import { describe, expect, it } from "vitest";
import { formatComparison, formatPriceTable } from "./format";

describe("formatPriceTable", () => {
  it("aligns columns to the widest cell", () => {
    const table = formatPriceTable([
      {
        ticker: "AAPL",
        time: "2024-01-02",
        open: 187.15,
        high: 188.44,
        low: 183.89,
        close: 185.64,
        volume: 82_488_700,
      },
    ]);

    expect(table.split("\n")).toEqual([
      "date        open    high    low     close   volume",
      "2024-01-02  187.15  188.44  183.89  185.64  82488700",
    ]);
  });

  it("says so when there is nothing to show", () => {
    expect(formatPriceTable([])).toBe("No prices found.");
  });
});

describe("formatComparison", () => {
  const bar = {
    ticker: "AAPL",
    time: "2024-01-03",
    open: 1,
    high: 1,
    low: 1,
    close: 1,
    volume: 1,
  };

  it("lists each differing field", () => {
    expect(
      formatComparison({
        status: "compared",
        ticker: "AAPL",
        left: { provider: "financial_datasets", bar },
        right: { provider: "finnhub", bar },
        differences: [{ field: "close", left: 101, right: 101.05 }],
      }),
    ).toBe(
      "Latest AAPL bar: financial_datasets vs finnhub\n- close: 101 vs 101.05",
    );
  });

  it("lists provider failures", () => {
    expect(
      formatComparison({
        status: "unavailable",
        ticker: "AAPL",
        failures: [{ provider: "finnhub", reason: "No bars in range." }],
      }),
    ).toBe("Comparison for AAPL unavailable:\n- finnhub: No bars in range.");
  });
});
