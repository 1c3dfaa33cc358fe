import { describe, expect, it } from "vitest";
import type { Price } from "../../../core/entities/price";
import {
  missingPriceWindows,
  PRICE_RANGE_SCOPE,
  settledPriceRanges,
} from "./priceWindows";

const bar = (time: string): Price => ({
  ticker: "AAPL",
  time,
  open: 1,
  high: 1,
  low: 1,
  close: 1,
  volume: 1,
});

describe("missingPriceWindows", () => {
  it("asks for the whole window when nothing is cached", () => {
    expect(
      missingPriceWindows([], { startDate: "2024-01-02", endDate: "2024-01-05" }),
    ).toEqual([{ startDate: "2024-01-02", endDate: "2024-01-05" }]);
  });

  it("asks only for uncovered leading and trailing days", () => {
    expect(
      missingPriceWindows([bar("2024-01-03"), bar("2024-01-04")], {
        startDate: "2024-01-01",
        endDate: "2024-01-10",
      }),
    ).toEqual([
      { startDate: "2024-01-01", endDate: "2024-01-02" },
      { startDate: "2024-01-05", endDate: "2024-01-10" },
    ]);
  });

  it("ignores edges that fall on a weekend", () => {
    expect(
      missingPriceWindows([bar("2024-01-08"), bar("2024-01-12")], {
        startDate: "2024-01-06",
        endDate: "2024-01-14",
      }),
    ).toEqual([]);
  });

  it("treats an already fetched holiday edge as covered", () => {
    expect(
      missingPriceWindows(
        [bar("2024-01-02"), bar("2024-01-04")],
        { startDate: "2024-01-01", endDate: "2024-01-05" },
        [{ scope: PRICE_RANGE_SCOPE, startDate: "2024-01-01", endDate: "2024-01-05" }],
      ),
    ).toEqual([]);
  });

  it("asks only for the gap between fetched ranges", () => {
    expect(
      missingPriceWindows([], { startDate: "2024-01-01", endDate: "2024-01-31" }, [
        { scope: PRICE_RANGE_SCOPE, startDate: "2024-01-20", endDate: "2024-01-31" },
        { scope: PRICE_RANGE_SCOPE, startDate: "2024-01-01", endDate: "2024-01-09" },
        { scope: "other", startDate: "2024-01-10", endDate: "2024-01-19" },
      ]),
    ).toEqual([{ startDate: "2024-01-10", endDate: "2024-01-19" }]);
  });
});

describe("settledPriceRanges", () => {
  it("stops fetched ranges before today and drops ranges that start today", () => {
    expect(
      settledPriceRanges(
        [
          { startDate: "2024-06-10", endDate: "2024-06-20" },
          { startDate: "2024-06-14", endDate: "2024-06-14" },
          { startDate: "2024-01-02", endDate: "2024-01-05" },
        ],
        "2024-06-14",
      ),
    ).toEqual([
      { scope: PRICE_RANGE_SCOPE, startDate: "2024-06-10", endDate: "2024-06-13" },
      { scope: PRICE_RANGE_SCOPE, startDate: "2024-01-02", endDate: "2024-01-05" },
    ]);
  });
});
