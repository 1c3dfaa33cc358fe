import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import {
  parseDateOption,
  parseLimitOption,
  parseListOption,
  parsePeriodOption,
} from "./options";

describe("CLI option parsers", () => {
  it("normalizes supported date spellings", () => {
    expect(parseDateOption("2024-01-31")).toBe("2024-01-31");
    expect(parseDateOption("01/31/2024")).toBe("2024-01-31");
    expect(parseDateOption("31-01-2024")).toBe("2024-01-31");
  });

  it("rejects dates it cannot read", () => {
    expect(() => parseDateOption("yesterday")).toThrow(InvalidArgumentError);
    expect(() => parseDateOption("02/30/2024")).toThrow(InvalidArgumentError);
  });

  it("accepts positive integer limits only", () => {
    expect(parseLimitOption("5")).toBe(5);
    expect(() => parseLimitOption("0")).toThrow("Expected a positive integer.");
    expect(() => parseLimitOption("2.5")).toThrow(InvalidArgumentError);
  });

  it("accepts known report periods only", () => {
    expect(parsePeriodOption("annual")).toBe("annual");
    expect(() => parsePeriodOption("monthly")).toThrow(
      "Expected one of: ttm, annual, quarterly.",
    );
  });

  it("splits comma lists and drops blanks", () => {
    expect(parseListOption("revenue, net_income,,")).toEqual([
      "revenue",
      "net_income",
    ]);
  });
});
