export type ReportPeriodType = "ttm" | "annual" | "quarterly";

export const reportPeriodTypes: readonly ReportPeriodType[] = [
  "ttm",
  "annual",
  "quarterly",
];

export const financialMetricNames = [
  "marketCap",
  "enterpriseValue",
  "priceToEarningsRatio",
  "priceToBookRatio",
  "priceToSalesRatio",
  "enterpriseValueToEbitdaRatio",
  "enterpriseValueToRevenueRatio",
  "freeCashFlowYield",
  "grossMargin",
  "operatingMargin",
  "netMargin",
  "returnOnEquity",
  "returnOnAssets",
  "currentRatio",
  "quickRatio",
  "debtToEquity",
  "interestCoverage",
  "payoutRatio",
  "dividendYield",
  "revenueGrowth",
  "earningsGrowth",
  "earningsPerShare",
  "bookValuePerShare",
] as const;

export type FinancialMetricName = (typeof financialMetricNames)[number];

/**
 * Ratios for one reporting period. Providers rarely fill every ratio, so each one is nullable.
 */
export type FinancialMetrics = {
  readonly ticker: string;
  readonly reportPeriod: string;
  readonly period: ReportPeriodType;
  readonly currency?: string;
} & { readonly [Name in FinancialMetricName]: number | null };
