import type { FinancialMetricName } from "../../../core/entities/financialMetrics";

export type MetricValues = { [Name in FinancialMetricName]: number | null };

/**
 * Builds the full ratio set from a per-name reader; names a provider has no field for come back null.
 */
export const buildMetricValues = (
  read: (name: FinancialMetricName) => number | null,
): MetricValues => ({
  marketCap: read("marketCap"),
  enterpriseValue: read("enterpriseValue"),
  priceToEarningsRatio: read("priceToEarningsRatio"),
  priceToBookRatio: read("priceToBookRatio"),
  priceToSalesRatio: read("priceToSalesRatio"),
  enterpriseValueToEbitdaRatio: read("enterpriseValueToEbitdaRatio"),
  enterpriseValueToRevenueRatio: read("enterpriseValueToRevenueRatio"),
  freeCashFlowYield: read("freeCashFlowYield"),
  grossMargin: read("grossMargin"),
  operatingMargin: read("operatingMargin"),
  netMargin: read("netMargin"),
  returnOnEquity: read("returnOnEquity"),
  returnOnAssets: read("returnOnAssets"),
  currentRatio: read("currentRatio"),
  quickRatio: read("quickRatio"),
  debtToEquity: read("debtToEquity"),
  interestCoverage: read("interestCoverage"),
  payoutRatio: read("payoutRatio"),
  dividendYield: read("dividendYield"),
  revenueGrowth: read("revenueGrowth"),
  earningsGrowth: read("earningsGrowth"),
  earningsPerShare: read("earningsPerShare"),
  bookValuePerShare: read("bookValuePerShare"),
});
