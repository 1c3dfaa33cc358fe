export const providerIds = ["financial_datasets", "finnhub"] as const;

export type ProviderId = (typeof providerIds)[number];

export const isProviderId = (value: string): value is ProviderId =>
  providerIds.some((id) => id === value);

export type DataOperation =
  | "getPrices"
  | "getFinancialMetrics"
  | "searchLineItems"
  | "getInsiderTrades"
  | "getCompanyNews"
  | "getMarketCap";
