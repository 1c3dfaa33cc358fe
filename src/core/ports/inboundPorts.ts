import type { Result } from "neverthrow";
import type { DataAccessError } from "../entities/appError";
import type { CompanyNews } from "../entities/companyNews";
import type {
  FinancialMetrics,
  ReportPeriodType,
} from "../entities/financialMetrics";
import type { InsiderTrade } from "../entities/insiderTrade";
import type { LineItem } from "../entities/lineItem";
import type { Price } from "../entities/price";
import type { ProviderId } from "../entities/provider";

export type PriceRequest = {
  ticker: string;
  startDate: string;
  endDate: string;
};

export type FinancialMetricsRequest = {
  ticker: string;
  endDate: string;
  period?: ReportPeriodType;
  limit?: number;
};

export type LineItemSearchRequest = {
  ticker: string;
  lineItems: string[];
  endDate: string;
  period?: ReportPeriodType;
  limit?: number;
};

export type InsiderTradesRequest = {
  ticker: string;
  endDate: string;
  startDate?: string;
  limit?: number;
};

export type CompanyNewsRequest = {
  ticker: string;
  endDate: string;
  startDate?: string;
  limit?: number;
};

export type MarketCapRequest = {
  ticker: string;
  endDate: string;
};

export type ProviderResult<T> = Promise<Result<T, DataAccessError>>;

/**
 * Capability set every data provider implements. Callers hold this port, never a concrete provider.
 */
export interface FinancialDataProviderPort {
  readonly id: ProviderId;
  getPrices(request: PriceRequest): ProviderResult<Price[]>;
  getFinancialMetrics(
    request: FinancialMetricsRequest,
  ): ProviderResult<FinancialMetrics[]>;
  searchLineItems(request: LineItemSearchRequest): ProviderResult<LineItem[]>;
  getInsiderTrades(
    request: InsiderTradesRequest,
  ): ProviderResult<InsiderTrade[]>;
  getCompanyNews(request: CompanyNewsRequest): ProviderResult<CompanyNews[]>;
  getMarketCap(request: MarketCapRequest): ProviderResult<number | null>;
}
