import { z } from "zod";
import type { CompanyNews } from "../../core/entities/companyNews";
import type { FinancialMetrics } from "../../core/entities/financialMetrics";
import type { InsiderTrade } from "../../core/entities/insiderTrade";
import type { LineItem } from "../../core/entities/lineItem";
import type { Price } from "../../core/entities/price";
import type { RecordKind, RecordKindMap } from "../../core/entities/recordKinds";

type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const periodSchema = z.enum(["ttm", "annual", "quarterly"]);
const ratio = z.number().nullable();

const priceSchema: RecordSchema<Price> = z.object({
  ticker: z.string(),
  time: z.string(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
});

const financialMetricsSchema: RecordSchema<FinancialMetrics> = z.object({
  ticker: z.string(),
  reportPeriod: z.string(),
  period: periodSchema,
  currency: z.string().optional(),
  marketCap: ratio,
  enterpriseValue: ratio,
  priceToEarningsRatio: ratio,
  priceToBookRatio: ratio,
  priceToSalesRatio: ratio,
  enterpriseValueToEbitdaRatio: ratio,
  enterpriseValueToRevenueRatio: ratio,
  freeCashFlowYield: ratio,
  grossMargin: ratio,
  operatingMargin: ratio,
  netMargin: ratio,
  returnOnEquity: ratio,
  returnOnAssets: ratio,
  currentRatio: ratio,
  quickRatio: ratio,
  debtToEquity: ratio,
  interestCoverage: ratio,
  payoutRatio: ratio,
  dividendYield: ratio,
  revenueGrowth: ratio,
  earningsGrowth: ratio,
  earningsPerShare: ratio,
  bookValuePerShare: ratio,
});

const lineItemSchema: RecordSchema<LineItem> = z.object({
  ticker: z.string(),
  lineItem: z.string(),
  value: z.number().nullable(),
  reportPeriod: z.string(),
  period: periodSchema,
  currency: z.string().optional(),
});

const insiderTradeSchema: RecordSchema<InsiderTrade> = z.object({
  ticker: z.string(),
  insiderName: z.string(),
  title: z.string().optional(),
  transactionType: z.string().optional(),
  filingDate: z.string(),
  transactionDate: z.string().nullable(),
  shares: z.number(),
  price: z.number(),
  value: z.number(),
});

const companyNewsSchema: RecordSchema<CompanyNews> = z.object({
  ticker: z.string(),
  date: z.string(),
  headline: z.string(),
  summary: z.string(),
  source: z.string(),
  url: z.string(),
  author: z.string().optional(),
  sentiment: z.string().optional(),
});

/**
 * Validates persisted payloads on the way out, since rows may predate the current record shapes.
 */
export const recordSchemas: {
  readonly [K in RecordKind]: RecordSchema<RecordKindMap[K]>;
} = {
  prices: priceSchema,
  financial_metrics: financialMetricsSchema,
  line_items: lineItemSchema,
  insider_trades: insiderTradeSchema,
  company_news: companyNewsSchema,
};
