export type InsiderTrade = {
  readonly ticker: string;
  readonly insiderName: string;
  readonly title?: string;
  readonly transactionType?: string;
  readonly filingDate: string;
  /** Absent on some filings; reads fall back to `filingDate`. */
  readonly transactionDate: string | null;
  readonly shares: number;
  readonly price: number;
  readonly value: number;
};
