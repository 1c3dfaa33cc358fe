import type { ReportPeriodType } from "./financialMetrics";

/**
 * A single named statement figure, e.g. `net_income` for the period ending `reportPeriod`.
 */
export type LineItem = {
  readonly ticker: string;
  readonly lineItem: string;
  readonly value: number | null;
  readonly reportPeriod: string;
  readonly period: ReportPeriodType;
  readonly currency?: string;
};
