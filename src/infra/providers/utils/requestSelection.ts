import type { FinancialMetrics, ReportPeriodType } from "../../../core/entities/financialMetrics";
import type { LineItem } from "../../../core/entities/lineItem";
import { filterRecords, sortRecords } from "../../../core/entities/recordKinds";
import type { FetchedRange } from "../../../core/ports/outboundPorts";

export const DEFAULT_REPORT_PERIOD: ReportPeriodType = "ttm";
export const DEFAULT_FUNDAMENTALS_LIMIT = 10;
export const DEFAULT_EVENTS_LIMIT = 1000;

export const selectMetrics = (
  records: readonly FinancialMetrics[],
  endDate: string,
  period: ReportPeriodType,
  limit: number,
): FinancialMetrics[] =>
  filterRecords(
    "financial_metrics",
    records.filter((record) => record.period === period),
    { endDate },
    limit,
  );

/**
 * Keeps the requested names for the `limit` most recent report periods on or before `endDate`.
 */
export const selectLineItems = (
  records: readonly LineItem[],
  names: readonly string[],
  endDate: string,
  period: ReportPeriodType,
  limit: number,
): LineItem[] => {
  const wanted = new Set(names);
  const matching = records.filter(
    (record) =>
      wanted.has(record.lineItem) &&
      record.period === period &&
      record.reportPeriod <= endDate,
  );
  const periods = [...new Set(matching.map((record) => record.reportPeriod))]
    .sort()
    .reverse()
    .slice(0, limit);
  const kept = new Set(periods);

  return sortRecords(
    "line_items",
    matching.filter((record) => kept.has(record.reportPeriod)),
  );
};

const lineItemScope = (period: ReportPeriodType, name: string): string =>
  `${period}:${name}`;

/**
 * Marks each requested name as asked for at `endDate`, so a name the provider does not report is not asked again.
 */
export const lineItemRanges = (
  names: readonly string[],
  period: ReportPeriodType,
  endDate: string,
): FetchedRange[] =>
  names.map((name) => ({
    scope: lineItemScope(period, name),
    startDate: endDate,
    endDate,
  }));

/**
 * Each requested name is either cached in the view or was already asked for with the same period and end date.
 */
export const coversLineItems = (
  view: readonly LineItem[],
  names: readonly string[],
  fetched: readonly FetchedRange[],
  period: ReportPeriodType,
  endDate: string,
): boolean => {
  const present = new Set(view.map((record) => record.lineItem));
  const asked = new Set(
    fetched
      .filter((range) => range.endDate === endDate)
      .map((range) => range.scope),
  );
  return (
    names.length > 0 &&
    names.every(
      (name) => present.has(name) || asked.has(lineItemScope(period, name)),
    )
  );
};
