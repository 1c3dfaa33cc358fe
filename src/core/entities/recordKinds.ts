import type { CompanyNews } from "./companyNews";
import type { FinancialMetrics } from "./financialMetrics";
import type { InsiderTrade } from "./insiderTrade";
import type { LineItem } from "./lineItem";
import type { Price } from "./price";

export type RecordKindMap = {
  prices: Price;
  financial_metrics: FinancialMetrics;
  line_items: LineItem;
  insider_trades: InsiderTrade;
  company_news: CompanyNews;
};

export type RecordKind = keyof RecordKindMap;

export type RecordOf<K extends RecordKind> = RecordKindMap[K];

export const recordKindNames: readonly RecordKind[] = [
  "prices",
  "financial_metrics",
  "line_items",
  "insider_trades",
  "company_news",
];

export type SortOrder = "asc" | "desc";

type RecordKindDescriptor<T> = {
  order: SortOrder;
  temporalKey: (record: T) => string;
  dedupKey: (record: T) => string;
};

/**
 * Identity and ordering rules per entity kind. Two records with the same dedup key are the same fact.
 */
export const recordKinds: {
  readonly [K in RecordKind]: RecordKindDescriptor<RecordKindMap[K]>;
} = {
  prices: {
    order: "asc",
    temporalKey: (record) => record.time,
    dedupKey: (record) => `${record.ticker}|${record.time}`,
  },
  financial_metrics: {
    order: "desc",
    temporalKey: (record) => record.reportPeriod,
    dedupKey: (record) =>
      `${record.ticker}|${record.reportPeriod}|${record.period}`,
  },
  line_items: {
    order: "desc",
    temporalKey: (record) => record.reportPeriod,
    dedupKey: (record) =>
      `${record.ticker}|${record.reportPeriod}|${record.period}|${record.lineItem}`,
  },
  insider_trades: {
    order: "desc",
    temporalKey: (record) => record.transactionDate ?? record.filingDate,
    dedupKey: (record) =>
      [
        record.ticker,
        record.filingDate,
        record.transactionDate ?? "",
        record.insiderName,
        record.shares,
        record.price,
      ].join("|"),
  },
  company_news: {
    order: "desc",
    temporalKey: (record) => record.date,
    dedupKey: (record) =>
      `${record.ticker}|${record.date}|${record.url || record.headline}`,
  },
};

export type RecordWindow = {
  startDate?: string;
  endDate: string;
};

export const temporalKeyOf = <K extends RecordKind>(
  kind: K,
  record: RecordOf<K>,
): string => recordKinds[kind].temporalKey(record);

export const dedupKeyOf = <K extends RecordKind>(
  kind: K,
  record: RecordOf<K>,
): string => recordKinds[kind].dedupKey(record);

/**
 * Inclusive on both ends; a missing start leaves the window unbounded below.
 */
export const isWithinWindow = (key: string, window: RecordWindow): boolean =>
  (window.startDate === undefined || key >= window.startDate) &&
  key <= window.endDate;

const compareText = (left: string, right: string): number =>
  left < right ? -1 : left > right ? 1 : 0;

/**
 * Orders by temporal key in the kind's direction, breaking ties on dedup key so output is deterministic.
 */
export const sortRecords = <K extends RecordKind>(
  kind: K,
  records: readonly RecordOf<K>[],
): RecordOf<K>[] => {
  const descriptor = recordKinds[kind];
  const direction = descriptor.order === "asc" ? 1 : -1;

  return [...records].sort(
    (left, right) =>
      direction *
        compareText(descriptor.temporalKey(left), descriptor.temporalKey(right)) ||
      compareText(descriptor.dedupKey(left), descriptor.dedupKey(right)),
  );
};

/**
 * Incoming records replace existing ones sharing a dedup key; new keys are appended before re-sorting.
 */
export const mergeRecords = <K extends RecordKind>(
  kind: K,
  existing: readonly RecordOf<K>[],
  incoming: readonly RecordOf<K>[],
): RecordOf<K>[] => {
  const descriptor = recordKinds[kind];
  const byKey = new Map<string, RecordOf<K>>();

  existing.forEach((record) => byKey.set(descriptor.dedupKey(record), record));
  incoming.forEach((record) => byKey.set(descriptor.dedupKey(record), record));

  return sortRecords(kind, [...byKey.values()]);
};

export const filterRecords = <K extends RecordKind>(
  kind: K,
  records: readonly RecordOf<K>[],
  window: RecordWindow,
  limit?: number,
): RecordOf<K>[] => {
  const descriptor = recordKinds[kind];
  const inWindow = records.filter((record) =>
    isWithinWindow(descriptor.temporalKey(record), window),
  );

  return sortRecords(kind, inWindow).slice(0, limit);
};
