import type { Price } from "../../../core/entities/price";
import type { RecordWindow } from "../../../core/entities/recordKinds";
import type { FetchedRange } from "../../../core/ports/outboundPorts";
import { containsWeekday, shiftDays } from "./dateUtils";

export type DateWindow = Required<RecordWindow>;

export const PRICE_RANGE_SCOPE = "daily";

const earlier = (a: string, b: string): string => (a < b ? a : b);

/**
 * Windows of the request not yet covered, either by the span of cached bars or by a range already fetched.
 * `covered` must be the ascending in-window view. Gaps made only of weekend days are treated as covered.
 */
export const missingPriceWindows = (
  covered: readonly Price[],
  window: DateWindow,
  fetched: readonly FetchedRange[] = [],
): DateWindow[] => {
  const spans: DateWindow[] = fetched
    .filter((range) => range.scope === PRICE_RANGE_SCOPE)
    .map(({ startDate, endDate }) => ({ startDate, endDate }));

  const first = covered.at(0);
  const last = covered.at(-1);
  if (first && last) {
    spans.push({ startDate: first.time, endDate: last.time });
  }
  spans.sort((a, b) => a.startDate.localeCompare(b.startDate));

  const missing: DateWindow[] = [];
  const addGap = (startDate: string, endDate: string) => {
    if (containsWeekday(startDate, endDate)) {
      missing.push({ startDate, endDate });
    }
  };

  let cursor = window.startDate;
  for (const span of spans) {
    if (cursor > window.endDate) break;
    if (span.endDate < cursor) continue;
    if (span.startDate > cursor) {
      addGap(cursor, earlier(shiftDays(span.startDate, -1), window.endDate));
    }
    cursor = shiftDays(span.endDate, 1);
  }
  if (cursor <= window.endDate) {
    addGap(cursor, window.endDate);
  }

  return missing;
};

/**
 * The parts of fetched windows that are settled, i.e. end before `today`. Today's bar may still change.
 */
export const settledPriceRanges = (
  windows: readonly DateWindow[],
  today: string,
): FetchedRange[] => {
  const lastSettled = shiftDays(today, -1);

  return windows
    .map((window) => ({
      scope: PRICE_RANGE_SCOPE,
      startDate: window.startDate,
      endDate: earlier(window.endDate, lastSettled),
    }))
    .filter((range) => range.startDate <= range.endDate);
};
