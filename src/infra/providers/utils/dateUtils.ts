/**
 * Shared date utilities for provider adapters. All calendar math is done in UTC on `YYYY-MM-DD` strings.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const DAY_FIRST_DATE = /^(\d{1,2})-(\d{1,2})-(\d{4})$/;

/**
 * Converts a Date to ISO date string (YYYY-MM-DD format).
 */
export const toIsoDate = (value: Date): string =>
  value.toISOString().slice(0, 10);

const pad = (value: number): string => String(value).padStart(2, "0");

const toCalendarDate = (
  year: number,
  month: number,
  day: number,
): string | null => {
  const candidate = new Date(Date.UTC(year, month - 1, day));
  const valid =
    candidate.getUTCFullYear() === year &&
    candidate.getUTCMonth() === month - 1 &&
    candidate.getUTCDate() === day;

  return valid ? `${year}-${pad(month)}-${pad(day)}` : null;
};

/**
 * Normalizes `YYYY-MM-DD`, `MM/DD/YYYY` and `DD-MM-YYYY` to `YYYY-MM-DD`.
 * Anything else comes back unchanged; callers prefer a best-effort value over a failure.
 */
export const formatDate = (value: string | Date): string => {
  if (value instanceof Date) {
    return toIsoDate(value);
  }

  const trimmed = value.trim();
  if (ISO_DATE.test(trimmed)) {
    return trimmed;
  }

  const us = US_DATE.exec(trimmed);
  if (us) {
    const parsed = toCalendarDate(Number(us[3]), Number(us[1]), Number(us[2]));
    if (parsed) {
      return parsed;
    }
  }

  const dayFirst = DAY_FIRST_DATE.exec(trimmed);
  if (dayFirst) {
    const parsed = toCalendarDate(
      Number(dayFirst[3]),
      Number(dayFirst[2]),
      Number(dayFirst[1]),
    );
    if (parsed) {
      return parsed;
    }
  }

  return value;
};

/**
 * Reduces provider timestamps such as `2024-01-05T05:00:00Z` or `2024-01-05 00:00:00` to the calendar day.
 */
export const toDateKey = (value: string): string => {
  const prefix = value.trim().slice(0, 10);
  return ISO_DATE.test(prefix) ? prefix : formatDate(value);
};

export const toUnixSeconds = (isoDate: string): number =>
  Math.floor(Date.parse(`${isoDate}T00:00:00.000Z`) / 1000);

export const fromUnixSeconds = (seconds: number): string =>
  toIsoDate(new Date(seconds * 1000));

export const shiftDays = (isoDate: string, days: number): string =>
  toIsoDate(new Date(Date.parse(`${isoDate}T00:00:00.000Z`) + days * DAY_MS));

/**
 * True when the inclusive window contains at least one Monday-Friday date.
 */
export const containsWeekday = (startDate: string, endDate: string): boolean => {
  for (
    let cursor = startDate, steps = 0;
    cursor <= endDate && steps < 7;
    cursor = shiftDays(cursor, 1), steps += 1
  ) {
    const weekday = new Date(`${cursor}T00:00:00.000Z`).getUTCDay();
    if (weekday !== 0 && weekday !== 6) {
      return true;
    }
  }

  return false;
};

export const isValidIsoDate = (value: string): boolean =>
  ISO_DATE.test(value) && !Number.isNaN(Date.parse(`${value}T00:00:00.000Z`));
