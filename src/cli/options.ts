import { InvalidArgumentError } from "commander";
import {
  reportPeriodTypes,
  type ReportPeriodType,
} from "../core/entities/financialMetrics";
import {
  formatDate,
  isValidIsoDate,
} from "../infra/providers/utils/dateUtils";

export const parseDateOption = (value: string): string => {
  const formatted = formatDate(value);
  if (!isValidIsoDate(formatted)) {
    throw new InvalidArgumentError(
      "Expected a date as YYYY-MM-DD, MM/DD/YYYY or DD-MM-YYYY.",
    );
  }
  return formatted;
};

export const parseLimitOption = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

export const parsePeriodOption = (value: string): ReportPeriodType => {
  const period = reportPeriodTypes.find((candidate) => candidate === value);
  if (!period) {
    throw new InvalidArgumentError(
      `Expected one of: ${reportPeriodTypes.join(", ")}.`,
    );
  }
  return period;
};

export const parseListOption = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
