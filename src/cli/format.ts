import type { Price } from "../core/entities/price";
import type { PriceComparison } from "../application/services/providerComparisonService";

const columns = ["date", "open", "high", "low", "close", "volume"] as const;

/**
 * Fixed-width daily bar table for terminal output.
 */
export const formatPriceTable = (prices: readonly Price[]): string => {
  if (prices.length === 0) {
    return "No prices found.";
  }

  const rows = prices.map((price) => [
    price.time,
    price.open.toFixed(2),
    price.high.toFixed(2),
    price.low.toFixed(2),
    price.close.toFixed(2),
    String(price.volume),
  ]);
  const widths = columns.map((column, index) =>
    Math.max(column.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const render = (cells: readonly string[]) =>
    cells
      .map((cell, index) => cell.padEnd(widths[index] ?? cell.length))
      .join("  ")
      .trimEnd();

  return [render(columns), ...rows.map(render)].join("\n");
};

export const formatComparison = (comparison: PriceComparison): string => {
  if (comparison.status === "unavailable") {
    return [
      `Comparison for ${comparison.ticker} unavailable:`,
      ...comparison.failures.map(
        (failure) => `- ${failure.provider}: ${failure.reason}`,
      ),
    ].join("\n");
  }

  const header = `Latest ${comparison.ticker} bar: ${comparison.left.provider} vs ${comparison.right.provider}`;
  if (comparison.differences.length === 0) {
    return `${header}\n- no differences`;
  }

  return [
    header,
    ...comparison.differences.map(
      (difference) =>
        `- ${difference.field}: ${difference.left} vs ${difference.right}`,
    ),
  ].join("\n");
};
