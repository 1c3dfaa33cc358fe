import type { Logger } from "pino";
import type { Price } from "../../core/entities/price";
import type { PriceRequest } from "../../core/ports/inboundPorts";
import type { ProviderRegistry } from "../bootstrap/providerRegistry";
import { logger as rootLogger } from "../../shared/logger/logger";

const RELATIVE_TOLERANCE = 0.0001;

const numericFields = ["open", "high", "low", "close", "volume"] as const;

export type ComparedField = "time" | (typeof numericFields)[number];

export type FieldDifference = {
  field: ComparedField;
  left: string | number;
  right: string | number;
};

export type PriceComparison =
  | {
      status: "compared";
      ticker: string;
      left: { provider: string; bar: Price };
      right: { provider: string; bar: Price };
      differences: FieldDifference[];
    }
  | {
      status: "unavailable";
      ticker: string;
      failures: Array<{ provider: string; reason: string }>;
    };

/**
 * Each comparison side gets its own directory so one provider's cached bars never answer for the other.
 */
export type DirectoryFactory = () => Pick<ProviderRegistry, "getHandler">;

export const differsBeyondTolerance = (left: number, right: number): boolean => {
  const scale = Math.max(Math.abs(left), Math.abs(right));
  return scale > 0 && Math.abs(left - right) / scale > RELATIVE_TOLERANCE;
};

/**
 * Compares the latest daily bar two providers return for the same range.
 */
export class ProviderComparisonService {
  constructor(
    private readonly createDirectory: DirectoryFactory,
    private readonly log: Logger = rootLogger.child({ component: "provider-comparison" }),
  ) {}

  async comparePrices(
    request: PriceRequest,
    leftProvider: string,
    rightProvider: string,
  ): Promise<PriceComparison> {
    const ticker = request.ticker.trim().toUpperCase();
    const [left, right] = await Promise.all([
      this.latestBar({ ...request, ticker }, leftProvider),
      this.latestBar({ ...request, ticker }, rightProvider),
    ]);

    const failures = [left, right].flatMap((side) =>
      "reason" in side ? [{ provider: side.provider, reason: side.reason }] : [],
    );
    if ("reason" in left || "reason" in right) {
      this.log.warn({ ticker, failures }, "Price comparison incomplete");
      return { status: "unavailable", ticker, failures };
    }

    const differences: FieldDifference[] = [];
    if (left.bar.time !== right.bar.time) {
      differences.push({ field: "time", left: left.bar.time, right: right.bar.time });
    }
    numericFields.forEach((field) => {
      if (differsBeyondTolerance(left.bar[field], right.bar[field])) {
        differences.push({ field, left: left.bar[field], right: right.bar[field] });
      }
    });

    this.log.info(
      { ticker, left: left.provider, right: right.provider, differences: differences.length },
      "Price comparison finished",
    );
    return { status: "compared", ticker, left, right, differences };
  }

  private async latestBar(
    request: PriceRequest,
    provider: string,
  ): Promise<{ provider: string; bar: Price } | { provider: string; reason: string }> {
    try {
      const result = await this.createDirectory().getHandler(provider).getPrices(request);
      if (result.isErr()) {
        return { provider, reason: result.error.message };
      }
      const bar = result.value.at(-1);
      return bar ? { provider, bar } : { provider, reason: "No bars in range." };
    } catch (error) {
      return {
        provider,
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
