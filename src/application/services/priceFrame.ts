import type { Price } from "../../core/entities/price";
import { mergeRecords } from "../../core/entities/recordKinds";

/**
 * Column-oriented daily bars, ascending by date.
 */
export type PriceFrame = {
  dates: string[];
  open: number[];
  high: number[];
  low: number[];
  close: number[];
  volume: number[];
};

export const toPriceFrame = (prices: readonly Price[]): PriceFrame => {
  const bars = mergeRecords("prices", [], prices);

  return {
    dates: bars.map((bar) => bar.time),
    open: bars.map((bar) => bar.open),
    high: bars.map((bar) => bar.high),
    low: bars.map((bar) => bar.low),
    close: bars.map((bar) => bar.close),
    volume: bars.map((bar) => bar.volume),
  };
};
