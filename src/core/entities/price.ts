/**
 * One daily OHLCV bar. `time` is the trading day as `YYYY-MM-DD`.
 */
export type Price = {
  readonly ticker: string;
  readonly time: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
};
