import type { RecordKind, RecordOf } from "../entities/recordKinds";

/**
 * A window a provider fetch already answered, whether or not it produced records.
 * `scope` separates independent questions within one kind, e.g. one line item name.
 */
export type FetchedRange = {
  scope: string;
  startDate: string;
  endDate: string;
};

/**
 * Per (kind, ticker) record collection. `set` merges rather than overwrites.
 * Fetched ranges live beside the records so empty answers are not asked again.
 */
export interface RecordCachePort {
  get<K extends RecordKind>(kind: K, ticker: string): Promise<RecordOf<K>[]>;
  set<K extends RecordKind>(
    kind: K,
    ticker: string,
    records: readonly RecordOf<K>[],
  ): Promise<void>;
  getFetchedRanges(kind: RecordKind, ticker: string): Promise<FetchedRange[]>;
  addFetchedRanges(
    kind: RecordKind,
    ticker: string,
    ranges: readonly FetchedRange[],
  ): Promise<void>;
  clear(): Promise<void>;
}

export type PrefetchJobPayload = {
  ticker: string;
  startDate: string;
  endDate: string;
  idempotencyKey: string;
  requestedAt: string;
};

export interface QueuePort {
  enqueue(payload: PrefetchJobPayload): Promise<void>;
}

export interface ClockPort {
  now(): Date;
}
