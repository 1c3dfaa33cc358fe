import {
  mergeRecords,
  type RecordKind,
  type RecordKindMap,
  type RecordOf,
} from "../../core/entities/recordKinds";
import type {
  FetchedRange,
  RecordCachePort,
} from "../../core/ports/outboundPorts";

type Collections = {
  [K in RecordKind]: Map<string, readonly RecordKindMap[K][]>;
};

const emptyCollections = (): Collections => ({
  prices: new Map(),
  financial_metrics: new Map(),
  line_items: new Map(),
  insider_trades: new Map(),
  company_news: new Map(),
});

const rangeKey = (kind: RecordKind, ticker: string): string =>
  `${kind}:${ticker.toUpperCase()}`;

const sameRange = (a: FetchedRange, b: FetchedRange): boolean =>
  a.scope === b.scope && a.startDate === b.startDate && a.endDate === b.endDate;

/**
 * Process-local cache. Collections are replaced wholesale on merge, so readers never see a half-merged array.
 */
export class MemoryRecordCache implements RecordCachePort {
  private collections = emptyCollections();
  private fetchedRanges = new Map<string, FetchedRange[]>();

  async get<K extends RecordKind>(
    kind: K,
    ticker: string,
  ): Promise<RecordOf<K>[]> {
    const collection: Map<string, readonly RecordOf<K>[]> =
      this.collections[kind];
    return [...(collection.get(ticker.toUpperCase()) ?? [])];
  }

  async set<K extends RecordKind>(
    kind: K,
    ticker: string,
    records: readonly RecordOf<K>[],
  ): Promise<void> {
    const collection: Map<string, readonly RecordOf<K>[]> =
      this.collections[kind];
    const key = ticker.toUpperCase();
    collection.set(key, mergeRecords(kind, collection.get(key) ?? [], records));
  }

  async getFetchedRanges(
    kind: RecordKind,
    ticker: string,
  ): Promise<FetchedRange[]> {
    return [...(this.fetchedRanges.get(rangeKey(kind, ticker)) ?? [])];
  }

  async addFetchedRanges(
    kind: RecordKind,
    ticker: string,
    ranges: readonly FetchedRange[],
  ): Promise<void> {
    const key = rangeKey(kind, ticker);
    const stored = this.fetchedRanges.get(key) ?? [];
    const fresh = ranges.filter(
      (range) => !stored.some((existing) => sameRange(existing, range)),
    );
    this.fetchedRanges.set(key, [...stored, ...fresh]);
  }

  async clear(): Promise<void> {
    this.collections = emptyCollections();
    this.fetchedRanges = new Map();
  }
}
