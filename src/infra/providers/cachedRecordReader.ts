import { err, ok } from "neverthrow";
import type { Logger } from "pino";
import type { ProviderResult } from "../../core/ports/inboundPorts";
import type {
  FetchedRange,
  RecordCachePort,
} from "../../core/ports/outboundPorts";
import {
  mergeRecords,
  type RecordKind,
  type RecordOf,
} from "../../core/entities/recordKinds";
import type { KeyedLock } from "../cache/keyedLock";

export type ReadThroughPlan<K extends RecordKind> = {
  kind: K;
  ticker: string;
  /** Narrows a full cached collection to what the request asks for. */
  select: (records: readonly RecordOf<K>[]) => RecordOf<K>[];
  /** Defaults to "the selected view is non-empty". */
  isSatisfied?: (
    view: readonly RecordOf<K>[],
    fetched: readonly FetchedRange[],
  ) => boolean;
  /** Receives the selected view so a fetch can ask only for what is missing. */
  fetch: (
    view: readonly RecordOf<K>[],
    fetched: readonly FetchedRange[],
  ) => ProviderResult<RecordOf<K>[]>;
  /** Ranges a successful fetch answered; stored even when it returned nothing. */
  answeredRanges?: (
    view: readonly RecordOf<K>[],
    fetched: readonly FetchedRange[],
  ) => FetchedRange[];
};

const hasRecords = <T>(view: readonly T[]): boolean => view.length > 0;

/**
 * Cache → filter → fetch-if-insufficient → merge → filter, serialized per (kind, ticker).
 */
export class CachedRecordReader {
  constructor(
    private readonly cache: RecordCachePort,
    private readonly lock: KeyedLock,
    private readonly log: Logger,
  ) {}

  read<K extends RecordKind>(plan: ReadThroughPlan<K>): ProviderResult<RecordOf<K>[]> {
    const ticker = plan.ticker.toUpperCase();
    const isSatisfied = plan.isSatisfied ?? hasRecords;

    return this.lock.runExclusive(`${plan.kind}:${ticker}`, async () => {
      const cached = await this.cache.get(plan.kind, ticker);
      const fetchedRanges = await this.cache.getFetchedRanges(plan.kind, ticker);
      const view = plan.select(cached);
      if (isSatisfied(view, fetchedRanges)) {
        this.log.debug(
          { kind: plan.kind, ticker, records: view.length },
          "Cache hit",
        );
        return ok(view);
      }

      const answered = plan.answeredRanges?.(view, fetchedRanges) ?? [];
      const fetched = await plan.fetch(view, fetchedRanges);
      if (fetched.isErr()) {
        return err(fetched.error);
      }

      if (fetched.value.length > 0) {
        await this.cache.set(plan.kind, ticker, fetched.value);
      }
      if (answered.length > 0) {
        await this.cache.addFetchedRanges(plan.kind, ticker, answered);
      }

      return ok(plan.select(mergeRecords(plan.kind, cached, fetched.value)));
    });
  }
}
