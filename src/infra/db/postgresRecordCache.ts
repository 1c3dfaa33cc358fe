import { and, eq, sql } from "drizzle-orm";
import type { z } from "zod";
import {
  dedupKeyOf,
  mergeRecords,
  sortRecords,
  temporalKeyOf,
  type RecordKind,
  type RecordOf,
} from "../../core/entities/recordKinds";
import type {
  FetchedRange,
  RecordCachePort,
} from "../../core/ports/outboundPorts";
import type { Database } from "./client";
import { recordSchemas } from "./recordSchemas";
import { cachedRecordsTable, fetchedRangesTable } from "./schema";

/**
 * Shared cache for several processes (CLI, prefetch worker). One row per record, keyed by its dedup key.
 */
export class PostgresRecordCache implements RecordCachePort {
  constructor(private readonly db: Database) {}

  async get<K extends RecordKind>(
    kind: K,
    ticker: string,
  ): Promise<RecordOf<K>[]> {
    const rows = await this.db
      .select({ payload: cachedRecordsTable.payload })
      .from(cachedRecordsTable)
      .where(
        and(
          eq(cachedRecordsTable.kind, kind),
          eq(cachedRecordsTable.ticker, ticker.toUpperCase()),
        ),
      );

    const schema: z.ZodType<RecordOf<K>, z.ZodTypeDef, unknown> =
      recordSchemas[kind];
    const records = schema.array().parse(rows.map((row) => row.payload));
    return sortRecords(kind, records);
  }

  /**
   * Upserts on (kind, ticker, dedup key) so a refreshed record overwrites the stored one.
   */
  async set<K extends RecordKind>(
    kind: K,
    ticker: string,
    records: readonly RecordOf<K>[],
  ): Promise<void> {
    // A single INSERT .. ON CONFLICT cannot touch the same key twice.
    const unique = mergeRecords(kind, [], records);
    if (unique.length === 0) return;

    await this.db
      .insert(cachedRecordsTable)
      .values(
        unique.map((record) => ({
          kind,
          ticker: ticker.toUpperCase(),
          dedupKey: dedupKeyOf(kind, record),
          temporalKey: temporalKeyOf(kind, record),
          payload: record,
        })),
      )
      .onConflictDoUpdate({
        target: [
          cachedRecordsTable.kind,
          cachedRecordsTable.ticker,
          cachedRecordsTable.dedupKey,
        ],
        set: {
          temporalKey: sql`excluded.temporal_key`,
          payload: sql`excluded.payload`,
          updatedAt: sql`now()`,
        },
      });
  }

  async getFetchedRanges(
    kind: RecordKind,
    ticker: string,
  ): Promise<FetchedRange[]> {
    return this.db
      .select({
        scope: fetchedRangesTable.scope,
        startDate: fetchedRangesTable.startDate,
        endDate: fetchedRangesTable.endDate,
      })
      .from(fetchedRangesTable)
      .where(
        and(
          eq(fetchedRangesTable.kind, kind),
          eq(fetchedRangesTable.ticker, ticker.toUpperCase()),
        ),
      );
  }

  async addFetchedRanges(
    kind: RecordKind,
    ticker: string,
    ranges: readonly FetchedRange[],
  ): Promise<void> {
    if (ranges.length === 0) return;

    await this.db
      .insert(fetchedRangesTable)
      .values(
        ranges.map((range) => ({
          kind,
          ticker: ticker.toUpperCase(),
          scope: range.scope,
          startDate: range.startDate,
          endDate: range.endDate,
        })),
      )
      .onConflictDoNothing();
  }

  async clear(): Promise<void> {
    await this.db.delete(cachedRecordsTable);
    await this.db.delete(fetchedRangesTable);
  }
}
