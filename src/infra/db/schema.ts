import {
  index,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";

export const cachedRecordsTable = pgTable(
  "cached_records",
  {
    kind: text("kind").notNull(),
    ticker: text("ticker").notNull(),
    dedupKey: text("dedup_key").notNull(),
    temporalKey: text("temporal_key").notNull(),
    payload: jsonb("payload").$type<unknown>().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    recordIdentityIdx: uniqueIndex("cached_records_identity_uidx").on(
      table.kind,
      table.ticker,
      table.dedupKey,
    ),
    tickerTimelineIdx: index("cached_records_timeline_idx").on(
      table.kind,
      table.ticker,
      table.temporalKey,
    ),
  }),
);

export const fetchedRangesTable = pgTable(
  "fetched_ranges",
  {
    kind: text("kind").notNull(),
    ticker: text("ticker").notNull(),
    scope: text("scope").notNull(),
    startDate: text("start_date").notNull(),
    endDate: text("end_date").notNull(),
    fetchedAt: timestamp("fetched_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    rangeIdentityIdx: uniqueIndex("fetched_ranges_identity_uidx").on(
      table.kind,
      table.ticker,
      table.scope,
      table.startDate,
      table.endDate,
    ),
  }),
);
