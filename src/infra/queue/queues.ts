/**
 * Hyphen-only because BullMQ uses colon as an internal Redis key separator.
 */
export const PREFETCH_QUEUE_NAME = "ticker-prefetch";
