import type {
  ClockPort,
  PrefetchJobPayload,
} from "../../core/ports/outboundPorts";

export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Builds prefetch payloads whose idempotency key collapses repeat requests within one hour.
 * Uses hyphen delimiters because BullMQ custom job ids cannot include colon.
 */
export class PrefetchJobFactory {
  constructor(private readonly clock: ClockPort) {}

  create(ticker: string, startDate: string, endDate: string): PrefetchJobPayload {
    const now = this.clock.now();
    const symbol = ticker.trim().toUpperCase();
    const hourBucket = now.toISOString().slice(0, 13);

    return {
      ticker: symbol,
      startDate,
      endDate,
      idempotencyKey: `${symbol}-${startDate}-${endDate}-${hourBucket}`,
      requestedAt: now.toISOString(),
    };
  }
}
