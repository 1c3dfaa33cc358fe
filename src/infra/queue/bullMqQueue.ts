import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type {
  PrefetchJobPayload,
  QueuePort,
} from "../../core/ports/outboundPorts";
import { PREFETCH_QUEUE_NAME } from "./queues";

export type QueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

const QUEUE_RETRIES = 2;

export const defaultJobOptions = {
  attempts: QUEUE_RETRIES + 1,
  removeOnComplete: 250,
  backoff: {
    type: "exponential",
    delay: 1_000,
  },
} as const;

export const redisConfigFromUrl = (url: string): RedisOptions => {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
  };
};

/**
 * Wraps BullMQ so application code depends on queue intent rather than queue vendor details.
 */
export class BullMqQueue implements QueuePort {
  private readonly queue: Queue<PrefetchJobPayload>;

  constructor(connection: RedisOptions) {
    this.queue = new Queue<PrefetchJobPayload>(PREFETCH_QUEUE_NAME, {
      connection,
      defaultJobOptions,
    });
  }

  /**
   * The idempotency key doubles as job id, so BullMQ drops duplicates while the first is retained.
   */
  async enqueue(payload: PrefetchJobPayload): Promise<void> {
    await this.queue.add(payload.idempotencyKey, payload, {
      jobId: payload.idempotencyKey,
    });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }

  async getQueueCounts(): Promise<QueueCounts> {
    const counts = await this.queue.getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
      "paused",
    );

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
      paused: counts.paused ?? 0,
    };
  }
}

export const createPrefetchWorker = (
  connection: RedisOptions,
  concurrency: number,
  processor: (payload: PrefetchJobPayload) => Promise<void>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency,
  };

  return new Worker<PrefetchJobPayload>(
    PREFETCH_QUEUE_NAME,
    async (job) => {
      await processor(job.data);
    },
    options,
  );
};
