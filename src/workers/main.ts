import { createRuntime } from "../application/bootstrap/runtimeFactory";
import {
  createPrefetchWorker,
  redisConfigFromUrl,
} from "../infra/queue/bullMqQueue";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};

const run = async (): Promise<void> => {
  const runtime = createRuntime();
  const prefetch = runtime.createPrefetchService();
  const startedAtByJobId = new Map<string, number>();

  logger.info(
    {
      defaultProvider: runtime.registry.defaultProviderId(),
      providerPriority: runtime.config.providerPriority,
      finnhubApiKeyConfigured: runtime.registry.isAvailable("finnhub"),
      cacheBackend: env.CACHE_BACKEND,
      redisUrl: env.REDIS_URL,
      concurrency: env.QUEUE_CONCURRENCY_PREFETCH,
    },
    "Worker runtime configuration",
  );

  const worker = createPrefetchWorker(
    redisConfigFromUrl(env.REDIS_URL),
    env.QUEUE_CONCURRENCY_PREFETCH,
    async (payload) => {
      await prefetch.run(payload);
    },
  );

  worker.on("active", (job) => {
    if (!job?.id) {
      return;
    }

    startedAtByJobId.set(job.id, Date.now());
    logger.info(
      {
        jobId: job.id,
        ticker: job.data.ticker,
        idempotencyKey: job.data.idempotencyKey,
      },
      "Worker job started",
    );
  });

  worker.on("failed", (job, error) => {
    const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
    if (job?.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.error(
      {
        jobId: job?.id,
        ticker: job?.data.ticker,
        idempotencyKey: job?.data.idempotencyKey,
        durationMs: startedAt ? Date.now() - startedAt : undefined,
        error: toErrorDetails(error),
      },
      "Worker job failed",
    );
  });

  worker.on("completed", (job) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    if (job.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.info(
      {
        jobId: job.id,
        ticker: job.data.ticker,
        durationMs: startedAt ? Date.now() - startedAt : undefined,
      },
      "Worker job completed",
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Worker shutting down");
    worker
      .close()
      .then(() => runtime.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
        process.exit(1);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  logger.info("Worker online");
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
