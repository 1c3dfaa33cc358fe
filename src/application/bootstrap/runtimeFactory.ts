import { ConfigurationError } from "../../core/entities/appError";
import type { RecordCachePort } from "../../core/ports/outboundPorts";
import { MemoryRecordCache } from "../../infra/cache/memoryRecordCache";
import { createDb } from "../../infra/db/client";
import { PostgresRecordCache } from "../../infra/db/postgresRecordCache";
import {
  BullMqQueue,
  redisConfigFromUrl,
} from "../../infra/queue/bullMqQueue";
import { PrefetchJobFactory, SystemClock } from "../../infra/system/systemPorts";
import {
  buildDataAccessConfig,
  env,
  type AppEnv,
} from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { FinancialDataService } from "../services/financialDataService";
import { PrefetchService } from "../services/prefetchService";
import { ProviderComparisonService } from "../services/providerComparisonService";
import { ProviderRegistry } from "./providerRegistry";

const createCache = (
  appEnv: AppEnv,
): { cache: RecordCachePort; close: () => Promise<void> } => {
  if (appEnv.CACHE_BACKEND === "postgres") {
    const { db, sql } = createDb(appEnv.POSTGRES_URL);
    return { cache: new PostgresRecordCache(db), close: () => sql.end() };
  }

  return { cache: new MemoryRecordCache(), close: async () => {} };
};

/**
 * Composition root shared by the CLI and the prefetch worker. Redis is only touched once the queue is requested.
 */
export const createRuntime = (appEnv: AppEnv = env) => {
  const config = buildDataAccessConfig(appEnv);
  const clock = new SystemClock();
  const { cache, close: closeCache } = createCache(appEnv);
  const log = logger.child({ component: "providers" });

  const registry = new ProviderRegistry(config, { cache, clock, log });
  const dataService = new FinancialDataService(registry);
  const comparisonService = new ProviderComparisonService(
    () => new ProviderRegistry(config, { clock, log }),
  );

  let queue: BullMqQueue | undefined;
  const getQueue = (): BullMqQueue => {
    if (!queue) {
      queue = new BullMqQueue(redisConfigFromUrl(appEnv.REDIS_URL));
    }
    return queue;
  };

  /**
   * Prefetching only warms a cache other processes can read, so it needs the Postgres backend.
   */
  const createPrefetchService = () => {
    if (appEnv.CACHE_BACKEND !== "postgres") {
      throw new ConfigurationError(
        `Prefetch requires CACHE_BACKEND=postgres; the ${appEnv.CACHE_BACKEND} cache is private to this process.`,
      );
    }
    return new PrefetchService(dataService, getQueue(), new PrefetchJobFactory(clock));
  };

  const close = async (): Promise<void> => {
    await queue?.close();
    await closeCache();
  };

  return {
    config,
    registry,
    dataService,
    comparisonService,
    getQueue,
    createPrefetchService,
    close,
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
