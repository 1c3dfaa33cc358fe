import type { Logger } from "pino";
import { ConfigurationError } from "../../core/entities/appError";
import { isProviderId, type ProviderId } from "../../core/entities/provider";
import type { FinancialDataProviderPort } from "../../core/ports/inboundPorts";
import type { ClockPort, RecordCachePort } from "../../core/ports/outboundPorts";
import { KeyedLock } from "../../infra/cache/keyedLock";
import { MemoryRecordCache } from "../../infra/cache/memoryRecordCache";
import { HttpJsonClient } from "../../infra/http/httpJsonClient";
import { CachedRecordReader } from "../../infra/providers/cachedRecordReader";
import { FinancialDatasetsProvider } from "../../infra/providers/financialDatasets/financialDatasetsProvider";
import { FinnhubProvider } from "../../infra/providers/finnhub/finnhubProvider";
import type { ProviderDependencies } from "../../infra/providers/providerDependencies";
import { SystemClock } from "../../infra/system/systemPorts";
import type {
  DataAccessConfig,
  ProviderConnection,
} from "../../shared/config/env";
import { logger as rootLogger } from "../../shared/logger/logger";

export type ProviderFactory = (
  connection: ProviderConnection,
  deps: ProviderDependencies,
) => FinancialDataProviderPort;

const defaultFactories: Record<ProviderId, ProviderFactory> = {
  financial_datasets: (connection, deps) =>
    new FinancialDatasetsProvider(connection, deps),
  finnhub: (connection, deps) => new FinnhubProvider(connection, deps),
};

const requiresCredential: Record<ProviderId, boolean> = {
  financial_datasets: false,
  finnhub: true,
};

export type ProviderRegistryOptions = {
  cache?: RecordCachePort;
  clock?: ClockPort;
  log?: Logger;
  factories?: Partial<Record<ProviderId, ProviderFactory>>;
};

/**
 * Process-scoped provider state: configuration, the shared cache and lock, and one lazily built handler per provider.
 */
export class ProviderRegistry {
  readonly cache: RecordCachePort;
  private readonly deps: ProviderDependencies;
  private readonly factories: Record<ProviderId, ProviderFactory>;
  private readonly handlers = new Map<ProviderId, FinancialDataProviderPort>();
  private defaultOverride: ProviderId | undefined;

  constructor(
    private readonly config: DataAccessConfig,
    options: ProviderRegistryOptions = {},
  ) {
    const log = options.log ?? rootLogger.child({ component: "providers" });
    this.cache = options.cache ?? new MemoryRecordCache();
    this.factories = { ...defaultFactories, ...options.factories };
    this.defaultOverride = config.defaultProvider;
    this.deps = {
      reader: new CachedRecordReader(this.cache, new KeyedLock(), log),
      httpClient: new HttpJsonClient(log),
      clock: options.clock ?? new SystemClock(),
      log,
      httpRetries: config.httpRetries,
    };
  }

  /**
   * Returns the handler for `id`, or for the default provider when omitted.
   * @throws ConfigurationError for an unknown id, or when the provider cannot be constructed.
   */
  getHandler(id?: string): FinancialDataProviderPort {
    const providerId = id === undefined ? this.defaultProviderId() : this.parseId(id);
    const existing = this.handlers.get(providerId);
    if (existing) {
      return existing;
    }

    const handler = this.factories[providerId](
      this.config.providers[providerId],
      this.deps,
    );
    this.handlers.set(providerId, handler);
    return handler;
  }

  setDefaultProvider(id: string): void {
    this.defaultOverride = this.parseId(id);
  }

  /**
   * Override first, then the first priority provider holding a credential, then one that needs none.
   */
  defaultProviderId(): ProviderId {
    if (this.defaultOverride) {
      return this.defaultOverride;
    }

    const credentialed = this.config.providerPriority.find(
      (id) => this.config.providers[id].apiKey.length > 0,
    );
    const keyless = this.config.providerPriority.find(
      (id) => !requiresCredential[id],
    );
    const resolved = credentialed ?? keyless;
    if (!resolved) {
      throw new ConfigurationError("No data provider could be resolved.");
    }
    return resolved;
  }

  /**
   * Other providers usable right now, in priority order.
   */
  fallbackProviders(primary: ProviderId): ProviderId[] {
    return this.config.providerPriority.filter(
      (id) => id !== primary && this.isAvailable(id),
    );
  }

  isAvailable(id: ProviderId): boolean {
    return (
      !requiresCredential[id] || this.config.providers[id].apiKey.length > 0
    );
  }

  private parseId(id: string): ProviderId {
    const normalized = id.trim().toLowerCase();
    if (!isProviderId(normalized)) {
      throw new ConfigurationError(`Unknown data provider: ${id}`, id);
    }
    return normalized;
  }
}
