import { Command } from "commander";
import {
  createRuntime,
  type Runtime,
} from "../application/bootstrap/runtimeFactory";
import type { ReportPeriodType } from "../core/entities/financialMetrics";
import { shiftDays, toIsoDate } from "../infra/providers/utils/dateUtils";
import { env, prefetchSymbols } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { formatComparison, formatPriceTable } from "./format";
import {
  parseDateOption,
  parseLimitOption,
  parseListOption,
  parsePeriodOption,
} from "./options";

const printJson = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};

/**
 * Runs one command against a fresh runtime and always releases its connections.
 */
const withRuntime = async (
  work: (runtime: Runtime) => Promise<void>,
): Promise<void> => {
  const runtime = createRuntime();
  try {
    await work(runtime);
  } finally {
    await runtime.close();
  }
};

type TickerOptions = { ticker: string; provider?: string };

export const buildCli = () => {
  const cli = new Command();
  cli
    .name("ticker-data")
    .description("Cached, failover-aware access to ticker market data");

  cli
    .command("prices")
    .description("Daily bars for a date range")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .requiredOption("--start <date>", "First day", parseDateOption)
    .requiredOption("--end <date>", "Last day", parseDateOption)
    .option("--provider <id>", "Primary provider override")
    .option("--json", "Print the price frame as JSON")
    .action(
      async (opts: TickerOptions & { start: string; end: string; json?: boolean }) => {
        await withRuntime(async ({ dataService }) => {
          const request = {
            ticker: opts.ticker,
            startDate: opts.start,
            endDate: opts.end,
          };
          if (opts.json) {
            printJson(await dataService.getPriceFrame(request, opts.provider));
            return;
          }
          console.log(
            formatPriceTable(await dataService.getPrices(request, opts.provider)),
          );
        });
      },
    );

  cli
    .command("metrics")
    .description("Financial metrics reported on or before a date")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .requiredOption("--end <date>", "Latest report period", parseDateOption)
    .option("--period <period>", "ttm, annual or quarterly", parsePeriodOption)
    .option("--limit <n>", "Maximum rows", parseLimitOption)
    .option("--provider <id>", "Primary provider override")
    .action(
      async (
        opts: TickerOptions & { end: string; period?: ReportPeriodType; limit?: number },
      ) => {
        await withRuntime(async ({ dataService }) => {
          printJson(
            await dataService.getFinancialMetrics(
              {
                ticker: opts.ticker,
                endDate: opts.end,
                period: opts.period,
                limit: opts.limit,
              },
              opts.provider,
            ),
          );
        });
      },
    );

  cli
    .command("line-items")
    .description("Search named statement line items")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .requiredOption("--items <names>", "Comma separated line item names", parseListOption)
    .requiredOption("--end <date>", "Latest report period", parseDateOption)
    .option("--period <period>", "ttm, annual or quarterly", parsePeriodOption)
    .option("--limit <n>", "Most recent report periods", parseLimitOption)
    .option("--provider <id>", "Primary provider override")
    .action(
      async (
        opts: TickerOptions & {
          items: string[];
          end: string;
          period?: ReportPeriodType;
          limit?: number;
        },
      ) => {
        await withRuntime(async ({ dataService }) => {
          printJson(
            await dataService.searchLineItems(
              {
                ticker: opts.ticker,
                lineItems: opts.items,
                endDate: opts.end,
                period: opts.period,
                limit: opts.limit,
              },
              opts.provider,
            ),
          );
        });
      },
    );

  cli
    .command("insiders")
    .description("Insider trades in a window")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .requiredOption("--end <date>", "Last day", parseDateOption)
    .option("--start <date>", "First day", parseDateOption)
    .option("--limit <n>", "Maximum rows", parseLimitOption)
    .option("--provider <id>", "Primary provider override")
    .action(
      async (opts: TickerOptions & { end: string; start?: string; limit?: number }) => {
        await withRuntime(async ({ dataService }) => {
          printJson(
            await dataService.getInsiderTrades(
              {
                ticker: opts.ticker,
                endDate: opts.end,
                startDate: opts.start,
                limit: opts.limit,
              },
              opts.provider,
            ),
          );
        });
      },
    );

  cli
    .command("news")
    .description("Company news in a window")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .requiredOption("--end <date>", "Last day", parseDateOption)
    .option("--start <date>", "First day", parseDateOption)
    .option("--limit <n>", "Maximum rows", parseLimitOption)
    .option("--provider <id>", "Primary provider override")
    .action(
      async (opts: TickerOptions & { end: string; start?: string; limit?: number }) => {
        await withRuntime(async ({ dataService }) => {
          printJson(
            await dataService.getCompanyNews(
              {
                ticker: opts.ticker,
                endDate: opts.end,
                startDate: opts.start,
                limit: opts.limit,
              },
              opts.provider,
            ),
          );
        });
      },
    );

  cli
    .command("market-cap")
    .description("Market capitalization as of a date")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .requiredOption("--end <date>", "As-of date", parseDateOption)
    .option("--provider <id>", "Primary provider override")
    .action(async (opts: TickerOptions & { end: string }) => {
      await withRuntime(async ({ dataService }) => {
        const marketCap = await dataService.getMarketCap(
          { ticker: opts.ticker, endDate: opts.end },
          opts.provider,
        );
        console.log(marketCap === null ? "Market cap unavailable." : String(marketCap));
      });
    });

  cli
    .command("compare")
    .description("Compare the latest daily bar from two providers")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .requiredOption("--start <date>", "First day", parseDateOption)
    .requiredOption("--end <date>", "Last day", parseDateOption)
    .option("--left <id>", "First provider", "financial_datasets")
    .option("--right <id>", "Second provider", "finnhub")
    .action(
      async (opts: {
        ticker: string;
        start: string;
        end: string;
        left: string;
        right: string;
      }) => {
        await withRuntime(async ({ comparisonService }) => {
          const comparison = await comparisonService.comparePrices(
            { ticker: opts.ticker, startDate: opts.start, endDate: opts.end },
            opts.left,
            opts.right,
          );
          console.log(formatComparison(comparison));
        });
      },
    );

  cli
    .command("enqueue")
    .description("Queue a cache prefetch job for the worker")
    .requiredOption("--ticker <ticker>", "Ticker symbol")
    .option("--start <date>", "First day", parseDateOption)
    .option("--end <date>", "Last day", parseDateOption)
    .action(async (opts: { ticker: string; start?: string; end?: string }) => {
      await withRuntime(async (runtime) => {
        const endDate = opts.end ?? toIsoDate(new Date());
        const startDate =
          opts.start ?? shiftDays(endDate, -env.PREFETCH_LOOKBACK_DAYS);
        await runtime.createPrefetchService().enqueue(opts.ticker, startDate, endDate);
      });
    });

  cli
    .command("run")
    .description("Start scheduler loop that enqueues prefetch jobs")
    .action(async () => {
      const runtime = createRuntime();
      const prefetch = runtime.createPrefetchService();
      const symbols = prefetchSymbols();

      logger.info(
        { symbols, intervalSeconds: env.PREFETCH_INTERVAL_SECONDS },
        "Scheduler started",
      );

      const tick = async () => {
        const endDate = toIsoDate(new Date());
        const startDate = shiftDays(endDate, -env.PREFETCH_LOOKBACK_DAYS);
        await Promise.all(
          symbols.map((symbol) => prefetch.enqueue(symbol, startDate, endDate)),
        );
      };

      await tick();
      setInterval(() => {
        tick().catch((error: unknown) => {
          logger.error({ err: error }, "Scheduler tick failed");
        });
      }, env.PREFETCH_INTERVAL_SECONDS * 1_000);
    });

  cli
    .command("status")
    .description("Report provider configuration and queue backlog")
    .action(async () => {
      await withRuntime(async ({ config, registry, getQueue }) => {
        const queueCounts = await getQueue().getQueueCounts();

        logger.info(
          {
            defaultProvider: registry.defaultProviderId(),
            providerPriority: config.providerPriority,
            availableProviders: config.providerPriority.filter((id) =>
              registry.isAvailable(id),
            ),
            cacheBackend: env.CACHE_BACKEND,
            httpRetries: config.httpRetries,
            prefetchSymbols: prefetchSymbols(),
            redis: env.REDIS_URL,
            queueCounts,
          },
          "Runtime status",
        );
      });
    });

  return cli;
};

export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
