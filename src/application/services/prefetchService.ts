import type { Logger } from "pino";
import type {
  PrefetchJobPayload,
  QueuePort,
} from "../../core/ports/outboundPorts";
import type { PrefetchJobFactory } from "../../infra/system/systemPorts";
import { logger as rootLogger } from "../../shared/logger/logger";
import type { FinancialDataService } from "./financialDataService";

export type PrefetchSummary = {
  ticker: string;
  startDate: string;
  endDate: string;
  prices: number;
  financialMetrics: number;
  insiderTrades: number;
  companyNews: number;
};

type PrefetchSource = Pick<
  FinancialDataService,
  "getPrices" | "getFinancialMetrics" | "getInsiderTrades" | "getCompanyNews"
>;

/**
 * Warms the shared cache for a ticker by reading through the dispatcher, so failover applies here too.
 */
export class PrefetchService {
  constructor(
    private readonly data: PrefetchSource,
    private readonly queue: QueuePort,
    private readonly jobs: PrefetchJobFactory,
    private readonly log: Logger = rootLogger.child({ component: "prefetch" }),
  ) {}

  async enqueue(
    ticker: string,
    startDate: string,
    endDate: string,
  ): Promise<PrefetchJobPayload> {
    const payload = this.jobs.create(ticker, startDate, endDate);
    await this.queue.enqueue(payload);
    this.log.info(
      { ticker: payload.ticker, idempotencyKey: payload.idempotencyKey },
      "Prefetch job enqueued",
    );
    return payload;
  }

  async run(
    job: Pick<PrefetchJobPayload, "ticker" | "startDate" | "endDate">,
  ): Promise<PrefetchSummary> {
    const { ticker, startDate, endDate } = job;
    const [prices, financialMetrics, insiderTrades, companyNews] =
      await Promise.all([
        this.data.getPrices({ ticker, startDate, endDate }),
        this.data.getFinancialMetrics({ ticker, endDate }),
        this.data.getInsiderTrades({ ticker, startDate, endDate }),
        this.data.getCompanyNews({ ticker, startDate, endDate }),
      ]);

    const summary: PrefetchSummary = {
      ticker,
      startDate,
      endDate,
      prices: prices.length,
      financialMetrics: financialMetrics.length,
      insiderTrades: insiderTrades.length,
      companyNews: companyNews.length,
    };
    this.log.info(summary, "Prefetch finished");
    return summary;
  }
}
