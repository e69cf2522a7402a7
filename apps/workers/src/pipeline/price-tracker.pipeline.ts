import { Logger } from '@nestjs/common';
import { CurrencyConfig, SeriesWindow } from '@coin-tracker/shared/types/price.types';
import { CurrencyOutcome, MergeResult, RunSummary } from '@coin-tracker/shared/types/report.types';
import { describeError, isFatal } from '@coin-tracker/shared/errors';
import { SeriesFetcher } from '@coin-tracker/crypto/pricing/series-fetcher';
import { MovingAverageProcessor } from '@coin-tracker/crypto/pricing/moving-average-processor';
import { ReportMerger } from '@coin-tracker/reports/merge/report-merger';
import { PriceReport } from '@coin-tracker/reports/spreadsheet/price-report';

export interface PipelineDeps {
  currencies: CurrencyConfig[];
  window: SeriesWindow;
  fetcher: SeriesFetcher;
  processor: MovingAverageProcessor;
  merger: ReportMerger;
  report: PriceReport;
  deltaReport?: PriceReport;
  /** Record a failed currency and continue instead of aborting the run. */
  isolateFailures?: boolean;
}

/**
 * fetch -> process -> merge, one currency at a time.
 */
export class PriceTrackerPipeline {
  private readonly logger = new Logger(PriceTrackerPipeline.name);

  constructor(private readonly deps: PipelineDeps) {}

  async run(): Promise<RunSummary> {
    const outcomes: CurrencyOutcome[] = [];

    for (const currency of this.deps.currencies) {
      try {
        const result = await this.processCurrency(currency);
        outcomes.push({ currency: currency.name, status: 'merged', ...result });
      } catch (error) {
        // Exhausted rate lookups end the run regardless of isolation
        if (isFatal(error) || !this.deps.isolateFailures) {
          throw error;
        }
        this.logger.error(`Processing ${currency.name} failed: ${describeError(error)}`);
        outcomes.push({
          currency: currency.name,
          status: 'failed',
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }

    return { currencies: outcomes };
  }

  async processCurrency(currency: CurrencyConfig): Promise<MergeResult> {
    const { window } = this.deps;
    this.logger.log(`Processing ${currency.name}, days count: ${window.days}`);

    const series = await this.deps.fetcher.fetch(currency, window);
    const records = await this.deps.processor.process(series, currency.name);

    return this.deps.merger.merge(currency, records, {
      primary: this.deps.report.sheetFor(currency),
      delta: this.deps.deltaReport?.sheetFor(currency),
    });
  }
}
