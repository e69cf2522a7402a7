import { CurrencyConfig } from '@coin-tracker/shared/types/price.types';
import { ISeriesProvider } from '@coin-tracker/crypto/pricing/price-provider.interface';
import { CoinMarketCapProvider } from '@coin-tracker/crypto/pricing/providers/coinmarketcap.provider';
import { DummySeriesProvider } from '@coin-tracker/crypto/pricing/providers/dummy.provider';
import { SeriesFetcher } from '@coin-tracker/crypto/pricing/series-fetcher';
import { MovingAverageProcessor } from '@coin-tracker/crypto/pricing/moving-average-processor';
import { ExchangeRateCache } from '@coin-tracker/crypto/fx/exchange-rate-cache';
import { RateConverter } from '@coin-tracker/crypto/fx/rate-converter';
import { BankOfIsraelRateSource } from '@coin-tracker/crypto/fx/boi-rate-source';
import { ReportMerger } from '@coin-tracker/reports/merge/report-merger';
import { PriorityClient } from '@coin-tracker/reports/priority/priority-client';
import { PriceReport } from '@coin-tracker/reports/spreadsheet/price-report';
import { IRateSource } from '@coin-tracker/shared/types/fx.types';
import { TrackerOptions } from '../config/tracker-options';
import { PriceTrackerPipeline } from './price-tracker.pipeline';

export interface PipelineOverrides {
  provider?: ISeriesProvider;
  rateSource?: IRateSource;
}

export function createSeriesProvider(options: TrackerOptions): ISeriesProvider {
  if (options.source === 'dummy') {
    return new DummySeriesProvider();
  }
  return new CoinMarketCapProvider({ baseUrl: options.marketDataUrl, apiKey: options.marketDataApiKey });
}

/**
 * Wire one run. Each call gets its own exchange rate cache.
 */
export function createPipeline(
  options: TrackerOptions,
  currencies: CurrencyConfig[],
  overrides: PipelineOverrides = {},
): PriceTrackerPipeline {
  const provider = overrides.provider ?? createSeriesProvider(options);
  const rateSource =
    overrides.rateSource ??
    new BankOfIsraelRateSource({ baseUrl: options.rateSourceUrl, currencyCode: options.rateCurrencyCode });

  const rates = new RateConverter(rateSource, new ExchangeRateCache(), options.rateMaxAttempts);
  const forwarder = options.priority ? new PriorityClient(options.priority) : undefined;

  return new PriceTrackerPipeline({
    currencies,
    window: options.window,
    fetcher: new SeriesFetcher(provider, options.averageDays),
    processor: new MovingAverageProcessor(rates, {
      windowSize: options.averageDays,
      threshold: options.averageThreshold,
    }),
    merger: new ReportMerger(forwarder),
    report: PriceReport.open(options.reportFile, options.averageDays),
    deltaReport: PriceReport.open(options.deltaReportFile, options.averageDays),
    isolateFailures: options.isolateFailures,
  });
}
