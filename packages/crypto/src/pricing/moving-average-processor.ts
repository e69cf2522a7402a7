import { Logger } from '@nestjs/common';
import { AverageThreshold, EnrichedRecord, RawPricePoint } from '@coin-tracker/shared/types/price.types';
import { DEFAULT_AVERAGE_THRESHOLD, MovingAverage, isAverageAvailable } from './moving-average';

export interface RateLookup {
  getRate(date: string): Promise<number>;
}

export interface MovingAverageProcessorOptions {
  windowSize: number;
  threshold?: AverageThreshold;
}

export function dailyAverage(point: RawPricePoint): number {
  return (point.open + point.close) / 2;
}

/**
 * Single causal pass over a newest-first series. Produces one record per
 * input day, oldest first.
 */
export class MovingAverageProcessor {
  private readonly logger = new Logger(MovingAverageProcessor.name);
  private readonly windowSize: number;
  private readonly threshold: AverageThreshold;

  constructor(
    private readonly rates: RateLookup,
    options: MovingAverageProcessorOptions,
  ) {
    this.windowSize = options.windowSize;
    this.threshold = options.threshold ?? DEFAULT_AVERAGE_THRESHOLD;
  }

  async process(series: readonly RawPricePoint[], label = 'series'): Promise<EnrichedRecord[]> {
    const average = new MovingAverage(this.windowSize);
    const records: EnrichedRecord[] = [];
    let validCloses = 0;

    for (let i = series.length - 1; i >= 0; i--) {
      const point = series[i];
      const conversionRate = await this.rates.getRate(point.date);

      this.logger.debug(
        `${label} ${point.date} open=${point.open} high=${point.high} low=${point.low} ` +
          `close=${point.close} volume=${point.volume} marketCap=${point.marketCap} rate=${conversionRate}`,
      );

      // Zero or negative closes are missing data
      if (point.close > 0) {
        average.add(point.close);
        validCloses++;
      }

      const daily = dailyAverage(point);

      records.push({
        price: point,
        movingAverage: isAverageAvailable(validCloses, this.windowSize, this.threshold) ? average.average() : null,
        conversionRate,
        dailyAverage: daily,
        convertedDailyAverage: daily * conversionRate,
      });
    }

    return records;
  }
}
