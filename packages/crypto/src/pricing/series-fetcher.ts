import { Logger } from '@nestjs/common';
import { ISeriesProvider } from './price-provider.interface';
import { CurrencyConfig, RawPricePoint, SeriesWindow } from '@coin-tracker/shared/types/price.types';
import { DataShapeError } from '@coin-tracker/shared/errors';

/**
 * Retrieves the daily series for one currency: the requested window plus
 * `windowSize - 1` leading days that only seed the moving average.
 */
export class SeriesFetcher {
  private readonly logger = new Logger(SeriesFetcher.name);

  constructor(
    private readonly provider: ISeriesProvider,
    private readonly windowSize: number,
  ) {}

  /**
   * Number of points requested for a window.
   */
  pointsFor(window: SeriesWindow): number {
    return window.days + this.windowSize - 1;
  }

  /**
   * @returns points ordered newest first
   */
  async fetch(currency: CurrencyConfig, window: SeriesWindow): Promise<RawPricePoint[]> {
    const count = this.pointsFor(window);
    this.logger.log(`Fetching ${count} days of ${currency.name} from ${this.provider.name} up to ${window.end}`);

    const points = await this.provider.fetchDailySeries(currency, { end: window.end, count });

    if (points.length < this.windowSize) {
      throw new DataShapeError(
        `Not enough data points for ${currency.name}: ${points.length} (need at least ${this.windowSize})`,
      );
    }

    return [...points].sort((a, b) => b.date.localeCompare(a.date));
  }
}
