import { CurrencyConfig, RawPricePoint, SeriesSource } from '@coin-tracker/shared/types/price.types';

export interface SeriesRequest {
  end: string; // YYYY-MM-DD, inclusive
  count: number;
}

export interface ISeriesProvider {
  name: SeriesSource;

  /**
   * Daily points for `request.count` days ending at `request.end`.
   * Order is whatever the upstream returns; callers normalize it.
   */
  fetchDailySeries(currency: CurrencyConfig, request: SeriesRequest): Promise<RawPricePoint[]>;
}
