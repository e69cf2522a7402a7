import { ISeriesProvider, SeriesRequest } from '../price-provider.interface';
import { CurrencyConfig, RawPricePoint } from '@coin-tracker/shared/types/price.types';
import { addDays, daysBetween } from '@coin-tracker/shared/utils/dates';

/**
 * Deterministic synthetic series for dry runs. No network access.
 */
export class DummySeriesProvider implements ISeriesProvider {
  readonly name = 'dummy';

  private dummyPrices: Record<string, number> = {
    'BTC': 45000,
    'ETH': 2500,
    'USDC': 1,
    'USDT': 1,
    'DAI': 1,
  };

  async fetchDailySeries(currency: CurrencyConfig, request: SeriesRequest): Promise<RawPricePoint[]> {
    const basePrice = this.dummyPrices[currency.symbol.toUpperCase()] ?? 100;
    const points: RawPricePoint[] = [];

    // Newest first, like the upstream API
    for (let i = 0; i < request.count; i++) {
      const date = addDays(request.end, -i);
      const dayIndex = daysBetween('2000-01-01', date);
      const open = basePrice * (1 + 0.02 * Math.sin(dayIndex));
      const close = basePrice * (1 + 0.02 * Math.sin(dayIndex + 1));

      points.push({
        date,
        open,
        high: Math.max(open, close) * 1.01,
        low: Math.min(open, close) * 0.99,
        close,
        volume: Math.round(basePrice * 1000),
        marketCap: Math.round(basePrice * 1_000_000),
      });
    }

    return points;
  }
}
