import { CurrencyConfig, EnrichedRecord } from '@coin-tracker/shared/types/price.types';

export const bitcoin: CurrencyConfig = { name: 'Bitcoin', symbol: 'BTC', cmc: 'bitcoin', cmcId: '1' };

/**
 * Record with open = close = `price` and a fixed rate of 3.5.
 */
export function recordFor(date: string, price = 100, movingAverage: number | null = null): EnrichedRecord {
  return {
    price: { date, open: price, high: price + 10, low: price - 10, close: price, volume: 1234567, marketCap: 987654321 },
    movingAverage,
    conversionRate: 3.5,
    dailyAverage: price,
    convertedDailyAverage: price * 3.5,
  };
}
