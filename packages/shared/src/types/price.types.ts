export type SeriesSource = 'coinmarketcap' | 'dummy';

/**
 * One entry of the currencies config file.
 */
export interface CurrencyConfig {
  name: string;
  symbol: string;
  cmc?: string;   // market-data slug, e.g. "bitcoin"
  cmcId: string;  // market-data numeric id, e.g. "1"
}

/**
 * Requested analysis period: `days` calendar days ending at `end` (inclusive).
 */
export interface SeriesWindow {
  end: string; // YYYY-MM-DD
  days: number;
}

export interface RawPricePoint {
  readonly date: string; // YYYY-MM-DD
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  readonly marketCap: number;
}

export interface EnrichedRecord {
  readonly price: RawPricePoint;
  /** Trailing mean of valid closes; null while not enough history has accumulated. */
  readonly movingAverage: number | null;
  readonly conversionRate: number;
  readonly dailyAverage: number;
  readonly convertedDailyAverage: number;
}

/**
 * `exceeds-window` reports an average once strictly more than `windowSize`
 * valid closes were seen; `fills-window` once at least `windowSize` were.
 */
export type AverageThreshold = 'exceeds-window' | 'fills-window';
