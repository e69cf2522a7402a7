import { RawPricePoint } from '@coin-tracker/shared/types/price.types';
import { addDays } from '@coin-tracker/shared/utils/dates';

/**
 * Points with the given closes, oldest close first, dated from `start`.
 * Returned newest first, like the fetcher does.
 */
export function seriesFromCloses(closes: number[], start = '2024-01-01'): RawPricePoint[] {
  return closes
    .map((close, i) => ({
      date: addDays(start, i),
      open: close,
      high: close,
      low: close,
      close,
      volume: 1000,
      marketCap: 50000,
    }))
    .reverse();
}
