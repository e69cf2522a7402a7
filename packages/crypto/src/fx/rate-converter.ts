import { Logger } from '@nestjs/common';
import { ExchangeRateCache } from './exchange-rate-cache';
import { IRateSource, RateResolution } from '@coin-tracker/shared/types/fx.types';
import { RateUnavailableError } from '@coin-tracker/shared/errors';
import { addDays } from '@coin-tracker/shared/utils/dates';

export const DEFAULT_RATE_MAX_ATTEMPTS = 20;

/**
 * Daily exchange rate lookup with a read-through cache.
 *
 * When the source has no rate for a day (weekend, holiday) the previous
 * calendar day is tried, up to `maxAttempts` lookups in total. The rate found
 * is cached under the day originally requested.
 */
export class RateConverter {
  private readonly logger = new Logger(RateConverter.name);

  constructor(
    private readonly source: IRateSource,
    private readonly cache: ExchangeRateCache = new ExchangeRateCache(),
    private readonly maxAttempts: number = DEFAULT_RATE_MAX_ATTEMPTS,
  ) {}

  async resolve(date: string): Promise<RateResolution> {
    const cached = this.cache.get(date);
    if (cached) {
      return {
        status: 'resolved',
        rate: cached.rate,
        requestedDate: date,
        resolvedDate: cached.resolvedDate,
        attempts: 0,
      };
    }

    let candidate = date;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const quote = await this.source.lookup(candidate);

      if (quote.status === 'available' && quote.rate > 0) {
        this.cache.set(date, { rate: quote.rate, resolvedDate: candidate });
        if (candidate !== date) {
          this.logger.debug(`Using ${this.source.name} rate of ${candidate} for ${date}`);
        }
        return { status: 'resolved', rate: quote.rate, requestedDate: date, resolvedDate: candidate, attempts: attempt };
      }

      const reason = quote.status === 'unavailable' ? quote.reason : `rate ${quote.rate}`;
      this.logger.debug(`No ${this.source.name} rate for ${candidate} (${reason}), trying previous day`);
      candidate = addDays(candidate, -1);
    }

    return { status: 'exhausted', requestedDate: date, attempts: this.maxAttempts };
  }

  async getRate(date: string): Promise<number> {
    const resolution = await this.resolve(date);
    if (resolution.status === 'exhausted') {
      throw new RateUnavailableError(resolution.requestedDate, resolution.attempts);
    }
    return resolution.rate;
  }
}
