export interface CachedRate {
  rate: number;
  resolvedDate: string;
}

/**
 * Rates already resolved during one run, keyed by the requested day.
 * Never evicted.
 */
export class ExchangeRateCache {
  private readonly rates = new Map<string, CachedRate>();

  get(date: string): CachedRate | undefined {
    return this.rates.get(date);
  }

  set(date: string, entry: CachedRate): void {
    this.rates.set(date, entry);
  }

  has(date: string): boolean {
    return this.rates.has(date);
  }

  get size(): number {
    return this.rates.size;
  }
}
