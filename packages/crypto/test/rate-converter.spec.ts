import { RateConverter } from '../src/fx/rate-converter';
import { ExchangeRateCache } from '../src/fx/exchange-rate-cache';
import { IRateSource, RateQuote } from '@coin-tracker/shared/types/fx.types';
import { RateUnavailableError, TransportError } from '@coin-tracker/shared/errors';

/**
 * Source with rates for the listed days only.
 */
function sourceWith(rates: Record<string, number>) {
  const lookup = jest.fn(async (date: string): Promise<RateQuote> => {
    const rate = rates[date];
    return rate === undefined ? { status: 'unavailable', reason: 'no publication' } : { status: 'available', rate };
  });
  const source: IRateSource = { name: 'test-bank', lookup };
  return { source, lookup };
}

describe('RateConverter', () => {
  it('should return the rate of the requested day', async () => {
    const { source, lookup } = sourceWith({ '2024-01-03': 3.7 });
    const converter = new RateConverter(source);

    const resolution = await converter.resolve('2024-01-03');

    expect(resolution).toEqual({
      status: 'resolved',
      rate: 3.7,
      requestedDate: '2024-01-03',
      resolvedDate: '2024-01-03',
      attempts: 1,
    });
    expect(lookup).toHaveBeenCalledTimes(1);
  });

  it('should serve repeated lookups from the cache without I/O', async () => {
    const { source, lookup } = sourceWith({ '2024-01-03': 3.7 });
    const converter = new RateConverter(source);

    await converter.getRate('2024-01-03');
    const rate = await converter.getRate('2024-01-03');

    expect(rate).toBe(3.7);
    expect(lookup).toHaveBeenCalledTimes(1);
  });

  it('should walk back over unpublished days and cache under the requested day', async () => {
    // Saturday 2024-01-06 -> Thursday 2024-01-04
    const { source, lookup } = sourceWith({ '2024-01-04': 3.65 });
    const cache = new ExchangeRateCache();
    const converter = new RateConverter(source, cache);

    const resolution = await converter.resolve('2024-01-06');

    expect(resolution).toEqual({
      status: 'resolved',
      rate: 3.65,
      requestedDate: '2024-01-06',
      resolvedDate: '2024-01-04',
      attempts: 3,
    });
    expect(lookup.mock.calls.map(([date]) => date)).toEqual(['2024-01-06', '2024-01-05', '2024-01-04']);
    expect(cache.get('2024-01-06')).toEqual({ rate: 3.65, resolvedDate: '2024-01-04' });
    expect(cache.has('2024-01-05')).toBe(false);

    const again = await converter.resolve('2024-01-06');
    expect(again).toMatchObject({ status: 'resolved', rate: 3.65, attempts: 0 });
    expect(lookup).toHaveBeenCalledTimes(3);
  });

  it('should treat a zero rate as unpublished', async () => {
    const { source } = sourceWith({ '2024-01-02': 0, '2024-01-01': 3.6 });
    const converter = new RateConverter(source);

    expect(await converter.getRate('2024-01-02')).toBe(3.6);
  });

  it('should report exhaustion after the retry budget', async () => {
    const { source, lookup } = sourceWith({});
    const converter = new RateConverter(source, new ExchangeRateCache(), 20);

    const resolution = await converter.resolve('2024-01-31');

    expect(resolution).toEqual({ status: 'exhausted', requestedDate: '2024-01-31', attempts: 20 });
    expect(lookup).toHaveBeenCalledTimes(20);
    expect(lookup).toHaveBeenLastCalledWith('2024-01-12');
  });

  it('should raise a fatal error instead of returning zero when exhausted', async () => {
    const { source } = sourceWith({ '2023-12-01': 3.5 });
    const converter = new RateConverter(source, new ExchangeRateCache(), 5);

    const error = await converter.getRate('2024-01-31').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateUnavailableError);
    expect(error).toMatchObject({ requestedDate: '2024-01-31', attempts: 5, kind: 'rate-unavailable' });
  });

  it('should not cache exhausted lookups', async () => {
    const { source, lookup } = sourceWith({});
    const cache = new ExchangeRateCache();
    const converter = new RateConverter(source, cache, 2);

    await converter.resolve('2024-01-31');

    expect(cache.size).toBe(0);
    expect(lookup).toHaveBeenCalledTimes(2);
  });

  it('should propagate transport failures from the source', async () => {
    const source: IRateSource = {
      name: 'test-bank',
      lookup: jest.fn().mockRejectedValue(new TransportError('connection reset')),
    };
    const converter = new RateConverter(source);

    await expect(converter.getRate('2024-01-31')).rejects.toBeInstanceOf(TransportError);
  });
});
