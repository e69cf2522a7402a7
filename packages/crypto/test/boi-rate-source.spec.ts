import { BankOfIsraelRateSource, parseCurrencyXml } from '../src/fx/boi-rate-source';
import { DataShapeError, TransportError } from '@coin-tracker/shared/errors';
import { requestOf, stubAdapter } from '../../../test/http-stub';

const rateXml = (rate: string, unit = '1') => `<?xml version="1.0" encoding="utf-8" standalone="yes"?>
<CURRENCIES>
  <LAST_UPDATE>2024-01-04</LAST_UPDATE>
  <CURRENCY>
    <NAME>Dollar</NAME>
    <UNIT>${unit}</UNIT>
    <CURRENCYCODE>USD</CURRENCYCODE>
    <COUNTRY>USA</COUNTRY>
    <RATE>${rate}</RATE>
    <CHANGE>-0.191</CHANGE>
  </CURRENCY>
</CURRENCIES>`;

describe('parseCurrencyXml', () => {
  it('should read the rate', () => {
    expect(parseCurrencyXml(rateXml('3.647'), '2024-01-04')).toEqual({ status: 'available', rate: 3.647 });
  });

  it('should treat a zero rate as unavailable', () => {
    expect(parseCurrencyXml(rateXml('0'), '2024-01-06')).toEqual({ status: 'unavailable', reason: 'zero rate' });
  });

  it('should treat a document without CURRENCY as unavailable', () => {
    const xml = '<CURRENCIES><ERROR1>Requested date is invalid</ERROR1></CURRENCIES>';
    expect(parseCurrencyXml(xml, '2024-01-06')).toEqual({ status: 'unavailable', reason: 'no CURRENCY element' });
  });

  it('should reject a unit greater than one', () => {
    expect(() => parseCurrencyXml(rateXml('2.51', '10'), '2024-01-04')).toThrow(DataShapeError);
  });
});

describe('BankOfIsraelRateSource', () => {
  it('should query the day in compact form', async () => {
    const adapter = stubAdapter({ status: 200, data: rateXml('3.712') });
    const source = new BankOfIsraelRateSource({ baseUrl: 'https://rates.test/currency.xml', adapter });

    const quote = await source.lookup('2024-01-05');

    expect(quote).toEqual({ status: 'available', rate: 3.712 });
    const request = requestOf(adapter);
    expect(request.baseURL).toBe('https://rates.test/currency.xml');
    expect(request.params).toEqual({ curr: '01', rdate: '20240105' });
  });

  it('should use the configured currency code', async () => {
    const adapter = stubAdapter({ status: 200, data: rateXml('4.02') });
    const source = new BankOfIsraelRateSource({ currencyCode: '27', adapter });

    await source.lookup('2024-01-05');

    expect(requestOf(adapter).params).toEqual({ curr: '27', rdate: '20240105' });
  });

  it('should report a non-success status as unavailable', async () => {
    const adapter = stubAdapter({ status: 404, data: 'Not Found' });
    const source = new BankOfIsraelRateSource({ adapter });

    expect(await source.lookup('2024-01-06')).toEqual({ status: 'unavailable', reason: 'status code 404' });
  });

  it('should raise a transport error when the request fails', async () => {
    const adapter = stubAdapter(new Error('getaddrinfo ENOTFOUND rates.test'));
    const source = new BankOfIsraelRateSource({ adapter });

    await expect(source.lookup('2024-01-06')).rejects.toBeInstanceOf(TransportError);
  });
});
