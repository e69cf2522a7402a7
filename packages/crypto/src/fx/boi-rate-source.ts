import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { DOMParser } from '@xmldom/xmldom';
import { IRateSource, RateQuote } from '@coin-tracker/shared/types/fx.types';
import { DataShapeError, TransportError, describeError } from '@coin-tracker/shared/errors';
import { formatCompact } from '@coin-tracker/shared/utils/dates';

export const BOI_CURRENCY_URL = 'https://www.boi.org.il/currency.xml';

// Bank of Israel series code for USD
export const BOI_USD_CODE = '01';

export interface BankOfIsraelOptions {
  baseUrl?: string;
  currencyCode?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

/**
 * Bank of Israel representative rate (shekels per unit of foreign currency)
 * for a single day.
 */
export class BankOfIsraelRateSource implements IRateSource {
  readonly name = 'bank-of-israel';
  private readonly client: AxiosInstance;
  private readonly currencyCode: string;

  constructor(options: BankOfIsraelOptions = {}) {
    this.currencyCode = options.currencyCode ?? BOI_USD_CODE;
    this.client = axios.create({
      baseURL: options.baseUrl ?? BOI_CURRENCY_URL,
      timeout: options.timeoutMs ?? 10000,
      responseType: 'text',
      adapter: options.adapter,
      validateStatus: () => true,
    });
  }

  async lookup(date: string): Promise<RateQuote> {
    let response: AxiosResponse<string>;

    try {
      response = await this.client.get<string>('', {
        params: {
          curr: this.currencyCode,
          rdate: formatCompact(date),
        },
      });
    } catch (error) {
      throw new TransportError(`Bank of Israel request failed for ${date}: ${describeError(error)}`, undefined, {
        cause: error,
      });
    }

    if (response.status !== 200) {
      return { status: 'unavailable', reason: `status code ${response.status}` };
    }

    return parseCurrencyXml(String(response.data), date);
  }
}

/**
 * Read CURRENCY/RATE and CURRENCY/UNIT from a currency.xml document.
 * A missing or zero rate means no publication for that day.
 */
export function parseCurrencyXml(xmlContent: string, date: string): RateQuote {
  const doc = new DOMParser().parseFromString(xmlContent, 'text/xml');
  const currency = doc.getElementsByTagName('CURRENCY')[0];

  if (!currency) {
    return { status: 'unavailable', reason: 'no CURRENCY element' };
  }

  const unit = parseNumber(getElementText(currency, 'UNIT'));
  if (unit > 1) {
    throw new DataShapeError(`Unexpected unit ${unit} in Bank of Israel rate for ${date}`);
  }

  const rate = parseNumber(getElementText(currency, 'RATE'));
  if (rate <= 0) {
    return { status: 'unavailable', reason: 'zero rate' };
  }

  return { status: 'available', rate };
}

function getElementText(parent: Element, tag: string): string {
  const elements = parent.getElementsByTagName(tag);
  if (elements.length === 0) return '';
  return elements[0].textContent ?? '';
}

function parseNumber(raw: string): number {
  const value = Number(raw.trim());
  return Number.isFinite(value) ? value : 0;
}
