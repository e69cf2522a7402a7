import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import * as Joi from 'joi';
import { Logger } from '@nestjs/common';
import { ISeriesProvider, SeriesRequest } from '../price-provider.interface';
import { CurrencyConfig, RawPricePoint } from '@coin-tracker/shared/types/price.types';
import { DataShapeError, TransportError, describeError } from '@coin-tracker/shared/errors';

declare module 'axios' {
  interface InternalAxiosRequestConfig {
    retryCount?: number;
  }
}

export const CMC_HISTORICAL_URL = 'https://web-api.coinmarketcap.com/v1/cryptocurrency/ohlcv/historical';

const QUOTE_CURRENCY = 'USD';

interface CmcQuote {
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  market_cap?: number | null;
}

interface CmcPayload {
  data: {
    quotes: Array<{ quote: { USD: CmcQuote } }>;
  };
}

const quoteSchema = Joi.object<CmcQuote>({
  timestamp: Joi.string().isoDate().required(),
  open: Joi.number().required(),
  high: Joi.number().required(),
  low: Joi.number().required(),
  close: Joi.number().required(),
  volume: Joi.number().required(),
  market_cap: Joi.number().allow(null),
}).unknown(true);

const payloadSchema = Joi.object<CmcPayload>({
  data: Joi.object({
    quotes: Joi.array()
      .items(
        Joi.object({
          quote: Joi.object({ USD: quoteSchema.required() }).unknown(true).required(),
        }).unknown(true),
      )
      .required(),
  })
    .unknown(true)
    .required(),
}).unknown(true);

export interface CoinMarketCapOptions {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseMs?: number;
  adapter?: AxiosAdapter;
}

export class CoinMarketCapProvider implements ISeriesProvider {
  readonly name = 'coinmarketcap';
  private readonly logger = new Logger(CoinMarketCapProvider.name);
  private readonly client: AxiosInstance;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;

  constructor(options: CoinMarketCapOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseMs = options.retryBaseMs ?? 1000;

    this.client = axios.create({
      baseURL: options.baseUrl ?? CMC_HISTORICAL_URL,
      timeout: options.timeoutMs ?? 10000,
      headers: options.apiKey ? { 'X-CMC_PRO_API_KEY': options.apiKey } : {},
      adapter: options.adapter,
      validateStatus: () => true,
    });

    // Back off on rate limiting: 2s, 4s, 8s
    this.client.interceptors.response.use(async (response: AxiosResponse) => {
      const config = response.config;
      const attempt = config.retryCount ?? 0;

      if (response.status === 429 && attempt < this.maxRetries) {
        config.retryCount = attempt + 1;
        const delay = Math.pow(2, config.retryCount) * this.retryBaseMs;
        this.logger.warn(`Rate limited, retrying in ${delay}ms (attempt ${config.retryCount})`);

        await new Promise(resolve => setTimeout(resolve, delay));
        return this.client(config);
      }

      return response;
    });
  }

  async fetchDailySeries(currency: CurrencyConfig, request: SeriesRequest): Promise<RawPricePoint[]> {
    let response: AxiosResponse<unknown>;

    try {
      response = await this.client.get<unknown>('', {
        params: {
          id: currency.cmcId,
          convert: QUOTE_CURRENCY,
          count: request.count,
          time_end: request.end,
        },
      });
    } catch (error) {
      throw new TransportError(
        `Market data request failed for ${currency.name}: ${describeError(error)}`,
        undefined,
        { cause: error },
      );
    }

    if (response.status !== 200) {
      throw new TransportError(
        `Market data status code error for ${currency.name}: ${response.status} ${response.statusText}`,
        response.status,
      );
    }

    return parseQuotes(response.data, currency.name);
  }
}

/**
 * Validate the historical OHLCV payload and map it to price points.
 */
export function parseQuotes(payload: unknown, label: string): RawPricePoint[] {
  const { value, error } = payloadSchema.validate(payload);
  if (error || !value) {
    throw new DataShapeError(`Malformed market data for ${label}: ${error?.message ?? 'empty payload'}`);
  }

  return value.data.quotes.map(({ quote }) => {
    const q = quote.USD;
    return {
      date: new Date(q.timestamp).toISOString().slice(0, 10),
      open: q.open,
      high: q.high,
      low: q.low,
      close: q.close,
      volume: q.volume,
      marketCap: Math.trunc(q.market_cap ?? 0),
    };
  });
}
