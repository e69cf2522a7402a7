import * as Joi from 'joi';
import { LogLevel } from '@nestjs/common';
import { AverageThreshold } from '@coin-tracker/shared/types/price.types';
import { ConfigurationError } from '@coin-tracker/shared/errors';
import { CMC_HISTORICAL_URL } from '@coin-tracker/crypto/pricing/providers/coinmarketcap.provider';
import { BOI_CURRENCY_URL, BOI_USD_CODE } from '@coin-tracker/crypto/fx/boi-rate-source';
import { DEFAULT_AVERAGE_DAYS, DEFAULT_AVERAGE_THRESHOLD } from '@coin-tracker/crypto/pricing/moving-average';
import { DEFAULT_RATE_MAX_ATTEMPTS } from '@coin-tracker/crypto/fx/rate-converter';

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug' | 'verbose';

export interface TrackerEnv {
  MARKET_DATA_URL: string;
  MARKET_DATA_API_KEY: string;
  RATE_SOURCE_URL: string;
  RATE_CURRENCY_CODE: string;
  REPORT_FILE: string;
  DELTA_REPORT_DIR: string;
  AVERAGE_DAYS: number;
  AVERAGE_THRESHOLD: AverageThreshold;
  RATE_MAX_RETRIES: number;
  PRIORITY_ENDPOINT: string;
  PRIORITY_USERNAME: string;
  PRIORITY_PASSWORD: string;
  TRACKER_CRON: string;
  LOG_LEVEL: LogLevelName;
}

/**
 * Environment variable validation schema
 */
export const envValidationSchema = Joi.object<TrackerEnv>({
  // Market data
  MARKET_DATA_URL: Joi.string().uri().default(CMC_HISTORICAL_URL),
  MARKET_DATA_API_KEY: Joi.string().allow('').default(''),

  // Exchange rates
  RATE_SOURCE_URL: Joi.string().uri().default(BOI_CURRENCY_URL),
  RATE_CURRENCY_CODE: Joi.string().default(BOI_USD_CODE),
  RATE_MAX_RETRIES: Joi.number().integer().min(1).default(DEFAULT_RATE_MAX_ATTEMPTS),

  // Reports
  REPORT_FILE: Joi.string().default('Crypto-HistoricalPrice.xlsx'),
  DELTA_REPORT_DIR: Joi.string().allow('').default(''),
  AVERAGE_DAYS: Joi.number().integer().min(1).default(DEFAULT_AVERAGE_DAYS),
  AVERAGE_THRESHOLD: Joi.string().valid('exceeds-window', 'fills-window').default(DEFAULT_AVERAGE_THRESHOLD),

  // Priority ERP (optional)
  PRIORITY_ENDPOINT: Joi.string().uri().allow('').default(''),
  PRIORITY_USERNAME: Joi.string().allow('').default(''),
  PRIORITY_PASSWORD: Joi.string().allow('').default(''),

  // Scheduler
  TRACKER_CRON: Joi.string().default('0 8 * * *'),

  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'debug', 'verbose').default('info'),
}).unknown(true);

export function loadEnv(env: NodeJS.ProcessEnv = process.env): TrackerEnv {
  const { value, error } = envValidationSchema.validate(env, { abortEarly: false });
  if (error || !value) {
    throw new ConfigurationError(`Invalid environment: ${error?.message ?? 'empty'}`);
  }
  return value;
}

const LOG_LEVELS: Record<LogLevelName, LogLevel[]> = {
  error: ['error'],
  warn: ['error', 'warn'],
  info: ['error', 'warn', 'log'],
  debug: ['error', 'warn', 'log', 'debug'],
  verbose: ['error', 'warn', 'log', 'debug', 'verbose'],
};

export function logLevelsFor(level: LogLevelName): LogLevel[] {
  return LOG_LEVELS[level];
}
