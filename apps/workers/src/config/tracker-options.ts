import * as path from 'path';
import { AverageThreshold, SeriesSource, SeriesWindow } from '@coin-tracker/shared/types/price.types';
import { ConfigurationError } from '@coin-tracker/shared/errors';
import { addDays, daysBetween, todayIso } from '@coin-tracker/shared/utils/dates';
import { PriorityConfig } from '@coin-tracker/reports/priority/priority-client';
import { CliArgs, DEFAULT_DAYS } from './cli';
import { TrackerEnv } from './env.validation';

export interface TrackerOptions {
  configPath?: string;
  reportFile: string;
  deltaReportFile: string;
  window: SeriesWindow;
  averageDays: number;
  averageThreshold: AverageThreshold;
  rateMaxAttempts: number;
  source: SeriesSource;
  isolateFailures: boolean;
  marketDataUrl: string;
  marketDataApiKey?: string;
  rateSourceUrl: string;
  rateCurrencyCode: string;
  priority?: PriorityConfig;
}

/**
 * `days` calendar days ending at `--to` (or today); `--from` with `--to`
 * spans the range inclusive.
 */
export function resolveWindow(args: Pick<CliArgs, 'days' | 'from' | 'to'>, today: string = todayIso()): SeriesWindow {
  const end = args.to ?? today;

  if (args.from) {
    if (args.from > end) {
      throw new ConfigurationError(`--from ${args.from} is after ${end}`);
    }
    return { end, days: daysBetween(args.from, end) + 1 };
  }

  return { end, days: args.days ?? DEFAULT_DAYS };
}

export function windowStart(window: SeriesWindow): string {
  return addDays(window.end, -(window.days - 1));
}

/**
 * `<start>.xlsx` for a single day, `<start>_<end>.xlsx` otherwise.
 */
export function deltaReportName(window: SeriesWindow): string {
  const start = windowStart(window);
  return start === window.end ? `${start}.xlsx` : `${start}_${window.end}.xlsx`;
}

export function resolveOptions(
  env: TrackerEnv,
  args: CliArgs,
  cwd: string = process.cwd(),
  today: string = todayIso(),
): TrackerOptions {
  const window = resolveWindow(args, today);
  const deltaDir = args.deltaDir ?? (env.DELTA_REPORT_DIR || cwd);

  const endpoint = args.priorityEndpoint ?? env.PRIORITY_ENDPOINT;
  const username = args.priorityUsername ?? env.PRIORITY_USERNAME;
  const password = args.priorityPassword ?? env.PRIORITY_PASSWORD;

  if (endpoint && !username) {
    throw new ConfigurationError('Priority endpoint is set but the username is missing');
  }

  return {
    configPath: args.config,
    reportFile: path.resolve(cwd, args.report ?? env.REPORT_FILE),
    deltaReportFile: path.resolve(cwd, deltaDir, deltaReportName(window)),
    window,
    averageDays: env.AVERAGE_DAYS,
    averageThreshold: env.AVERAGE_THRESHOLD,
    rateMaxAttempts: env.RATE_MAX_RETRIES,
    source: args.source ?? 'coinmarketcap',
    isolateFailures: args.isolateFailures,
    marketDataUrl: env.MARKET_DATA_URL,
    marketDataApiKey: env.MARKET_DATA_API_KEY || undefined,
    rateSourceUrl: env.RATE_SOURCE_URL,
    rateCurrencyCode: env.RATE_CURRENCY_CODE,
    priority: endpoint ? { endpoint, username, password } : undefined,
  };
}
