#!/usr/bin/env node
import 'reflect-metadata';
import * as dotenv from 'dotenv';
dotenv.config();

import { Logger } from '@nestjs/common';
import { ConfigurationError, describeError } from '@coin-tracker/shared/errors';
import { USAGE, VERSION, readArgs } from './config/cli';
import { loadCurrencies, resolveConfigPath } from './config/currencies';
import { loadEnv, logLevelsFor } from './config/env.validation';
import { resolveOptions } from './config/tracker-options';
import { createPipeline } from './pipeline/pipeline.factory';

/**
 * One tracking run over every configured currency.
 *
 * Exit codes:
 *   0 = all currencies merged (or failures isolated with --isolate-failures)
 *   1 = configuration error or unrecovered processing error
 */
async function bootstrap(): Promise<void> {
  const logger = new Logger('PriceTracker');

  const args = readArgs(process.argv.slice(2));
  if (!args) {
    process.exit(1);
    return;
  }

  if (args.help) {
    console.log(USAGE);
    return;
  }
  if (args.version) {
    console.log(VERSION);
    return;
  }

  try {
    const env = loadEnv();
    Logger.overrideLogger(logLevelsFor(env.LOG_LEVEL));

    const options = resolveOptions(env, args);
    const currencies = loadCurrencies(resolveConfigPath(options.configPath));

    logger.log(
      `Tracking ${currencies.length} currencies, ${options.window.days} days up to ${options.window.end}` +
        (options.priority ? `, exporting to ${options.priority.endpoint}` : ''),
    );

    const summary = await createPipeline(options, currencies).run();

    for (const outcome of summary.currencies) {
      if (outcome.status === 'failed') {
        logger.warn(`${outcome.currency}: failed (${outcome.error.message})`);
      } else {
        logger.log(`${outcome.currency}: ${outcome.appended} new rows, ${outcome.skipped} already present`);
      }
    }

    logger.log('Finished');
  } catch (error) {
    const prefix = error instanceof ConfigurationError ? 'Configuration error' : 'Run failed';
    logger.error(`${prefix}: ${describeError(error)}`, error instanceof Error ? error.stack : undefined);
    process.exit(1);
  }
}

bootstrap().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
