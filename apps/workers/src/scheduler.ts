/**
 * Long-running entrypoint: run the tracker once at start-up, then on the
 * TRACKER_CRON schedule (UTC). Flags are the same as the CLI's.
 *
 * Usage:
 *     node dist/scheduler.js [options]
 */
import 'reflect-metadata';
import * as dotenv from 'dotenv';
dotenv.config();

import * as cron from 'node-cron';
import { Logger } from '@nestjs/common';
import { describeError, isFatal } from '@coin-tracker/shared/errors';
import { CliArgs, USAGE, VERSION, readArgs } from './config/cli';
import { loadCurrencies, resolveConfigPath } from './config/currencies';
import { TrackerEnv, loadEnv, logLevelsFor } from './config/env.validation';
import { resolveOptions } from './config/tracker-options';
import { createPipeline } from './pipeline/pipeline.factory';
import { ScheduledRun } from './pipeline/scheduled-run';

const logger = new Logger('Scheduler');

async function runOnce(env: TrackerEnv, args: CliArgs): Promise<void> {
  // Options are resolved per run so the window ends on the current day
  const options = resolveOptions(env, args);
  const currencies = loadCurrencies(resolveConfigPath(options.configPath));

  logger.log(`Starting run for ${options.window.end}`);
  const summary = await createPipeline(options, currencies).run();
  const appended = summary.currencies.reduce((sum, o) => sum + (o.status === 'merged' ? o.appended : 0), 0);
  logger.log(`Run complete: ${appended} new rows`);
}

function handleFailure(error: unknown): void {
  logger.error(`Run failed: ${describeError(error)}`);
  if (isFatal(error)) {
    process.exit(1);
  }
}

function start(): void {
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

  let env: TrackerEnv;
  try {
    env = loadEnv();
  } catch (error) {
    logger.error(`Configuration error: ${describeError(error)}`);
    process.exit(1);
    return;
  }
  Logger.overrideLogger(logLevelsFor(env.LOG_LEVEL));

  if (!cron.validate(env.TRACKER_CRON)) {
    logger.error(`Invalid TRACKER_CRON expression: ${env.TRACKER_CRON}`);
    process.exit(1);
    return;
  }

  const run = new ScheduledRun(() => runOnce(env, args));

  cron.schedule(env.TRACKER_CRON, () => {
    run.trigger('scheduled run').catch(handleFailure);
  }, { timezone: 'UTC' });

  logger.log('Scheduler started. Running initial fetch...');
  run
    .trigger('initial run')
    .then(() => {
      logger.log(`Initial run complete. Entering schedule loop (${env.TRACKER_CRON} UTC)`);
    })
    .catch(handleFailure);
}

start();
