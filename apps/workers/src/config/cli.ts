import { SeriesSource } from '@coin-tracker/shared/types/price.types';
import { ConfigurationError, describeError } from '@coin-tracker/shared/errors';
import { isIsoDay } from '@coin-tracker/shared/utils/dates';

export const VERSION = '1.0.0';

export const DEFAULT_DAYS = 15;

export const USAGE = `Usage: coin-tracker [options]

Track daily cryptocurrency prices with a moving average and shekel conversion.

Options:
  --days <n>                  days to report, ending today or at --to (default ${DEFAULT_DAYS})
  --from <YYYY-MM-DD>         first day to report
  --to <YYYY-MM-DD>           last day to report (default today)
  --config <path>             currencies config file (default config.json)
  --report <path>             report workbook (default REPORT_FILE)
  --delta-dir <path>          directory for the per-run delta workbook
  --source <name>             coinmarketcap | dummy (default coinmarketcap)
  --isolate-failures          keep going with the next currency when one fails
  --priority-endpoint <url>   export rates to Priority through this OData endpoint
  --priority-username <user>  Priority API username
  --priority-password <pass>  Priority API password
  --help                      show this message
  --version                   show the version`;

export interface CliArgs {
  days?: number;
  from?: string;
  to?: string;
  config?: string;
  report?: string;
  deltaDir?: string;
  source?: SeriesSource;
  isolateFailures: boolean;
  priorityEndpoint?: string;
  priorityUsername?: string;
  priorityPassword?: string;
  help: boolean;
  version: boolean;
}

type ValueFlag =
  | 'days'
  | 'from'
  | 'to'
  | 'config'
  | 'report'
  | 'deltaDir'
  | 'source'
  | 'priorityEndpoint'
  | 'priorityUsername'
  | 'priorityPassword';

// camelCase aliases are the flag names of the first releases
const VALUE_FLAGS = new Map<string, ValueFlag>([
  ['days', 'days'],
  ['daysBackToFetch', 'days'],
  ['from', 'from'],
  ['to', 'to'],
  ['config', 'config'],
  ['report', 'report'],
  ['delta-dir', 'deltaDir'],
  ['source', 'source'],
  ['priority-endpoint', 'priorityEndpoint'],
  ['priorityEndpoint', 'priorityEndpoint'],
  ['priority-username', 'priorityUsername'],
  ['priorityUsername', 'priorityUsername'],
  ['priority-password', 'priorityPassword'],
  ['priorityPassword', 'priorityPassword'],
]);

const SOURCES: readonly SeriesSource[] = ['coinmarketcap', 'dummy'];

function isSource(value: string): value is SeriesSource {
  return SOURCES.some(source => source === value);
}

/**
 * Parse `--flag value`, `--flag=value` and boolean switches.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const parsed: CliArgs = { isolateFailures: false, help: false, version: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      throw new ConfigurationError(`Unexpected argument: ${arg}`);
    }

    const eq = arg.indexOf('=');
    const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

    if (key === 'help' || key === 'version' || key === 'isolate-failures') {
      if (eq !== -1) throw new ConfigurationError(`--${key} takes no value`);
      if (key === 'help') parsed.help = true;
      else if (key === 'version') parsed.version = true;
      else parsed.isolateFailures = true;
      continue;
    }

    const field = VALUE_FLAGS.get(key);
    if (!field) {
      throw new ConfigurationError(`Unknown option: --${key}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value === '') {
      throw new ConfigurationError(`Missing value for --${key}`);
    }

    switch (field) {
      case 'days': {
        const days = Number(value);
        if (!Number.isInteger(days) || days < 1) {
          throw new ConfigurationError(`--${key} must be a positive integer, got ${value}`);
        }
        parsed.days = days;
        break;
      }
      case 'from':
      case 'to':
        if (!isIsoDay(value)) {
          throw new ConfigurationError(`--${key} must be a date as YYYY-MM-DD, got ${value}`);
        }
        parsed[field] = value;
        break;
      case 'source':
        if (!isSource(value)) {
          throw new ConfigurationError(`--source must be one of ${SOURCES.join(', ')}, got ${value}`);
        }
        parsed.source = value;
        break;
      default:
        parsed[field] = value;
    }
  }

  return parsed;
}

/**
 * parseArgs for entry points: prints the error and usage instead of throwing.
 */
export function readArgs(argv: readonly string[]): CliArgs | null {
  try {
    return parseArgs(argv);
  } catch (error) {
    console.error(describeError(error));
    console.error(USAGE);
    return null;
  }
}
