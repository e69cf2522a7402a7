import * as fs from 'fs';
import * as path from 'path';
import * as Joi from 'joi';
import { CurrencyConfig } from '@coin-tracker/shared/types/price.types';
import { ConfigurationError, describeError } from '@coin-tracker/shared/errors';

export const CONFIG_FILE_NAME = 'config.json';

interface CurrencyEntry {
  name: string;
  symbol: string;
  cmc?: string;
  cmc_id: string | number;
}

interface CurrenciesFile {
  currencies: CurrencyEntry[];
}

const currenciesSchema = Joi.object<CurrenciesFile>({
  currencies: Joi.array()
    .items(
      Joi.object({
        name: Joi.string().required(),
        symbol: Joi.string().required(),
        cmc: Joi.string().allow(''),
        cmc_id: Joi.alternatives(Joi.string(), Joi.number().integer()).required(),
      }),
    )
    .min(1)
    .required(),
});

/**
 * Explicit path if given, otherwise config.json beside the app, then in the
 * working directory.
 */
export function resolveConfigPath(explicit?: string, cwd: string = process.cwd()): string {
  if (explicit) {
    const resolved = path.resolve(cwd, explicit);
    if (!fs.existsSync(resolved)) {
      throw new ConfigurationError(`Config file not found: ${resolved}`);
    }
    return resolved;
  }

  const candidates = [path.join(__dirname, '..', '..', CONFIG_FILE_NAME), path.join(cwd, CONFIG_FILE_NAME)];
  const found = candidates.find(candidate => fs.existsSync(candidate));
  if (!found) {
    throw new ConfigurationError(`Config file not found, looked in: ${candidates.join(', ')}`);
  }
  return found;
}

export function parseCurrencies(content: string): CurrencyConfig[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Config file is not valid JSON: ${describeError(error)}`);
  }

  const { value, error } = currenciesSchema.validate(raw);
  if (error || !value) {
    throw new ConfigurationError(`Invalid currencies config: ${error?.message ?? 'empty'}`);
  }

  return value.currencies.map(entry => ({
    name: entry.name,
    symbol: entry.symbol,
    cmc: entry.cmc || undefined,
    cmcId: String(entry.cmc_id),
  }));
}

export function loadCurrencies(configPath: string): CurrencyConfig[] {
  return parseCurrencies(fs.readFileSync(configPath, 'utf8'));
}
