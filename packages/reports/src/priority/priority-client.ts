import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import * as Joi from 'joi';
import { Logger } from '@nestjs/common';
import { CurrencyConfig } from '@coin-tracker/shared/types/price.types';
import { ForwardPayload, ForwardResult, IRateForwarder } from '@coin-tracker/shared/types/report.types';
import { describeError } from '@coin-tracker/shared/errors';

export interface PriorityConfig {
  endpoint: string;
  username: string;
  password: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

interface PriorityErrorBody {
  FORM: { InterfaceErrors: { text: string } };
}

const errorBodySchema = Joi.object<PriorityErrorBody>({
  FORM: Joi.object({
    InterfaceErrors: Joi.object({ text: Joi.string().required() }).unknown(true).required(),
  })
    .unknown(true)
    .required(),
}).unknown(true);

/**
 * Loads daily currency rates into the Priority ERP through its OData API.
 */
export class PriorityClient implements IRateForwarder {
  private readonly logger = new Logger(PriorityClient.name);
  private readonly client: AxiosInstance;

  constructor(config: PriorityConfig) {
    this.client = axios.create({
      baseURL: config.endpoint,
      timeout: config.timeoutMs ?? 30000,
      auth: { username: config.username, password: config.password },
      headers: { 'Content-Type': 'application/json' },
      adapter: config.adapter,
      validateStatus: () => true,
    });
  }

  static loadCurrencyPath(symbol: string): string {
    return `/CURRENCIES('${symbol}')/LOADCURRENCY_SUBFORM`;
  }

  async forward(currency: CurrencyConfig, payload: ForwardPayload): Promise<ForwardResult> {
    this.logger.log(`Inserting to Priority {${currency.name}, ${payload.exchangeRate}, ${payload.currencyDate}}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.post<unknown>(PriorityClient.loadCurrencyPath(currency.symbol), {
        EXCHANGE: payload.exchangeRate,
        CURDATE: `${payload.currencyDate}T00:00:00Z`,
      });
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Priority insert ERROR {network}: ${message}`);
      return { ok: false, status: 0, message };
    }

    if (response.status === 201) {
      this.logger.log(`Priority insert of currency ${currency.name} -> successful`);
      return { ok: true };
    }

    const message = interfaceErrorText(response.data) ?? `status code ${response.status}`;
    this.logger.error(`Priority insert ERROR {${response.status}}: ${message}`);
    return { ok: false, status: response.status, message };
  }
}

export function interfaceErrorText(body: unknown): string | undefined {
  const { value, error } = errorBodySchema.validate(body);
  if (error || !value) return undefined;
  return value.FORM.InterfaceErrors.text;
}
