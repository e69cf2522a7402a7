import { CurrencyConfig } from './price.types';

export interface ForwardPayload {
  exchangeRate: number;
  currencyDate: string; // YYYY-MM-DD
}

export type ForwardResult =
  | { ok: true }
  | { ok: false; status: number; message: string };

export interface IRateForwarder {
  forward(currency: CurrencyConfig, payload: ForwardPayload): Promise<ForwardResult>;
}

export interface MergeResult {
  appended: number;
  skipped: number;
  forwardFailures: number;
}

export type CurrencyOutcome =
  | ({ currency: string; status: 'merged' } & MergeResult)
  | { currency: string; status: 'failed'; error: Error };

export interface RunSummary {
  currencies: CurrencyOutcome[];
}
