export type TrackerErrorKind =
  | 'transport'
  | 'data-shape'
  | 'rate-unavailable'
  | 'persistence'
  | 'configuration';

export abstract class TrackerError extends Error {
  abstract readonly kind: TrackerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Non-success HTTP status or network failure.
 */
export class TransportError extends TrackerError {
  readonly kind = 'transport';

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Payload does not have the expected shape (or too few points).
 */
export class DataShapeError extends TrackerError {
  readonly kind = 'data-shape';
}

/**
 * The rate walk-back budget ran out. Fatal for the whole run.
 */
export class RateUnavailableError extends TrackerError {
  readonly kind = 'rate-unavailable';

  constructor(readonly requestedDate: string, readonly attempts: number) {
    super(`No exchange rate found for ${requestedDate} after ${attempts} attempts`);
  }
}

export class PersistenceError extends TrackerError {
  readonly kind = 'persistence';
}

export class ConfigurationError extends TrackerError {
  readonly kind = 'configuration';
}

export function isFatal(error: unknown): boolean {
  return error instanceof RateUnavailableError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
