export type RateQuote =
  | { status: 'available'; rate: number }
  | { status: 'unavailable'; reason: string };

export type RateResolution =
  | {
      status: 'resolved';
      rate: number;
      requestedDate: string;
      resolvedDate: string;
      attempts: number;
    }
  | {
      status: 'exhausted';
      requestedDate: string;
      attempts: number;
    };

export interface IRateSource {
  name: string;

  /** Rate for exactly one calendar day (YYYY-MM-DD). */
  lookup(date: string): Promise<RateQuote>;
}
