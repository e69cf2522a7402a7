import { AverageThreshold } from '@coin-tracker/shared/types/price.types';

export const DEFAULT_AVERAGE_DAYS = 14;
export const DEFAULT_AVERAGE_THRESHOLD: AverageThreshold = 'exceeds-window';

/**
 * Fixed-capacity trailing mean over the last `capacity` values.
 */
export class MovingAverage {
  private readonly buffer: number[];
  private next = 0;
  private size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Moving average capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<number>(capacity).fill(0);
  }

  add(value: number): void {
    if (this.size < this.capacity) {
      this.size++;
    }

    this.buffer[this.next] = value;
    this.next = (this.next + 1) % this.capacity;
  }

  /**
   * Exact mean of the current window, summed afresh on each call. Slots
   * fill from index 0, so the first `size` entries are the window.
   */
  average(): number {
    if (this.size === 0) return 0;
    let sum = 0;
    for (let i = 0; i < this.size; i++) {
      sum += this.buffer[i];
    }
    return sum / this.size;
  }

  get count(): number {
    return this.size;
  }

  get isFull(): boolean {
    return this.size === this.capacity;
  }
}

export function isAverageAvailable(
  validCloses: number,
  windowSize: number,
  threshold: AverageThreshold = DEFAULT_AVERAGE_THRESHOLD,
): boolean {
  return threshold === 'exceeds-window' ? validCloses > windowSize : validCloses >= windowSize;
}
