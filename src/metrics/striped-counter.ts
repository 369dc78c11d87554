import { threadId } from "node:worker_threads";

const DEFAULT_STRIPES = 8;
const BYTES_PER_CELL = BigInt64Array.BYTES_PER_ELEMENT;

/**
 * Add-only counter spread over several cells of a SharedArrayBuffer.
 *
 * Each thread adds into the cell picked by its `threadId`, so workers that
 * share the buffer rarely touch the same cell. Updates go through `Atomics`
 * and are never lost; `sum()` reflects every increment that completed before
 * it was called.
 */
export class StripedCounter {
  readonly buffer: SharedArrayBuffer;
  private readonly cells: BigInt64Array;
  private readonly stripe: number;

  /**
   * @param stripes - number of cells; ignored when `buffer` is given
   * @param buffer - memory of an existing counter to attach to
   */
  constructor(stripes: number = DEFAULT_STRIPES, buffer?: SharedArrayBuffer) {
    if (buffer) {
      if (buffer.byteLength === 0 || buffer.byteLength % BYTES_PER_CELL !== 0) {
        throw new RangeError(`Buffer length ${buffer.byteLength} is not a whole number of counter cells`);
      }
      this.buffer = buffer;
    } else {
      if (!Number.isInteger(stripes) || stripes < 1) {
        throw new RangeError(`Stripe count must be a positive integer (got ${stripes})`);
      }
      this.buffer = new SharedArrayBuffer(stripes * BYTES_PER_CELL);
    }
    this.cells = new BigInt64Array(this.buffer);
    this.stripe = threadId % this.cells.length;
  }

  /** Attach to a counter created elsewhere, typically in another worker. */
  static fromBuffer(buffer: SharedArrayBuffer): StripedCounter {
    return new StripedCounter(DEFAULT_STRIPES, buffer);
  }

  increment(): void {
    Atomics.add(this.cells, this.stripe, 1n);
  }

  add(n: number): void {
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new RangeError(`Counter increment must be a non-negative integer (got ${n})`);
    }
    Atomics.add(this.cells, this.stripe, BigInt(n));
  }

  sum(): number {
    let total = 0n;
    for (let i = 0; i < this.cells.length; i++) {
      total += Atomics.load(this.cells, i);
    }
    return Number(total);
  }

  /** Number of cells the count is spread over. */
  get stripes(): number {
    return this.cells.length;
  }
}
