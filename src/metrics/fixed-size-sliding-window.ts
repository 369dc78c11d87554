/**
 * Count-based sliding window over the most recent calls.
 */

import { Aggregation } from "./aggregation.js";
import { type TimeUnit, toMillis } from "./duration.js";
import type { Outcome } from "./outcome.js";
import type { SlidingWindowMetrics } from "./sliding-window.js";
import type { Snapshot } from "./snapshot.js";

/**
 * Count-based window over the last `windowSize` calls.
 *
 * Backed by a ring of single-call measurements. Once the ring is full, each
 * record overwrites the oldest slot and its counts are subtracted from the
 * running total, so `totalNumberOfCalls` saturates at `windowSize`.
 */
export class FixedSizeSlidingWindowMetrics implements SlidingWindowMetrics {
  private readonly windowSize: number;
  private readonly measurements: Aggregation[];
  private readonly total = new Aggregation();
  private headIndex = 0;

  constructor(windowSize: number) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new RangeError(`Window size must be a positive integer (got ${windowSize})`);
    }
    this.windowSize = windowSize;
    this.measurements = Array.from({ length: windowSize }, () => new Aggregation());
  }

  record(duration: number, unit: TimeUnit, outcome: Outcome): Snapshot {
    const durationMs = toMillis(duration, unit);
    const slot = this.moveWindowByOne();
    slot.record(durationMs, outcome);
    this.total.record(durationMs, outcome);
    return this.total.toSnapshot();
  }

  getSnapshot(): Snapshot {
    return this.total.toSnapshot();
  }

  private moveWindowByOne(): Aggregation {
    this.headIndex = (this.headIndex + 1) % this.windowSize;
    const slot = this.measurements[this.headIndex];
    // Slots that have never been written hold zero counts.
    this.total.remove(slot);
    slot.reset();
    return slot;
  }
}
