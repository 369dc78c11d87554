/**
 * Time-bucketed sliding window.
 *
 * Keeps one bucket per wall-clock second for the last N seconds. Buckets are
 * reused in a ring as the clock advances; the running total is kept in step
 * by subtracting each bucket before it is reused.
 */

import { Aggregation } from "./aggregation.js";
import { type TimeUnit, toMillis } from "./duration.js";
import type { Outcome } from "./outcome.js";
import type { SlidingWindowMetrics } from "./sliding-window.js";
import type { Snapshot } from "./snapshot.js";

const BUCKET_DURATION_MS = 1_000; // 1 second

class TimeBucket extends Aggregation {
  constructor(public epochSecond: number) {
    super();
  }

  resetTo(epochSecond: number): void {
    this.reset();
    this.epochSecond = epochSecond;
  }
}

function currentEpochSecond(): number {
  return Math.floor(Date.now() / BUCKET_DURATION_MS);
}

/**
 * Time-based window over the last `windowSizeInSeconds` seconds.
 *
 * Calls are counted in one bucket per epoch second. As the clock advances the
 * head moves forward, and every bucket it passes over is subtracted from the
 * running total and reused for the new second.
 */
export class SlidingTimeWindowMetrics implements SlidingWindowMetrics {
  private readonly windowSize: number;
  private readonly buckets: TimeBucket[];
  private readonly total = new Aggregation();
  private headIndex: number;

  constructor(windowSizeInSeconds: number) {
    if (!Number.isInteger(windowSizeInSeconds) || windowSizeInSeconds < 1) {
      throw new RangeError(`Window size must be a positive integer (got ${windowSizeInSeconds})`);
    }
    this.windowSize = windowSizeInSeconds;
    const now = currentEpochSecond();
    this.buckets = Array.from({ length: windowSizeInSeconds }, (_, i) => new TimeBucket(now - windowSizeInSeconds + 1 + i));
    this.headIndex = windowSizeInSeconds - 1;
  }

  record(duration: number, unit: TimeUnit, outcome: Outcome): Snapshot {
    const durationMs = toMillis(duration, unit);
    const bucket = this.moveWindowToCurrentEpochSecond();
    bucket.record(durationMs, outcome);
    this.total.record(durationMs, outcome);
    return this.total.toSnapshot();
  }

  /** Sums only the buckets still inside the window; stale buckets are left for the next record to evict. */
  getSnapshot(): Snapshot {
    // After the clock steps backwards the head bucket is ahead of `now` and still holds live calls.
    const newest = Math.max(currentEpochSecond(), this.buckets[this.headIndex].epochSecond);
    const oldestValid = newest - this.windowSize + 1;
    const live = new Aggregation();
    for (const bucket of this.buckets) {
      if (bucket.epochSecond >= oldestValid && bucket.epochSecond <= newest) {
        live.add(bucket);
      }
    }
    return live.toSnapshot();
  }

  private moveWindowToCurrentEpochSecond(): TimeBucket {
    const now = currentEpochSecond();
    let head = this.buckets[this.headIndex];
    const elapsed = now - head.epochSecond;
    // A clock that steps backwards keeps writing into the head bucket.
    if (elapsed <= 0) return head;

    let secondsToMove = Math.min(elapsed, this.windowSize);
    do {
      secondsToMove--;
      this.headIndex = (this.headIndex + 1) % this.windowSize;
      head = this.buckets[this.headIndex];
      this.total.remove(head);
      head.resetTo(now - secondsToMove);
    } while (secondsToMove > 0);
    return head;
  }
}
