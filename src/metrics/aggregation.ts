import { isFailure, isSlow, type Outcome } from "./outcome.js";
import { createSnapshot, type Snapshot, type SnapshotCounts } from "./snapshot.js";

/**
 * Running counters for one bucket of a sliding window, or for the window as
 * a whole. Buckets are subtracted from the total when they are evicted.
 */
export class Aggregation implements SnapshotCounts {
  numberOfCalls = 0;
  numberOfFailedCalls = 0;
  numberOfSlowCalls = 0;
  numberOfSlowFailedCalls = 0;
  totalDurationMs = 0;

  record(durationMs: number, outcome: Outcome): void {
    this.numberOfCalls++;
    this.totalDurationMs += durationMs;
    const failed = isFailure(outcome);
    if (failed) this.numberOfFailedCalls++;
    if (isSlow(outcome)) {
      this.numberOfSlowCalls++;
      if (failed) this.numberOfSlowFailedCalls++;
    }
  }

  add(other: SnapshotCounts): void {
    this.numberOfCalls += other.numberOfCalls;
    this.numberOfFailedCalls += other.numberOfFailedCalls;
    this.numberOfSlowCalls += other.numberOfSlowCalls;
    this.numberOfSlowFailedCalls += other.numberOfSlowFailedCalls;
    this.totalDurationMs += other.totalDurationMs;
  }

  remove(other: SnapshotCounts): void {
    this.numberOfCalls -= other.numberOfCalls;
    this.numberOfFailedCalls -= other.numberOfFailedCalls;
    this.numberOfSlowCalls -= other.numberOfSlowCalls;
    this.numberOfSlowFailedCalls -= other.numberOfSlowFailedCalls;
    this.totalDurationMs -= other.totalDurationMs;
  }

  reset(): void {
    this.numberOfCalls = 0;
    this.numberOfFailedCalls = 0;
    this.numberOfSlowCalls = 0;
    this.numberOfSlowFailedCalls = 0;
    this.totalDurationMs = 0;
  }

  toSnapshot(): Snapshot {
    return createSnapshot(this);
  }
}
