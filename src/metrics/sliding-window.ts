import type { TimeUnit } from "./duration.js";
import type { Outcome } from "./outcome.js";
import type { Snapshot } from "./snapshot.js";

/**
 * A bounded, continuously-evicting population of call outcomes.
 *
 * Both methods are synchronous: a snapshot never observes a half-applied
 * record.
 */
export interface SlidingWindowMetrics {
  /** Append one classified outcome, evict per strategy, and return a fresh snapshot. */
  record(duration: number, unit: TimeUnit, outcome: Outcome): Snapshot;
  /** Read the current aggregate without changing what is recorded. */
  getSnapshot(): Snapshot;
}
