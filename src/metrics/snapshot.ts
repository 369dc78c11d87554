/**
 * Immutable aggregates handed out by the sliding windows.
 */

/** Rate value reported when there are no calls to compute a percentage over. */
export const NO_RATE = -1;

/**
 * Point-in-time aggregate of a sliding window's sample population.
 * Rates are percentages in [0, 100], or NO_RATE for an empty window.
 */
export interface Snapshot {
  readonly totalNumberOfCalls: number;
  readonly numberOfSuccessfulCalls: number;
  readonly numberOfFailedCalls: number;
  readonly numberOfSlowCalls: number;
  readonly numberOfSlowSuccessfulCalls: number;
  readonly numberOfSlowFailedCalls: number;
  readonly totalDurationMs: number;
  readonly averageDurationMs: number;
  readonly failureRate: number;
  readonly slowCallRate: number;
}

export interface SnapshotCounts {
  numberOfCalls: number;
  numberOfFailedCalls: number;
  numberOfSlowCalls: number;
  numberOfSlowFailedCalls: number;
  totalDurationMs: number;
}

export function createSnapshot(counts: SnapshotCounts): Snapshot {
  const total = counts.numberOfCalls;
  return Object.freeze({
    totalNumberOfCalls: total,
    numberOfSuccessfulCalls: total - counts.numberOfFailedCalls,
    numberOfFailedCalls: counts.numberOfFailedCalls,
    numberOfSlowCalls: counts.numberOfSlowCalls,
    numberOfSlowSuccessfulCalls: counts.numberOfSlowCalls - counts.numberOfSlowFailedCalls,
    numberOfSlowFailedCalls: counts.numberOfSlowFailedCalls,
    totalDurationMs: counts.totalDurationMs,
    averageDurationMs: total === 0 ? 0 : counts.totalDurationMs / total,
    failureRate: total === 0 ? NO_RATE : (counts.numberOfFailedCalls * 100) / total,
    slowCallRate: total === 0 ? NO_RATE : (counts.numberOfSlowCalls * 100) / total,
  });
}
