export { Aggregation } from "./aggregation.js";
export type { Duration, TimeUnit } from "./duration.js";
export { TIME_UNITS, toMillis, toNanos } from "./duration.js";
export { FixedSizeSlidingWindowMetrics } from "./fixed-size-sliding-window.js";
export { isFailure, isSlow, Outcome } from "./outcome.js";
export { SlidingTimeWindowMetrics } from "./sliding-time-window.js";
export type { SlidingWindowMetrics } from "./sliding-window.js";
export type { Snapshot, SnapshotCounts } from "./snapshot.js";
export { createSnapshot, NO_RATE } from "./snapshot.js";
export { StripedCounter } from "./striped-counter.js";
