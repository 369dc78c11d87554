/**
 * Time units and conversions for measured call durations.
 */

export const TIME_UNITS = ["nanoseconds", "microseconds", "milliseconds", "seconds", "minutes", "hours", "days"] as const;

export type TimeUnit = (typeof TIME_UNITS)[number];

export interface Duration {
  amount: number;
  unit: TimeUnit;
}

const NANOS_PER_UNIT: Record<TimeUnit, number> = {
  nanoseconds: 1,
  microseconds: 1_000,
  milliseconds: 1_000_000,
  seconds: 1_000_000_000,
  minutes: 60_000_000_000,
  hours: 3_600_000_000_000,
  days: 86_400_000_000_000,
};

function assertAmount(amount: number): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new RangeError(`Duration must be a finite, non-negative number (got ${amount})`);
  }
}

/**
 * Convert an elapsed time to a whole number of nanoseconds. Rounding keeps
 * equal durations given in different units equal (0.067 s and 67 ms).
 */
export function toNanos(amount: number, unit: TimeUnit): number {
  assertAmount(amount);
  return Math.round(amount * NANOS_PER_UNIT[unit]);
}

/** Convert an elapsed time to milliseconds. */
export function toMillis(amount: number, unit: TimeUnit): number {
  assertAmount(amount);
  return (amount * NANOS_PER_UNIT[unit]) / NANOS_PER_UNIT.milliseconds;
}
