/**
 * Classification of a single completed call. "Slow" is not a separate axis:
 * every call is exactly one of the four.
 */
export const Outcome = {
  SUCCESS: "SUCCESS",
  SLOW_SUCCESS: "SLOW_SUCCESS",
  ERROR: "ERROR",
  SLOW_ERROR: "SLOW_ERROR",
} as const;

export type Outcome = (typeof Outcome)[keyof typeof Outcome];

export function isFailure(outcome: Outcome): boolean {
  return outcome === Outcome.ERROR || outcome === Outcome.SLOW_ERROR;
}

export function isSlow(outcome: Outcome): boolean {
  return outcome === Outcome.SLOW_SUCCESS || outcome === Outcome.SLOW_ERROR;
}
