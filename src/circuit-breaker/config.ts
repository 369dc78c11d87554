/**
 * Circuit breaker configuration bundle: validation and env defaults.
 */

import { z } from "zod";
import { type CircuitBreakerDefaults, config, SLIDING_WINDOW_TYPES } from "../config/index.js";
import { type Duration, TIME_UNITS } from "../metrics/duration.js";

export type SlidingWindowType = (typeof SLIDING_WINDOW_TYPES)[number];

const durationSchema = z.object({
  amount: z.number().finite().min(0),
  unit: z.enum(TIME_UNITS),
});

/** Options accepted when building a circuit breaker's metrics. All are optional. */
export const circuitBreakerConfigSchema = z
  .object({
    slidingWindowType: z.enum(SLIDING_WINDOW_TYPES),
    /** Calls for COUNT_BASED, seconds for TIME_BASED. */
    slidingWindowSize: z.number().int().min(1),
    minimumNumberOfCalls: z.number().int().min(1),
    /** Percentage in (0, 100]. */
    failureRateThreshold: z.number().gt(0).max(100),
    /** Percentage in (0, 100]. */
    slowCallRateThreshold: z.number().gt(0).max(100),
    /** Milliseconds, or an explicit duration. */
    slowCallDurationThreshold: z.union([z.number().finite().min(0), durationSchema]),
  })
  .partial()
  .strict();

export type CircuitBreakerConfigInput = z.input<typeof circuitBreakerConfigSchema>;

export interface CircuitBreakerConfig {
  readonly slidingWindowType: SlidingWindowType;
  readonly slidingWindowSize: number;
  readonly minimumNumberOfCalls: number;
  readonly failureRateThreshold: number;
  readonly slowCallRateThreshold: number;
  readonly slowCallDurationThreshold: Readonly<Duration>;
}

export class InvalidCircuitBreakerConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid circuit breaker configuration: ${issues.join("; ")}`);
    this.name = "InvalidCircuitBreakerConfigError";
    this.issues = issues;
  }
}

/**
 * Validate a config bundle and fill omitted options from `defaults`
 * (the process-wide CIRCUIT_BREAKER_* environment settings unless given).
 *
 * @throws InvalidCircuitBreakerConfigError listing every rejected option.
 */
export function parseCircuitBreakerConfig(
  input: CircuitBreakerConfigInput = {},
  defaults: CircuitBreakerDefaults = config.circuitBreaker,
): CircuitBreakerConfig {
  const parsed = circuitBreakerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidCircuitBreakerConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }
  const opts = parsed.data;

  const slowCall = opts.slowCallDurationThreshold ?? defaults.slowCallDurationThresholdMs;
  const slowCallDurationThreshold: Duration =
    typeof slowCall === "number" ? { amount: slowCall, unit: "milliseconds" } : { ...slowCall };

  return Object.freeze({
    slidingWindowType: opts.slidingWindowType ?? defaults.slidingWindowType,
    slidingWindowSize: opts.slidingWindowSize ?? defaults.slidingWindowSize,
    minimumNumberOfCalls: opts.minimumNumberOfCalls ?? defaults.minimumNumberOfCalls,
    failureRateThreshold: opts.failureRateThreshold ?? defaults.failureRateThreshold,
    slowCallRateThreshold: opts.slowCallRateThreshold ?? defaults.slowCallRateThreshold,
    slowCallDurationThreshold: Object.freeze(slowCallDurationThreshold),
  });
}
