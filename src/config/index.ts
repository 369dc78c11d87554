import { z } from "zod";

export const SLIDING_WINDOW_TYPES = ["COUNT_BASED", "TIME_BASED"] as const;

/**
 * Circuit breaker defaults read from the environment. Each value fills the
 * matching option when an explicit config bundle leaves it out.
 */
export const circuitBreakerDefaultsSchema = z
  .object({
    slidingWindowType: z.enum(SLIDING_WINDOW_TYPES).default("COUNT_BASED"),
    slidingWindowSize: z.coerce.number().int().min(1).default(100),
    minimumNumberOfCalls: z.coerce.number().int().min(1).default(100),
    failureRateThreshold: z.coerce.number().gt(0).max(100).default(50),
    slowCallRateThreshold: z.coerce.number().gt(0).max(100).default(100),
    slowCallDurationThresholdMs: z.coerce.number().min(0).default(60_000),
  })
  .default({
    slidingWindowType: "COUNT_BASED",
    slidingWindowSize: 100,
    minimumNumberOfCalls: 100,
    failureRateThreshold: 50,
    slowCallRateThreshold: 100,
    slowCallDurationThresholdMs: 60_000,
  });

export const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Defaults for every circuit breaker created in this process. */
  circuitBreaker: circuitBreakerDefaultsSchema,
});

export const config = configSchema.parse({
  nodeEnv: process.env.NODE_ENV,
  logLevel: process.env.LOG_LEVEL,
  circuitBreaker: {
    slidingWindowType: process.env.CIRCUIT_BREAKER_SLIDING_WINDOW_TYPE,
    slidingWindowSize: process.env.CIRCUIT_BREAKER_SLIDING_WINDOW_SIZE,
    minimumNumberOfCalls: process.env.CIRCUIT_BREAKER_MINIMUM_NUMBER_OF_CALLS,
    failureRateThreshold: process.env.CIRCUIT_BREAKER_FAILURE_RATE_THRESHOLD,
    slowCallRateThreshold: process.env.CIRCUIT_BREAKER_SLOW_CALL_RATE_THRESHOLD,
    slowCallDurationThresholdMs: process.env.CIRCUIT_BREAKER_SLOW_CALL_DURATION_THRESHOLD_MS,
  },
});

export type Config = z.infer<typeof configSchema>;
export type CircuitBreakerDefaults = z.infer<typeof circuitBreakerDefaultsSchema>;
