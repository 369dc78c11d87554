import { describe, expect, it } from "vitest";

// The exported `config` is parsed once at import time, so these tests
// exercise the schemas directly.

describe("config schema", () => {
  it("uses correct defaults when no env vars set", async () => {
    const { configSchema } = await import("./index.js");
    expect(configSchema.parse({ circuitBreaker: {} })).toEqual({
      nodeEnv: "development",
      logLevel: "info",
      circuitBreaker: {
        slidingWindowType: "COUNT_BASED",
        slidingWindowSize: 100,
        minimumNumberOfCalls: 100,
        failureRateThreshold: 50,
        slowCallRateThreshold: 100,
        slowCallDurationThresholdMs: 60_000,
      },
    });
  });

  it("coerces circuit breaker defaults from env strings", async () => {
    const { circuitBreakerDefaultsSchema } = await import("./index.js");
    const result = circuitBreakerDefaultsSchema.parse({
      slidingWindowType: "TIME_BASED",
      slidingWindowSize: "30",
      minimumNumberOfCalls: "5",
      failureRateThreshold: "25.5",
      slowCallRateThreshold: "80",
      slowCallDurationThresholdMs: "1500",
    });
    expect(result).toEqual({
      slidingWindowType: "TIME_BASED",
      slidingWindowSize: 30,
      minimumNumberOfCalls: 5,
      failureRateThreshold: 25.5,
      slowCallRateThreshold: 80,
      slowCallDurationThresholdMs: 1500,
    });
  });

  it("rejects out-of-range thresholds", async () => {
    const { circuitBreakerDefaultsSchema } = await import("./index.js");
    expect(() => circuitBreakerDefaultsSchema.parse({ failureRateThreshold: "0" })).toThrow();
    expect(() => circuitBreakerDefaultsSchema.parse({ slowCallRateThreshold: "101" })).toThrow();
  });

  it("rejects an unknown sliding window type", async () => {
    const { circuitBreakerDefaultsSchema } = await import("./index.js");
    expect(() => circuitBreakerDefaultsSchema.parse({ slidingWindowType: "ROLLING" })).toThrow();
  });

  it("rejects an unknown log level", async () => {
    const { configSchema } = await import("./index.js");
    expect(() => configSchema.parse({ logLevel: "verbose" })).toThrow();
  });
});
