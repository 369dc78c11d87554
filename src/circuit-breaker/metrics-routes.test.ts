/**
 * Tests for the read-only circuit breaker metrics routes.
 */

import { Hono } from "hono";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CircuitBreakerMetrics } from "./circuit-breaker-metrics.js";
import { createCircuitBreakerMetricsRoutes } from "./metrics-routes.js";
import { CircuitBreakerMetricsRegistry } from "./registry.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

function makeApp() {
  const registry = new CircuitBreakerMetricsRegistry();
  const payments = registry.register(
    "payments",
    new CircuitBreakerMetrics(10, {
      slidingWindowType: "COUNT_BASED",
      minimumNumberOfCalls: 1,
      failureRateThreshold: 50,
      slowCallRateThreshold: 100,
      slowCallDurationThreshold: 100,
    }),
  );
  const app = new Hono();
  app.route("/circuit-breakers", createCircuitBreakerMetricsRoutes(registry));
  return { app, payments };
}

describe("circuit breaker metrics routes", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-02-21T12:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("GET / returns a report for every circuit breaker", async () => {
    const { app, payments } = makeApp();
    payments.onError(250, "milliseconds");
    payments.onCallNotPermitted();

    const res = await app.request("/circuit-breakers");
    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      timestamp: number;
      circuitBreakers: Record<string, Record<string, number>>;
    };
    expect(body.timestamp).toBe(new Date("2026-02-21T12:00:00Z").getTime());
    expect(body.circuitBreakers.payments).toEqual({
      failureRate: 100,
      slowCallRate: 100,
      numberOfBufferedCalls: 1,
      numberOfSuccessfulCalls: 0,
      numberOfFailedCalls: 1,
      numberOfSlowCalls: 1,
      numberOfSlowSuccessfulCalls: 0,
      numberOfSlowFailedCalls: 1,
      numberOfNotPermittedCalls: 1,
      minimumNumberOfCalls: 1,
    });
  });

  it("GET /:name returns one circuit breaker", async () => {
    const { app, payments } = makeApp();
    payments.onSuccess(10, "milliseconds");

    const res = await app.request("/circuit-breakers/payments");
    expect(res.status).toBe(200);
    const body = (await res.json()) as { failureRate: number; numberOfSuccessfulCalls: number };
    expect(body.failureRate).toBe(0);
    expect(body.numberOfSuccessfulCalls).toBe(1);
  });

  it("GET /:name returns 404 for an unknown circuit breaker", async () => {
    const { app } = makeApp();
    const res = await app.request("/circuit-breakers/inventory");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Circuit breaker not found: inventory" });
  });
});
