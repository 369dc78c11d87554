import { Hono } from "hono";
import type { CircuitBreakerMetricsRegistry } from "./registry.js";

/**
 * Create read-only circuit breaker metrics routes.
 *
 * GET /       — report for every registered circuit breaker
 * GET /:name  — report for one circuit breaker (404 if unknown)
 */
export function createCircuitBreakerMetricsRoutes(registry: CircuitBreakerMetricsRegistry): Hono {
  const routes = new Hono();

  routes.get("/", (c) => {
    return c.json({ timestamp: Date.now(), circuitBreakers: registry.report() });
  });

  routes.get("/:name", (c) => {
    const name = c.req.param("name");
    const metrics = registry.get(name);
    if (!metrics) {
      return c.json({ error: `Circuit breaker not found: ${name}` }, 404);
    }
    return c.json(metrics.toJSON());
  });

  return routes;
}
