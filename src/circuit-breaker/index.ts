export type { CircuitBreakerMetricsReport } from "./circuit-breaker-metrics.js";
export { CircuitBreakerMetrics, Result } from "./circuit-breaker-metrics.js";
export type { CircuitBreakerConfig, CircuitBreakerConfigInput, SlidingWindowType } from "./config.js";
export { circuitBreakerConfigSchema, InvalidCircuitBreakerConfigError, parseCircuitBreakerConfig } from "./config.js";
export { createCircuitBreakerMetricsRoutes } from "./metrics-routes.js";
export { CircuitBreakerMetricsRegistry } from "./registry.js";
