/**
 * Call-health threshold evaluation for circuit breakers.
 */

export * from "./circuit-breaker/index.js";
export * from "./metrics/index.js";
