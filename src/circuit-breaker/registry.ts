import { logger } from "../config/logger.js";
import type { CircuitBreakerMetrics, CircuitBreakerMetricsReport } from "./circuit-breaker-metrics.js";

/**
 * Named CircuitBreakerMetrics instances, one per governed call-site, kept so
 * the host process can report on all of them at once.
 */
export class CircuitBreakerMetricsRegistry {
  private readonly entries = new Map<string, CircuitBreakerMetrics>();

  /** @throws if a circuit breaker with the same name is already registered. */
  register(name: string, metrics: CircuitBreakerMetrics): CircuitBreakerMetrics {
    if (this.entries.has(name)) {
      throw new Error(`Circuit breaker "${name}" is already registered`);
    }
    this.entries.set(name, metrics);
    logger.info("Circuit breaker metrics registered", { name });
    return metrics;
  }

  get(name: string): CircuitBreakerMetrics | undefined {
    return this.entries.get(name);
  }

  /** Returns true if an entry was removed. */
  remove(name: string): boolean {
    const removed = this.entries.delete(name);
    if (removed) logger.info("Circuit breaker metrics removed", { name });
    return removed;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  report(): Record<string, CircuitBreakerMetricsReport> {
    const out: Record<string, CircuitBreakerMetricsReport> = {};
    for (const [name, metrics] of this.entries) {
      out[name] = metrics.toJSON();
    }
    return out;
  }
}
