/**
 * Threshold evaluation for a single circuit breaker.
 *
 * Each completed call is classified as slow or not against the configured
 * duration, recorded into the sliding window, and the returned snapshot is
 * checked against the failure-rate and slow-call-rate thresholds. Until the
 * window holds the minimum number of calls the verdict is
 * BELOW_MINIMUM_CALLS_THRESHOLD and the rates read as -1.
 */

import { logger } from "../config/logger.js";
import { type TimeUnit, toNanos } from "../metrics/duration.js";
import { FixedSizeSlidingWindowMetrics } from "../metrics/fixed-size-sliding-window.js";
import { Outcome } from "../metrics/outcome.js";
import { SlidingTimeWindowMetrics } from "../metrics/sliding-time-window.js";
import type { SlidingWindowMetrics } from "../metrics/sliding-window.js";
import { NO_RATE, type Snapshot } from "../metrics/snapshot.js";
import { StripedCounter } from "../metrics/striped-counter.js";
import {
  type CircuitBreakerConfig,
  type CircuitBreakerConfigInput,
  InvalidCircuitBreakerConfigError,
  parseCircuitBreakerConfig,
} from "./config.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Verdict of a threshold check, consumed by the circuit breaker state machine. */
export const Result = {
  /** Healthy. */
  BELOW_THRESHOLDS: "BELOW_THRESHOLDS",
  /** Failure rate or slow-call rate reached its threshold. */
  ABOVE_THRESHOLDS: "ABOVE_THRESHOLDS",
  /** Too few calls for the rates to be trusted; treat as healthy. */
  BELOW_MINIMUM_CALLS_THRESHOLD: "BELOW_MINIMUM_CALLS_THRESHOLD",
} as const;

export type Result = (typeof Result)[keyof typeof Result];

export interface CircuitBreakerMetricsReport {
  failureRate: number;
  slowCallRate: number;
  numberOfBufferedCalls: number;
  numberOfSuccessfulCalls: number;
  numberOfFailedCalls: number;
  numberOfSlowCalls: number;
  numberOfSlowSuccessfulCalls: number;
  numberOfSlowFailedCalls: number;
  numberOfNotPermittedCalls: number;
  minimumNumberOfCalls: number;
}

// ---------------------------------------------------------------------------
// Evaluator
// ---------------------------------------------------------------------------

/**
 * Classifies completed calls, feeds them to a sliding window, and checks the
 * window's failure and slow-call rates against the configured thresholds.
 *
 * Every method is synchronous and takes no locks; the window hands back an
 * immutable snapshot that is evaluated as-is.
 */
export class CircuitBreakerMetrics {
  readonly config: CircuitBreakerConfig;
  private readonly metrics: SlidingWindowMetrics;
  private readonly failureRateThreshold: number;
  private readonly slowCallRateThreshold: number;
  private readonly slowCallDurationThresholdNanos: number;
  private readonly minimumNumberOfCalls: number;
  private readonly numberOfNotPermittedCalls = new StripedCounter();

  /**
   * @param slidingWindowSize - calls for a COUNT_BASED window, seconds for TIME_BASED
   * @param window - replaces the window the config would select
   * @throws InvalidCircuitBreakerConfigError on any rejected option
   */
  constructor(slidingWindowSize: number, configInput?: CircuitBreakerConfigInput, window?: SlidingWindowMetrics) {
    if (!Number.isInteger(slidingWindowSize) || slidingWindowSize < 1) {
      throw new InvalidCircuitBreakerConfigError([
        `slidingWindowSize: must be a positive integer (got ${slidingWindowSize})`,
      ]);
    }
    const cfg = parseCircuitBreakerConfig(configInput);
    this.config = cfg;

    if (cfg.slidingWindowType === "COUNT_BASED") {
      this.metrics = window ?? new FixedSizeSlidingWindowMetrics(slidingWindowSize);
      // A minimum larger than the window could never be reached.
      this.minimumNumberOfCalls = Math.min(cfg.minimumNumberOfCalls, slidingWindowSize);
      if (this.minimumNumberOfCalls < cfg.minimumNumberOfCalls) {
        logger.warn("minimumNumberOfCalls clamped to sliding window size", {
          configured: cfg.minimumNumberOfCalls,
          effective: this.minimumNumberOfCalls,
        });
      }
    } else {
      this.metrics = window ?? new SlidingTimeWindowMetrics(slidingWindowSize);
      this.minimumNumberOfCalls = cfg.minimumNumberOfCalls;
    }

    this.failureRateThreshold = cfg.failureRateThreshold;
    this.slowCallRateThreshold = cfg.slowCallRateThreshold;
    this.slowCallDurationThresholdNanos = toNanos(cfg.slowCallDurationThreshold.amount, cfg.slowCallDurationThreshold.unit);

    logger.debug("Circuit breaker metrics created", {
      slidingWindowType: cfg.slidingWindowType,
      slidingWindowSize,
      minimumNumberOfCalls: this.minimumNumberOfCalls,
      failureRateThreshold: this.failureRateThreshold,
      slowCallRateThreshold: this.slowCallRateThreshold,
    });
  }

  /** Build metrics sized by the config's own `slidingWindowSize`. */
  static fromConfig(configInput?: CircuitBreakerConfigInput): CircuitBreakerMetrics {
    const cfg = parseCircuitBreakerConfig(configInput);
    return new CircuitBreakerMetrics(cfg.slidingWindowSize, configInput);
  }

  /** Records a call that was rejected without being attempted. Never affects the rates. */
  onCallNotPermitted(): void {
    this.numberOfNotPermittedCalls.increment();
  }

  /** Records a successful call and checks whether the thresholds are exceeded. */
  onSuccess(duration: number, unit: TimeUnit): Result {
    const outcome = this.isSlow(duration, unit) ? Outcome.SLOW_SUCCESS : Outcome.SUCCESS;
    return this.checkIfThresholdsExceeded(this.metrics.record(duration, unit, outcome));
  }

  /** Records a failed call and checks whether the thresholds are exceeded. */
  onError(duration: number, unit: TimeUnit): Result {
    const outcome = this.isSlow(duration, unit) ? Outcome.SLOW_ERROR : Outcome.ERROR;
    return this.checkIfThresholdsExceeded(this.metrics.record(duration, unit, outcome));
  }

  /**
   * Failure rate first, then slow-call rate. Reaching a threshold exactly
   * counts as exceeding it.
   */
  checkIfThresholdsExceeded(snapshot: Snapshot): Result {
    const failureRate = this.failureRateOf(snapshot);
    if (failureRate === NO_RATE) {
      return Result.BELOW_MINIMUM_CALLS_THRESHOLD;
    }
    if (failureRate >= this.failureRateThreshold) {
      return Result.ABOVE_THRESHOLDS;
    }
    const slowCallRate = this.slowCallRateOf(snapshot);
    if (slowCallRate !== NO_RATE && slowCallRate >= this.slowCallRateThreshold) {
      return Result.ABOVE_THRESHOLDS;
    }
    return Result.BELOW_THRESHOLDS;
  }

  /** Failure percentage, or -1 until the minimum number of calls is buffered. */
  getFailureRate(): number {
    return this.failureRateOf(this.metrics.getSnapshot());
  }

  /** Slow-call percentage, or -1 until the minimum number of calls is buffered. */
  getSlowCallRate(): number {
    return this.slowCallRateOf(this.metrics.getSnapshot());
  }

  getNumberOfSuccessfulCalls(): number {
    return this.metrics.getSnapshot().numberOfSuccessfulCalls;
  }

  getNumberOfFailedCalls(): number {
    return this.metrics.getSnapshot().numberOfFailedCalls;
  }

  getNumberOfSlowCalls(): number {
    return this.metrics.getSnapshot().numberOfSlowCalls;
  }

  getNumberOfSlowSuccessfulCalls(): number {
    return this.metrics.getSnapshot().numberOfSlowSuccessfulCalls;
  }

  getNumberOfSlowFailedCalls(): number {
    return this.metrics.getSnapshot().numberOfSlowFailedCalls;
  }

  getNumberOfBufferedCalls(): number {
    return this.metrics.getSnapshot().totalNumberOfCalls;
  }

  getNumberOfNotPermittedCalls(): number {
    return this.numberOfNotPermittedCalls.sum();
  }

  /** Effective minimum, after clamping to a count-based window's size. */
  getMinimumNumberOfCalls(): number {
    return this.minimumNumberOfCalls;
  }

  toJSON(): CircuitBreakerMetricsReport {
    const snapshot = this.metrics.getSnapshot();
    return {
      failureRate: this.failureRateOf(snapshot),
      slowCallRate: this.slowCallRateOf(snapshot),
      numberOfBufferedCalls: snapshot.totalNumberOfCalls,
      numberOfSuccessfulCalls: snapshot.numberOfSuccessfulCalls,
      numberOfFailedCalls: snapshot.numberOfFailedCalls,
      numberOfSlowCalls: snapshot.numberOfSlowCalls,
      numberOfSlowSuccessfulCalls: snapshot.numberOfSlowSuccessfulCalls,
      numberOfSlowFailedCalls: snapshot.numberOfSlowFailedCalls,
      numberOfNotPermittedCalls: this.getNumberOfNotPermittedCalls(),
      minimumNumberOfCalls: this.minimumNumberOfCalls,
    };
  }

  private isSlow(duration: number, unit: TimeUnit): boolean {
    return toNanos(duration, unit) > this.slowCallDurationThresholdNanos;
  }

  private hasMinimumCalls(snapshot: Snapshot): boolean {
    const bufferedCalls = snapshot.totalNumberOfCalls;
    return bufferedCalls > 0 && bufferedCalls >= this.minimumNumberOfCalls;
  }

  private failureRateOf(snapshot: Snapshot): number {
    return this.hasMinimumCalls(snapshot) ? snapshot.failureRate : NO_RATE;
  }

  private slowCallRateOf(snapshot: Snapshot): number {
    return this.hasMinimumCalls(snapshot) ? snapshot.slowCallRate : NO_RATE;
  }
}
