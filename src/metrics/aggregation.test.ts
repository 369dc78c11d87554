import { describe, expect, it } from "vitest";
import { Aggregation } from "./aggregation.js";
import { Outcome } from "./outcome.js";
import { createSnapshot, NO_RATE } from "./snapshot.js";

describe("Aggregation", () => {
  it("counts each outcome into the matching totals", () => {
    const agg = new Aggregation();
    agg.record(10, Outcome.SUCCESS);
    agg.record(300, Outcome.SLOW_SUCCESS);
    agg.record(20, Outcome.ERROR);
    agg.record(400, Outcome.SLOW_ERROR);

    expect(agg.toSnapshot()).toEqual({
      totalNumberOfCalls: 4,
      numberOfSuccessfulCalls: 2,
      numberOfFailedCalls: 2,
      numberOfSlowCalls: 2,
      numberOfSlowSuccessfulCalls: 1,
      numberOfSlowFailedCalls: 1,
      totalDurationMs: 730,
      averageDurationMs: 182.5,
      failureRate: 50,
      slowCallRate: 50,
    });
  });

  it("subtracts an evicted bucket from the total", () => {
    const total = new Aggregation();
    const bucket = new Aggregation();
    bucket.record(50, Outcome.ERROR);
    total.add(bucket);
    total.record(50, Outcome.SUCCESS);

    total.remove(bucket);

    const snapshot = total.toSnapshot();
    expect(snapshot.totalNumberOfCalls).toBe(1);
    expect(snapshot.numberOfFailedCalls).toBe(0);
    expect(snapshot.totalDurationMs).toBe(50);
  });

  it("reset clears every counter", () => {
    const agg = new Aggregation();
    agg.record(500, Outcome.SLOW_ERROR);
    agg.reset();
    expect(agg.toSnapshot().totalNumberOfCalls).toBe(0);
    expect(agg.toSnapshot().numberOfSlowFailedCalls).toBe(0);
  });
});

describe("createSnapshot", () => {
  it("reports NO_RATE and zero average for an empty population", () => {
    const snapshot = createSnapshot({
      numberOfCalls: 0,
      numberOfFailedCalls: 0,
      numberOfSlowCalls: 0,
      numberOfSlowFailedCalls: 0,
      totalDurationMs: 0,
    });
    expect(snapshot.failureRate).toBe(NO_RATE);
    expect(snapshot.slowCallRate).toBe(NO_RATE);
    expect(snapshot.averageDurationMs).toBe(0);
  });

  it("keeps failed + successful equal to the total", () => {
    const snapshot = createSnapshot({
      numberOfCalls: 7,
      numberOfFailedCalls: 3,
      numberOfSlowCalls: 5,
      numberOfSlowFailedCalls: 2,
      totalDurationMs: 70,
    });
    expect(snapshot.numberOfFailedCalls + snapshot.numberOfSuccessfulCalls).toBe(snapshot.totalNumberOfCalls);
    expect(snapshot.numberOfSlowSuccessfulCalls).toBe(3);
  });

  it("is frozen", () => {
    const snapshot = new Aggregation().toSnapshot();
    expect(Object.isFrozen(snapshot)).toBe(true);
  });
});
