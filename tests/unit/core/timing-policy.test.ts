import { describe, it, expect } from 'vitest';
import {
  FixedFractionPolicy,
  PercentileLadderPolicy,
  createTimingPolicy,
} from '../../../src/core/timing-policy.js';
import { LatencyTracker } from '../../../src/core/latency-tracker.js';
import { HedgeError } from '../../../src/api/errors.js';

function captureError(fn: () => unknown): HedgeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof HedgeError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a HedgeError');
}

describe('FixedFractionPolicy', () => {
  it('fires a single hedge at the fraction of the SLO', () => {
    const policy = new FixedFractionPolicy({ targetSloMs: 200, hedgeFraction: 0.75, maxHedges: 1 });

    expect(policy.delays('orders')).toEqual([150]);
  });

  it('spaces additional hedges at multiples of the base delay', () => {
    const policy = new FixedFractionPolicy({ targetSloMs: 1000, hedgeFraction: 0.25, maxHedges: 3 });

    expect(policy.delays('orders')).toEqual([250, 500, 750]);
  });

  it('yields no hedges when maxHedges is zero', () => {
    const policy = new FixedFractionPolicy({ targetSloMs: 1000, hedgeFraction: 0.5, maxHedges: 0 });

    expect(policy.delays('orders')).toEqual([]);
  });

  it.each([0, 1, -0.5, 1.5])('rejects hedge fraction %s', (hedgeFraction) => {
    const error = captureError(
      () => new FixedFractionPolicy({ targetSloMs: 1000, hedgeFraction, maxHedges: 1 })
    );

    expect(error.code).toBe('InvalidConfiguration');
    expect(error.message).toBe("Invalid configuration on field 'hedgeFraction': Must be strictly between 0 and 1");
  });

  it('rejects a non-positive SLO', () => {
    const error = captureError(() => new FixedFractionPolicy({ targetSloMs: 0, hedgeFraction: 0.5, maxHedges: 1 }));

    expect(error.message).toBe("Invalid configuration on field 'targetSloMs': Must be positive");
  });

  it('rejects an SLO no timer can schedule', () => {
    const error = captureError(
      () => new FixedFractionPolicy({ targetSloMs: 3_000_000_000, hedgeFraction: 0.5, maxHedges: 1 })
    );

    expect(error.message).toBe("Invalid configuration on field 'targetSloMs': Must not exceed 2147483647 ms");
  });

  it('rejects a fractional hedge count', () => {
    const error = captureError(
      () => new FixedFractionPolicy({ targetSloMs: 1000, hedgeFraction: 0.5, maxHedges: 1.5 })
    );

    expect(error.details?.field).toBe('maxHedges');
  });
});

describe('PercentileLadderPolicy', () => {
  it('sorts hedge points and scales them by the SLO', () => {
    const policy = new PercentileLadderPolicy({ targetSloMs: 400, hedgePoints: [0.5, 0.25, 0.75] });

    expect(policy.hedgePoints).toEqual([0.25, 0.5, 0.75]);
    expect(policy.delays('orders')).toEqual([100, 200, 300]);
  });

  it('does not mutate the caller array', () => {
    const points = [0.75, 0.25];
    new PercentileLadderPolicy({ targetSloMs: 400, hedgePoints: points });

    expect(points).toEqual([0.75, 0.25]);
  });

  it('requires at least one hedge point', () => {
    const error = captureError(() => new PercentileLadderPolicy({ targetSloMs: 400, hedgePoints: [] }));

    expect(error.message).toBe("Invalid configuration on field 'hedgePoints': At least one hedge point is required");
  });

  it('names the offending hedge point', () => {
    const error = captureError(() => new PercentileLadderPolicy({ targetSloMs: 400, hedgePoints: [0.5, 1.2] }));

    expect(error.details?.field).toBe('hedgePoints.1');
  });
});

describe('adaptive overlay', () => {
  it('uses the target SLO until the tracker has enough samples', () => {
    const tracker = new LatencyTracker({ minSamples: 10 });
    for (let i = 0; i < 9; i++) {
      tracker.record('orders', 500);
    }
    const policy = new FixedFractionPolicy({
      targetSloMs: 2000,
      hedgeFraction: 0.9,
      maxHedges: 1,
      adaptive: { tracker, percentile: 0.95 },
    });

    expect(policy.isAdaptive).toBe(true);
    expect(policy.effectiveSloMs('orders')).toBe(2000);
    expect(policy.delays('orders')).toEqual([1800]);
  });

  it('switches to the tracked percentile once warmed up', () => {
    const tracker = new LatencyTracker({ minSamples: 10 });
    for (let i = 0; i < 20; i++) {
      tracker.record('orders', 500);
    }
    const policy = new FixedFractionPolicy({
      targetSloMs: 2000,
      hedgeFraction: 0.9,
      maxHedges: 1,
      adaptive: { tracker, percentile: 0.95 },
    });

    expect(policy.effectiveSloMs('orders')).toBe(500);
    expect(policy.delays('orders')).toEqual([450]);
    expect(policy.delays('payments')).toEqual([1800]);
  });

  it('scales a ladder by the tracked percentile', () => {
    const tracker = new LatencyTracker({ minSamples: 1 });
    tracker.record('orders', 400);
    const policy = new PercentileLadderPolicy({
      targetSloMs: 1000,
      hedgePoints: [0.25, 0.5],
      adaptive: { tracker, percentile: 0.5 },
    });

    expect(policy.delays('orders')).toEqual([100, 200]);
  });

  it('rejects a percentile outside (0, 1]', () => {
    const tracker = new LatencyTracker();
    const error = captureError(
      () =>
        new FixedFractionPolicy({
          targetSloMs: 1000,
          hedgeFraction: 0.5,
          maxHedges: 1,
          adaptive: { tracker, percentile: 0 },
        })
    );

    expect(error.message).toBe("Invalid configuration on field 'percentile': Percentile must be greater than 0");
  });

  it('is not adaptive without an overlay', () => {
    const policy = new FixedFractionPolicy({ targetSloMs: 1000, hedgeFraction: 0.5, maxHedges: 1 });

    expect(policy.isAdaptive).toBe(false);
  });
});

describe('createTimingPolicy', () => {
  it('builds a ladder when hedge points are given', () => {
    expect(createTimingPolicy({ targetSloMs: 400, hedgePoints: [0.5] })).toBeInstanceOf(PercentileLadderPolicy);
  });

  it('builds a fixed-fraction policy otherwise', () => {
    expect(createTimingPolicy({ targetSloMs: 400, hedgeFraction: 0.5, maxHedges: 1 })).toBeInstanceOf(
      FixedFractionPolicy
    );
  });
});
