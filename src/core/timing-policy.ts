/**
 * Hedge Timing Policies
 *
 * Compute the ordered delays (ms from dispatch start) at which hedge attempts
 * fire for an endpoint.
 *
 * - FixedFractionPolicy: hedge i fires at `slo * hedgeFraction * i`
 * - PercentileLadderPolicy: hedge i fires at `slo * hedgePoints[i]`
 * - Adaptive overlay (either variant): `slo` is the tracked percentile for the
 *   endpoint, or the configured target while the tracker lacks samples
 *
 * Options are validated at construction; an invalid policy never reaches a
 * dispatch.
 */

import { zodErrorToHedgeError } from '../api/errors.js';
import {
  AdaptiveOverlaySchema,
  FixedFractionPolicySchema,
  PercentileLadderPolicySchema,
} from '../types/schemas/policy.js';
import type { LatencyTracker } from './latency-tracker.js';
import type { ZodType } from 'zod';

export interface AdaptiveOverlayOptions {
  tracker: LatencyTracker;
  /** Percentile of tracked latencies used as the effective SLO, e.g. 0.95 */
  percentile: number;
}

export interface FixedFractionPolicyOptions {
  targetSloMs: number;
  hedgeFraction: number;
  maxHedges: number;
  adaptive?: AdaptiveOverlayOptions;
}

export interface PercentileLadderPolicyOptions {
  targetSloMs: number;
  hedgePoints: readonly number[];
  adaptive?: AdaptiveOverlayOptions;
}

export type TimingPolicyOptions = FixedFractionPolicyOptions | PercentileLadderPolicyOptions;

export abstract class TimingPolicy {
  public readonly targetSloMs: number;
  protected readonly adaptive?: AdaptiveOverlayOptions;

  protected constructor(targetSloMs: number, adaptive?: AdaptiveOverlayOptions) {
    if (adaptive) {
      parseOrThrow(AdaptiveOverlaySchema, { percentile: adaptive.percentile });
    }
    this.targetSloMs = targetSloMs;
    this.adaptive = adaptive;
  }

  public get isAdaptive(): boolean {
    return this.adaptive !== undefined;
  }

  /**
   * SLO used for an endpoint's delays.
   */
  public effectiveSloMs(endpointKey: string): number {
    if (!this.adaptive) {
      return this.targetSloMs;
    }
    return this.adaptive.tracker.percentile(endpointKey, this.adaptive.percentile, this.targetSloMs);
  }

  /**
   * Ordered hedge delays for an endpoint, one per hedge attempt.
   */
  public delays(endpointKey: string): number[] {
    return this.delaysFor(this.effectiveSloMs(endpointKey));
  }

  protected abstract delaysFor(sloMs: number): number[];
}

export class FixedFractionPolicy extends TimingPolicy {
  public readonly hedgeFraction: number;
  public readonly maxHedges: number;

  constructor(options: FixedFractionPolicyOptions) {
    const parsed = parseOrThrow(FixedFractionPolicySchema, {
      targetSloMs: options.targetSloMs,
      hedgeFraction: options.hedgeFraction,
      maxHedges: options.maxHedges,
    });
    super(parsed.targetSloMs, options.adaptive);
    this.hedgeFraction = parsed.hedgeFraction;
    this.maxHedges = parsed.maxHedges;
  }

  protected delaysFor(sloMs: number): number[] {
    const baseDelayMs = sloMs * this.hedgeFraction;
    return Array.from({ length: this.maxHedges }, (_, index) => baseDelayMs * (index + 1));
  }
}

export class PercentileLadderPolicy extends TimingPolicy {
  public readonly hedgePoints: readonly number[];

  constructor(options: PercentileLadderPolicyOptions) {
    const parsed = parseOrThrow(PercentileLadderPolicySchema, {
      targetSloMs: options.targetSloMs,
      hedgePoints: [...options.hedgePoints],
    });
    super(parsed.targetSloMs, options.adaptive);
    this.hedgePoints = [...parsed.hedgePoints].sort((a, b) => a - b);
  }

  protected delaysFor(sloMs: number): number[] {
    return this.hedgePoints.map((point) => sloMs * point);
  }
}

/**
 * Build the policy variant matching the options shape.
 */
export function createTimingPolicy(options: TimingPolicyOptions): TimingPolicy {
  if ('hedgePoints' in options) {
    return new PercentileLadderPolicy(options);
  }
  return new FixedFractionPolicy(options);
}

function parseOrThrow<T>(schema: ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw zodErrorToHedgeError(result.error);
  }
  return result.data;
}
