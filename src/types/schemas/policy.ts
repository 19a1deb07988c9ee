/**
 * Timing policy and latency tracker schemas
 *
 * Validate constructor options before any dispatch can happen, so an invalid
 * hedge fraction surfaces as an InvalidConfiguration error at build time.
 */

import { z } from 'zod';
import { LATENCY_TRACKER } from '../../config/defaults.js';
import {
  AdaptivePercentile,
  NonNegativeInteger,
  OpenUnitFraction,
  PositiveDurationMs,
  PositiveInteger,
} from './common.js';

export const LatencyTrackerOptionsSchema = z
  .object({
    windowSize: PositiveInteger.optional(),
    minSamples: PositiveInteger.optional(),
    maxEndpoints: PositiveInteger.optional(),
  })
  .refine(
    (data) =>
      (data.minSamples ?? LATENCY_TRACKER.MIN_SAMPLES) <= (data.windowSize ?? LATENCY_TRACKER.WINDOW_SIZE),
    {
      message: 'must be <= windowSize',
      path: ['minSamples'],
    }
  );

export const FixedFractionPolicySchema = z.object({
  targetSloMs: PositiveDurationMs,
  hedgeFraction: OpenUnitFraction,
  maxHedges: NonNegativeInteger,
});

export const PercentileLadderPolicySchema = z.object({
  targetSloMs: PositiveDurationMs,
  hedgePoints: z.array(OpenUnitFraction).min(1, 'At least one hedge point is required'),
});

export const AdaptiveOverlaySchema = z.object({
  percentile: AdaptivePercentile,
});
