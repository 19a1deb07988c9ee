/**
 * Hedging Configuration Schemas
 *
 * Zod schemas for validating hedging.yaml configuration and its
 * per-environment overrides.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import {
  AdaptivePercentile,
  LatencyAttributionMode,
  LogLevelSchema,
  NonNegativeInteger,
  OpenUnitFraction,
  PositiveDurationMs,
  PositiveInteger,
} from './common.js';

/**
 * Timing Policy Configuration
 *
 * `hedge_points` selects the percentile ladder; otherwise `hedge_at` and
 * `max_hedges` describe the fixed-fraction policy.
 */
export const TimingConfigSchema = z.object({
  target_slo_ms: PositiveDurationMs,
  hedge_at: OpenUnitFraction,
  max_hedges: NonNegativeInteger,
  hedge_points: z.array(OpenUnitFraction).min(1, 'must contain at least one hedge point').optional(),
});

/**
 * Adaptive SLO Configuration
 */
export const AdaptiveConfigSchema = z.object({
  enabled: z.boolean(),
  percentile: AdaptivePercentile,
  latency_attribution: LatencyAttributionMode,
});

/**
 * Latency Tracker Configuration
 */
export const TrackerConfigSchema = z.object({
  window_size: PositiveInteger,
  min_samples: PositiveInteger,
  max_endpoints: PositiveInteger.optional(),
});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
  name: z.string().min(1, 'Logger name cannot be empty'),
});

const HedgingConfigSchemaBase = z.object({
  timing: TimingConfigSchema,
  adaptive: AdaptiveConfigSchema,
  tracker: TrackerConfigSchema,
  logging: LoggingConfigSchema,
});

/**
 * Complete hedging configuration with optional environment overrides
 *
 * Cross-field rule: the tracker cannot require more samples than it keeps.
 */
export const HedgingConfigSchema = HedgingConfigSchemaBase.extend({
  environments: z
    .object({
      production: HedgingConfigSchemaBase.deepPartial().optional(),
      development: HedgingConfigSchemaBase.deepPartial().optional(),
      test: HedgingConfigSchemaBase.deepPartial().optional(),
    })
    .optional(),
}).refine((data) => data.tracker.min_samples <= data.tracker.window_size, {
  message: 'must be <= window_size',
  path: ['tracker', 'min_samples'],
});
