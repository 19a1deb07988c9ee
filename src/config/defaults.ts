/**
 * Default Configuration Constants
 *
 * All hedging defaults centralized here for easy tuning. The YAML loader
 * and the programmatic factories both fall back to these values.
 */

/**
 * Timing Policy Configuration
 */
export const TIMING = {
  /** Target latency SLO (ms) */
  TARGET_SLO_MS: 1_000,

  /** Fraction of the SLO at which the first hedge fires */
  HEDGE_FRACTION: 0.95,

  /** Hedges fired after the original attempt */
  MAX_HEDGES: 1,

  /** Longest delay a Node.js timer honours (2^31 - 1 ms) */
  MAX_TIMER_DELAY_MS: 2_147_483_647,
} as const;

/**
 * Adaptive SLO Configuration
 */
export const ADAPTIVE = {
  /** Learn the effective SLO from tracked latencies */
  ENABLED: false,

  /** Percentile of the latency window used as the effective SLO */
  PERCENTILE: 0.95,

  /** Latency fed back to the tracker: whole race or winning attempt only */
  LATENCY_ATTRIBUTION: 'race' as const,
} as const;

/**
 * Latency Tracker Configuration
 */
export const LATENCY_TRACKER = {
  /** Samples kept per endpoint */
  WINDOW_SIZE: 100,

  /** Samples required before a percentile replaces the configured SLO */
  MIN_SAMPLES: 10,
} as const;

/**
 * Logging Configuration
 */
export const LOGGING = {
  LEVEL: 'warn' as const,
  NAME: 'hedgewise',
} as const;
