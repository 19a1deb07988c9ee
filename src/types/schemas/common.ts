/**
 * Common Zod schema primitives for hedgewise
 */

import { z } from 'zod';
import { TIMING } from '../../config/defaults.js';

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative');

/**
 * Positive duration in milliseconds, schedulable by a single timer
 */
export const PositiveDurationMs = z
  .number()
  .finite('Must be finite')
  .positive('Must be positive')
  .max(TIMING.MAX_TIMER_DELAY_MS, `Must not exceed ${TIMING.MAX_TIMER_DELAY_MS} ms`);

/**
 * Fraction strictly inside (0, 1): hedge points and hedge fractions
 */
export const OpenUnitFraction = z
  .number()
  .gt(0, 'Must be strictly between 0 and 1')
  .lt(1, 'Must be strictly between 0 and 1');

/**
 * Percentile used for adaptive SLO estimation, in (0, 1]
 */
export const AdaptivePercentile = z
  .number()
  .gt(0, 'Percentile must be greater than 0')
  .max(1, 'Percentile cannot exceed 1');

/**
 * Latency attribution mode for adaptive learning
 */
export const LatencyAttributionMode = z.enum(['race', 'attempt'], {
  errorMap: () => ({ message: 'Latency attribution must be either race or attempt' }),
});

/**
 * pino log level
 */
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'], {
  errorMap: () => ({
    message: 'Log level must be one of: trace, debug, info, warn, error, fatal, silent',
  }),
});
