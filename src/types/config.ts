/**
 * Dispatcher configuration exposed to the client layer.
 *
 * camelCase counterpart of the `hedging.yaml` sections; every field has a
 * default in `config/defaults.ts`.
 */

import type { LatencyAttribution } from '../core/hedge-dispatcher.js';
import type { LogLevel } from '../utils/logger-helpers.js';

export interface HedgeDispatcherConfig {
  /** Target latency SLO in milliseconds */
  targetSloMs: number;
  /** Fraction of the SLO at which the first hedge fires (fixed policy) */
  hedgeFraction: number;
  /** Hedges fired at multiples of the base delay (fixed policy) */
  maxHedges: number;
  /** Explicit SLO fractions; selects the percentile ladder when set */
  hedgePoints?: number[];
  /** Learn the effective SLO per endpoint from tracked latencies */
  adaptive: boolean;
  /** Percentile of tracked latencies used as the adaptive SLO */
  percentile: number;
  latencyAttribution: LatencyAttribution;
  windowSize: number;
  minSamples: number;
  maxEndpoints?: number;
  logLevel: LogLevel | 'silent';
  loggerName: string;
}
