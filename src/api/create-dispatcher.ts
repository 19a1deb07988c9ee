/**
 * Dispatcher factory.
 *
 * Wires one LatencyTracker into both the timing policy (adaptive overlay) and
 * the dispatcher (latency feedback), so adaptive learning needs no manual
 * plumbing. Missing config fields fall back to `config/defaults.ts`.
 */

import type { Logger } from 'pino';
import { ADAPTIVE, LATENCY_TRACKER, LOGGING, TIMING } from '../config/defaults.js';
import { HedgeDispatcher } from '../core/hedge-dispatcher.js';
import { LatencyTracker } from '../core/latency-tracker.js';
import { createTimingPolicy, type TimingPolicy } from '../core/timing-policy.js';
import type { EndpointKeyResolver, HedgeTransport } from '../core/transport.js';
import type { HedgeDispatcherConfig } from '../types/config.js';
import { createLogger } from '../utils/logger-helpers.js';

export interface CreateHedgeDispatcherOptions<TRequest, TResponse> {
  transport: HedgeTransport<TRequest, TResponse>;
  config?: Partial<HedgeDispatcherConfig>;
  endpointKey?: EndpointKeyResolver<TRequest>;
  /** Shared tracker; created from the config when omitted */
  tracker?: LatencyTracker;
  logger?: Logger;
  now?: () => number;
}

/**
 * Fill unset fields with the library defaults.
 */
export function resolveDispatcherConfig(config: Partial<HedgeDispatcherConfig> = {}): HedgeDispatcherConfig {
  return {
    targetSloMs: config.targetSloMs ?? TIMING.TARGET_SLO_MS,
    hedgeFraction: config.hedgeFraction ?? TIMING.HEDGE_FRACTION,
    maxHedges: config.maxHedges ?? TIMING.MAX_HEDGES,
    hedgePoints: config.hedgePoints,
    adaptive: config.adaptive ?? ADAPTIVE.ENABLED,
    percentile: config.percentile ?? ADAPTIVE.PERCENTILE,
    latencyAttribution: config.latencyAttribution ?? ADAPTIVE.LATENCY_ATTRIBUTION,
    windowSize: config.windowSize ?? LATENCY_TRACKER.WINDOW_SIZE,
    minSamples: config.minSamples ?? LATENCY_TRACKER.MIN_SAMPLES,
    maxEndpoints: config.maxEndpoints,
    logLevel: config.logLevel ?? LOGGING.LEVEL,
    loggerName: config.loggerName ?? LOGGING.NAME,
  };
}

/**
 * Build the timing policy described by a dispatcher config.
 */
export function createPolicyFromConfig(config: HedgeDispatcherConfig, tracker?: LatencyTracker): TimingPolicy {
  const adaptive = config.adaptive && tracker ? { tracker, percentile: config.percentile } : undefined;

  if (config.hedgePoints) {
    return createTimingPolicy({ targetSloMs: config.targetSloMs, hedgePoints: config.hedgePoints, adaptive });
  }
  return createTimingPolicy({
    targetSloMs: config.targetSloMs,
    hedgeFraction: config.hedgeFraction,
    maxHedges: config.maxHedges,
    adaptive,
  });
}

/**
 * Build a dispatcher, its policy and (when adaptive) its tracker.
 *
 * @throws HedgeError with code InvalidConfiguration for invalid settings
 */
export function createHedgeDispatcher<TRequest, TResponse>(
  options: CreateHedgeDispatcherOptions<TRequest, TResponse>
): HedgeDispatcher<TRequest, TResponse> {
  const config = resolveDispatcherConfig(options.config);

  const tracker =
    options.tracker ??
    (config.adaptive
      ? new LatencyTracker({
          windowSize: config.windowSize,
          minSamples: config.minSamples,
          maxEndpoints: config.maxEndpoints,
        })
      : undefined);

  const policy = createPolicyFromConfig(config, tracker);
  const logger = options.logger ?? createLogger({ level: config.logLevel, name: config.loggerName });

  return new HedgeDispatcher<TRequest, TResponse>({
    transport: options.transport,
    policy,
    tracker,
    endpointKey: options.endpointKey,
    latencyAttribution: config.latencyAttribution,
    logger: logger.child({ component: 'hedge-dispatcher' }),
    now: options.now,
  });
}
