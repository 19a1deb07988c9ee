/**
 * hedgewise
 *
 * Client-side request hedging: duplicate a slow request after a delay and
 * take whichever attempt answers first.
 */

export { HedgeDispatcher } from './core/hedge-dispatcher.js';
export type {
  AttemptEvent,
  AttemptFailedEvent,
  DispatchFailedEvent,
  DispatchOptions,
  DispatchSucceededEvent,
  HedgeDispatcherEvents,
  HedgeDispatcherOptions,
  HedgeDispatcherStats,
  LatencyAttribution,
} from './core/hedge-dispatcher.js';

export { LatencyTracker } from './core/latency-tracker.js';
export type { LatencySnapshot, LatencyTrackerOptions } from './core/latency-tracker.js';
export { SampleWindow } from './core/sample-window.js';

export {
  TimingPolicy,
  FixedFractionPolicy,
  PercentileLadderPolicy,
  createTimingPolicy,
} from './core/timing-policy.js';
export type {
  AdaptiveOverlayOptions,
  FixedFractionPolicyOptions,
  PercentileLadderPolicyOptions,
  TimingPolicyOptions,
} from './core/timing-policy.js';

export type { AttemptContext, EndpointKeyResolver, HedgeTransport } from './core/transport.js';

export {
  createHedgeDispatcher,
  createPolicyFromConfig,
  resolveDispatcherConfig,
  type CreateHedgeDispatcherOptions,
} from './api/create-dispatcher.js';
export {
  HedgedHttpClient,
  type HedgedHttpClientOptions,
  type HttpRequestOptions,
} from './api/hedged-http-client.js';
export * from './transport/fetch/index.js';

export {
  HedgeError,
  TransportFailureError,
  InternalFaultError,
  createCancelledError,
  toHedgeError,
  type AttemptFailure,
  type HedgeErrorCode,
  type HedgeErrorShape,
} from './api/errors.js';

export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  toDispatcherConfig,
  type ConfigEnvironment,
  type HedgingConfig,
} from './config/loader.js';
export type { HedgeDispatcherConfig } from './types/config.js';
export { createLogger, type LoggerOptions, type LogLevel } from './utils/logger-helpers.js';
