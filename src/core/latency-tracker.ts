/**
 * Latency Tracker
 *
 * Per-endpoint sliding window of observed latencies with on-demand
 * percentile queries. Feeds the adaptive timing policy so hedge delays follow
 * what an endpoint actually does instead of a fixed operator guess.
 *
 * Architecture:
 * - Map<endpointKey, SampleWindow> (bounded FIFO ring per endpoint)
 * - Percentile = nearest rank over a sorted copy of the window
 * - Sparse-data guard: fewer than `minSamples` samples returns the caller's default
 * - Optional `maxEndpoints` bound evicts the least recently recorded endpoint
 *
 * Every call runs to completion on the event loop, so a percentile query
 * always sees a whole window, never a partially applied record.
 */

import { HedgeError, zodErrorToHedgeError } from '../api/errors.js';
import { LATENCY_TRACKER } from '../config/defaults.js';
import { LatencyTrackerOptionsSchema } from '../types/schemas/policy.js';
import { nearestRankPercentile, safeAverage } from '../utils/math-helpers.js';
import { SampleWindow } from './sample-window.js';

export interface LatencyTrackerOptions {
  /** Samples kept per endpoint (default: 100) */
  windowSize?: number;
  /** Samples required before percentiles are trusted (default: 10) */
  minSamples?: number;
  /** Maximum tracked endpoints; unlimited when omitted */
  maxEndpoints?: number;
}

export interface LatencySnapshot {
  endpointKey: string;
  count: number;
  minMs: number | null;
  maxMs: number | null;
  meanMs: number | null;
  /** Requested percentiles keyed by their value (e.g. `0.95`) */
  percentiles: Record<string, number | null>;
}

export class LatencyTracker {
  public readonly windowSize: number;
  public readonly minSamples: number;
  public readonly maxEndpoints: number | undefined;

  // Map iteration order doubles as recency order for endpoint eviction
  private readonly windows = new Map<string, SampleWindow>();

  constructor(options: LatencyTrackerOptions = {}) {
    const parsed = LatencyTrackerOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw zodErrorToHedgeError(parsed.error);
    }

    this.windowSize = parsed.data.windowSize ?? LATENCY_TRACKER.WINDOW_SIZE;
    this.minSamples = parsed.data.minSamples ?? LATENCY_TRACKER.MIN_SAMPLES;
    this.maxEndpoints = parsed.data.maxEndpoints;
  }

  /**
   * Record one observed latency for an endpoint.
   *
   * Negative or non-finite values are ignored.
   */
  public record(endpointKey: string, latencyMs: number): void {
    if (!Number.isFinite(latencyMs) || latencyMs < 0) {
      return;
    }

    let window = this.windows.get(endpointKey);
    if (window) {
      this.windows.delete(endpointKey);
    } else {
      window = new SampleWindow(this.windowSize);
      this.evictStaleEndpoints();
    }
    this.windows.set(endpointKey, window);

    window.push(latencyMs);
  }

  /**
   * Percentile of the endpoint's current window.
   *
   * @param p - Percentile in [0, 1]
   * @param defaultValue - Returned unchanged while fewer than `minSamples` samples exist
   */
  public percentile(endpointKey: string, p: number, defaultValue: number): number {
    if (!Number.isFinite(p) || p < 0 || p > 1) {
      throw new HedgeError('InvalidConfiguration', `Percentile must be within [0, 1], got ${p}`, {
        field: 'percentile',
      });
    }

    const window = this.windows.get(endpointKey);
    if (!window || window.size < this.minSamples) {
      return defaultValue;
    }

    const sorted = window.toArray().sort((a, b) => a - b);
    return nearestRankPercentile(sorted, p) ?? defaultValue;
  }

  /**
   * Drop history for one endpoint, or for all endpoints.
   */
  public clear(endpointKey?: string): void {
    if (endpointKey === undefined) {
      this.windows.clear();
      return;
    }
    this.windows.delete(endpointKey);
  }

  /**
   * Copy of the endpoint's samples, oldest first.
   */
  public samples(endpointKey: string): number[] {
    return this.windows.get(endpointKey)?.toArray() ?? [];
  }

  public sampleCount(endpointKey: string): number {
    return this.windows.get(endpointKey)?.size ?? 0;
  }

  public endpoints(): string[] {
    return Array.from(this.windows.keys());
  }

  /**
   * Diagnostic summary; ignores the `minSamples` guard.
   */
  public snapshot(endpointKey: string, percentiles: readonly number[] = [0.5, 0.95, 0.99]): LatencySnapshot {
    const values = this.samples(endpointKey);
    const sorted = [...values].sort((a, b) => a - b);

    const selected: Record<string, number | null> = {};
    for (const p of percentiles) {
      selected[String(p)] = nearestRankPercentile(sorted, p) ?? null;
    }

    return {
      endpointKey,
      count: values.length,
      minMs: sorted[0] ?? null,
      maxMs: sorted[sorted.length - 1] ?? null,
      meanMs: values.length > 0 ? safeAverage(values) : null,
      percentiles: selected,
    };
  }

  private evictStaleEndpoints(): void {
    if (this.maxEndpoints === undefined) {
      return;
    }

    while (this.windows.size >= this.maxEndpoints) {
      const oldest = this.windows.keys().next();
      if (oldest.done) {
        return;
      }
      this.windows.delete(oldest.value);
    }
  }
}
