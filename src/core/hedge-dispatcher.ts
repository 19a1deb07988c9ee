/**
 * Hedge Dispatcher
 *
 * Races the original attempt of a request against delayed duplicate
 * attempts, returns the first success and cancels the rest.
 *
 * Architecture:
 * - One HedgeRace per dispatch owns every attempt and hedge timer it creates
 * - Attempt 0 starts immediately; hedge i starts at delays[i] from dispatch start
 * - First successful attempt wins; later results are discarded
 * - Settlement clears pending hedge timers, aborts live attempts and waits for
 *   each of them to settle before dispatch returns or throws
 * - Attempt failures neither cancel nor accelerate pending hedges
 * - Winner latency is fed back to the LatencyTracker for adaptive timing
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import {
  createCancelledError,
  InternalFaultError,
  TransportFailureError,
  type AttemptFailure,
  type HedgeError,
} from '../api/errors.js';
import { TIMING } from '../config/defaults.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { safeDivide } from '../utils/math-helpers.js';
import { MultiTimerGuard } from '../utils/timer-guard.js';
import type { LatencyTracker } from './latency-tracker.js';
import type { TimingPolicy } from './timing-policy.js';
import type { EndpointKeyResolver, HedgeTransport } from './transport.js';

/**
 * Which latency is recorded for adaptive learning:
 * - race: dispatch start → winner settlement (what the caller waited)
 * - attempt: winner's own start → its settlement
 */
export type LatencyAttribution = 'race' | 'attempt';

export interface HedgeDispatcherOptions<TRequest, TResponse> {
  transport: HedgeTransport<TRequest, TResponse>;
  policy: TimingPolicy;
  /** Receives winner latencies; usually the adaptive policy's tracker */
  tracker?: LatencyTracker;
  /**
   * Defaults to `String(request)`; object requests need their own resolver or
   * they all share one latency history.
   */
  endpointKey?: EndpointKeyResolver<TRequest>;
  /** Default: 'race' */
  latencyAttribution?: LatencyAttribution;
  logger?: Logger;
  /** Clock in milliseconds; defaults to Date.now() */
  now?: () => number;
}

export interface DispatchOptions {
  /** Aborting cancels every attempt and rejects with a Cancelled error */
  signal?: AbortSignal;
}

export interface AttemptEvent {
  endpointKey: string;
  attempt: number;
  /** Milliseconds since dispatch start */
  elapsedMs: number;
}

export interface AttemptFailedEvent extends AttemptEvent {
  error: unknown;
}

export interface DispatchSucceededEvent {
  endpointKey: string;
  /** Attempt that produced the response */
  attempt: number;
  latencyMs: number;
  attemptsStarted: number;
}

export interface DispatchFailedEvent {
  endpointKey: string;
  error: HedgeError;
  attemptsStarted: number;
}

export interface HedgeDispatcherEvents {
  attemptStarted: (event: AttemptEvent) => void;
  hedgeFired: (event: AttemptEvent) => void;
  attemptFailed: (event: AttemptFailedEvent) => void;
  dispatchSucceeded: (event: DispatchSucceededEvent) => void;
  dispatchFailed: (event: DispatchFailedEvent) => void;
}

export interface HedgeDispatcherStats {
  dispatches: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  faults: number;
  attemptsStarted: number;
  hedgesFired: number;
  /** Dispatches won by a hedge rather than the original attempt */
  hedgeWins: number;
  /** Losing attempts aborted after the race settled */
  attemptsCancelled: number;
  hedgeWinRate: number;
}

type DispatchCounters = Omit<HedgeDispatcherStats, 'hedgeWinRate'>;

function emptyCounters(): DispatchCounters {
  return {
    dispatches: 0,
    succeeded: 0,
    failed: 0,
    cancelled: 0,
    faults: 0,
    attemptsStarted: 0,
    hedgesFired: 0,
    hedgeWins: 0,
    attemptsCancelled: 0,
  };
}

type RaceOutcome<TResponse> =
  | {
      kind: 'success';
      response: TResponse;
      attempt: number;
      attemptStartedAt: number;
      settledAt: number;
    }
  | { kind: 'failure' }
  | { kind: 'cancelled'; reason: unknown }
  | { kind: 'fault'; error: unknown };

interface RaceAttempt {
  attempt: number;
  controller: AbortController;
  startedAt: number;
  settled: Promise<void>;
  done: boolean;
}

interface HedgeRaceOptions<TRequest, TResponse> {
  transport: HedgeTransport<TRequest, TResponse>;
  request: TRequest;
  endpointKey: string;
  delays: readonly number[];
  startedAt: number;
  now: () => number;
  onAttemptStarted: (event: AttemptEvent) => void;
  onAttemptFailed: (event: AttemptFailedEvent) => void;
  onLateResponse: (attempt: number, response: TResponse) => Promise<void>;
}

/**
 * Attempt set of a single dispatch.
 */
class HedgeRace<TRequest, TResponse> {
  public readonly failures: AttemptFailure[] = [];
  public cancelledAttempts = 0;

  private readonly attempts: RaceAttempt[] = [];
  private readonly timers = new MultiTimerGuard();
  private readonly finished: Promise<RaceOutcome<TResponse>>;
  private resolveFinished: (outcome: RaceOutcome<TResponse>) => void = () => undefined;
  private outcome?: RaceOutcome<TResponse>;
  private pendingHedges: number;

  constructor(private readonly options: HedgeRaceOptions<TRequest, TResponse>) {
    this.pendingHedges = options.delays.length;
    this.finished = new Promise((resolve) => {
      this.resolveFinished = resolve;
    });
  }

  public get attemptsStarted(): number {
    return this.attempts.length;
  }

  public async run(signal?: AbortSignal): Promise<RaceOutcome<TResponse>> {
    if (signal?.aborted) {
      this.settle({ kind: 'cancelled', reason: signal.reason });
      return this.finished;
    }

    const onAbort = (): void => {
      this.settle({ kind: 'cancelled', reason: signal?.reason });
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      this.guard(() => {
        this.launch(0);
        this.options.delays.forEach((delayMs, index) => {
          const attempt = index + 1;
          this.timers.set(
            `hedge-${attempt}`,
            () => {
              this.guard(() => {
                this.pendingHedges -= 1;
                this.launch(attempt);
              });
            },
            Math.max(0, delayMs)
          );
        });
      });

      const outcome = await this.finished;
      await Promise.allSettled(this.attempts.map((entry) => entry.settled));
      return outcome;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.timers.clearAll();
    }
  }

  private launch(attempt: number): void {
    // Checked before every send: a settled race never starts another attempt
    if (this.outcome) {
      return;
    }

    const { transport, request, endpointKey, now } = this.options;
    const entry: RaceAttempt = {
      attempt,
      controller: new AbortController(),
      startedAt: now(),
      settled: Promise.resolve(),
      done: false,
    };

    this.options.onAttemptStarted({
      endpointKey,
      attempt,
      elapsedMs: entry.startedAt - this.options.startedAt,
    });
    this.attempts.push(entry);

    let pending: Promise<TResponse>;
    try {
      pending = transport.send(request, { attempt, endpointKey, signal: entry.controller.signal });
    } catch (error) {
      pending = Promise.reject(error);
    }

    entry.settled = pending.then(
      async (response) => {
        entry.done = true;
        if (this.outcome) {
          await this.options.onLateResponse(entry.attempt, response);
          return;
        }
        this.guard(() => this.handleSuccess(entry, response));
      },
      (error: unknown) => {
        entry.done = true;
        this.guard(() => this.handleFailure(entry, error));
      }
    );
  }

  private handleSuccess(entry: RaceAttempt, response: TResponse): void {
    if (this.outcome) {
      return;
    }

    this.settle({
      kind: 'success',
      response,
      attempt: entry.attempt,
      attemptStartedAt: entry.startedAt,
      settledAt: this.options.now(),
    });
  }

  private handleFailure(entry: RaceAttempt, error: unknown): void {
    // Losers rejecting after cancellation land here
    if (this.outcome) {
      return;
    }

    const elapsedMs = this.options.now() - this.options.startedAt;
    this.failures.push({ attempt: entry.attempt, error, elapsedMs });
    this.options.onAttemptFailed({
      endpointKey: this.options.endpointKey,
      attempt: entry.attempt,
      elapsedMs,
      error,
    });

    if (this.pendingHedges === 0 && this.attempts.every((candidate) => candidate.done)) {
      this.settle({ kind: 'failure' });
    }
  }

  private settle(outcome: RaceOutcome<TResponse>): void {
    if (this.outcome) {
      return;
    }

    this.outcome = outcome;
    this.timers.clearAll();
    for (const entry of this.attempts) {
      if (!entry.done) {
        entry.controller.abort();
        this.cancelledAttempts += 1;
      }
    }
    this.resolveFinished(outcome);
  }

  private guard(fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.settle({ kind: 'fault', error });
    }
  }
}

/**
 * Hedge Dispatcher
 *
 * Transparent to callers: a dispatch either resolves with one response or
 * rejects with a single HedgeError.
 */
export class HedgeDispatcher<TRequest, TResponse> extends EventEmitter<HedgeDispatcherEvents> {
  public readonly policy: TimingPolicy;
  public readonly tracker?: LatencyTracker;
  public readonly latencyAttribution: LatencyAttribution;

  private readonly transport: HedgeTransport<TRequest, TResponse>;
  private readonly resolveEndpointKey: EndpointKeyResolver<TRequest>;
  private readonly logger?: Logger;
  private readonly now: () => number;

  private readonly usesDefaultKey: boolean;
  private warnedOpaqueKey = false;

  private stats: DispatchCounters = emptyCounters();

  constructor(options: HedgeDispatcherOptions<TRequest, TResponse>) {
    super();
    this.transport = options.transport;
    this.policy = options.policy;
    this.tracker = options.tracker;
    this.latencyAttribution = options.latencyAttribution ?? 'race';
    this.resolveEndpointKey = options.endpointKey ?? ((request: TRequest) => String(request));
    this.usesDefaultKey = options.endpointKey === undefined;
    this.logger = options.logger;
    this.now = options.now ?? (() => Date.now());

    this.logger?.debug(
      {
        targetSloMs: this.policy.targetSloMs,
        adaptive: this.policy.isAdaptive,
        latencyAttribution: this.latencyAttribution,
        tracking: this.tracker !== undefined,
      },
      'HedgeDispatcher initialized'
    );
  }

  /**
   * Send a request with hedging.
   *
   * Resolves with the first successful attempt's response. Rejects with
   * TransportFailureError when every attempt failed, InternalFaultError when
   * the orchestration itself failed, or a Cancelled HedgeError when the
   * caller aborted. No attempt is still running once this settles.
   */
  public async dispatch(request: TRequest, options: DispatchOptions = {}): Promise<TResponse> {
    const startedAt = this.now();
    this.stats.dispatches += 1;

    let endpointKey = '<unresolved>';
    let delays: number[];
    try {
      endpointKey = this.resolveEndpointKey(request);
      delays = this.policy.delays(endpointKey);
    } catch (error) {
      throw this.fail(endpointKey, new InternalFaultError(endpointKey, error), 0);
    }

    if (this.usesDefaultKey && !this.warnedOpaqueKey && endpointKey.startsWith('[object ')) {
      this.warnedOpaqueKey = true;
      this.logger?.warn(
        { endpointKey },
        'Requests stringify to an opaque endpoint key and share one latency history; pass an endpointKey resolver'
      );
    }

    // A timer longer than the Node.js limit fires after 1 ms, so such hedges are not scheduled
    const schedulable = delays.filter((delayMs) => delayMs <= TIMING.MAX_TIMER_DELAY_MS);
    if (schedulable.length < delays.length) {
      this.logger?.warn(
        { endpointKey, delays, maxDelayMs: TIMING.MAX_TIMER_DELAY_MS },
        'Hedge delays beyond the timer range were not scheduled'
      );
    }

    lazyLog(this.logger, 'debug', () => ({ endpointKey, delays: schedulable }), 'Dispatching hedged request');

    const race = new HedgeRace<TRequest, TResponse>({
      transport: this.transport,
      request,
      endpointKey,
      delays: schedulable,
      startedAt,
      now: this.now,
      onAttemptStarted: (event) => this.onAttemptStarted(event),
      onAttemptFailed: (event) => this.onAttemptFailed(event),
      onLateResponse: (attempt, response) => this.discardResponse(endpointKey, attempt, response),
    });

    const outcome = await race.run(options.signal);

    const attemptsStarted = race.attemptsStarted;
    this.stats.attemptsStarted += attemptsStarted;
    this.stats.hedgesFired += Math.max(0, attemptsStarted - 1);
    this.stats.attemptsCancelled += race.cancelledAttempts;

    if (outcome.kind === 'success') {
      return await this.complete(endpointKey, startedAt, outcome, attemptsStarted);
    }
    throw this.fail(endpointKey, toDispatchError(endpointKey, outcome, race.failures), attemptsStarted);
  }

  public getStats(): HedgeDispatcherStats {
    return {
      ...this.stats,
      hedgeWinRate: safeDivide(this.stats.hedgeWins, this.stats.succeeded),
    };
  }

  public resetStats(): void {
    this.stats = emptyCounters();
  }

  /**
   * Release the underlying transport.
   */
  public async close(): Promise<void> {
    await this.transport.close?.();
    this.removeAllListeners();
  }

  private async complete(
    endpointKey: string,
    startedAt: number,
    outcome: Extract<RaceOutcome<TResponse>, { kind: 'success' }>,
    attemptsStarted: number
  ): Promise<TResponse> {
    const latencyMs =
      this.latencyAttribution === 'attempt'
        ? outcome.settledAt - outcome.attemptStartedAt
        : outcome.settledAt - startedAt;

    try {
      this.tracker?.record(endpointKey, latencyMs);

      lazyLog(
        this.logger,
        'debug',
        () => ({ endpointKey, attempt: outcome.attempt, latencyMs, attemptsStarted }),
        'Hedged request completed'
      );

      this.emit('dispatchSucceeded', {
        endpointKey,
        attempt: outcome.attempt,
        latencyMs,
        attemptsStarted,
      });
    } catch (error) {
      // The caller never sees this response
      await this.discardResponse(endpointKey, outcome.attempt, outcome.response);
      throw this.fail(endpointKey, new InternalFaultError(endpointKey, error), attemptsStarted);
    }

    this.stats.succeeded += 1;
    if (outcome.attempt > 0) {
      this.stats.hedgeWins += 1;
    }
    return outcome.response;
  }

  private fail(endpointKey: string, error: HedgeError, attemptsStarted: number): HedgeError {
    switch (error.code) {
      case 'Cancelled':
        this.stats.cancelled += 1;
        this.logger?.debug({ endpointKey, attemptsStarted }, 'Hedged request cancelled');
        break;
      case 'InternalFault':
        this.stats.faults += 1;
        this.logger?.error({ endpointKey, err: error.cause }, 'Hedge orchestration fault');
        break;
      default:
        this.stats.failed += 1;
        this.logger?.warn({ endpointKey, attemptsStarted, err: error.message }, 'All hedged attempts failed');
    }

    try {
      this.emit('dispatchFailed', { endpointKey, error, attemptsStarted });
    } catch (listenerError) {
      this.logger?.error({ endpointKey, err: listenerError }, 'dispatchFailed listener threw');
    }
    return error;
  }

  private async discardResponse(endpointKey: string, attempt: number, response: TResponse): Promise<void> {
    if (!this.transport.discard) {
      return;
    }
    try {
      await this.transport.discard(response);
    } catch (error) {
      this.logger?.warn({ endpointKey, attempt, err: error }, 'Failed to discard response');
    }
  }

  private onAttemptStarted(event: AttemptEvent): void {
    this.emit('attemptStarted', event);
    if (event.attempt > 0) {
      lazyLog(this.logger, 'debug', () => ({ ...event }), 'Hedge fired');
      this.emit('hedgeFired', event);
    }
  }

  private onAttemptFailed(event: AttemptFailedEvent): void {
    lazyLog(
      this.logger,
      'debug',
      () => ({
        endpointKey: event.endpointKey,
        attempt: event.attempt,
        elapsedMs: event.elapsedMs,
        err: event.error instanceof Error ? event.error.message : String(event.error),
      }),
      'Attempt failed'
    );
    this.emit('attemptFailed', event);
  }
}

function toDispatchError<TResponse>(
  endpointKey: string,
  outcome: Exclude<RaceOutcome<TResponse>, { kind: 'success' }>,
  failures: readonly AttemptFailure[]
): HedgeError {
  if (outcome.kind === 'failure') {
    return new TransportFailureError(endpointKey, failures);
  }
  if (outcome.kind === 'cancelled') {
    return createCancelledError(endpointKey, outcome.reason);
  }
  return new InternalFaultError(endpointKey, outcome.error);
}
