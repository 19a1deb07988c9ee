/**
 * Hedging error utilities.
 *
 * Provides a consistent error type for every public API surface and
 * helpers to convert validation and transport failures into HedgeError
 * instances that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to API consumers.
 */
export type HedgeErrorCode =
  | 'InvalidConfiguration'
  | 'TransportFailure'
  | 'InternalFault'
  | 'Cancelled';

/**
 * Plain error shape (for JSON responses/telemetry).
 */
export interface HedgeErrorShape {
  code: HedgeErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Error implementation returned by the dispatcher and its collaborators.
 */
export class HedgeError extends Error implements HedgeErrorShape {
  public readonly code: HedgeErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: HedgeErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HedgeError';
    this.code = code;
    this.details = details;
  }

  public toObject(): HedgeErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Failure of a single attempt, kept for diagnosis.
 */
export interface AttemptFailure {
  /** 0 = original request, 1..N = hedges in firing order */
  attempt: number;
  error: unknown;
  /** Milliseconds from dispatch start until the attempt failed */
  elapsedMs: number;
}

/**
 * Every started attempt of a dispatch failed.
 *
 * `hedged` tells a hedge-exhausted failure (several attempts ran) apart from
 * a single-attempt failure.
 */
export class TransportFailureError extends HedgeError {
  public readonly failures: readonly AttemptFailure[];
  public readonly attemptsStarted: number;
  public readonly hedged: boolean;

  constructor(endpointKey: string, failures: readonly AttemptFailure[]) {
    const last = failures[failures.length - 1];
    const hedged = failures.length > 1;
    const reason = last ? describeError(last.error) : 'no attempt was started';
    const message = hedged
      ? `All ${failures.length} hedged attempts to ${endpointKey} failed: ${reason}`
      : `Request to ${endpointKey} failed: ${reason}`;

    super(
      'TransportFailure',
      message,
      {
        endpointKey,
        attempts: failures.map((failure) => ({
          attempt: failure.attempt,
          elapsedMs: failure.elapsedMs,
          message: describeError(failure.error),
        })),
      },
      { cause: last?.error }
    );
    this.name = 'TransportFailureError';
    this.failures = failures;
    this.attemptsStarted = failures.length;
    this.hedged = hedged;
  }
}

/**
 * Unexpected fault while orchestrating the race itself.
 */
export class InternalFaultError extends HedgeError {
  constructor(endpointKey: string, fault: unknown) {
    super(
      'InternalFault',
      `Hedge orchestration for ${endpointKey} failed: ${describeError(fault)}`,
      { endpointKey },
      { cause: fault }
    );
    this.name = 'InternalFaultError';
  }
}

/**
 * Convenience helper to create cancellation errors.
 */
export function createCancelledError(endpointKey: string, reason?: unknown): HedgeError {
  const suffix = reason === undefined ? '' : `: ${describeError(reason)}`;
  return new HedgeError(
    'Cancelled',
    `Dispatch to ${endpointKey} was cancelled by the caller${suffix}`,
    { endpointKey },
    { cause: reason }
  );
}

/**
 * Convert a Zod validation error into an InvalidConfiguration error.
 *
 * @example
 * ```typescript
 * const result = FixedFractionPolicySchema.safeParse({ targetSloMs: 0 });
 * if (!result.success) {
 *   throw zodErrorToHedgeError(result.error);
 * }
 * // Throws: "Invalid configuration on field 'targetSloMs': Must be positive"
 * ```
 */
export function zodErrorToHedgeError(error: ZodError): HedgeError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Invalid configuration on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return new HedgeError('InvalidConfiguration', message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}

/**
 * Map unknown errors into HedgeError instances.
 */
export function toHedgeError(
  error: unknown,
  fallbackCode: HedgeErrorCode = 'InternalFault'
): HedgeError {
  if (error instanceof HedgeError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new HedgeError('Cancelled', error.message || 'Operation aborted by caller', undefined, {
        cause: error,
      });
    }
    return new HedgeError(fallbackCode, error.message, undefined, { cause: error });
  }

  return new HedgeError(fallbackCode, 'Unknown hedging error', undefined, { cause: error });
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
