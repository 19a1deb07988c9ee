/**
 * Transport contract consumed by the hedge dispatcher.
 *
 * One `send` call is one attempt. The dispatcher may call `send` several
 * times concurrently with the same request, so the operation must be safe to
 * duplicate (idempotency is the caller's concern). A transport must honour
 * `context.signal`: once it aborts, stop the in-flight work, release what the
 * attempt holds and reject. The dispatcher waits for that rejection before it
 * returns, so a transport that ignores the signal holds the dispatch open
 * until the attempt finishes on its own.
 */

export interface AttemptContext {
  /** 0 = original request, 1..N = hedges in firing order */
  attempt: number;
  endpointKey: string;
  signal: AbortSignal;
}

export interface HedgeTransport<TRequest, TResponse> {
  send(request: TRequest, context: AttemptContext): Promise<TResponse>;
  /**
   * Releases a response that succeeded after the race was already won
   * (e.g. cancels an unread HTTP body).
   */
  discard?(response: TResponse): Promise<void>;
  close?(): Promise<void>;
}

/**
 * Derives the endpoint key used to group latencies and timing decisions.
 */
export type EndpointKeyResolver<TRequest> = (request: TRequest) => string;
