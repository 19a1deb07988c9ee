/**
 * Fetch Transport
 *
 * One attempt = one `fetch` call carrying the attempt's abort signal. Any
 * HTTP status resolves the attempt; only network errors and aborts reject.
 */

import type { AttemptContext, HedgeTransport } from '../../core/transport.js';
import type { FetchFunction, FetchTransportOptions, HttpRequest } from './types.js';

export class FetchTransport implements HedgeTransport<HttpRequest, Response> {
  private readonly fetchImpl: FetchFunction;
  private readonly attemptHeader?: string;

  constructor(options: FetchTransportOptions = {}) {
    // Resolved per call when not injected so a stubbed global is picked up
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.attemptHeader = options.attemptHeader;
  }

  public async send(request: HttpRequest, context: AttemptContext): Promise<Response> {
    const headers: Record<string, string> = { ...request.headers };
    if (this.attemptHeader) {
      headers[this.attemptHeader] = String(context.attempt);
    }

    return this.fetchImpl(request.url, {
      method: request.method,
      headers,
      body: request.body,
      signal: context.signal,
    });
  }

  /**
   * Cancel the unread body of a response that lost the race.
   */
  public async discard(response: Response): Promise<void> {
    if (response.body && !response.bodyUsed) {
      await response.body.cancel();
    }
  }
}
