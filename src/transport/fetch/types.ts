/**
 * HTTP transport types
 */

export interface HttpRequest {
  method: string;
  /** Absolute URL */
  url: string;
  headers?: Record<string, string>;
  body?: string | Uint8Array;
}

export type FetchFunction = typeof fetch;

export interface FetchTransportOptions {
  /** Defaults to the global fetch */
  fetch?: FetchFunction;
  /**
   * Header carrying the attempt ordinal (0 = original) on every attempt.
   * Not sent when unset.
   */
  attemptHeader?: string;
}
