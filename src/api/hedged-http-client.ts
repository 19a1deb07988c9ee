/**
 * Hedged HTTP Client
 *
 * Drop-in HTTP client: every request goes through a HedgeDispatcher over
 * FetchTransport, keyed by `host + pathname`.
 */

import type { Logger } from 'pino';
import { getConfig, toDispatcherConfig, type HedgingConfig } from '../config/loader.js';
import type { HedgeDispatcher, HedgeDispatcherStats } from '../core/hedge-dispatcher.js';
import type { LatencyTracker } from '../core/latency-tracker.js';
import type { HedgeTransport } from '../core/transport.js';
import { httpEndpointKey } from '../transport/fetch/endpoint-key.js';
import { FetchTransport } from '../transport/fetch/FetchTransport.js';
import type { HttpRequest } from '../transport/fetch/types.js';
import type { HedgeDispatcherConfig } from '../types/config.js';
import { createHedgeDispatcher } from './create-dispatcher.js';

export interface HedgedHttpClientOptions {
  /** Relative request URLs are resolved against it */
  baseUrl?: string;
  /** Sent with every request; per-request headers win */
  headers?: Record<string, string>;
  /** Defaults to a FetchTransport over the global fetch */
  transport?: HedgeTransport<HttpRequest, Response>;
  config?: Partial<HedgeDispatcherConfig>;
  tracker?: LatencyTracker;
  logger?: Logger;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  body?: string | Uint8Array;
  signal?: AbortSignal;
}

export class HedgedHttpClient {
  public readonly dispatcher: HedgeDispatcher<HttpRequest, Response>;

  private readonly baseUrl?: string;
  private readonly headers: Record<string, string>;

  constructor(options: HedgedHttpClientOptions = {}) {
    this.baseUrl = options.baseUrl;
    this.headers = { ...options.headers };
    this.dispatcher = createHedgeDispatcher<HttpRequest, Response>({
      transport: options.transport ?? new FetchTransport(),
      config: options.config,
      endpointKey: httpEndpointKey,
      tracker: options.tracker,
      logger: options.logger,
    });
  }

  /**
   * Build a client from a loaded `hedging.yaml` (the global config by default).
   */
  public static fromConfig(
    config: HedgingConfig = getConfig(),
    options: Omit<HedgedHttpClientOptions, 'config'> = {}
  ): HedgedHttpClient {
    return new HedgedHttpClient({ ...options, config: toDispatcherConfig(config) });
  }

  /**
   * @throws TypeError when the URL cannot be resolved (before any attempt)
   */
  public async request(method: string, url: string, options: HttpRequestOptions = {}): Promise<Response> {
    const request: HttpRequest = {
      method: method.toUpperCase(),
      url: this.resolveUrl(url),
      headers: { ...this.headers, ...options.headers },
      body: options.body,
    };
    return this.dispatcher.dispatch(request, { signal: options.signal });
  }

  public async get(url: string, options: Omit<HttpRequestOptions, 'body'> = {}): Promise<Response> {
    return this.request('GET', url, options);
  }

  public async post(
    url: string,
    body: string | Uint8Array,
    options: Omit<HttpRequestOptions, 'body'> = {}
  ): Promise<Response> {
    return this.request('POST', url, { ...options, body });
  }

  public getStats(): HedgeDispatcherStats {
    return this.dispatcher.getStats();
  }

  public async close(): Promise<void> {
    await this.dispatcher.close();
  }

  private resolveUrl(url: string): string {
    return (this.baseUrl ? new URL(url, this.baseUrl) : new URL(url)).toString();
  }
}
