import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HedgedHttpClient } from '../../../src/api/hedged-http-client.js';
import { loadConfig } from '../../../src/config/loader.js';

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

/**
 * First call hangs until aborted; later calls answer immediately.
 */
function slowThenFast(fast: Response) {
  let calls = 0;
  return vi.fn((_input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    calls += 1;
    if (calls > 1) {
      return Promise.resolve(fast);
    }
    return new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      if (signal) {
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      }
    });
  });
}

describe('HedgedHttpClient', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
  });

  it('hedges a slow GET and returns the faster response', async () => {
    const fast = new Response('fast');
    const fetchMock = slowThenFast(fast);
    vi.stubGlobal('fetch', fetchMock);
    const client = new HedgedHttpClient({
      baseUrl: 'https://api.test',
      headers: { accept: 'application/json' },
      config: { targetSloMs: 200, hedgeFraction: 0.75, maxHedges: 1, logLevel: 'silent' },
    });

    const pending = client.get('/orders?id=7', { headers: { 'x-trace': 'abc' } });
    await vi.advanceTimersByTimeAsync(150);

    await expect(pending).resolves.toBe(fast);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1]?.[0]).toBe('https://api.test/orders?id=7');
    expect(fetchMock.mock.calls[1]?.[1]).toMatchObject({
      method: 'GET',
      headers: { accept: 'application/json', 'x-trace': 'abc' },
    });
    expect(fetchMock.mock.calls[0]?.[1]?.signal?.aborted).toBe(true);

    const stats = client.getStats();
    expect(stats.hedgeWins).toBe(1);
    expect(stats.attemptsCancelled).toBe(1);
  });

  it('sends POST bodies', async () => {
    const fetchMock = vi.fn(async (..._args: FetchArgs) => new Response('created', { status: 201 }));
    vi.stubGlobal('fetch', fetchMock);
    const client = new HedgedHttpClient({ config: { logLevel: 'silent' } });

    const response = await client.post('https://api.test/orders', '{"id":7}');

    expect(response.status).toBe(201);
    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({ method: 'POST', body: '{"id":7}' });
  });

  it('normalizes the method', async () => {
    const fetchMock = vi.fn(async (..._args: FetchArgs) => new Response(null, { status: 204 }));
    vi.stubGlobal('fetch', fetchMock);
    const client = new HedgedHttpClient({ config: { logLevel: 'silent' } });

    await client.request('delete', 'https://api.test/orders/7');

    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('DELETE');
  });

  it('rejects an unresolvable URL before any attempt', async () => {
    const fetchMock = vi.fn(async (..._args: FetchArgs) => new Response('never'));
    vi.stubGlobal('fetch', fetchMock);
    const client = new HedgedHttpClient({ config: { logLevel: 'silent' } });

    await expect(client.get('/orders')).rejects.toThrow(TypeError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('builds from a loaded configuration', () => {
    const client = HedgedHttpClient.fromConfig(loadConfig(undefined, 'production'));

    expect(client.dispatcher.policy.targetSloMs).toBe(1000);
    expect(client.dispatcher.policy.isAdaptive).toBe(true);
    expect(client.dispatcher.tracker?.maxEndpoints).toBe(10000);
  });

  it('closes the dispatcher', async () => {
    const client = new HedgedHttpClient({ config: { logLevel: 'silent' } });
    const listener = vi.fn();
    client.dispatcher.on('dispatchSucceeded', listener);

    await client.close();

    expect(client.dispatcher.listenerCount('dispatchSucceeded')).toBe(0);
  });
});
