import type { HttpRequest } from './types.js';

/**
 * Groups latencies by `host + pathname`; method, query and fragment are ignored.
 *
 * @example
 * httpEndpointKey({ method: 'GET', url: 'https://api.test:8443/users?page=2' });
 * // => 'api.test:8443/users'
 */
export function httpEndpointKey(request: HttpRequest): string {
  const url = new URL(request.url);
  return `${url.host}${url.pathname}`;
}
