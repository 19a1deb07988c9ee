export { FetchTransport } from './FetchTransport.js';
export { httpEndpointKey } from './endpoint-key.js';
export type { FetchFunction, FetchTransportOptions, HttpRequest } from './types.js';
