export * from './types.js';
export { TransportError, TransportErrorCode } from './transport-error.js';
export { buildBasicAuthHeader } from './basic-auth.js';
export { FetchHttpTransport, buildRequestUrl } from './fetch-http-transport.js';
export type { FetchHttpTransportOptions } from './fetch-http-transport.js';
