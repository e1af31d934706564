export { parseResponse, isJsonResponse } from './parse-response.js';
export { unwrapEnvelope } from './unwrap-envelope.js';
