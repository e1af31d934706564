export { BandApi, IgnoredDataSchema } from './band-api.js';
export type { BandApiOptions } from './band-api.js';
export { Endpoints } from './endpoints.js';
export type { Endpoint } from './endpoints.js';
