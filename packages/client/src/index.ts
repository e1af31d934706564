export { BandClient } from './band-client.js';
export type { BandClientDeps } from './band-client.js';
export { iteratePages } from './pagination.js';
export type { IteratePagesOptions } from './pagination.js';
export * from './errors/index.js';
export * from './response/index.js';
export * from './resources/index.js';
export * from './api/index.js';
