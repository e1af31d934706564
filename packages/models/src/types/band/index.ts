export type { BandClientConfig } from './BandClientConfig.js';
export type { AuthorizationRequest } from './AuthorizationRequest.js';
export type { ApiEnvelope, ApiFailureData, JsonValue } from './ApiEnvelope.js';
export type { Cursor, PagedResult } from './Pagination.js';
