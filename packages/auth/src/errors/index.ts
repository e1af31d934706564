export { AuthorizationError, AuthorizationErrorCode } from './authorization-error.js';
export { ConfigurationError, ConfigurationErrorCode } from '@bandkit/core';
