export { BandError, toError } from './band-error.js';
export { ConfigurationError, ConfigurationErrorCode } from './configuration-error.js';
