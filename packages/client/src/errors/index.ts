export { ApiError, ApiErrorCode } from './api-error.js';
export { PermissionError, PermissionErrorCode } from './permission-error.js';
export { FieldLookupError, FieldLookupErrorCode } from './field-lookup-error.js';
