/**
 * Error entrypoint: exports the client's error taxonomy and helpers for identifying
 * and unwrapping error types.
 * @module
 */

/** Error representing a response with status code 400 or above. */
export { ApiError, getApiError, isApiError } from './apiError.js';
/** Error raised when the backend rejects a login or token refresh. */
export { AuthError, getAuthError, isAuthError } from './authError.js';
/** Error raised for invalid client configuration. */
export { ConfigError, getConfigError, isConfigError } from './configError.js';
/** Error raised for transport failures below HTTP. */
export { ConnectionError, getConnectionError, isConnectionError } from './connectionError.js';
/** Error representing a path template that could not be filled in. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Error raised when a JSON success body cannot be parsed. */
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised when a request carries both a JSON body and a file. */
export { getRequestShapeError, isRequestShapeError, RequestShapeError } from './requestShapeError.js';
/** Error raised when a request exceeds the client's timeout. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error representing a response payload that does not match its schema. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
