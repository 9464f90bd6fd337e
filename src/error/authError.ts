import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the backend rejects a login or token refresh.
 * The rejecting {@link ApiError} is attached as `cause`.
 */
export class AuthError extends Error {
  /** AuthError error-name */
  static name = 'AuthError';
  /** Status code the auth endpoint answered with */
  #statusCode: number;

  /** Creates a new instance of an AuthError with the status code of the rejection */
  constructor(message: string, statusCode: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#statusCode = statusCode;
  }

  /** Status code the auth endpoint answered with */
  get statusCode(): number {
    return this.#statusCode;
  }
}

/**
 * Type guard for {@link AuthError}.
 */
export function isAuthError(error: unknown): error is AuthError {
  return isErrorType(AuthError, error);
}

/**
 * Extract an {@link AuthError} from an unknown error value, following nested causes.
 */
export function getAuthError(error: unknown): AuthError | null {
  return unwrapErrorType(AuthError, error);
}
