import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request exceeds the client's timeout.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static name = 'TimeoutError';
  /** Timeout that elapsed, in milliseconds */
  #timeout: number;

  /** Creates a new instance of a TimeoutError for the elapsed timeout */
  constructor(message: string, timeout: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#timeout = timeout;
  }

  /** Timeout that elapsed, in milliseconds */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}

/**
 * Extract a {@link TimeoutError} from an unknown error value, following nested causes.
 */
export function getTimeoutError(error: unknown): TimeoutError | null {
  return unwrapErrorType(TimeoutError, error);
}
