import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a successful response declared as JSON cannot be parsed.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  static name = 'DecodeError';
  /** Body text that failed to parse */
  #bodyText: string;

  /** Creates a new instance of a DecodeError holding the offending body */
  constructor(message: string, bodyText: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#bodyText = bodyText;
  }

  /** Body text that failed to parse */
  get bodyText(): string {
    return this.#bodyText;
  }
}

/**
 * Type guard for {@link DecodeError}.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): DecodeError | null {
  return unwrapErrorType(DecodeError, error);
}
