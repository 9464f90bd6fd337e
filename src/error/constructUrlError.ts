import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a path template that could not be filled in,
 * e.g. an empty id or a placeholder without a value.
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  static name = 'ConstructURLError';
  /** Path template as it looked when construction failed */
  #path: string;

  /** Creates a new instance of a ConstructURLError with the offending path */
  constructor(message: string, path: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#path = path;
  }

  /** Path template as it looked when construction failed */
  get path(): string {
    return this.#path;
  }
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}

/**
 * Extract a {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): ConstructURLError | null {
  return unwrapErrorType(ConstructURLError, error);
}
