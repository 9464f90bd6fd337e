import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised before dispatch when a request carries both a JSON body and a file.
 */
export class RequestShapeError extends Error {
  /** RequestShapeError error-name */
  static name = 'RequestShapeError';
  /** Method and path of the rejected request */
  #endpointPath: string;

  /** Creates a new instance of a RequestShapeError for the rejected endpoint */
  constructor(message: string, endpointPath: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#endpointPath = endpointPath;
  }

  /** Path of the rejected request */
  get endpointPath(): string {
    return this.#endpointPath;
  }
}

/**
 * Type guard for {@link RequestShapeError}.
 */
export function isRequestShapeError(error: unknown): error is RequestShapeError {
  return isErrorType(RequestShapeError, error);
}

/**
 * Extract a {@link RequestShapeError} from an unknown error value, following nested causes.
 */
export function getRequestShapeError(error: unknown): RequestShapeError | null {
  return unwrapErrorType(RequestShapeError, error);
}
