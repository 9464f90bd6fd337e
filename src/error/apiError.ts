import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response with status code 400 or above.
 *
 * The body is kept exactly as the server sent it, never decoded, so HTML error
 * pages and truncated JSON stay readable.
 */
export class ApiError extends Error {
  /** ApiError error-name */
  static name = 'ApiError';
  /** HTTP status code of the failed response */
  #statusCode: number;
  /** Undecoded response body */
  #rawBody: string;
  /** API path the request was sent to, relative to the versioned prefix */
  #endpointPath: string;

  /** Creates a new instance of an ApiError for the given status, body and endpoint */
  constructor(statusCode: number, rawBody: string, endpointPath: string, opts?: ErrorOptions) {
    super(`API error ${statusCode} on ${endpointPath}: ${rawBody}`, opts);
    this.#statusCode = statusCode;
    this.#rawBody = rawBody;
    this.#endpointPath = endpointPath;
  }

  /** HTTP status code of the failed response */
  get statusCode(): number {
    return this.#statusCode;
  }

  /** Response body as received */
  get rawBody(): string {
    return this.#rawBody;
  }

  /** API path the request was sent to */
  get endpointPath(): string {
    return this.#endpointPath;
  }
}

/**
 * Type guard for {@link ApiError}.
 */
export function isApiError(error: unknown): error is ApiError {
  return isErrorType(ApiError, error);
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): ApiError | null {
  return unwrapErrorType(ApiError, error);
}
