import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised for transport failures below HTTP: DNS lookups, refused or reset
 * connections, TLS handshakes, or a client that was already disposed.
 * The transport error is attached as `cause`.
 */
export class ConnectionError extends Error {
  /** ConnectionError error-name */
  static name = 'ConnectionError';
}

/**
 * Type guard for {@link ConnectionError}.
 */
export function isConnectionError(error: unknown): error is ConnectionError {
  return isErrorType(ConnectionError, error);
}

/**
 * Extract a {@link ConnectionError} from an unknown error value, following nested causes.
 */
export function getConnectionError(error: unknown): ConnectionError | null {
  return unwrapErrorType(ConnectionError, error);
}
