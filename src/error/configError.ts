import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised for invalid client configuration, such as an API key combined with
 * a session token, or a session operation on a client without a session.
 */
export class ConfigError extends Error {
  /** ConfigError error-name */
  static name = 'ConfigError';
}

/**
 * Type guard for {@link ConfigError}.
 */
export function isConfigError(error: unknown): error is ConfigError {
  return isErrorType(ConfigError, error);
}

/**
 * Extract a {@link ConfigError} from an unknown error value, following nested causes.
 */
export function getConfigError(error: unknown): ConfigError | null {
  return unwrapErrorType(ConfigError, error);
}
