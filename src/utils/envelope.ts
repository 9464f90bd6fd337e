import { ValidationError } from '../error/validationError.js';
import type { SafeWrap } from './wrap.js';

function kindOf(body: unknown): string {
  if (body === null) {
    return 'null';
  }

  return Array.isArray(body) ? 'array' : typeof body;
}

/**
 * Reads the list nested under `key` of a JSON object response, e.g. `stations`
 * in `{"stations": [...]}`.
 *
 * An absent or `null` key means an empty list. Whatever else sits under the key
 * is returned as is, for the caller's schema to check. A body that is not an
 * object gives a {@link ValidationError}, prefixed with `context`.
 */
export function unwrapEnvelope(body: unknown, key: string, context = key): SafeWrap<ValidationError, unknown> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    const kind = kindOf(body);
    return [new ValidationError(`error validating ${context}`, [{ message: `Expected object, received ${kind}` }]), null];
  }

  const value: unknown = Reflect.get(body, key);
  return [null, value ?? []];
}
