import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates a decoded payload against a Standard Schema (zod, valibot, ...) and
 * wraps the result in a tuple-style `[error, value]` response.
 *
 * - Sync and async schemas are both supported.
 * - A schema that throws, or resolves to a rejected promise, gives a
 *   {@link ValidationError} with the thrown value as `cause`.
 * - Reported issues give a {@link ValidationError} listing them, prefixed with `context`.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
  context = 'response',
): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [err, pending] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (err) {
    return [new ValidationError(`error validating ${context}`, [], { cause: err }), null];
  }

  const [errAsync, result] = await safeWrapAsync(() => Promise.resolve(pending));
  if (errAsync) {
    return [new ValidationError(`error validating ${context} asynchronously`, [], { cause: errAsync }), null];
  }

  if (result.issues) {
    return [new ValidationError(`error validating ${context}`, result.issues), null];
  }

  return [null, result.value];
}
