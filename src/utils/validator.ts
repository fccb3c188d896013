import type { StandardSchemaV1 } from '@standard-schema/spec';
import { DecodingError } from '../error/decodingError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)` which may be sync or async.
 * - A throwing or rejecting validation is wrapped in a `DecodingError` without issues.
 * - A result with `issues` returns `[DecodingError, null]` carrying those issues.
 * - Otherwise returns `[null, result.value]`.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<DecodingError, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [err, pending] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (err) {
    return [new DecodingError('error validating on validation start', [], { cause: err }), null];
  }

  let result: ValidationResult;
  if (pending instanceof Promise) {
    const [errAsync, resultAsync] = await safeWrapAsync(() => pending);
    if (errAsync) {
      return [new DecodingError('error validating async data', [], { cause: errAsync }), null];
    }

    result = resultAsync;
  } else {
    result = pending;
  }

  if (result.issues) {
    return [new DecodingError('error validating data', [...result.issues]), null];
  }

  return [null, result.value];
}
