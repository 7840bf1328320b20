import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';

/**
 * Validates `input` against a Standard Schema (zod, valibot, arktype, ...).
 *
 * Sync and async validators are both supported. A throwing validator, or one
 * reporting issues, yields a {@link ValidationError}.
 */
export async function validate<S extends StandardSchemaV1>(
  input: unknown,
  schema: S,
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<S>> {
  type Result = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<S>>;

  const [errStart, pending] = safeWrap<Result | Promise<Result>>(() => schema['~standard'].validate(input));
  if (errStart) {
    return [new ValidationError('error validating on validation start', [], { cause: errStart }), null];
  }

  const [errAsync, result] = await safeWrapAsync(() => Promise.resolve(pending));
  if (errAsync) {
    return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
