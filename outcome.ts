// @filename: outcome.ts
/**
 * Running one validator against one value.
 *
 * @module
 */
import type { Subscriber } from "./_spec.ts";
import type { ValidationSubscription } from "./subscription.ts";
import type { Validator } from "./validator.ts";

import { AlreadyTerminatedError, ValidationError } from "./error.ts";

/**
 * The verdict on a single value. Accepted values are carried through
 * untouched.
 */
export type Outcome<T> =
  | { readonly valid: true; readonly value: T }
  | { readonly valid: false; readonly error: ValidationError };

/**
 * The live references of a subscription at the moment a value was
 * evaluated, together with the verdict.
 */
export interface Evaluation<T, Out, F> {
  readonly downstream: Subscriber<Out, F>;
  readonly validator: Validator<T>;
  readonly outcome: Outcome<T>;
}

/**
 * Runs `validator` against `value`.
 *
 * Whatever the validator throws is caught and normalized with
 * {@link ValidationError.from}.
 *
 * @example
 * ```ts
 * check(Validator.schema(z.string().min(3)), 'foo-bar');
 * // { valid: true, value: 'foo-bar' }
 * ```
 */
export function check<T>(validator: Validator<T>, value: T): Outcome<T> {
  try {
    validator.validate(value);
    return { valid: true, value };
  } catch (err) {
    return { valid: false, error: ValidationError.from(err) };
  }
}

/**
 * Validates `value` on behalf of `subscription`.
 *
 * @throws {AlreadyTerminatedError} if the subscription is complete
 */
export function evaluate<T, Out, E, X>(
  subscription: ValidationSubscription<T, Out, E, X>,
  value: T,
): Evaluation<T, Out, E | X> {
  const { downstream, validator } = subscription;
  if (subscription.isComplete || !downstream || !validator) {
    throw new AlreadyTerminatedError();
  }

  return { downstream, validator, outcome: check(validator, value) };
}
