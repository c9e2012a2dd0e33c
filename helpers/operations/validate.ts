import type { Publisher } from "../../_spec.ts";
import type {
  CompactClosure,
  ThrowingClosure,
  Validatable,
  ValidatorInput,
} from "../../validator.ts";
import type {
  CompactValidatePublisher,
  NullableValidationPublisher,
  TryValidationPublisher,
} from "../operators.ts";

import { resolveCompact, resolveThrowing } from "../../validator.ts";
import { ValidationPublisher } from "../operators.ts";
import { filterInvalid, nullablePass, propagateErrors } from "../policies.ts";

/**
 * @module operations/validate
 *
 * **Validation Operators - Check Every Value As It Flows**
 *
 * Three operators, three answers to "what happens to an invalid value?":
 *
 * ```ts
 * const name = z.string().min(1).min(3);
 *
 * pipe(from(['foo-bar', 'fo']), validate(name))        // 'foo-bar', undefined
 * pipe(from(['foo-bar', 'fo']), tryValidate(name))     // 'foo-bar', then ValidationError
 * pipe(from(['foo-bar', 'fo']), compactValidate(name)) // 'foo-bar'
 * ```
 *
 * Every operator accepts the same argument forms:
 *
 * - a `Validator`, or a function returning one
 * - a zod schema
 * - a name and a closure, for ad-hoc checks
 * - nothing at all, when the values are `Validatable`
 *
 * Values that pass are forwarded as they are; validation never transforms
 * them.
 */

/** Operator returned by {@link validate}. */
export interface ValidateOperator<T> {
  <E>(source: Publisher<T, E>): NullableValidationPublisher<T, E>;
}

/** Operator returned by {@link tryValidate}. */
export interface TryValidateOperator<T> {
  <E>(source: Publisher<T, E>): TryValidationPublisher<T, E>;
}

/** Operator returned by {@link compactValidate}. */
export interface CompactValidateOperator<T> {
  <E>(source: Publisher<T, E>): CompactValidatePublisher<T, E>;
}

/**
 * Validates each value, emitting it when valid and `undefined` when not.
 *
 * The first invalid value retires the validator: it shows up downstream as
 * `undefined`, and every later value is swallowed without requesting more.
 * The stream does not fail, and the upstream's own completion still comes
 * through.
 *
 * @example
 * ```ts
 * pipe(
 *   just('fo'),
 *   validate(z.string().min(1).min(3)),
 * ).subscribe(...)  // undefined, then finished
 *
 * pipe(
 *   just('foo'),
 *   validate('foo-bar only', (s: string) => s === 'foo-bar' ? s : null),
 * ).subscribe(...)  // undefined, then finished
 * ```
 */
export function validate<T extends Validatable>(): ValidateOperator<T>;
export function validate<T>(validator: ValidatorInput<T>): ValidateOperator<T>;
export function validate<T>(name: string, closure: CompactClosure<T>): ValidateOperator<T>;
export function validate<T>(input?: ValidatorInput<T> | string, closure?: CompactClosure<T>): ValidateOperator<T> {
  const validator = resolveCompact(input, closure);
  return <E>(source: Publisher<T, E>) => new ValidationPublisher(source, validator, nullablePass<T, E>());
}

/**
 * Validates each value and fails the stream with a `ValidationError` on the
 * first invalid one.
 *
 * `null` and `undefined` that pass the validator are skipped rather than
 * forwarded, so downstream only ever sees present values. After the failure
 * the upstream is cancelled.
 *
 * @example
 * ```ts
 * pipe(
 *   from(['foo-bar', 'fo', 'bar-foo']),
 *   tryValidate(z.string().min(3, 'too short')),
 * ).subscribe(...)  // 'foo-bar', then failure: ValidationError('too short')
 *
 * pipe(
 *   just('foo'),
 *   tryValidate('foo-bar only', (s: string) => {
 *     if (s !== 'foo-bar') throw new Error('only foo-bar is allowed');
 *   }),
 * ).subscribe(...)  // failure: ValidationError('only foo-bar is allowed')
 * ```
 */
export function tryValidate<T extends Validatable>(): TryValidateOperator<T>;
export function tryValidate<T>(validator: ValidatorInput<T>): TryValidateOperator<T>;
export function tryValidate<T>(name: string, closure: ThrowingClosure<T>): TryValidateOperator<T>;
export function tryValidate<T>(input?: ValidatorInput<T> | string, closure?: ThrowingClosure<T>): TryValidateOperator<T> {
  const validator = resolveThrowing(input, closure);
  return <E>(source: Publisher<T, E>) => new ValidationPublisher(source, validator, propagateErrors<T, E>());
}

/**
 * Validates each value and silently drops the invalid ones.
 *
 * A dropped value still consumes one unit of the subscriber's demand. With
 * unlimited demand that goes unnoticed; a subscriber that requests values
 * one at a time has to ask again.
 *
 * @example
 * ```ts
 * pipe(
 *   from(['foo-bar', '', 'fo', 'bar-foo']),
 *   compactValidate(z.string().min(1).min(3)),
 * ).subscribe(...)  // 'foo-bar', 'bar-foo', then finished
 * ```
 */
export function compactValidate<T extends Validatable>(): CompactValidateOperator<T>;
export function compactValidate<T>(validator: ValidatorInput<T>): CompactValidateOperator<T>;
export function compactValidate<T>(name: string, closure: CompactClosure<T>): CompactValidateOperator<T>;
export function compactValidate<T>(input?: ValidatorInput<T> | string, closure?: CompactClosure<T>): CompactValidateOperator<T> {
  const validator = resolveCompact(input, closure);
  return <E>(source: Publisher<T, E>) => new ValidationPublisher(source, validator, filterInvalid<T, E>());
}
