// @filename: validator.ts
/**
 * The validator contract consumed by every operator in this package.
 *
 * A validator is an immutable, named check over values of type `T`. It
 * returns normally when a value is acceptable and throws when it is not.
 * The rules themselves come from elsewhere: a zod schema, a self-validating
 * value, or a small closure.
 *
 * @example Building validators
 * ```ts
 * import { z } from 'zod';
 *
 * // From a schema
 * const username = Validator.schema(z.string().min(1).min(3));
 *
 * // From a closure that throws
 * const even = new Validator<number>('even', n => {
 *   if (n % 2 !== 0) throw new Error(`${n} is odd`);
 * });
 *
 * // From a closure that returns the value or nothing
 * const fooBar = Validator.compact('foo-bar only', (s: string) => s === 'foo-bar' ? s : null);
 * ```
 *
 * @module
 */
import type { ZodType } from "zod";

import { ValidationError } from "./error.ts";

/**
 * A value that knows how to validate itself.
 *
 * `validate()` throws when the value is invalid.
 *
 * @example
 * ```ts
 * class Username implements Validatable {
 *   constructor(readonly name: string) {}
 *   validate() {
 *     if (this.name.length < 3) throw new ValidationError('name too short');
 *   }
 * }
 * ```
 */
export interface Validatable {
  validate(): void;
}

/**
 * Closure for the nullable family: returns `null` or `undefined` to reject
 * the value, anything else to accept it. Returning the value itself is the
 * usual way.
 */
export type CompactClosure<T> = (value: T) => unknown;

/** Closure for the error-propagating family: throws to reject. */
export type ThrowingClosure<T> = (value: T) => void;

/**
 * Anything an operator accepts in place of a {@link Validator}: the
 * validator itself, a factory that builds one, or a zod schema.
 */
export type ValidatorInput<T> = Validator<T> | (() => Validator<T>) | ZodType<T>;

/**
 * An immutable, named check over values of type `T`.
 */
export class Validator<T> {
  /** Name used in descriptions and `toString()`. */
  readonly name: string;

  /** The check; throws to reject. */
  readonly #check: ThrowingClosure<T>;

  constructor(name: string, check: ThrowingClosure<T>) {
    this.name = name;
    this.#check = check;
  }

  /**
   * Returns when `value` is acceptable, throws when it is not.
   */
  validate(value: T): void {
    this.#check(value);
  }

  /**
   * Validator for {@link Validatable} values: delegates to `value.validate()`.
   */
  static valid<T extends Validatable>(): Validator<T> {
    return selfValidator<T>();
  }

  /**
   * Builds a validator from a zod schema.
   *
   * Only the verdict of the schema is used. Transforms, defaults and
   * coercions do not apply: the value that passes is the value that flows
   * on. On failure the issue messages are joined with `"; "`.
   */
  static schema<T>(schema: ZodType<T>, name: string = "schema"): Validator<T> {
    return new Validator<T>(name, (value) => {
      const result = schema.safeParse(value);
      if (!result.success) {
        throw new ValidationError(result.error.issues.map((issue) => issue.message).join("; "));
      }
    });
  }

  /**
   * Builds a validator from a closure that returns the value when it is
   * acceptable, and `null` or `undefined` when it is not.
   *
   * Rejections are described as `"<name> invalid."`.
   */
  static compact<T>(name: string, closure: CompactClosure<T>): Validator<T> {
    return new Validator<T>(name, (value) => {
      const result = closure(value);
      if (result === null || result === undefined) {
        throw new ValidationError(`${name} invalid.`);
      }
    });
  }

  toString(): string {
    return `Validator(${this.name})`;
  }

  get [Symbol.toStringTag](): "Validator" {
    return "Validator" as const;
  }
}

/**
 * Returns `true` if `value` carries its own `validate()` method.
 */
export function isValidatable(value: unknown): value is Validatable {
  return typeof value === "object" && value !== null && "validate" in value && typeof value.validate === "function";
}

/**
 * Validator that asks each value to validate itself. A value that cannot
 * do so is rejected.
 *
 * @internal
 */
function selfValidator<T>(): Validator<T> {
  return new Validator<T>("valid", (value) => {
    if (!isValidatable(value)) {
      throw new ValidationError(`${String(value)} is not validatable.`);
    }
    value.validate();
  });
}

/**
 * Resolves the argument forms of the nullable family (`validate`,
 * `compactValidate`, `validated`, `PassthroughValidatedSubject`) to a single
 * {@link Validator}.
 *
 * - nothing → {@link Validator.valid}
 * - a name and a closure → {@link Validator.compact}
 * - a validator, factory or zod schema → {@link toValidator}
 */
export function resolveCompact<T>(input?: ValidatorInput<T> | string, closure?: CompactClosure<T>): Validator<T> {
  if (input === undefined) return selfValidator<T>();
  if (typeof input === "string") {
    if (!closure) throw new TypeError(`Missing closure for validator "${input}"`);
    return Validator.compact(input, closure);
  }
  return toValidator(input);
}

/**
 * Resolves the argument forms of the error-propagating family (`tryValidate`,
 * `tryValidated`). Same as {@link resolveCompact}, except that the closure
 * throws to reject.
 */
export function resolveThrowing<T>(input?: ValidatorInput<T> | string, closure?: ThrowingClosure<T>): Validator<T> {
  if (input === undefined) return selfValidator<T>();
  if (typeof input === "string") {
    if (!closure) throw new TypeError(`Missing closure for validator "${input}"`);
    return new Validator(input, closure);
  }
  return toValidator(input);
}

/**
 * Turns a {@link ValidatorInput} into a {@link Validator}. A factory is
 * invoked here, once.
 */
export function toValidator<T>(input: ValidatorInput<T>): Validator<T> {
  if (input instanceof Validator) return input;
  if (typeof input === "function") return input();
  return Validator.schema(input);
}
