// @filename: validated.ts
/**
 * Single-shot sources: one value, validated once, delivered on first demand.
 *
 * Unlike the operators, these publishers have no upstream. The value and
 * the validator are fixed at construction, and the verdict is computed
 * right there; subscribing and requesting only replay it.
 *
 * @example
 * ```ts
 * const name = z.string().min(1).min(3);
 *
 * validated('foo-bar', name).subscribe(sink(v => console.log(v))); // 'foo-bar'
 * validated('fo', name).subscribe(sink(v => console.log(v)));      // undefined
 *
 * tryValidated('fo', name).subscribe(sink({
 *   next: v => console.log(v),
 *   complete: c => console.log(c.kind), // 'failure'
 * }));
 * ```
 *
 * @module
 */
import type { Completion, Publisher, Subscriber, Subscription } from "./_spec.ts";
import type { Demand } from "./demand.ts";
import type { ValidationError } from "./error.ts";
import type { Outcome } from "./outcome.ts";
import type {
  CompactClosure,
  ThrowingClosure,
  Validatable,
  ValidatorInput,
} from "./validator.ts";

import { check } from "./outcome.ts";
import { resolveCompact, resolveThrowing, Validator } from "./validator.ts";

/**
 * What a single-shot subscription delivers: either a value followed by
 * `finished`, or a terminal signal alone.
 *
 * @internal
 */
type SingleShot<T, E> =
  | { readonly kind: "value"; readonly value: T }
  | { readonly kind: "terminal"; readonly completion: Completion<E> };

/** @internal */
type SingleShotTag = "Validated" | "TryValidated";

/**
 * Holds the downstream and the stored result until the first positive
 * request, then lets go of the downstream before delivering.
 *
 * @internal
 */
class SingleShotSubscription<T, E> implements Subscription {
  #downstream: Subscriber<T, E> | null;
  readonly #result: SingleShot<T, E>;
  readonly #tag: SingleShotTag;

  constructor(tag: SingleShotTag, downstream: Subscriber<T, E>, result: SingleShot<T, E>) {
    this.#tag = tag;
    this.#downstream = downstream;
    this.#result = result;
  }

  get isComplete(): boolean {
    return this.#downstream === null;
  }

  request(demand: Demand): void {
    const downstream = this.#downstream;
    if (!downstream || !(demand > 0)) return;

    this.cancel();
    const result = this.#result;
    if (result.kind === "terminal") {
      downstream.complete(result.completion);
      return;
    }

    downstream.next(result.value);
    downstream.complete({ kind: "finished" });
  }

  cancel(): void {
    this.#downstream = null;
  }

  get [Symbol.toStringTag](): SingleShotTag {
    return this.#tag;
  }
}

/**
 * A top-level publisher that emits its value when valid and `undefined`
 * when not, then finishes. It never fails.
 */
export class ValidatedPublisher<T> implements Publisher<T | undefined, never> {
  readonly output: T;
  readonly validator: Validator<T>;
  readonly outcome: Outcome<T>;

  constructor(output: T, validator: Validator<T>) {
    this.output = output;
    this.validator = validator;
    this.outcome = check(validator, output);
  }

  /** For values that validate themselves. */
  static of<T extends Validatable>(output: T): ValidatedPublisher<T> {
    return new ValidatedPublisher(output, Validator.valid<T>());
  }

  subscribe(subscriber: Subscriber<T | undefined, never>): void {
    const outcome = this.outcome;
    const value = outcome.valid ? outcome.value : undefined;
    subscriber.start(new SingleShotSubscription<T | undefined, never>("Validated", subscriber, { kind: "value", value }));
  }

  get [Symbol.toStringTag](): "ValidatedPublisher" {
    return "ValidatedPublisher" as const;
  }
}

/**
 * A top-level publisher that emits its value and finishes when valid, and
 * fails with a {@link ValidationError} when not.
 */
export class TryValidatedPublisher<T> implements Publisher<T, ValidationError> {
  readonly output: T;
  readonly validator: Validator<T>;
  readonly outcome: Outcome<T>;

  constructor(output: T, validator: Validator<T>) {
    this.output = output;
    this.validator = validator;
    this.outcome = check(validator, output);
  }

  /** For values that validate themselves. */
  static of<T extends Validatable>(output: T): TryValidatedPublisher<T> {
    return new TryValidatedPublisher(output, Validator.valid<T>());
  }

  subscribe(subscriber: Subscriber<T, ValidationError>): void {
    const outcome = this.outcome;
    const result: SingleShot<T, ValidationError> = outcome.valid
      ? { kind: "value", value: outcome.value }
      : { kind: "terminal", completion: { kind: "failure", error: outcome.error } };
    subscriber.start(new SingleShotSubscription("TryValidated", subscriber, result));
  }

  get [Symbol.toStringTag](): "TryValidatedPublisher" {
    return "TryValidatedPublisher" as const;
  }
}

/**
 * Creates a {@link ValidatedPublisher}, accepting the same argument forms as
 * the `validate()` operator.
 */
export function validated<T extends Validatable>(output: T): ValidatedPublisher<T>;
export function validated<T>(output: T, validator: ValidatorInput<T>): ValidatedPublisher<T>;
export function validated<T>(output: T, name: string, closure: CompactClosure<T>): ValidatedPublisher<T>;
export function validated<T>(output: T, input?: ValidatorInput<T> | string, closure?: CompactClosure<T>): ValidatedPublisher<T> {
  return new ValidatedPublisher(output, resolveCompact(input, closure));
}

/**
 * Creates a {@link TryValidatedPublisher}, accepting the same argument forms
 * as the `tryValidate()` operator.
 */
export function tryValidated<T extends Validatable>(output: T): TryValidatedPublisher<T>;
export function tryValidated<T>(output: T, validator: ValidatorInput<T>): TryValidatedPublisher<T>;
export function tryValidated<T>(output: T, name: string, closure: ThrowingClosure<T>): TryValidatedPublisher<T>;
export function tryValidated<T>(output: T, input?: ValidatorInput<T> | string, closure?: ThrowingClosure<T>): TryValidatedPublisher<T> {
  return new TryValidatedPublisher(output, resolveThrowing(input, closure));
}
