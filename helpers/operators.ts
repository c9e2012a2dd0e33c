// @filename: helpers/operators.ts
/**
 * The publisher behind every validation operator.
 *
 * `validate()`, `tryValidate()` and `compactValidate()` all build a
 * {@link ValidationPublisher}; they differ only in the {@link Policy} they
 * pass. Each subscriber gets its own {@link ValidationSubscription}, so one
 * validation publisher can be subscribed to many times, each subscription
 * with independent state.
 *
 * @module
 */
import type { Publisher, Subscriber } from "../_spec.ts";
import type { ValidationError } from "../error.ts";
import type { Validator } from "../validator.ts";
import type { Policy } from "./policies.ts";

import { ValidationSubscription } from "../subscription.ts";

/**
 * A publisher that validates everything its upstream emits.
 *
 * @typeParam T - values emitted by the upstream
 * @typeParam Out - values emitted by this publisher
 * @typeParam E - upstream failure
 * @typeParam X - failure introduced by the policy
 */
export class ValidationPublisher<T, Out, E, X = never> implements Publisher<Out, E | X> {
  readonly upstream: Publisher<T, E>;
  readonly validator: Validator<T>;
  readonly policy: Policy<T, Out, E, X>;

  constructor(upstream: Publisher<T, E>, validator: Validator<T>, policy: Policy<T, Out, E, X>) {
    this.upstream = upstream;
    this.validator = validator;
    this.policy = policy;
  }

  subscribe(subscriber: Subscriber<Out, E | X>): void {
    this.upstream.subscribe(new ValidationSubscription(subscriber, this.validator, this.policy));
  }

  get [Symbol.toStringTag](): string {
    return `${this.policy.name}Publisher`;
  }
}

/** Emits valid values, or `undefined` for the first invalid one. Never adds a failure. */
export type NullableValidationPublisher<T, E> = ValidationPublisher<T, T | undefined, E>;

/** Emits valid, non-nil values; ends with a {@link ValidationError} on the first invalid one. */
export type TryValidationPublisher<T, E> = ValidationPublisher<T, NonNullable<T>, E, ValidationError>;

/** Emits only valid values. */
export type CompactValidatePublisher<T, E> = ValidationPublisher<T, T, E>;
