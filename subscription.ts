// @filename: subscription.ts
/**
 * The subscription shared by the validation operators.
 *
 * @module
 */
import type { Completion, Subscriber, Subscription } from "./_spec.ts";
import type { Demand } from "./demand.ts";
import type { Policy } from "./helpers/policies.ts";
import type { Validator } from "./validator.ts";

/**
 * Sits between an upstream publisher and a downstream subscriber and decides,
 * value by value, what crosses.
 *
 *
 * One instance plays both roles of an operator: it is the subscriber the
 * upstream pushes into, and the subscription the downstream requests from.
 * The forwarding decision itself belongs to the {@link Policy} it was
 * created with.
 *
 * State is three references: the validator, the downstream and the upstream
 * handle. The subscription is complete as soon as either the validator or
 * the downstream is gone. Cancellation, upstream completion and
 * error-propagating termination clear all three at once; the nullable-pass
 * policy only retires the validator, so the downstream still hears how the
 * upstream ends.
 *
 * @typeParam T - values received from upstream
 * @typeParam Out - values sent downstream
 * @typeParam E - upstream failure
 * @typeParam X - extra failure the policy may introduce
 */
export class ValidationSubscription<T, Out, E, X = never> implements Subscription, Subscriber<T, E> {
  #validator: Validator<T> | null;
  #downstream: Subscriber<Out, E | X> | null;
  #upstream: Subscription | null = null;
  readonly #policy: Policy<T, Out, E, X>;

  constructor(downstream: Subscriber<Out, E | X>, validator: Validator<T>, policy: Policy<T, Out, E, X>) {
    this.#downstream = downstream;
    this.#validator = validator;
    this.#policy = policy;
  }

  /** `true` once the downstream or the validator has been released. */
  get isComplete(): boolean {
    return this.#downstream === null || this.#validator === null;
  }

  get validator(): Validator<T> | null {
    return this.#validator;
  }

  get downstream(): Subscriber<Out, E | X> | null {
    return this.#downstream;
  }

  get upstream(): Subscription | null {
    return this.#upstream;
  }

  /**
   * Receives the upstream handle and introduces this subscription to the
   * downstream. A second handle, or one that arrives after completion, is
   * cancelled on the spot.
   */
  start(subscription: Subscription): void {
    const downstream = this.#downstream;
    if (this.#upstream || this.isComplete || !downstream) {
      subscription.cancel();
      return;
    }

    this.#upstream = subscription;
    downstream.start(this);
  }

  /** Relays demand upstream, unchanged, while the subscription is alive. */
  request(demand: Demand): void {
    if (this.isComplete) return;
    this.#upstream?.request(demand);
  }

  /** Cancels upstream and releases every reference. Idempotent. */
  cancel(): void {
    const upstream = this.#upstream;
    this.#release();
    upstream?.cancel();
  }

  next(value: T): Demand {
    return this.#policy.receive(this, value);
  }

  /**
   * Forwards the upstream's terminal signal and releases every reference.
   */
  complete(completion: Completion<E>): void {
    const downstream = this.#downstream;
    this.#release();
    downstream?.complete(completion);
  }

  /**
   * Stops validating without detaching the downstream. Further values are
   * swallowed; the upstream's completion is still forwarded.
   */
  retire(): void {
    this.#validator = null;
  }

  #release(): void {
    this.#downstream = null;
    this.#upstream = null;
    this.#validator = null;
  }

  get [Symbol.toStringTag](): string {
    return this.#policy.name;
  }
}
