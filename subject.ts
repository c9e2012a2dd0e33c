// @filename: subject.ts
/**
 * Push-in points: subjects you `send()` values into imperatively.
 *
 * {@link PassthroughSubject} is the raw, multicast subject. It respects each
 * subscriber's demand and does not buffer: a value sent while a subscriber
 * has no outstanding demand is simply not delivered to that subscriber.
 *
 * {@link ValidatedSubject} puts a validator in front of any subject. Values
 * that fail are dropped without a trace; everything else is plain
 * delegation.
 *
 * @example
 * ```ts
 * const names = new PassthroughValidatedSubject(z.string().min(1).min(3));
 * names.subscribe(sink(name => console.log(name)));
 *
 * names.send('fo');      // dropped
 * names.send('foo-bar'); // 'foo-bar'
 * names.complete({ kind: 'finished' });
 * ```
 *
 * @module
 */
import type { Completion, Subject, Subscriber, Subscription } from "./_spec.ts";
import type { CompactClosure, Validatable, ValidatorInput } from "./validator.ts";

import { Demand } from "./demand.ts";
import { check } from "./outcome.ts";
import { resolveCompact, Validator } from "./validator.ts";

/**
 * One subscriber's view of a {@link PassthroughSubject}: its outstanding
 * demand and its link back to the subject.
 *
 * @internal
 */
class Conduit<T, E> implements Subscription {
  #subject: PassthroughSubject<T, E> | null;
  #downstream: Subscriber<T, E> | null;
  #demand: Demand = Demand.none;

  constructor(subject: PassthroughSubject<T, E>, downstream: Subscriber<T, E>) {
    this.#subject = subject;
    this.#downstream = downstream;
  }

  request(demand: Demand): void {
    if (!this.#downstream) return;
    this.#demand = Demand.add(this.#demand, Demand.max(demand));
  }

  cancel(): void {
    const subject = this.#subject;
    this.#subject = null;
    this.#downstream = null;
    subject?.detach(this);
  }

  /** Delivers `value` if demand allows. */
  offer(value: T): void {
    const downstream = this.#downstream;
    if (!downstream || this.#demand === 0) return;

    this.#demand = Demand.subtract(this.#demand, 1);
    const more = downstream.next(value);
    this.#demand = Demand.add(this.#demand, more);
  }

  /** Delivers the terminal signal and releases the downstream. */
  finish(completion: Completion<E>): void {
    const downstream = this.#downstream;
    this.#subject = null;
    this.#downstream = null;
    downstream?.complete(completion);
  }

  get [Symbol.toStringTag](): "PassthroughSubject.Conduit" {
    return "PassthroughSubject.Conduit" as const;
  }
}

/**
 * A multicast subject without a current value.
 *
 *
 * - `send()` pushes to every subscriber with outstanding demand.
 * - `complete()` ends every subscription; later `send()` calls are ignored
 *   and late subscribers receive the same terminal signal straight away.
 * - `start()` lets the subject act as the end of another pipeline: it asks
 *   the upstream for unlimited demand. Upstream handles that arrive after
 *   completion are cancelled.
 */
export class PassthroughSubject<T, E = never> implements Subject<T, E> {
  readonly #conduits = new Set<Conduit<T, E>>();
  #completion: Completion<E> | null = null;

  /** `true` once a terminal signal was sent. */
  get isComplete(): boolean {
    return this.#completion !== null;
  }

  subscribe(subscriber: Subscriber<T, E>): void {
    const completion = this.#completion;
    if (completion) {
      subscriber.start(emptySubscription);
      subscriber.complete(completion);
      return;
    }

    const conduit = new Conduit(this, subscriber);
    this.#conduits.add(conduit);
    subscriber.start(conduit);
  }

  send(value: T): void {
    if (this.#completion) return;
    for (const conduit of [...this.#conduits]) conduit.offer(value);
  }

  complete(completion: Completion<E>): void {
    if (this.#completion) return;
    this.#completion = completion;

    const conduits = [...this.#conduits];
    this.#conduits.clear();
    for (const conduit of conduits) conduit.finish(completion);
  }

  start(subscription: Subscription): void {
    if (this.#completion) {
      subscription.cancel();
      return;
    }

    subscription.request(Demand.unlimited);
  }

  /** @internal Called by a conduit when its subscriber cancels. */
  detach(conduit: Conduit<T, E>): void {
    this.#conduits.delete(conduit);
  }

  get [Symbol.toStringTag](): "PassthroughSubject" {
    return "PassthroughSubject" as const;
  }
}

/**
 * A subject that only lets valid values through to the subject it wraps.
 *
 * Invalid values are dropped: no signal, no buffering, no error. The
 * wrapper never terminates on its own; only `complete()` does that.
 *
 * @typeParam T - values sent through the subject
 * @typeParam S - the wrapped subject
 */
export class ValidatedSubject<T, S extends Subject<T, never> = Subject<T, never>> implements Subject<T, never> {
  readonly validator: Validator<T>;
  readonly #subject: S;

  constructor(validator: Validator<T>, subject: S) {
    this.validator = validator;
    this.#subject = subject;
  }

  send(value: T): void {
    if (check(this.validator, value).valid) this.#subject.send(value);
  }

  complete(completion: Completion<never>): void {
    this.#subject.complete(completion);
  }

  start(subscription: Subscription): void {
    this.#subject.start(subscription);
  }

  subscribe(subscriber: Subscriber<T, never>): void {
    this.#subject.subscribe(subscriber);
  }

  get [Symbol.toStringTag](): string {
    return "ValidatedSubject";
  }
}

/**
 * A {@link ValidatedSubject} over a fresh {@link PassthroughSubject}.
 *
 * @example
 * ```ts
 * new PassthroughValidatedSubject(z.string().min(3));
 * new PassthroughValidatedSubject(() => Validator.schema(z.string().min(3)));
 * new PassthroughValidatedSubject('foo-bar only', (s: string) => s === 'foo-bar' ? s : null);
 * PassthroughValidatedSubject.of<Username>();
 * ```
 */
export class PassthroughValidatedSubject<T> extends ValidatedSubject<T, PassthroughSubject<T>> {
  constructor(validator: ValidatorInput<T>);
  constructor(name: string, closure: CompactClosure<T>);
  constructor(input: ValidatorInput<T> | string, closure?: CompactClosure<T>) {
    super(resolveCompact(input, closure), new PassthroughSubject<T>());
  }

  /** For values that validate themselves. */
  static of<T extends Validatable>(): PassthroughValidatedSubject<T> {
    return new PassthroughValidatedSubject<T>(Validator.valid<T>());
  }

  override get [Symbol.toStringTag](): string {
    return "PassthroughValidatedSubject";
  }
}

const emptySubscription: Subscription = {
  request() {},
  cancel() {},
};
