// @filename: publisher.ts
/**
 * Cold, demand-aware sources.
 *
 * Each subscriber gets an independent run over the source. Values are only
 * pushed while the subscriber has outstanding demand, and a `request()` made
 * from inside `next()` is folded into the running emission loop instead of
 * starting a nested one.
 *
 * @example
 * ```ts
 * from([1, 2, 3]).subscribe({
 *   start: s => s.request(2),
 *   next: v => { console.log(v); return Demand.none; },
 *   complete: c => console.log(c.kind),
 * });
 * // 1, 2   (3 waits for more demand)
 * ```
 *
 * @module
 */
import type { Publisher, Subscriber, Subscription } from "./_spec.ts";

import { Demand } from "./demand.ts";

/**
 * Subscription over an iterator: pushes while demand lasts, finishes as soon
 * as the iterator is exhausted.
 *
 * Once demand runs out the iterator is read one step ahead, so a source that
 * has nothing left completes without waiting for more demand.
 *
 * @internal
 */
class IteratorSubscription<T> implements Subscription {
  #downstream: Subscriber<T, never> | null;
  #iterator: Iterator<T> | null;
  #pending: IteratorYieldResult<T> | null = null;
  #demand: Demand = Demand.none;
  #emitting = false;

  constructor(downstream: Subscriber<T, never>, iterator: Iterator<T>) {
    this.#downstream = downstream;
    this.#iterator = iterator;
  }

  request(demand: Demand): void {
    if (!this.#downstream) return;
    this.#demand = Demand.add(this.#demand, Demand.max(demand));

    // A request from inside next() only raises the demand; the running loop picks it up.
    if (this.#emitting) return;
    this.#emitting = true;
    try {
      this.#drain();
    } finally {
      this.#emitting = false;
    }
  }

  cancel(): void {
    this.#downstream = null;
    this.#iterator = null;
    this.#pending = null;
  }

  #drain(): void {
    while (this.#demand > 0) {
      const result = this.#pull();
      const downstream = this.#downstream;
      if (!result || !downstream) return;

      this.#demand = Demand.subtract(this.#demand, 1);
      const more = downstream.next(result.value);
      this.#demand = Demand.add(this.#demand, more);

      if (this.#demand === 0) {
        this.#pending = this.#pull();
      }
    }
  }

  /**
   * Next item, either held over from a look-ahead or read now. Finishes the
   * downstream and returns `null` when the iterator is done.
   */
  #pull(): IteratorYieldResult<T> | null {
    const pending = this.#pending;
    this.#pending = null;
    if (pending) return pending;

    const downstream = this.#downstream;
    const iterator = this.#iterator;
    if (!downstream || !iterator) return null;

    const result = iterator.next();
    if (!result.done) return result;

    this.cancel();
    downstream.complete({ kind: "finished" });
    return null;
  }

  get [Symbol.toStringTag](): "Sequence.Subscription" {
    return "Sequence.Subscription" as const;
  }
}

/**
 * A publisher that replays an iterable to every subscriber.
 */
export class Sequence<T> implements Publisher<T, never> {
  readonly #values: Iterable<T>;

  constructor(values: Iterable<T>) {
    this.#values = values;
  }

  subscribe(subscriber: Subscriber<T, never>): void {
    const iterator = this.#values[Symbol.iterator]();
    subscriber.start(new IteratorSubscription(subscriber, iterator));
  }

  get [Symbol.toStringTag](): "Sequence" {
    return "Sequence" as const;
  }
}

/**
 * A publisher that ends every subscription with `error` as soon as it is
 * subscribed to.
 */
export class Fail<E> implements Publisher<never, E> {
  readonly error: E;

  constructor(error: E) {
    this.error = error;
  }

  subscribe(subscriber: Subscriber<never, E>): void {
    let cancelled = false;
    subscriber.start({
      request() {},
      cancel() { cancelled = true; },
    });
    if (!cancelled) subscriber.complete({ kind: "failure", error: this.error });
  }

  get [Symbol.toStringTag](): "Fail" {
    return "Fail" as const;
  }
}

/**
 * Creates a publisher that emits every item of `values`, then finishes.
 *
 * @example
 * ```ts
 * pipe(from(['foo-bar', 'fo']), compactValidate(z.string().min(3)));
 * ```
 */
export function from<T>(values: Iterable<T>): Sequence<T> {
  return new Sequence(values);
}

/**
 * Creates a publisher that emits `value` once, then finishes.
 */
export function just<T>(value: T): Sequence<T> {
  return new Sequence([value]);
}

/**
 * Creates a publisher that fails immediately with `error`.
 */
export function fail<E>(error: E): Fail<E> {
  return new Fail(error);
}
