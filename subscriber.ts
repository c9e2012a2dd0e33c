// @filename: subscriber.ts
/**
 * Terminal subscribers.
 *
 * @module
 */
import type { Completion, Subscriber, Subscription } from "./_spec.ts";
import type { Cancellable, SinkOptions } from "./_types.ts";

import { Demand } from "./demand.ts";
import { reportError } from "./helpers/utils.ts";
import { Symbol } from "./symbol.ts";

/**
 * A subscriber that hands values to callbacks and can be cancelled.
 *
 *
 * The sink requests its configured demand (unlimited by default) as soon as
 * it is started and never asks for more by itself; call `request()` to
 * grant more when the initial demand is bounded.
 *
 * Errors thrown by the callbacks do not travel upstream. They are reported
 * to the host the way an uncaught error would be, and the sink carries on.
 *
 * @typeParam T - values received
 * @typeParam E - failure received
 */
export class Sink<T, E = never> implements Subscriber<T, E>, Cancellable {
  readonly #options: SinkOptions<T, E>;
  #subscription: Subscription | null = null;
  #closed = false;

  constructor(options: SinkOptions<T, E>) {
    this.#options = options;
  }

  /** `true` after cancellation or the terminal signal. */
  get closed(): boolean {
    return this.#closed;
  }

  start(subscription: Subscription): void {
    if (this.#closed || this.#subscription) {
      subscription.cancel();
      return;
    }

    this.#subscription = subscription;
    subscription.request(this.#options.demand ?? Demand.unlimited);
  }

  next(value: T): Demand {
    if (this.#closed) return Demand.none;

    const options = this.#options;
    try {
      options.next?.(value);
    } catch (err) {
      reportError(err);
    }
    return Demand.none;
  }

  complete(completion: Completion<E>): void {
    if (this.#closed) return;
    this.#closed = true;
    this.#subscription = null;

    const options = this.#options;
    if (typeof options.complete !== "function") {
      if (completion.kind === "failure") reportError(completion.error);
      return;
    }

    try {
      options.complete(completion);
    } catch (err) {
      if (completion.kind === "failure") {
        // Keep the handler's error visible, but surface the failure it was handling
        console.error("Sink completion handler threw:", err);
        reportError(completion.error);
      } else reportError(err);
    }
  }

  /** Grants the upstream `demand` more values. */
  request(demand: Demand): void {
    if (this.#closed) return;
    this.#subscription?.request(demand);
  }

  cancel(): void {
    if (this.#closed) return;
    this.#closed = true;

    const subscription = this.#subscription;
    this.#subscription = null;
    subscription?.cancel();
  }

  [Symbol.dispose](): void {
    this.cancel();
  }

  get [Symbol.toStringTag](): "Sink" {
    return "Sink" as const;
  }
}

/**
 * Creates a {@link Sink}.
 *
 * @example
 * ```ts
 * const names = new PassthroughSubject<string>();
 * const cancellable = sink<string>({
 *   next: name => console.log(name),
 *   complete: c => console.log(c.kind),
 * });
 *
 * pipe(names, compactValidate(z.string().min(3))).subscribe(cancellable);
 * names.send('foo-bar'); // 'foo-bar'
 * cancellable.cancel();
 * ```
 */
export function sink<T, E = never>(options: SinkOptions<T, E> | ((value: T) => void)): Sink<T, E> {
  return new Sink(typeof options === "function" ? { next: options } : options);
}
