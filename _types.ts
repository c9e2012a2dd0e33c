// @filename: _types.ts
import type { Completion } from "./_spec.ts";
import type { Demand } from "./demand.ts";
import type { Symbol } from "./symbol.ts";

/**
 * A handle that stops a running subscription.
 *
 * Cancellables also support `using` blocks through `Symbol.dispose`.
 *
 * @example
 * ```ts
 * const cancellable = sink(value => console.log(value));
 * subject.subscribe(cancellable);
 *
 * cancellable.cancel(); // no more values
 * ```
 */
export interface Cancellable {
  /** Stops the subscription. Safe to call more than once. */
  cancel(): void;

  /** Same as `cancel()`; lets `using` clean up automatically. */
  [Symbol.dispose](): void;
}

/**
 * Callbacks and settings for `sink()`.
 *
 * @typeParam T - values received
 * @typeParam E - failure received
 */
export interface SinkOptions<T, E> {
  /** Called for every value. */
  next?(value: T): void;

  /**
   * Called once with the terminal signal. When missing, a failure is
   * reported to the host as an uncaught error.
   */
  complete?(completion: Completion<E>): void;

  /**
   * Demand requested as soon as the sink is started.
   *
   * @default Demand.unlimited
   */
  demand?: Demand;
}
