// @filename: helpers/policies.ts
/**
 * Forwarding policies for {@link ValidationSubscription}.
 *
 * A policy is a tagged value with one job: given a value that just arrived
 * from upstream, decide what the downstream sees and how much more demand
 * to report upstream. The subscription owns the state; policies only read
 * it and use its narrow mutation API (`retire()`, `cancel()`).
 *
 * | Policy            | Valid value         | Invalid value                        |
 * |-------------------|---------------------|--------------------------------------|
 * | `validate`        | forwarded           | `undefined` forwarded, then retired  |
 * | `tryValidate`     | forwarded (non-nil) | failure completion, then torn down   |
 * | `compactValidate` | forwarded           | dropped                              |
 *
 * @module
 */
import type { ValidationError } from "../error.ts";
import type { Evaluation } from "../outcome.ts";
import type { ValidationSubscription } from "../subscription.ts";

import { Demand } from "../demand.ts";
import { AlreadyTerminatedError } from "../error.ts";
import { check, evaluate } from "../outcome.ts";

export type PolicyKind = "validate" | "tryValidate" | "compactValidate";

/**
 * How a {@link ValidationSubscription} turns a verdict into a forwarding
 * decision.
 *
 * @typeParam T - values received from upstream
 * @typeParam Out - values sent downstream
 * @typeParam E - upstream failure
 * @typeParam X - failure introduced by the policy
 */
export interface Policy<T, Out, E, X = never> {
  readonly kind: PolicyKind;

  /** Display name, used as the subscription's `Symbol.toStringTag`. */
  readonly name: string;

  /** Handles one upstream value and returns the additional demand. */
  receive(subscription: ValidationSubscription<T, Out, E, X>, value: T): Demand;
}

/**
 * Evaluates a value, turning {@link AlreadyTerminatedError} into `null` so
 * callers can answer with zero demand.
 */
function tryEvaluate<T, Out, E, X>(
  subscription: ValidationSubscription<T, Out, E, X>,
  value: T,
): Evaluation<T, Out, E | X> | null {
  try {
    return evaluate(subscription, value);
  } catch (err) {
    if (err instanceof AlreadyTerminatedError) return null;
    throw err;
  }
}

/**
 * Nullable-pass: valid values go through, the first invalid one becomes
 * `undefined` and retires the validator. The stream itself never fails.
 */
export function nullablePass<T, E>(): Policy<T, T | undefined, E> {
  return {
    kind: "validate",
    name: "Validate",
    receive(subscription, value) {
      const evaluation = tryEvaluate(subscription, value);
      if (!evaluation) return Demand.none;

      const { downstream, outcome } = evaluation;
      if (outcome.valid) return downstream.next(outcome.value);

      subscription.retire();
      downstream.next(undefined);
      return Demand.none;
    },
  };
}

/**
 * Error-propagating: valid values go through, `null` and `undefined` are
 * skipped, and the first invalid value ends the stream with a
 * {@link ValidationError}.
 */
export function propagateErrors<T, E>(): Policy<T, NonNullable<T>, E, ValidationError> {
  return {
    kind: "tryValidate",
    name: "TryValidate",
    receive(subscription, value) {
      const evaluation = tryEvaluate(subscription, value);
      if (!evaluation) return Demand.none;

      const { downstream, outcome } = evaluation;
      if (outcome.valid) {
        const present = outcome.value;
        if (present === null || present === undefined) return Demand.none;
        return downstream.next(present);
      }

      subscription.cancel();
      downstream.complete({ kind: "failure", error: outcome.error });
      return Demand.none;
    },
  };
}

/**
 * Filtering: valid values go through, invalid ones disappear. The consumed
 * element is not re-requested; a subscriber with bounded demand asks again
 * itself.
 */
export function filterInvalid<T, E>(): Policy<T, T, E> {
  return {
    kind: "compactValidate",
    name: "CompactValidate",
    receive(subscription, value) {
      const { downstream, validator } = subscription;
      if (subscription.isComplete || !downstream || !validator) return Demand.none;

      const outcome = check(validator, value);
      return outcome.valid ? downstream.next(outcome.value) : Demand.none;
    },
  };
}
