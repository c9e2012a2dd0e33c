// @filename: helpers/mod.ts
/**
 * Validation operators and pipeline composition.
 *
 * @module
 *
 *
 * Operators are plain functions from one publisher to another. `pipe()`
 * strings them together; nothing runs until the resulting publisher is
 * subscribed to.
 *
 * ## Basic Usage
 *
 * @example
 * ```ts
 * import { z } from "zod";
 * import { pipe, compactValidate, tryValidate } from "./helpers/mod.ts";
 * import { from } from "./publisher.ts";
 * import { sink } from "./subscriber.ts";
 *
 * const usernames = pipe(
 *   from(["foo-bar", "", "fo", "bar-foo"]),
 *   compactValidate(z.string().min(1)),              // drop empty strings
 *   tryValidate(z.string().min(3, "too short")),     // fail on short ones
 * );
 *
 * usernames.subscribe(sink({
 *   next: name => console.log(name),
 *   complete: c => console.log(c.kind === "failure" ? c.error.message : "done"),
 * }));
 * // foo-bar
 * // too short
 * ```
 *
 * ## Policies
 *
 * Every validation operator is a {@link ValidationPublisher} with one of
 * three policies. The policies can also be used directly to build custom
 * operators:
 *
 * ```ts
 * const strict = <T, E>(source: Publisher<T, E>) =>
 *   new ValidationPublisher(source, myValidator, propagateErrors<T, E>());
 * ```
 */
export type * from "./_types.ts";

export * from "./operations/validate.ts";
export * from "./operators.ts";
export * from "./pipe.ts";
export * from "./policies.ts";
export * from "./utils.ts";
