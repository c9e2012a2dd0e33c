/**
 * Per-element validation for push/demand streams.
 *
 * A stream in this library is a **publisher** that pushes values to a
 * **subscriber**, but only as many as the subscriber asked for. The
 * subscriber regulates the flow through a **subscription**: `request(n)` for
 * more, `cancel()` to stop. One terminal signal, finished or failed, ends
 * it all.
 *
 * This package slots validation into that flow. Every value is checked as it
 * passes, and you choose what an invalid value turns into.
 *
 * ## Why This Exists
 *
 * Checking values in a callback is easy. Checking them *inside* a stream,
 * without breaking the stream's rules, is not:
 *
 * ```ts
 * // The ad-hoc way 😫
 * source.subscribe({
 *   start: s => s.request(Infinity),
 *   next(value) {
 *     try {
 *       schema.parse(value);
 *       handle(value);
 *     } catch (err) {
 *       // Stop the stream? Skip the value? Tell the consumer?
 *       // And who cancels the upstream?
 *     }
 *     return 0;
 *   },
 *   complete() {},
 * });
 * ```
 *
 * With the operators, each of those answers is one function call:
 *
 * ```ts
 * // The operator way ✨
 * import { z } from 'zod';
 * import { pipe, tryValidate, sink } from './mod.ts';
 *
 * pipe(source, tryValidate(z.string().min(1).min(3)))
 *   .subscribe(sink({
 *     next: value => handle(value),
 *     complete: c => c.kind === 'failure' && report(c.error.message),
 *   }));
 * ```
 *
 * ## Choosing a Policy
 *
 * | You want invalid values to…              | Use                           |
 * |------------------------------------------|-------------------------------|
 * | show up as `undefined`                   | `validate()`                  |
 * | end the stream with a `ValidationError`  | `tryValidate()`               |
 * | disappear                                | `compactValidate()`           |
 *
 * And when there is no upstream at all:
 *
 * | You have…                               | Use                                  |
 * |-----------------------------------------|--------------------------------------|
 * | one value, want it or `undefined`        | `validated(value, validator)`        |
 * | one value, want it or a failure          | `tryValidated(value, validator)`     |
 * | values pushed in imperatively            | `new PassthroughValidatedSubject(…)` |
 *
 * @example Nullable-pass
 * ```ts
 * pipe(just('fo'), validate(z.string().min(3)))
 *   .subscribe(sink(v => console.log(v))); // undefined
 * ```
 *
 * @example Error-propagating
 * ```ts
 * pipe(from(['foo-bar', 'fo', 'bar-foo']), tryValidate(z.string().min(3, 'too short')))
 *   .subscribe(sink({
 *     next: v => console.log(v),             // 'foo-bar'
 *     complete: c => console.log(c.kind),    // 'failure'
 *   }));
 * ```
 *
 * @example Filtering
 * ```ts
 * pipe(from(['foo-bar', 'fo', 'bar-foo']), compactValidate(z.string().min(3)))
 *   .subscribe(sink(v => console.log(v))); // 'foo-bar', 'bar-foo'
 * ```
 *
 * ## Building Validators
 *
 * Anywhere a validator is expected you can pass:
 *
 * - a {@link Validator}: `new Validator<number>('even', n => { if (n % 2) throw new Error('odd'); })`
 * - a factory: `() => Validator.schema(z.string().email())`
 * - a zod schema: `z.string().min(3)`
 * - a name and a closure: `validate('foo-bar only', (s: string) => s === 'foo-bar' ? s : null)`
 * - nothing, when your values implement {@link Validatable}
 *
 * Whatever a validator throws, subscribers only ever see a
 * {@link ValidationError} carrying the description.
 *
 * ## Common Gotchas
 *
 * - `validate()` retires its validator after the first invalid value: later
 *   values are swallowed, but the upstream's completion still arrives.
 * - `compactValidate()` does not re-request the values it drops. With a
 *   bounded demand, ask again yourself.
 * - `tryValidate()` skips `null` and `undefined` that pass the validator.
 * - Validation never changes a value. Zod transforms and defaults do not
 *   apply; the original value flows on.
 *
 * @module
 */
export * from "./demand.ts";
export * from "./error.ts";
export * from "./outcome.ts";
export * from "./publisher.ts";
export * from "./subject.ts";
export * from "./subscriber.ts";
export * from "./subscription.ts";
export * from "./symbol.ts";
export * from "./validated.ts";
export * from "./validator.ts";
export * from "./helpers/mod.ts";

export type * from "./_spec.ts";
export type * from "./_types.ts";
