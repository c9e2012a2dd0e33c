// helpers/pipe.ts
// Composition utility for publisher operators

import type { UnaryFunction } from "./_types.ts";

/**
 * Pipe function with 8 overloads to compose up to 8 operators with proper
 * typing.
 *
 *
 * Takes a publisher and feeds it through each operator in turn, left to
 * right. Every operator receives the publisher the previous one returned.
 * Nothing is subscribed here: `pipe()` only assembles the pipeline, and
 * work starts when the result is subscribed to.
 *
 * @returns The publisher returned by the last operator, or `source` when no
 * operator is given
 *
 * @example
 * ```ts
 * const names = pipe(
 *   from(['foo-bar', '', 'fo', 'bar-foo']),
 *   compactValidate(z.string().min(1)),
 *   tryValidate(z.string().min(3, 'too short')),
 * );
 *
 * names.subscribe(sink({
 *   next: name => console.log(name),
 *   complete: c => console.log(c.kind),
 * }));
 * // 'foo-bar', then 'failure'
 * ```
 */

// Overload 0: No operator
export function pipe<A>(source: A): A;

// Overload 1: Single operator
export function pipe<A, B>(
  source: A,
  op1: UnaryFunction<A, B>
): B;

// Overload 2: Two operators
export function pipe<A, B, C>(
  source: A,
  op1: UnaryFunction<A, B>,
  op2: UnaryFunction<B, C>
): C;

// Overload 3: Three operators
export function pipe<A, B, C, D>(
  source: A,
  op1: UnaryFunction<A, B>,
  op2: UnaryFunction<B, C>,
  op3: UnaryFunction<C, D>
): D;

// Overload 4: Four operators
export function pipe<A, B, C, D, E>(
  source: A,
  op1: UnaryFunction<A, B>,
  op2: UnaryFunction<B, C>,
  op3: UnaryFunction<C, D>,
  op4: UnaryFunction<D, E>
): E;

// Overload 5: Five operators
export function pipe<A, B, C, D, E, F>(
  source: A,
  op1: UnaryFunction<A, B>,
  op2: UnaryFunction<B, C>,
  op3: UnaryFunction<C, D>,
  op4: UnaryFunction<D, E>,
  op5: UnaryFunction<E, F>
): F;

// Overload 6: Six operators
export function pipe<A, B, C, D, E, F, G>(
  source: A,
  op1: UnaryFunction<A, B>,
  op2: UnaryFunction<B, C>,
  op3: UnaryFunction<C, D>,
  op4: UnaryFunction<D, E>,
  op5: UnaryFunction<E, F>,
  op6: UnaryFunction<F, G>
): G;

// Overload 7: Seven operators
export function pipe<A, B, C, D, E, F, G, H>(
  source: A,
  op1: UnaryFunction<A, B>,
  op2: UnaryFunction<B, C>,
  op3: UnaryFunction<C, D>,
  op4: UnaryFunction<D, E>,
  op5: UnaryFunction<E, F>,
  op6: UnaryFunction<F, G>,
  op7: UnaryFunction<G, H>
): H;

// Overload 8: Eight operators
export function pipe<A, B, C, D, E, F, G, H, I>(
  source: A,
  op1: UnaryFunction<A, B>,
  op2: UnaryFunction<B, C>,
  op3: UnaryFunction<C, D>,
  op4: UnaryFunction<D, E>,
  op5: UnaryFunction<E, F>,
  op6: UnaryFunction<F, G>,
  op7: UnaryFunction<G, H>,
  op8: UnaryFunction<H, I>
): I;

// Implementation
export function pipe(source: unknown, ...operators: unknown[]): unknown {
  if (operators.length > 8) {
    throw new Error('pipe: Too many operators (maximum 8).');
  }

  return operators.reduce<unknown>((result, operator, index) => {
    if (!isOperator(operator)) {
      throw new TypeError(`pipe:operator[${index + 1}] must be a function`);
    }
    return operator(result);
  }, source);
}

function isOperator(value: unknown): value is UnaryFunction<unknown, unknown> {
  return typeof value === "function";
}
