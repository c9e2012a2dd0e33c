// @filename: symbol.ts
/**
 * Extensions to the global Symbol constructor for deterministic cleanup of
 * subscriptions and cancellables.
 *
 *
 * `Symbol.dispose` is the well-known symbol behind TC39's `using`
 * declarations. Older runtimes ship without it, so we register it once on
 * the global `Symbol` and export a typed view of the constructor that always
 * carries it.
 *
 * @example
 * ```ts
 * import { Symbol } from './symbol.ts';
 *
 * const cancellable = sink(value => console.log(value));
 * cancellable[Symbol.dispose](); // same as cancellable.cancel()
 * ```
 *
 * @module
 */
export interface SymbolConstructor
  extends Omit<typeof globalThis.Symbol, "dispose"> {
  /**
   * Well-known symbol for synchronous resource disposal.
   *
   * Objects with a `[Symbol.dispose]()` method release their resources when
   * a `using` block exits.
   */
  readonly dispose: unique symbol;
}

/**
 * The global `Symbol` constructor, typed to include `Symbol.dispose`.
 */
export const Symbol: SymbolConstructor = globalThis.Symbol as unknown as SymbolConstructor;

if (typeof Symbol.dispose !== "symbol") {
  Reflect.defineProperty(Symbol, "dispose", {
    value: globalThis.Symbol("Symbol.dispose"),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}
