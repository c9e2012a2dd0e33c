// A function of one argument; the building block `pipe()` composes.
export interface UnaryFunction<T, R> {
  (source: T): R;
}
