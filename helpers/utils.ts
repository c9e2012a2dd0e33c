/**
 * Reports an error to the host the way an uncaught exception would be,
 * without interrupting the current call stack.
 *
 * Used where a user callback throws and there is no one left in the
 * pipeline to hand the error to.
 */
export function reportError(err: unknown): void {
  queueMicrotask(() => { throw err; });
}
