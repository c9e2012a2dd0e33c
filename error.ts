// @filename: error.ts
/**
 * Error types used by the validation operators.
 *
 * There are exactly two:
 *
 * - {@link ValidationError} is the one shape every rejected value is turned
 *   into, whatever the validator originally threw. It keeps the description
 *   and nothing else.
 * - {@link AlreadyTerminatedError} tells the operators that a subscription
 *   was already cancelled or completed when a value arrived. It never leaves
 *   the library; the operators turn it into "no demand".
 *
 * @module
 */

const FALLBACK_DESCRIPTION = "Validation failed.";

/**
 * The normalized failure of a validation.
 *
 *
 * Validators may throw anything: a zod issue list, a plain `Error`, a
 * string. Whatever it was, by the time it reaches a subscriber it is a
 * `ValidationError` whose `message` is the human-readable reason. The
 * original error and its metadata are dropped.
 *
 * @example
 * ```ts
 * const err = ValidationError.from(new TypeError('name must not be empty'));
 * err.message;     // 'name must not be empty'
 * err.description; // 'name must not be empty'
 * err instanceof TypeError; // false
 * ```
 */
export class ValidationError extends Error {
  constructor(description: string) {
    super(description.length > 0 ? description : FALLBACK_DESCRIPTION);
    this.name = "ValidationError";
  }

  /** The human-readable reason the value was rejected. */
  get description(): string {
    return this.message;
  }

  /**
   * Normalizes any thrown value into a `ValidationError`.
   *
   * An existing `ValidationError` is returned as is. An `Error` contributes
   * its `message`; any other value is stringified.
   */
  static from(error: unknown): ValidationError {
    if (error instanceof ValidationError) return error;
    return new ValidationError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Returns `true` if `value` is a {@link ValidationError}.
 */
export function isValidationError(value: unknown): value is ValidationError {
  return value instanceof ValidationError;
}

/**
 * Raised when a value reaches a subscription that has already been
 * cancelled, completed, or retired.
 *
 * @internal
 */
export class AlreadyTerminatedError extends Error {
  constructor() {
    super("Subscription has already terminated");
    this.name = "AlreadyTerminatedError";
  }
}
