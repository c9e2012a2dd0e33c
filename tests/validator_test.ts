/**
 * Tests for validators and their errors
 *
 * ## ValidationError
 * - Normalization of thrown values with `ValidationError.from()`
 * - Empty descriptions and the `isValidationError` guard
 *
 * ## Validator forms
 * - zod schemas, single and joined issue messages
 * - Name + closure validators and their descriptions
 * - Self-validating values and values that cannot validate themselves
 *
 * ## Argument resolution and check()
 * - Validators, factories and schemas resolved to one `Validator`
 * - Accepted values keep their identity
 */
import { test, expect, vi } from "vitest";
import { z } from "zod";

import { isValidationError, ValidationError } from "../error.ts";
import { check } from "../outcome.ts";
import {
  isValidatable,
  resolveCompact,
  resolveThrowing,
  toValidator,
  Validator,
} from "../validator.ts";

const username = z.string()
  .min(1, "must not be empty")
  .min(3, "must be at least 3 characters");

class Username {
  constructor(readonly name: string) {}

  validate(): void {
    if (this.name.length < 3) throw new ValidationError(`${this.name} is too short`);
  }
}

// -----------------------------------------------------------------------------
// ValidationError
// -----------------------------------------------------------------------------

test("ValidationError.from keeps the message of an Error", () => {
  const err = ValidationError.from(new TypeError("name must not be empty"));
  expect(err).toBeInstanceOf(ValidationError);
  expect(err).not.toBeInstanceOf(TypeError);
  expect(err.name).toBe("ValidationError");
  expect(err.description).toBe("name must not be empty");
});

test("ValidationError.from stringifies anything else", () => {
  expect(ValidationError.from("boom").message).toBe("boom");
  expect(ValidationError.from(42).message).toBe("42");
});

test("ValidationError.from returns an existing ValidationError as is", () => {
  const err = new ValidationError("already normalized");
  expect(ValidationError.from(err)).toBe(err);
});

test("ValidationError falls back to a generic description when empty", () => {
  expect(new ValidationError("").message).toBe("Validation failed.");
  expect(ValidationError.from(new Error("")).description).toBe("Validation failed.");
});

test("isValidationError narrows", () => {
  expect(isValidationError(new ValidationError("x"))).toBe(true);
  expect(isValidationError(new Error("x"))).toBe(false);
  expect(isValidationError("x")).toBe(false);
});

// -----------------------------------------------------------------------------
// Validator forms
// -----------------------------------------------------------------------------

test("Validator.schema accepts values the schema accepts", () => {
  const validator = Validator.schema(username);
  expect(() => validator.validate("foo-bar")).not.toThrow();
});

test("Validator.schema reports the failing issue message", () => {
  const validator = Validator.schema(username);
  expect(() => validator.validate("fo")).toThrow(ValidationError);
  expect(() => validator.validate("fo")).toThrow("must be at least 3 characters");
});

test("Validator.schema joins several issue messages", () => {
  const outcome = check(Validator.schema(username), "");
  expect(outcome.valid).toBe(false);
  if (!outcome.valid) {
    expect(outcome.error.message).toBe("must not be empty; must be at least 3 characters");
  }
});

test("Validator.compact describes a rejection with its name", () => {
  const fooBar: Validator<string> = Validator.compact("foo-bar only", (s: string) => s === "foo-bar" ? s : null);
  expect(() => fooBar.validate("foo-bar")).not.toThrow();
  expect(() => fooBar.validate("foo")).toThrow("foo-bar only invalid.");
});

test("Validator.compact accepts any non-nil result", () => {
  const nonEmpty = Validator.compact("non-empty", (s: string) => s.length > 0 ? s.length : null);
  expect(() => nonEmpty.validate("foo")).not.toThrow();
  expect(() => nonEmpty.validate("")).toThrow("non-empty invalid.");
});

test("Validator.valid delegates to the value", () => {
  const validator = Validator.valid<Username>();
  expect(validator.name).toBe("valid");
  expect(() => validator.validate(new Username("foo-bar"))).not.toThrow();
  expect(() => validator.validate(new Username("fo"))).toThrow("fo is too short");
});

test("the self validator rejects values without validate()", () => {
  const validator = resolveCompact<number>();
  expect(() => validator.validate(42)).toThrow("42 is not validatable.");
});

test("isValidatable", () => {
  expect(isValidatable(new Username("foo"))).toBe(true);
  expect(isValidatable({ validate: "nope" })).toBe(false);
  expect(isValidatable(null)).toBe(false);
});

test("Validator string forms", () => {
  const validator = new Validator<number>("even", (n) => {
    if (n % 2 !== 0) throw new Error(`${n} is odd`);
  });
  expect(String(validator)).toBe("Validator(even)");
  expect(Object.prototype.toString.call(validator)).toBe("[object Validator]");
  expect(String(Validator.schema(username))).toBe("Validator(schema)");
  expect(String(Validator.schema(username, "username"))).toBe("Validator(username)");
});

// -----------------------------------------------------------------------------
// Argument resolution
// -----------------------------------------------------------------------------

test("toValidator passes validators through and calls factories once", () => {
  const validator = Validator.schema(username);
  expect(toValidator(validator)).toBe(validator);

  const factory = vi.fn(() => validator);
  expect(toValidator(factory)).toBe(validator);
  expect(factory).toHaveBeenCalledTimes(1);
});

test("toValidator wraps a zod schema", () => {
  const validator = toValidator(username);
  expect(validator.name).toBe("schema");
  expect(() => validator.validate("fo")).toThrow("must be at least 3 characters");
});

test("resolveCompact needs a closure with a name", () => {
  expect(() => resolveCompact<string>("foo-bar only")).toThrow(TypeError);
  expect(() => resolveCompact<string>("foo-bar only")).toThrow('Missing closure for validator "foo-bar only"');
});

test("resolveThrowing builds a validator from a throwing closure", () => {
  const validator = resolveThrowing("foo-bar only", (s: string) => {
    if (s !== "foo-bar") throw new Error("only foo-bar is allowed");
  });
  expect(validator.name).toBe("foo-bar only");
  expect(() => validator.validate("foo")).toThrow("only foo-bar is allowed");
});

// -----------------------------------------------------------------------------
// check()
// -----------------------------------------------------------------------------

test("check carries accepted values through untouched", () => {
  const value = new Username("foo-bar");
  const outcome = check(Validator.valid<Username>(), value);
  expect(outcome.valid).toBe(true);
  if (outcome.valid) expect(outcome.value).toBe(value);
});

test("check normalizes whatever the validator throws", () => {
  const validator = new Validator<string>("throws a string", () => {
    throw "not an error";
  });
  const outcome = check(validator, "foo");
  expect(outcome.valid).toBe(false);
  if (!outcome.valid) {
    expect(outcome.error).toBeInstanceOf(ValidationError);
    expect(outcome.error.message).toBe("not an error");
  }
});
