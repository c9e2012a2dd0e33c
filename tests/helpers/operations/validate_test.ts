/**
 * Tests for the validate(), tryValidate() and compactValidate() operators
 *
 * This suite runs each operator against real sources and covers:
 * - Every validator form: schema, factory, name + closure, `Validatable`
 * - Independent state per subscription
 * - Failure descriptions and upstream failures passing through
 * - Bounded demand
 * - Publisher tags and properties
 */
import { test, expect } from "vitest";
import { z } from "zod";

import type { Publisher } from "../../../_spec.ts";
import type { ValidateOperator } from "../../../helpers/operations/validate.ts";

import { ValidationError } from "../../../error.ts";
import { compactValidate, tryValidate, validate } from "../../../helpers/operations/validate.ts";
import { from, just } from "../../../publisher.ts";
import { PassthroughSubject } from "../../../subject.ts";
import { Validator } from "../../../validator.ts";
import { Recorder } from "../../_utils/recorder.ts";

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
// validate()
// -----------------------------------------------------------------------------

test("validate emits undefined for the first invalid value and then only completion", () => {
  const recorder = new Recorder<string | undefined>();
  validate(username)(from(["foo-bar", "fo", "bar-foo"])).subscribe(recorder);

  expect(recorder.signals).toEqual([
    { type: "start" },
    { type: "next", value: "foo-bar" },
    { type: "next", value: undefined },
    { type: "complete", completion: { kind: "finished" } },
  ]);
});

test("validate with a name and a closure", () => {
  const recorder = new Recorder<string | undefined>();
  validate("foo-bar only", (s: string) => s === "foo-bar" ? s : null)(just("foo")).subscribe(recorder);

  expect(recorder.values).toEqual([undefined]);
  expect(recorder.completions).toEqual([{ kind: "finished" }]);
});

test("closure-built operators take a publisher of the closure's parameter type", () => {
  const source: Publisher<string> = from(["foo-bar", "foo", "bar-foo"]);
  const fooBarOnly = (s: string) => s === "foo-bar" ? s : null;

  const nullable = new Recorder<string | undefined>();
  const operator: ValidateOperator<string> = validate("foo-bar only", fooBarOnly);
  operator(source).subscribe(nullable);
  expect(nullable.values).toEqual(["foo-bar", undefined]);

  const compact = new Recorder<string>();
  compactValidate("foo-bar only", fooBarOnly)(source).subscribe(compact);
  expect(compact.values).toEqual(["foo-bar"]);
});

test("validate keeps separate state per subscription", () => {
  const names = validate(username)(from(["fo", "foo-bar"]));
  const first = new Recorder<string | undefined>();
  const second = new Recorder<string | undefined>();

  names.subscribe(first);
  names.subscribe(second);
  expect(first.values).toEqual([undefined]);
  expect(second.values).toEqual([undefined]);
  expect(second.completions).toEqual([{ kind: "finished" }]);
});

test("validate accepts a validator factory", () => {
  const recorder = new Recorder<string | undefined>();
  validate(() => Validator.schema(username))(just("foo-bar")).subscribe(recorder);
  expect(recorder.values).toEqual(["foo-bar"]);
});

// -----------------------------------------------------------------------------
// tryValidate()
// -----------------------------------------------------------------------------

test("tryValidate fails the stream with the validator's description", () => {
  const recorder = new Recorder<string, ValidationError>();
  tryValidate(username)(from(["foo-bar", "fo", "bar-foo"])).subscribe(recorder);

  expect(recorder.values).toEqual(["foo-bar"]);
  expect(recorder.completions).toHaveLength(1);

  const [completion] = recorder.completions;
  expect(completion.kind).toBe("failure");
  if (completion.kind === "failure") {
    expect(completion.error).toBeInstanceOf(ValidationError);
    expect(completion.error.message).toBe("must be at least 3 characters");
  }
});

test("tryValidate with a name and a throwing closure", () => {
  const recorder = new Recorder<string, ValidationError>();
  tryValidate("foo-bar only", (s: string) => {
    if (s !== "foo-bar") throw new Error("only foo-bar is allowed");
  })(just("foo")).subscribe(recorder);

  expect(recorder.values).toEqual([]);
  const [completion] = recorder.completions;
  expect(completion.kind === "failure" && completion.error.message).toBe("only foo-bar is allowed");
});

test("tryValidate passes values that validate themselves, by reference", () => {
  const valid = new Username("foo-bar");
  const invalid = new Username("fo");
  const recorder = new Recorder<Username, ValidationError>();
  tryValidate<Username>()(from([valid, invalid])).subscribe(recorder);

  expect(recorder.values).toHaveLength(1);
  expect(recorder.values[0]).toBe(valid);
  const [completion] = recorder.completions;
  expect(completion.kind === "failure" && completion.error.message).toBe("fo is too short");
});

test("tryValidate completes a single value under bounded demand", () => {
  const recorder = new Recorder<string, ValidationError>({ initial: 1 });
  tryValidate(username)(just("foo-bar")).subscribe(recorder);

  expect(recorder.values).toEqual(["foo-bar"]);
  expect(recorder.completions).toEqual([{ kind: "finished" }]);
});

test("tryValidate forwards an upstream failure untouched", () => {
  const upstream = new PassthroughSubject<string, Error>();
  const recorder = new Recorder<string, Error | ValidationError>();
  tryValidate(username)(upstream).subscribe(recorder);

  const error = new Error("upstream broke");
  upstream.send("foo-bar");
  upstream.complete({ kind: "failure", error });

  expect(recorder.values).toEqual(["foo-bar"]);
  expect(recorder.completions).toEqual([{ kind: "failure", error }]);
  const [completion] = recorder.completions;
  expect(completion.kind === "failure" && completion.error).toBe(error);
});

// -----------------------------------------------------------------------------
// compactValidate()
// -----------------------------------------------------------------------------

test("compactValidate drops invalid values", () => {
  const recorder = new Recorder<string>();
  compactValidate(username)(from(["foo-bar", "", "fo", "bar-foo"])).subscribe(recorder);

  expect(recorder.values).toEqual(["foo-bar", "bar-foo"]);
  expect(recorder.completions).toEqual([{ kind: "finished" }]);
});

test("compactValidate does not replace demand spent on dropped values", () => {
  const recorder = new Recorder<string>({ initial: 1 });
  compactValidate(username)(from(["fo", "foo-bar"])).subscribe(recorder);
  expect(recorder.values).toEqual([]);

  recorder.request(1);
  expect(recorder.values).toEqual(["foo-bar"]);
  expect(recorder.completions).toEqual([{ kind: "finished" }]);
});

test("compactValidate with a Validatable type", () => {
  const recorder = new Recorder<Username>();
  compactValidate<Username>()(from([new Username("fo"), new Username("foo-bar")])).subscribe(recorder);
  expect(recorder.values.map((value) => value.name)).toEqual(["foo-bar"]);
});

// -----------------------------------------------------------------------------
// Publishers
// -----------------------------------------------------------------------------

test("validation publishers are tagged with their policy", () => {
  const source = just("foo-bar");
  expect(Object.prototype.toString.call(validate(username)(source))).toBe("[object ValidatePublisher]");
  expect(Object.prototype.toString.call(tryValidate(username)(source))).toBe("[object TryValidatePublisher]");
  expect(Object.prototype.toString.call(compactValidate(username)(source))).toBe("[object CompactValidatePublisher]");
});

test("validation publishers expose their upstream and validator", () => {
  const source = just("foo-bar");
  const validator = Validator.schema(username);
  const publisher = validate(validator)(source);
  expect(publisher.upstream).toBe(source);
  expect(publisher.validator).toBe(validator);
  expect(publisher.policy.kind).toBe("validate");
});
