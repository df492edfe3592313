import { describe, it, expect } from "vitest";
import {
	SchemataError,
	ValidationFailure,
	NullNotAllowedError,
	TypeMismatchError,
	OutOfBoundsError,
	UnknownAttributeError,
	UnexpectedKeywordError,
	formatBounds,
	isSchemataError,
	isValidationFailure,
	getErrorMessage,
	wrapError,
} from "../src/errors.js";

describe("SchemataError", () => {
	it("creates error with message and code", () => {
		const error = new SchemataError("Test message", "TEST_CODE");

		expect(error.message).toBe("Test message");
		expect(error.code).toBe("TEST_CODE");
		expect(error.name).toBe("SchemataError");
		expect(error.suggestion).toBeUndefined();
	});

	it("formats error without suggestion", () => {
		const error = new SchemataError("Test message", "CODE");

		expect(error.format()).toBe("SchemataError: Test message");
	});

	it("formats error with suggestion", () => {
		const error = new SchemataError("Test message", "CODE", { suggestion: "Try this" });

		expect(error.format()).toBe("SchemataError: Test message\n  Suggestion: Try this");
	});

	it("preserves cause", () => {
		const cause = new Error("root");
		const error = new SchemataError("wrapped", "CODE", { cause });

		expect(error.cause).toBe(cause);
	});
});

describe("validation failures", () => {
	it("NullNotAllowedError carries the field name", () => {
		const error = new NullNotAllowedError("age");

		expect(error).toBeInstanceOf(ValidationFailure);
		expect(error).toBeInstanceOf(SchemataError);
		expect(error.name).toBe("NullNotAllowedError");
		expect(error.code).toBe("NULL_NOT_ALLOWED");
		expect(error.field).toBe("age");
		expect(error.message).toBe('Field "age" cannot be null.');
		expect(error.format()).toBe(
			'NullNotAllowedError: Field "age" cannot be null.\n  Suggestion: Provide a value for "age" or declare the field as nullable',
		);
	});

	it("TypeMismatchError carries expected and actual types", () => {
		const error = new TypeMismatchError("name", "string", "integer");

		expect(error.code).toBe("TYPE_MISMATCH");
		expect(error.field).toBe("name");
		expect(error.expected).toBe("string");
		expect(error.actual).toBe("integer");
		expect(error.message).toBe('Field "name" expects string, got integer.');
	});

	it("OutOfBoundsError carries the value and bounds", () => {
		const error = new OutOfBoundsError("age", 200, [0, 150]);

		expect(error.code).toBe("OUT_OF_BOUNDS");
		expect(error.value).toBe(200);
		expect(error.bounds).toEqual([0, 150]);
		expect(error.message).toBe('Field "age" value 200 is outside [0, 150].');
	});

	it("UnknownAttributeError names the attribute and model", () => {
		const error = new UnknownAttributeError("extra", "Person");

		expect(error.code).toBe("UNKNOWN_ATTRIBUTE");
		expect(error.field).toBe("extra");
		expect(error.message).toBe('Unknown attribute "extra" on Person.');
	});

	it("UnknownAttributeError works without a model name", () => {
		expect(new UnknownAttributeError("extra").message).toBe('Unknown attribute "extra".');
	});

	it("UnexpectedKeywordError names the keyword", () => {
		const error = new UnexpectedKeywordError("nam", "Person");

		expect(error.code).toBe("UNEXPECTED_KEYWORD");
		expect(error.field).toBe("nam");
		expect(error.message).toBe('"nam" is an invalid keyword argument for Person.');
		expect(new UnexpectedKeywordError("nam").message).toBe('"nam" is an invalid keyword argument.');
	});
});

describe("formatBounds", () => {
	it("formats closed bounds", () => {
		expect(formatBounds([0, 10])).toBe("[0, 10]");
	});

	it("formats open sides", () => {
		expect(formatBounds([null, 10])).toBe("(-∞, 10]");
		expect(formatBounds([0, null])).toBe("[0, ∞)");
	});

	it("formats bigint bounds", () => {
		expect(formatBounds([1n, 2n])).toBe("[1, 2]");
	});
});

describe("isSchemataError", () => {
	it("returns true for schemata errors", () => {
		expect(isSchemataError(new SchemataError("x", "CODE"))).toBe(true);
		expect(isSchemataError(new NullNotAllowedError("x"))).toBe(true);
	});

	it("returns false for other values", () => {
		expect(isSchemataError(new Error("x"))).toBe(false);
		expect(isSchemataError("x")).toBe(false);
	});
});

describe("isValidationFailure", () => {
	it("distinguishes validation failures from other schemata errors", () => {
		expect(isValidationFailure(new TypeMismatchError("a", "string", "integer"))).toBe(true);
		expect(isValidationFailure(new SchemataError("x", "CODE"))).toBe(false);
	});
});

describe("getErrorMessage", () => {
	it("reads messages of errors and stringifies anything else", () => {
		expect(getErrorMessage(new Error("boom"))).toBe("boom");
		expect(getErrorMessage("plain")).toBe("plain");
		expect(getErrorMessage(42)).toBe("42");
	});
});

describe("wrapError", () => {
	it("returns schemata errors unchanged", () => {
		const original = new UnknownAttributeError("extra");

		expect(wrapError(original)).toBe(original);
	});

	it("wraps other errors with context", () => {
		const cause = new Error("boom");
		const wrapped = wrapError(cause, "Loading models");

		expect(wrapped.message).toBe("Loading models: boom");
		expect(wrapped.code).toBe("UNKNOWN_ERROR");
		expect(wrapped.cause).toBe(cause);
	});

	it("wraps non-error values", () => {
		expect(wrapError("bad").message).toBe("bad");
	});
});
