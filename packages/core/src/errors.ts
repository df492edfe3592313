/**
 * @title Errors
 * @description Error types for @schemata/core.
 *
 * Every validation problem is reported as a {@link ValidationFailure}
 * subclass carrying the name of the field whose rule was violated.
 *
 * @module errors
 */

/**
 * Options for constructing a SchemataError.
 */
export interface SchemataErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all schemata errors.
 */
export class SchemataError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: SchemataErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "SchemataError";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * Codes of the validation failure family.
 */
export type ValidationFailureCode =
	| "NULL_NOT_ALLOWED"
	| "TYPE_MISMATCH"
	| "OUT_OF_BOUNDS"
	| "UNKNOWN_ATTRIBUTE"
	| "UNEXPECTED_KEYWORD";

/**
 * A value, an instance, or a construction call broke a schema rule.
 */
export class ValidationFailure extends SchemataError {
	declare readonly code: ValidationFailureCode;
	/** Name of the innermost field whose rule was violated. */
	readonly field: string;

	constructor(message: string, code: ValidationFailureCode, field: string, options?: SchemataErrorOptions) {
		super(message, code, options);
		this.name = "ValidationFailure";
		this.field = field;
	}
}

/**
 * A non-nullable field received null or undefined.
 */
export class NullNotAllowedError extends ValidationFailure {
	constructor(field: string) {
		super(`Field "${field}" cannot be null.`, "NULL_NOT_ALLOWED", field, {
			suggestion: `Provide a value for "${field}" or declare the field as nullable`,
		});
		this.name = "NullNotAllowedError";
	}
}

/**
 * The runtime shape of a value does not match the field's expected types.
 */
export class TypeMismatchError extends ValidationFailure {
	/** Description of the accepted type(s). */
	readonly expected: string;
	/** Description of the type that was found. */
	readonly actual: string;

	constructor(field: string, expected: string, actual: string) {
		super(`Field "${field}" expects ${expected}, got ${actual}.`, "TYPE_MISMATCH", field);
		this.name = "TypeMismatchError";
		this.expected = expected;
		this.actual = actual;
	}
}

/**
 * Inclusive numeric bounds; a missing side is unbounded.
 */
export type Bounds = readonly [lower: number | bigint | null, upper: number | bigint | null];

/**
 * Format bounds as an inclusive interval, e.g. `[0, ∞)`.
 */
export function formatBounds(bounds: Bounds): string {
	const [lower, upper] = bounds;
	const left = lower === null ? "(-∞" : `[${lower}`;
	const right = upper === null ? "∞)" : `${upper}]`;
	return `${left}, ${right}`;
}

/**
 * A numeric value lies outside the field's inclusive bounds.
 */
export class OutOfBoundsError extends ValidationFailure {
	/** The offending value. */
	readonly value: number | bigint | boolean;
	/** The configured bounds. */
	readonly bounds: Bounds;

	constructor(field: string, value: number | bigint | boolean, bounds: Bounds) {
		super(`Field "${field}" value ${String(value)} is outside ${formatBounds(bounds)}.`, "OUT_OF_BOUNDS", field);
		this.name = "OutOfBoundsError";
		this.value = value;
		this.bounds = bounds;
	}
}

/**
 * An instance carries an attribute that its schema does not declare.
 */
export class UnknownAttributeError extends ValidationFailure {
	constructor(attribute: string, modelName?: string) {
		super(
			modelName ? `Unknown attribute "${attribute}" on ${modelName}.` : `Unknown attribute "${attribute}".`,
			"UNKNOWN_ATTRIBUTE",
			attribute,
			{ suggestion: "Remove the attribute or validate with allowUnknownData enabled" },
		);
		this.name = "UnknownAttributeError";
	}
}

/**
 * A model was constructed with a keyword its schema does not declare.
 */
export class UnexpectedKeywordError extends ValidationFailure {
	constructor(keyword: string, modelName?: string) {
		super(
			modelName
				? `"${keyword}" is an invalid keyword argument for ${modelName}.`
				: `"${keyword}" is an invalid keyword argument.`,
			"UNEXPECTED_KEYWORD",
			keyword,
			{ suggestion: "Use fromMapping() to import data that may carry unknown attributes" },
		);
		this.name = "UnexpectedKeywordError";
	}
}

/**
 * Check if an error is a SchemataError.
 */
export function isSchemataError(error: unknown): error is SchemataError {
	return error instanceof SchemataError;
}

/**
 * Check if an error belongs to the validation failure family.
 */
export function isValidationFailure(error: unknown): error is ValidationFailure {
	return error instanceof ValidationFailure;
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as a SchemataError.
 */
export function wrapError(error: unknown, context?: string): SchemataError {
	if (isSchemataError(error)) {
		return error;
	}

	const contextPrefix = context ? `${context}: ` : "";

	return new SchemataError(`${contextPrefix}${getErrorMessage(error)}`, "UNKNOWN_ERROR", { cause: error });
}
