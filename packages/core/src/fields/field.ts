/**
 * @title Field Base Module
 * @description The validation contract shared by every field kind.
 *
 * A field validates one value in three steps:
 * 1. kind-specific rules (bounds, elements, nested models), which only run on
 *    a non-null value of the expected type;
 * 2. the null rule;
 * 3. the type rule.
 *
 * @module fields
 */

import { NullNotAllowedError, TypeMismatchError } from "../errors.js";
import { describeValue, formatTypes, isNull, type TypeDescriptor } from "../types/value-type.js";

/** Name a field carries until a schema binds it. */
export const UNBOUND_FIELD_NAME = "<unbound>";

/** Discriminant of the built-in field kinds. */
export type FieldKind = "any" | "string" | "number" | "integer" | "list" | "dict" | "model";

/**
 * Options shared by every field.
 */
export interface FieldOptions {
	/** Whether null and undefined are valid values (default: false). */
	nullable?: boolean;
	/** Explicit name, useful for fields nested in containers. */
	name?: string;
}

/**
 * A reusable validation rule for one named slot of a model.
 *
 * @typeParam T - Type of the values the field accepts
 */
export abstract class Field<T = unknown> {
	/** Kind of the field. */
	abstract readonly kind: FieldKind;
	/** Name used in failure reports; bound to the schema key when declared on a model. */
	name: string;
	/** Whether null and undefined are valid values. */
	readonly nullable: boolean;
	/** Accepted runtime types, or null when any type is accepted. */
	readonly expectedTypes: readonly TypeDescriptor<T>[] | null;

	protected constructor(expectedTypes: readonly TypeDescriptor<T>[] | null, options: FieldOptions = {}) {
		this.name = options.name ?? UNBOUND_FIELD_NAME;
		this.nullable = options.nullable ?? false;
		this.expectedTypes = expectedTypes;
	}

	/**
	 * Kind-specific rules for a non-null value of the expected type.
	 */
	protected validateContent?(value: T): void;

	/**
	 * Bind the field to a name.
	 *
	 * @returns The field itself
	 */
	bind(name: string): this {
		this.name = name;
		return this;
	}

	/**
	 * Whether the field is bound to a name.
	 */
	get isBound(): boolean {
		return this.name !== UNBOUND_FIELD_NAME;
	}

	/**
	 * Whether a non-null value has one of the accepted types.
	 */
	accepts(value: unknown): value is T {
		return this.expectedTypes === null || this.expectedTypes.some((type) => type.matches(value));
	}

	/**
	 * Description of the accepted types, e.g. `"list"` or `"number | bigint | boolean"`.
	 */
	describeExpected(): string {
		return this.expectedTypes === null ? "any" : formatTypes(this.expectedTypes);
	}

	/**
	 * Validate a value.
	 *
	 * @param value - Value to check
	 * @throws ValidationFailure describing the first violated rule
	 */
	validate(value: unknown): void {
		if (!isNull(value) && this.accepts(value)) {
			this.validateContent?.(value);
		}

		if (isNull(value)) {
			if (!this.nullable) {
				throw new NullNotAllowedError(this.name);
			}
			return;
		}

		if (!this.accepts(value)) {
			throw new TypeMismatchError(this.name, this.describeExpected(), describeValue(value));
		}
	}
}

/**
 * A field without a type constraint; only the null rule applies.
 */
export class AnyField extends Field<unknown> {
	readonly kind = "any";

	constructor(options: FieldOptions = {}) {
		super(null, options);
	}
}
