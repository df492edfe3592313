/**
 * @title Value Types Module
 * @description Runtime classification of loosely-typed values.
 *
 * Type descriptors are what a field checks a value against; `describeValue`
 * names the shape that was actually found, for error messages.
 *
 * @module types
 */

import _ from "lodash";

/**
 * A named runtime type test.
 */
export interface TypeDescriptor<T = unknown> {
	/** Name used in error messages (e.g. "string", "list"). */
	readonly name: string;
	/** Whether the value belongs to this type. */
	matches(value: unknown): value is T;
}

/** A key/value mapping accepted by dict fields. */
export type Mapping = Readonly<Record<string, unknown>> | ReadonlyMap<unknown, unknown>;

/**
 * The null representation: both null and undefined.
 */
export function isNull(value: unknown): value is null | undefined {
	return value === null || value === undefined;
}

/**
 * Whether the value is a plain object (created by `{}`, `Object.create(null)` or JSON).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return _.isPlainObject(value);
}

export const STRING_TYPE: TypeDescriptor<string> = {
	name: "string",
	matches: (value): value is string => typeof value === "string",
};

export const NUMBER_TYPE: TypeDescriptor<number> = {
	name: "number",
	matches: (value): value is number => typeof value === "number",
};

export const INTEGER_TYPE: TypeDescriptor<number> = {
	name: "integer",
	matches: (value): value is number => typeof value === "number" && Number.isInteger(value),
};

export const BIGINT_TYPE: TypeDescriptor<bigint> = {
	name: "bigint",
	matches: (value): value is bigint => typeof value === "bigint",
};

export const BOOLEAN_TYPE: TypeDescriptor<boolean> = {
	name: "boolean",
	matches: (value): value is boolean => typeof value === "boolean",
};

export const LIST_TYPE: TypeDescriptor<readonly unknown[]> = {
	name: "list",
	matches: (value): value is readonly unknown[] => Array.isArray(value),
};

export const DICT_TYPE: TypeDescriptor<Mapping> = {
	name: "dict",
	matches: (value): value is Mapping => value instanceof Map || isRecord(value),
};

/**
 * Iterate the entries of a mapping in insertion order.
 */
export function mappingEntries(mapping: Mapping): Array<[unknown, unknown]> {
	return mapping instanceof Map ? [...mapping.entries()] : Object.entries(mapping);
}

/**
 * Describe accepted types, e.g. `"number | bigint | boolean"`.
 */
export function formatTypes(types: readonly TypeDescriptor[]): string {
	return types.map((t) => t.name).join(" | ");
}

/**
 * Name of the model class a value was created from, if it was created from one.
 */
function modelNameOf(value: object): string | undefined {
	const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
	if (typeof ctor === "function" && "modelName" in ctor && typeof ctor.modelName === "string") {
		return ctor.modelName;
	}
	return undefined;
}

/**
 * Describe the runtime shape of a value.
 *
 * Numbers are split into "integer" and "float" so integral fields can report
 * what they rejected.
 */
export function describeValue(value: unknown): string {
	if (isNull(value)) {
		return "null";
	}
	if (typeof value === "number") {
		return Number.isInteger(value) ? "integer" : "float";
	}
	if (typeof value !== "object") {
		return typeof value;
	}
	if (Array.isArray(value)) {
		return "list";
	}
	if (value instanceof Map) {
		return "map";
	}
	if (isRecord(value)) {
		return "dict";
	}
	return modelNameOf(value) ?? (value.constructor?.name || "object");
}
