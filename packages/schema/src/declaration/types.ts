/**
 * @title Declaration Types Module
 * @description Types for model declaration documents (YAML or JSON).
 *
 * A document declares models by name:
 *
 * ```yaml
 * models:
 *   Person:
 *     fields:
 *       name: { type: string }
 *       age: { type: integer, nullable: true, min: 0 }
 *   Employee:
 *     extends: [Person]
 *     allow-unknown-data: false
 *     fields:
 *       manager: { type: model, model: Employee, nullable: true }
 * ```
 *
 * Keys are accepted in kebab-case and camelCase.
 *
 * @module declaration
 */

import { isRecord, type FieldKind } from "@schemata/core";

/**
 * Declaration of a single field.
 */
export interface FieldDescriptor {
	/** Field kind. */
	type: FieldKind;
	/** Whether null is a valid value. */
	nullable?: boolean;
	/** Explicit name (for nested descriptors). */
	name?: string;
	/** Inclusive lower bound (number and integer fields). */
	min?: number | null;
	/** Inclusive upper bound (number and integer fields). */
	max?: number | null;
	/** Inclusive `[lower, upper]` bounds (number and integer fields). */
	bounds?: [number | null, number | null];
	/** Whether booleans count as numbers (number and integer fields). */
	acceptBooleans?: boolean;
	/** Element descriptor (list fields). */
	of?: FieldDescriptor;
	/** Key descriptor (dict fields). */
	ofKey?: FieldDescriptor;
	/** Value descriptor (dict fields). */
	ofValue?: FieldDescriptor;
	/** Name of the model (model fields). */
	model?: string;
}

/**
 * Declaration of a model.
 */
export interface ModelDescriptor {
	/** Names of the ancestor models, highest precedence first. */
	extends?: string[];
	/** Default unknown-attribute policy. */
	allowUnknownData?: boolean;
	/** Non-field declarations. */
	attributes?: Record<string, unknown>;
	/** Field declarations. */
	fields?: Record<string, FieldDescriptor>;
}

/**
 * A parsed declaration document.
 */
export interface DeclarationDocument {
	/** Declaration format URI. */
	$schema?: string;
	/** Model declarations by name, in document order. */
	models: Map<string, ModelDescriptor>;
}

/** Declaration format identifier of this version. */
export const DECLARATION_VERSION_URI = "urn:schemata:declaration:v1";

/** Declaration format identifiers this version can read. */
export const SUPPORTED_DECLARATION_VERSIONS: ReadonlySet<string> = new Set([DECLARATION_VERSION_URI]);

/** Allowed top-level keys of a declaration document. */
export const ALLOWED_TOP_LEVEL_KEYS: ReadonlySet<string> = new Set(["$schema", "models"]);

/** Allowed properties of a model declaration (both camelCase and kebab-case). */
export const ALLOWED_MODEL_PROPERTIES: ReadonlySet<string> = new Set([
	"extends",
	"allowUnknownData",
	"allow-unknown-data",
	"attributes",
	"fields",
]);

/** Allowed properties of a field descriptor (both camelCase and kebab-case). */
export const ALLOWED_FIELD_PROPERTIES: ReadonlySet<string> = new Set([
	"type",
	"nullable",
	"name",
	"min",
	"max",
	"bounds",
	"acceptBooleans",
	"accept-booleans",
	"of",
	"ofKey",
	"of-key",
	"ofValue",
	"of-value",
	"model",
]);

const FIELD_KINDS: readonly FieldKind[] = ["any", "string", "number", "integer", "list", "dict", "model"];

/** Allowed field types. */
export const ALLOWED_FIELD_TYPES: ReadonlySet<string> = new Set<string>(FIELD_KINDS);

/** Field types each kind-specific option applies to, keyed by camelCase option. */
export const OPTION_FIELD_TYPES: Readonly<Record<string, readonly FieldKind[]>> = {
	min: ["number", "integer"],
	max: ["number", "integer"],
	bounds: ["number", "integer"],
	acceptBooleans: ["number", "integer"],
	of: ["list"],
	ofKey: ["dict"],
	ofValue: ["dict"],
	model: ["model"],
};

/**
 * Mapping of kebab-case declaration keys to camelCase TypeScript keys.
 */
const KEBAB_TO_CAMEL: Record<string, string> = {
	"accept-booleans": "acceptBooleans",
	"of-key": "ofKey",
	"of-value": "ofValue",
	"allow-unknown-data": "allowUnknownData",
};

/**
 * Convert a declaration key to camelCase.
 */
export function toCamelKey(key: string): string {
	return KEBAB_TO_CAMEL[key] ?? key;
}

/**
 * Read a property accepting both its camelCase and kebab-case spelling.
 * The camelCase spelling wins when both are present.
 */
export function readProperty(raw: Record<string, unknown>, camelKey: string): unknown {
	if (raw[camelKey] !== undefined) {
		return raw[camelKey];
	}
	for (const [kebab, camel] of Object.entries(KEBAB_TO_CAMEL)) {
		if (camel === camelKey) {
			return raw[kebab];
		}
	}
	return undefined;
}

/**
 * The spelling under which a property appears in a raw declaration, with the
 * same precedence as {@link readProperty}. Falls back to the camelCase key.
 */
export function propertyKey(raw: Record<string, unknown>, camelKey: string): string {
	if (raw[camelKey] !== undefined) {
		return camelKey;
	}
	for (const [kebab, camel] of Object.entries(KEBAB_TO_CAMEL)) {
		if (camel === camelKey && raw[kebab] !== undefined) {
			return kebab;
		}
	}
	return camelKey;
}

export function isFieldKind(value: unknown): value is FieldKind {
	return FIELD_KINDS.some((kind) => kind === value);
}

function optionalBound(value: unknown): number | null | undefined {
	return typeof value === "number" || value === null ? value : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
	return typeof value === "boolean" ? value : undefined;
}

/**
 * Normalise a raw field descriptor, converting kebab-case keys to camelCase.
 *
 * @param raw - Raw descriptor object
 * @returns Normalised descriptor, or null if it has no valid type
 */
export function normaliseFieldDescriptor(raw: Record<string, unknown>): FieldDescriptor | null {
	const type = raw["type"];
	if (!isFieldKind(type)) {
		return null;
	}

	const result: FieldDescriptor = { type };

	const nullable = optionalBoolean(raw["nullable"]);
	if (nullable !== undefined) {
		result.nullable = nullable;
	}
	if (typeof raw["name"] === "string") {
		result.name = raw["name"];
	}

	const min = optionalBound(raw["min"]);
	if (min !== undefined) {
		result.min = min;
	}
	const max = optionalBound(raw["max"]);
	if (max !== undefined) {
		result.max = max;
	}
	const bounds = raw["bounds"];
	if (Array.isArray(bounds) && bounds.length === 2) {
		const lower = optionalBound(bounds[0]);
		const upper = optionalBound(bounds[1]);
		if (lower !== undefined && upper !== undefined) {
			result.bounds = [lower, upper];
		}
	}
	const acceptBooleans = optionalBoolean(readProperty(raw, "acceptBooleans"));
	if (acceptBooleans !== undefined) {
		result.acceptBooleans = acceptBooleans;
	}

	for (const key of ["of", "ofKey", "ofValue"] as const) {
		const child = readProperty(raw, key);
		if (isRecord(child)) {
			const descriptor = normaliseFieldDescriptor(child);
			if (descriptor) {
				result[key] = descriptor;
			}
		}
	}

	if (typeof raw["model"] === "string") {
		result.model = raw["model"];
	}

	return result;
}

/**
 * Normalise a map of raw field descriptors. Entries without a valid type are dropped.
 */
export function normaliseFieldDescriptorMap(raw: Record<string, unknown>): Record<string, FieldDescriptor> {
	const entries: Array<[string, FieldDescriptor]> = [];

	for (const [key, value] of Object.entries(raw)) {
		if (isRecord(value)) {
			const descriptor = normaliseFieldDescriptor(value);
			if (descriptor) {
				entries.push([key, descriptor]);
			}
		}
	}

	return Object.fromEntries(entries);
}

/**
 * Normalise a raw model declaration.
 */
export function normaliseModelDescriptor(raw: Record<string, unknown>): ModelDescriptor {
	const result: ModelDescriptor = {};

	const ancestors = raw["extends"];
	if (Array.isArray(ancestors)) {
		result.extends = ancestors.filter((name): name is string => typeof name === "string");
	}

	const allowUnknownData = optionalBoolean(readProperty(raw, "allowUnknownData"));
	if (allowUnknownData !== undefined) {
		result.allowUnknownData = allowUnknownData;
	}

	if (isRecord(raw["attributes"])) {
		result.attributes = { ...raw["attributes"] };
	}

	if (isRecord(raw["fields"])) {
		result.fields = normaliseFieldDescriptorMap(raw["fields"]);
	}

	return result;
}

/**
 * Normalise a raw declaration document.
 */
export function normaliseDeclaration(raw: Record<string, unknown>): DeclarationDocument {
	const result: DeclarationDocument = { models: new Map() };

	if (typeof raw["$schema"] === "string") {
		result.$schema = raw["$schema"];
	}

	const models = raw["models"];
	if (isRecord(models)) {
		for (const [name, value] of Object.entries(models)) {
			if (isRecord(value)) {
				result.models.set(name, normaliseModelDescriptor(value));
			}
		}
	}

	return result;
}
