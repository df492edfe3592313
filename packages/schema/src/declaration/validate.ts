/**
 * @title Declaration Validation
 * @description Pure validation logic for model declaration documents.
 *
 * Validates syntax, structure, and semantic correctness of declaration
 * files. Returns an array of findings with severity levels.
 *
 * @module declaration
 */

import * as yaml from "js-yaml";
import { isRecord } from "@schemata/core";
import {
	ALLOWED_FIELD_PROPERTIES,
	ALLOWED_FIELD_TYPES,
	ALLOWED_MODEL_PROPERTIES,
	ALLOWED_TOP_LEVEL_KEYS,
	OPTION_FIELD_TYPES,
	SUPPORTED_DECLARATION_VERSIONS,
	propertyKey,
	readProperty,
	toCamelKey,
} from "./types.js";

/**
 * Severity level for a declaration finding.
 */
export type DeclarationSeverity = "error" | "warning" | "information";

/**
 * A single validation finding from declaration analysis.
 */
export interface DeclarationFinding {
	/** Human-readable description of the issue. */
	message: string;
	/** Severity level. */
	severity: DeclarationSeverity;
	/** Machine-readable code identifying the check. */
	code: string;
	/** Zero-based line number (when available from syntax errors). */
	line?: number;
	/** Zero-based column number (when available from syntax errors). */
	column?: number;
	/** Dot-separated key path to the problematic location. */
	keyPath?: string;
}

/**
 * Options for structure validation.
 */
export interface DeclarationValidationOptions {
	/** Names of models declared elsewhere (e.g. in a registry) that may be referenced. */
	knownModels?: Iterable<string>;
}

/**
 * Declaration file format.
 */
export type DeclarationFormat = "yaml" | "json";

/**
 * Model names a document may refer to.
 */
interface ReferenceScope {
	declared: ReadonlySet<string>;
	known: ReadonlySet<string>;
}

function isResolvable(scope: ReferenceScope, name: string): boolean {
	return scope.declared.has(name) || scope.known.has(name);
}

/**
 * Validate a declaration document and return all findings.
 *
 * @param content - Raw file content (YAML or JSON string).
 * @param format - File format: "yaml" or "json".
 * @param options - Validation options.
 * @returns Array of validation findings.
 */
export function validateDeclaration(
	content: string,
	format: DeclarationFormat,
	options: DeclarationValidationOptions = {},
): DeclarationFinding[] {
	const syntaxResult = validateDeclarationSyntax(content, format);
	if (syntaxResult.error) {
		return syntaxResult.error;
	}
	return validateDeclarationStructure(syntaxResult.parsed, options);
}

/**
 * Validate syntax of a declaration document.
 *
 * @param content - Raw file content.
 * @param format - File format.
 * @returns Either an error array or the parsed object.
 */
export function validateDeclarationSyntax(
	content: string,
	format: DeclarationFormat,
): { error: DeclarationFinding[] } | { error: null; parsed: unknown } {
	if (content.trim() === "") {
		return { error: null, parsed: null };
	}

	try {
		const parsed: unknown = format === "json" ? JSON.parse(content) : yaml.load(content);
		return { error: null, parsed };
	} catch (err: unknown) {
		const finding: DeclarationFinding = {
			message: "",
			severity: "error",
			code: "syntax-error",
		};

		if (format === "yaml" && err instanceof yaml.YAMLException) {
			finding.message = err.reason ?? String(err);
			if (err.mark) {
				finding.line = err.mark.line;
				finding.column = err.mark.column;
			}
		} else if (err instanceof SyntaxError) {
			finding.message = err.message;
		} else {
			finding.message = String(err);
		}

		return { error: [finding] };
	}
}

/**
 * Validate the structure and semantics of a parsed declaration document.
 *
 * @param parsed - The parsed YAML/JSON object.
 * @param options - Validation options.
 * @returns Array of validation findings.
 */
export function validateDeclarationStructure(
	parsed: unknown,
	options: DeclarationValidationOptions = {},
): DeclarationFinding[] {
	if (parsed === null || parsed === undefined) {
		return [];
	}

	if (!isRecord(parsed)) {
		return [
			{
				message: "Declaration document must be an object.",
				severity: "error",
				code: "invalid-root-type",
			},
		];
	}

	const findings: DeclarationFinding[] = [];

	// Check for unknown top-level keys.
	for (const key of Object.keys(parsed)) {
		if (!ALLOWED_TOP_LEVEL_KEYS.has(key)) {
			findings.push({
				message: `Unknown top-level key "${key}".`,
				severity: "warning",
				code: "unknown-top-level-key",
				keyPath: key,
			});
		}
	}

	// Validate "$schema".
	const version = parsed["$schema"];
	if (version !== undefined) {
		if (typeof version !== "string") {
			findings.push({
				message: '"$schema" must be a string.',
				severity: "error",
				code: "invalid-section-type",
				keyPath: "$schema",
			});
		} else if (!SUPPORTED_DECLARATION_VERSIONS.has(version)) {
			findings.push({
				message: `Unknown declaration version "${version}". Known versions: ${[...SUPPORTED_DECLARATION_VERSIONS].join(", ")}.`,
				severity: "information",
				code: "unknown-version",
				keyPath: "$schema",
			});
		}
	}

	// Validate "models" section.
	const models = parsed["models"];
	if (models === undefined) {
		return findings;
	}
	if (!isRecord(models)) {
		findings.push({
			message: '"models" must be an object.',
			severity: "error",
			code: "invalid-section-type",
			keyPath: "models",
		});
		return findings;
	}

	const scope: ReferenceScope = {
		declared: new Set(Object.keys(models)),
		known: new Set(options.knownModels ?? []),
	};

	for (const [modelName, modelValue] of Object.entries(models)) {
		const modelPath = `models.${modelName}`;
		if (modelName.trim() === "") {
			findings.push({
				message: "Model name must be a non-empty string.",
				severity: "error",
				code: "invalid-model-name",
				keyPath: modelPath,
			});
			continue;
		}
		if (!isRecord(modelValue)) {
			findings.push({
				message: `Model "${modelName}" must be an object.`,
				severity: "error",
				code: "invalid-model-entry",
				keyPath: modelPath,
			});
			continue;
		}
		validateModelDescriptor(modelName, modelValue, modelPath, scope, findings);
	}

	validateInheritanceCycles(models, findings);

	return findings;
}

/**
 * Validate a single model declaration.
 */
function validateModelDescriptor(
	modelName: string,
	raw: Record<string, unknown>,
	modelPath: string,
	scope: ReferenceScope,
	findings: DeclarationFinding[],
): void {
	// Check for unknown properties.
	for (const prop of Object.keys(raw)) {
		if (!ALLOWED_MODEL_PROPERTIES.has(prop)) {
			findings.push({
				message: `Unknown model property "${prop}".`,
				severity: "warning",
				code: "unknown-model-property",
				keyPath: `${modelPath}.${prop}`,
			});
		}
	}

	// Validate "extends".
	const ancestors = raw["extends"];
	if (ancestors !== undefined) {
		if (!Array.isArray(ancestors)) {
			findings.push({
				message: `Model "${modelName}" "extends" must be an array of model names.`,
				severity: "error",
				code: "invalid-extends",
				keyPath: `${modelPath}.extends`,
			});
		} else {
			for (let i = 0; i < ancestors.length; i++) {
				const ancestor: unknown = ancestors[i];
				const ancestorPath = `${modelPath}.extends[${i}]`;
				if (typeof ancestor !== "string") {
					findings.push({
						message: `Ancestor at index ${i} must be a model name.`,
						severity: "error",
						code: "invalid-extends",
						keyPath: ancestorPath,
					});
				} else if (!isResolvable(scope, ancestor)) {
					findings.push({
						message: `Model "${modelName}" extends unknown model "${ancestor}".`,
						severity: "error",
						code: "unknown-ancestor",
						keyPath: ancestorPath,
					});
				}
			}
		}
	}

	// Validate "allow-unknown-data".
	const allowUnknownData = readProperty(raw, "allowUnknownData");
	if (allowUnknownData !== undefined && typeof allowUnknownData !== "boolean") {
		const key = propertyKey(raw, "allowUnknownData");
		findings.push({
			message: `Model "${modelName}" "${key}" must be a boolean.`,
			severity: "error",
			code: "invalid-boolean-option",
			keyPath: `${modelPath}.${key}`,
		});
	}

	// Validate "attributes".
	if (raw["attributes"] !== undefined && !isRecord(raw["attributes"])) {
		findings.push({
			message: `Model "${modelName}" "attributes" must be an object.`,
			severity: "error",
			code: "invalid-section-type",
			keyPath: `${modelPath}.attributes`,
		});
	}

	// Validate "fields".
	const fields = raw["fields"];
	if (fields !== undefined) {
		if (isRecord(fields)) {
			validateFieldDescriptorMap(fields, `${modelPath}.fields`, scope, findings);
		} else {
			findings.push({
				message: `Model "${modelName}" "fields" must be an object.`,
				severity: "error",
				code: "invalid-section-type",
				keyPath: `${modelPath}.fields`,
			});
		}
	}
}

/**
 * Validate a map of field descriptors (e.g., a model's "fields" section).
 */
function validateFieldDescriptorMap(
	fields: Record<string, unknown>,
	parentPath: string,
	scope: ReferenceScope,
	findings: DeclarationFinding[],
): void {
	for (const [key, value] of Object.entries(fields)) {
		validateFieldDescriptor(value, `${parentPath}.${key}`, scope, findings);
	}
}

/**
 * Validate a single field descriptor for allowed properties, valid types,
 * and semantic consistency.
 */
function validateFieldDescriptor(
	value: unknown,
	keyPath: string,
	scope: ReferenceScope,
	findings: DeclarationFinding[],
): void {
	if (!isRecord(value)) {
		findings.push({
			message: `Field descriptor "${keyPath}" must be an object.`,
			severity: "error",
			code: "invalid-field-descriptor",
			keyPath,
		});
		return;
	}

	// Check for unknown properties.
	for (const prop of Object.keys(value)) {
		if (!ALLOWED_FIELD_PROPERTIES.has(prop)) {
			findings.push({
				message: `Unknown field property "${prop}".`,
				severity: "warning",
				code: "unknown-field-property",
				keyPath: `${keyPath}.${prop}`,
			});
		}
	}

	// Validate "type".
	const type = value["type"];
	if (type === undefined) {
		findings.push({
			message: 'Field descriptor is missing "type".',
			severity: "error",
			code: "missing-type",
			keyPath,
		});
		return;
	}
	if (typeof type !== "string" || !ALLOWED_FIELD_TYPES.has(type)) {
		findings.push({
			message: `Invalid type "${String(type)}". Allowed types: ${[...ALLOWED_FIELD_TYPES].join(", ")}.`,
			severity: "error",
			code: "invalid-type",
			keyPath: `${keyPath}.type`,
		});
		return;
	}

	// Boolean options.
	for (const option of ["nullable", "acceptBooleans"]) {
		const optionValue = readProperty(value, option);
		if (optionValue !== undefined && typeof optionValue !== "boolean") {
			const key = propertyKey(value, option);
			findings.push({
				message: `"${key}" must be a boolean.`,
				severity: "error",
				code: "invalid-boolean-option",
				keyPath: `${keyPath}.${key}`,
			});
		}
	}

	if (value["name"] !== undefined && typeof value["name"] !== "string") {
		findings.push({
			message: '"name" must be a string.',
			severity: "error",
			code: "invalid-field-descriptor",
			keyPath: `${keyPath}.name`,
		});
	}

	// Options that do not apply to the type.
	for (const prop of Object.keys(value)) {
		const applicable = OPTION_FIELD_TYPES[toCamelKey(prop)];
		if (applicable && !applicable.some((kind) => kind === type)) {
			findings.push({
				message: `"${prop}" does not apply to fields of type "${type}".`,
				severity: "warning",
				code: "option-not-applicable",
				keyPath: `${keyPath}.${prop}`,
			});
		}
	}

	validateBounds(value, keyPath, findings);

	// Recurse into child descriptors.
	for (const child of ["of", "ofKey", "ofValue"]) {
		const childValue = readProperty(value, child);
		if (childValue !== undefined) {
			validateFieldDescriptor(childValue, `${keyPath}.${propertyKey(value, child)}`, scope, findings);
		}
	}

	// Model references.
	if (type === "model") {
		const model = value["model"];
		if (typeof model !== "string" || model === "") {
			findings.push({
				message: 'Fields of type "model" need a "model" name.',
				severity: "error",
				code: "missing-model-reference",
				keyPath,
			});
		} else if (!isResolvable(scope, model)) {
			findings.push({
				message: `Unknown model "${model}".`,
				severity: "error",
				code: "unknown-model-reference",
				keyPath: `${keyPath}.model`,
			});
		}
	}
}

function isBound(value: unknown): value is number | null {
	return value === null || typeof value === "number";
}

/**
 * Check the shape and order of "min", "max" and "bounds".
 */
function validateBounds(raw: Record<string, unknown>, keyPath: string, findings: DeclarationFinding[]): void {
	const pairs: Array<[unknown, unknown, string]> = [];

	if (raw["min"] !== undefined || raw["max"] !== undefined) {
		pairs.push([raw["min"] ?? null, raw["max"] ?? null, keyPath]);
	}

	const bounds = raw["bounds"];
	if (bounds !== undefined) {
		if (Array.isArray(bounds) && bounds.length === 2) {
			pairs.push([bounds[0], bounds[1], `${keyPath}.bounds`]);
		} else {
			findings.push({
				message: '"bounds" must be a [lower, upper] pair.',
				severity: "error",
				code: "invalid-bounds",
				keyPath: `${keyPath}.bounds`,
			});
		}
	}

	for (const [lower, upper, path] of pairs) {
		if (!isBound(lower) || !isBound(upper)) {
			findings.push({
				message: "Bounds must be numbers or null.",
				severity: "error",
				code: "invalid-bounds",
				keyPath: path,
			});
		} else if (lower !== null && upper !== null && lower > upper) {
			findings.push({
				message: `Lower bound (${lower}) is greater than upper bound (${upper}).`,
				severity: "error",
				code: "min-greater-than-max",
				keyPath: path,
			});
		}
	}
}

/**
 * Report models that inherit from themselves, directly or not.
 */
function validateInheritanceCycles(models: Record<string, unknown>, findings: DeclarationFinding[]): void {
	const graph = new Map<string, string[]>();
	for (const [name, value] of Object.entries(models)) {
		const ancestors = isRecord(value) ? value["extends"] : undefined;
		graph.set(
			name,
			Array.isArray(ancestors) ? ancestors.filter((ancestor): ancestor is string => typeof ancestor === "string") : [],
		);
	}

	for (const name of graph.keys()) {
		if (reaches(graph, name, name, new Set())) {
			findings.push({
				message: `Model "${name}" inherits from itself.`,
				severity: "error",
				code: "extends-cycle",
				keyPath: `models.${name}.extends`,
			});
		}
	}
}

function reaches(graph: ReadonlyMap<string, string[]>, from: string, target: string, seen: Set<string>): boolean {
	for (const next of graph.get(from) ?? []) {
		if (next === target) {
			return true;
		}
		if (!seen.has(next)) {
			seen.add(next);
			if (reaches(graph, next, target, seen)) {
				return true;
			}
		}
	}
	return false;
}
