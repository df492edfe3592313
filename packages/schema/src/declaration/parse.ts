/**
 * @title Declaration Parsing Module
 * @description Build model classes from YAML and JSON declaration documents.
 *
 * Models are defined ancestors first and registered into a registry, through
 * which `model` fields resolve lazily, so models may refer to themselves or to
 * each other.
 *
 * @module declaration
 */

import * as fs from "node:fs";
import * as yaml from "js-yaml";
import {
	AnyField,
	DictField,
	IntegralField,
	ListField,
	ModelField,
	NumericField,
	StringField,
	createLogger,
	getErrorMessage,
	isRecord,
	type Field,
	type NumericFieldOptions,
} from "@schemata/core";
import { DeclarationError } from "../errors.js";
import { defineModel, type ModelClass } from "../model/model.js";
import { ModelRegistry } from "../registry/model-registry.js";
import { normaliseDeclaration, type DeclarationDocument, type FieldDescriptor } from "./types.js";
import { validateDeclarationStructure, type DeclarationFormat } from "./validate.js";

const log = createLogger("declaration");

/**
 * Options for loading declarations.
 */
export interface DeclarationLoadOptions {
	/** Content format (default: "yaml"). */
	format?: DeclarationFormat;
	/** Source path, for error messages. */
	sourcePath?: string;
	/** Registry to resolve references in and register new models into (default: a new registry). */
	registry?: ModelRegistry;
}

/**
 * Result of loading a declaration document.
 */
export interface DeclarationLoadResult {
	/** Models declared by the document, in definition order (ancestors first). */
	models: Map<string, ModelClass>;
	/** Registry holding the declared models. */
	registry: ModelRegistry;
	/** Path of the source file, when loaded from a file. */
	sourcePath?: string;
}

/**
 * Detect the declaration format from a file path based on its extension.
 */
export function detectFormat(filePath: string): DeclarationFormat {
	return filePath.endsWith(".json") ? "json" : "yaml";
}

/**
 * Build a field from its descriptor.
 *
 * @param descriptor - Normalised field descriptor
 * @param registry - Registry model references resolve in
 */
export function buildField(descriptor: FieldDescriptor, registry: ModelRegistry): Field {
	const options = { nullable: descriptor.nullable, name: descriptor.name };

	switch (descriptor.type) {
		case "any":
			return new AnyField(options);
		case "string":
			return new StringField(options);
		case "number":
			return new NumericField(numericOptions(descriptor));
		case "integer":
			return new IntegralField(numericOptions(descriptor));
		case "list":
			return new ListField({ ...options, of: descriptor.of && buildField(descriptor.of, registry) });
		case "dict":
			return new DictField({
				...options,
				ofKey: descriptor.ofKey && buildField(descriptor.ofKey, registry),
				ofValue: descriptor.ofValue && buildField(descriptor.ofValue, registry),
			});
		case "model": {
			const modelName = descriptor.model;
			if (!modelName) {
				throw new DeclarationError('Fields of type "model" need a "model" name.');
			}
			return new ModelField({ ...options, model: () => registry.require(modelName) });
		}
	}
}

function numericOptions(descriptor: FieldDescriptor): NumericFieldOptions {
	return {
		nullable: descriptor.nullable,
		name: descriptor.name,
		bounds: descriptor.bounds,
		min: descriptor.min,
		max: descriptor.max,
		acceptBooleans: descriptor.acceptBooleans,
	};
}

/**
 * Order model names so that every document-local ancestor comes before its descendants.
 *
 * @throws DeclarationError on an inheritance cycle
 */
function definitionOrder(document: DeclarationDocument): string[] {
	const order: string[] = [];
	const state = new Map<string, "visiting" | "done">();

	const visit = (name: string, trail: string[]): void => {
		const current = state.get(name);
		if (current === "done") {
			return;
		}
		if (current === "visiting") {
			throw new DeclarationError(`Inheritance cycle: ${[...trail, name].join(" -> ")}.`);
		}
		state.set(name, "visiting");
		for (const ancestor of document.models.get(name)?.extends ?? []) {
			if (document.models.has(ancestor)) {
				visit(ancestor, [...trail, name]);
			}
		}
		state.set(name, "done");
		order.push(name);
	};

	for (const name of document.models.keys()) {
		visit(name, []);
	}
	return order;
}

/**
 * Define the models of a normalised document, then register them together.
 * Nothing is registered when a definition fails.
 */
function defineModels(document: DeclarationDocument, registry: ModelRegistry): Map<string, ModelClass> {
	for (const name of document.models.keys()) {
		if (registry.has(name)) {
			throw new DeclarationError(`Model "${name}" is already registered.`);
		}
	}

	const models = new Map<string, ModelClass>();
	for (const name of definitionOrder(document)) {
		const descriptor = document.models.get(name);
		if (!descriptor) {
			continue;
		}
		const fields: Record<string, Field> = Object.fromEntries(
			Object.entries(descriptor.fields ?? {}).map(([fieldName, fieldDescriptor]) => [
				fieldName,
				buildField(fieldDescriptor, registry),
			]),
		);
		const model = defineModel({
			name,
			fields,
			extends: (descriptor.extends ?? []).map((ancestor) => models.get(ancestor) ?? registry.require(ancestor)),
			allowUnknownData: descriptor.allowUnknownData,
			attributes: descriptor.attributes,
		});
		models.set(name, model);
	}

	for (const model of models.values()) {
		registry.register(model);
	}
	return models;
}

/**
 * Parse declaration content from a YAML or JSON string and define its models.
 *
 * @param content - Declaration content (YAML or JSON)
 * @param options - Format, source path and registry
 * @returns Defined models and the registry holding them
 * @throws DeclarationError if parsing, validation or definition fails
 */
export function parseDeclarationContent(content: string, options: DeclarationLoadOptions = {}): DeclarationLoadResult {
	const { format = "yaml", sourcePath } = options;
	const registry = options.registry ?? new ModelRegistry();

	try {
		const raw: unknown = format === "json" ? JSON.parse(content) : yaml.load(content);

		if (!isRecord(raw)) {
			throw new DeclarationError("Declaration document is empty or invalid", { declarationPath: sourcePath });
		}

		const findings = validateDeclarationStructure(raw, { knownModels: registry.names() });
		for (const finding of findings) {
			if (finding.severity === "error") {
				const location = finding.keyPath ? ` (at ${finding.keyPath})` : "";
				throw new DeclarationError(`${finding.message}${location}`, { declarationPath: sourcePath });
			}
			const level = finding.severity === "warning" ? "warn" : "info";
			log[level]({ code: finding.code, keyPath: finding.keyPath, source: sourcePath }, finding.message);
		}

		const models = defineModels(normaliseDeclaration(raw), registry);
		log.debug({ source: sourcePath, models: [...models.keys()] }, "Loaded model declarations");

		return { models, registry, sourcePath };
	} catch (error) {
		if (error instanceof DeclarationError) {
			throw error;
		}
		throw new DeclarationError(`Failed to parse declarations: ${getErrorMessage(error)}`, {
			declarationPath: sourcePath,
			cause: error,
		});
	}
}

/**
 * Parse a declaration file and define its models.
 *
 * @param declarationPath - Path to a `.yml`, `.yaml` or `.json` file
 * @param options - Registry to register the models into
 * @returns Defined models and the registry holding them
 * @throws DeclarationError if reading or parsing fails
 */
export function parseDeclarationFile(
	declarationPath: string,
	options: Omit<DeclarationLoadOptions, "format" | "sourcePath"> = {},
): DeclarationLoadResult {
	let content: string;
	try {
		content = fs.readFileSync(declarationPath, "utf-8");
	} catch (error) {
		throw new DeclarationError(`Failed to read declaration file: ${getErrorMessage(error)}`, {
			declarationPath,
			cause: error,
		});
	}
	return parseDeclarationContent(content, {
		...options,
		format: detectFormat(declarationPath),
		sourcePath: declarationPath,
	});
}
