/**
 * @title Declaration Module
 * @description Barrel export for declaration documents: types, parsing and validation.
 *
 * @module declaration
 */

export {
	type FieldDescriptor,
	type ModelDescriptor,
	type DeclarationDocument,
	DECLARATION_VERSION_URI,
	SUPPORTED_DECLARATION_VERSIONS,
	ALLOWED_TOP_LEVEL_KEYS,
	ALLOWED_MODEL_PROPERTIES,
	ALLOWED_FIELD_PROPERTIES,
	ALLOWED_FIELD_TYPES,
	OPTION_FIELD_TYPES,
	isFieldKind,
	normaliseFieldDescriptor,
	normaliseFieldDescriptorMap,
	normaliseModelDescriptor,
	normaliseDeclaration,
} from "./types.js";

export {
	buildField,
	detectFormat,
	parseDeclarationContent,
	parseDeclarationFile,
	type DeclarationLoadOptions,
	type DeclarationLoadResult,
} from "./parse.js";

export {
	validateDeclaration,
	validateDeclarationSyntax,
	validateDeclarationStructure,
	type DeclarationFinding,
	type DeclarationFormat,
	type DeclarationSeverity,
	type DeclarationValidationOptions,
} from "./validate.js";
