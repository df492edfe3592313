/**
 * @title Model Module
 * @description Barrel export for the model schema engine.
 *
 * @module model
 */

export { ModelSchema, resolveSchema, type FieldMap, type SchemaDeclaration } from "./schema.js";

export {
	Model,
	defineModel,
	type AnyModelClass,
	type FieldValue,
	type InheritedFields,
	type MappingInput,
	type ModelClass,
	type ModelDefinition,
	type ModelValues,
	type ResolvedFields,
	type UnknownDataOptions,
} from "./model.js";
