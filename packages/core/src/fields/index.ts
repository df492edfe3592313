/**
 * @title Fields Module
 * @description Barrel export for the field type hierarchy.
 *
 * @module fields
 */

export { Field, AnyField, UNBOUND_FIELD_NAME, type FieldKind, type FieldOptions } from "./field.js";
export { StringField } from "./string.js";
export { NumericField, IntegralField, type Numeric, type Bound, type NumericFieldOptions } from "./numeric.js";
export { ListField, type ListFieldOptions } from "./list.js";
export { DictField, type DictFieldOptions } from "./dict.js";
export {
	ModelField,
	type ModelFieldOptions,
	type ModelReference,
	type ModelType,
	type Validatable,
} from "./model.js";
