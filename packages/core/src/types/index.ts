/**
 * Public type exports for @schemata/core.
 */

export {
	type TypeDescriptor,
	type Mapping,
	STRING_TYPE,
	NUMBER_TYPE,
	INTEGER_TYPE,
	BIGINT_TYPE,
	BOOLEAN_TYPE,
	LIST_TYPE,
	DICT_TYPE,
	isNull,
	isRecord,
	mappingEntries,
	formatTypes,
	describeValue,
} from "./value-type.js";
