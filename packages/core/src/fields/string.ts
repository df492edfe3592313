import { STRING_TYPE } from "../types/value-type.js";
import { Field, type FieldOptions } from "./field.js";

/**
 * A string field.
 */
export class StringField extends Field<string> {
	readonly kind = "string";

	constructor(options: FieldOptions = {}) {
		super([STRING_TYPE], options);
	}
}
