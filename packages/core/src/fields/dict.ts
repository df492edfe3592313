import { DICT_TYPE, mappingEntries, type Mapping } from "../types/value-type.js";
import { Field, type FieldOptions } from "./field.js";

/**
 * Options for dict fields.
 */
export interface DictFieldOptions extends FieldOptions {
	/** Field every key must satisfy. */
	ofKey?: Field;
	/** Field every value must satisfy. */
	ofValue?: Field;
}

/**
 * A key/value mapping: a plain object or a Map.
 *
 * Keys are checked first, then values, each in the mapping's iteration order.
 */
export class DictField extends Field<Mapping> {
	readonly kind = "dict";
	/** Field every key must satisfy. */
	readonly ofKey: Field | null;
	/** Field every value must satisfy. */
	readonly ofValue: Field | null;

	constructor(options: DictFieldOptions = {}) {
		super([DICT_TYPE], options);
		this.ofKey = options.ofKey ?? null;
		this.ofValue = options.ofValue ?? null;
	}

	protected override validateContent(value: Mapping): void {
		const entries = mappingEntries(value);
		if (this.ofKey) {
			for (const [key] of entries) {
				this.ofKey.validate(key);
			}
		}
		if (this.ofValue) {
			for (const [, item] of entries) {
				this.ofValue.validate(item);
			}
		}
	}
}
