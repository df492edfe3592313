import { LIST_TYPE } from "../types/value-type.js";
import { Field, type FieldOptions } from "./field.js";

/**
 * Options for list fields.
 */
export interface ListFieldOptions extends FieldOptions {
	/** Field every element must satisfy. */
	of?: Field;
}

/**
 * An ordered sequence (array).
 *
 * When `of` is set every element is validated with it; the first failing
 * element's error propagates.
 */
export class ListField extends Field<readonly unknown[]> {
	readonly kind = "list";
	/** Field every element must satisfy. */
	readonly of: Field | null;

	constructor(options: ListFieldOptions = {}) {
		super([LIST_TYPE], options);
		this.of = options.of ?? null;
	}

	protected override validateContent(value: readonly unknown[]): void {
		if (!this.of) {
			return;
		}
		for (const item of value) {
			this.of.validate(item);
		}
	}
}
