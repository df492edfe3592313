/**
 * @title Numeric Fields Module
 * @description Number fields with optional inclusive bounds.
 *
 * Booleans are accepted as numbers unless `acceptBooleans` is false, and count
 * as 0 and 1 when compared with bounds. Bigints are integral.
 *
 * @module fields
 */

import { OutOfBoundsError, SchemataError, formatBounds, type Bounds } from "../errors.js";
import { BIGINT_TYPE, BOOLEAN_TYPE, INTEGER_TYPE, NUMBER_TYPE, type TypeDescriptor } from "../types/value-type.js";
import { Field, type FieldKind, type FieldOptions } from "./field.js";

/** Values accepted by numeric fields. */
export type Numeric = number | bigint | boolean;

/** A bound; null or undefined means unbounded on that side. */
export type Bound = number | bigint | null | undefined;

/**
 * Options for numeric and integral fields.
 */
export interface NumericFieldOptions extends FieldOptions {
	/** Inclusive `[lower, upper]` bounds. Takes precedence over `min` and `max`. */
	bounds?: readonly [lower: Bound, upper: Bound];
	/** Inclusive lower bound. */
	min?: Bound;
	/** Inclusive upper bound. */
	max?: Bound;
	/** Whether booleans are accepted as numbers (default: true). */
	acceptBooleans?: boolean;
}

function resolveBounds(options: NumericFieldOptions): Bounds | null {
	const [lower, upper] = options.bounds ?? [options.min, options.max];
	if (lower === null || lower === undefined) {
		return upper === null || upper === undefined ? null : [null, upper];
	}
	if (upper !== null && upper !== undefined && lower > upper) {
		throw new SchemataError(
			`Invalid bounds ${formatBounds([lower, upper])}: lower bound is greater than upper bound.`,
			"INVALID_FIELD_OPTIONS",
		);
	}
	return [lower, upper ?? null];
}

function toComparable(value: Numeric): number | bigint {
	return typeof value === "boolean" ? Number(value) : value;
}

/**
 * A number field with optional inclusive bounds.
 */
export class NumericField extends Field<Numeric> {
	/** Descriptor of the accepted JavaScript numbers. */
	protected static readonly numberType: TypeDescriptor<number> = NUMBER_TYPE;

	readonly kind: FieldKind = "number";
	/** Inclusive bounds, or null when unbounded on both sides. */
	readonly bounds: Bounds | null;
	/** Whether booleans are accepted as numbers. */
	readonly acceptBooleans: boolean;

	constructor(options: NumericFieldOptions = {}) {
		const acceptBooleans = options.acceptBooleans ?? true;
		const types: TypeDescriptor<Numeric>[] = [new.target.numberType, BIGINT_TYPE];
		if (acceptBooleans) {
			types.push(BOOLEAN_TYPE);
		}
		super(types, options);
		this.bounds = resolveBounds(options);
		this.acceptBooleans = acceptBooleans;
	}

	protected override validateContent(value: Numeric): void {
		if (this.bounds === null) {
			return;
		}
		const [lower, upper] = this.bounds;
		const comparable = toComparable(value);
		if ((lower !== null && comparable < lower) || (upper !== null && comparable > upper)) {
			throw new OutOfBoundsError(this.name, value, this.bounds);
		}
	}
}

/**
 * A numeric field that rejects floating-point values.
 */
export class IntegralField extends NumericField {
	protected static override readonly numberType: TypeDescriptor<number> = INTEGER_TYPE;

	override readonly kind: FieldKind = "integer";
}
