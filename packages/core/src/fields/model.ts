/**
 * @title Model Field Module
 * @description Fields holding a nested model instance.
 *
 * The field knows models only through the structural {@link ModelType}
 * interface, so it does not depend on the model engine.
 *
 * @module fields
 */

import type { TypeDescriptor } from "../types/value-type.js";
import { Field, type FieldOptions } from "./field.js";

/**
 * Anything that validates itself.
 */
export interface Validatable {
	validate(): void;
}

/**
 * A model type as seen by a model field.
 */
export interface ModelType<M extends Validatable = Validatable> {
	/** Name of the model, used in failure reports. */
	readonly modelName: string;
	/** Whether the value is an instance of the model (or of a model inheriting from it). */
	isInstance(value: unknown): value is M;
}

/**
 * A model type, or a function returning one for models that are not
 * declared yet (self-referential or mutually referential models).
 */
export type ModelReference<M extends Validatable = Validatable> = ModelType<M> | (() => ModelType<M>);

/**
 * Options for model fields.
 */
export interface ModelFieldOptions<M extends Validatable = Validatable> extends FieldOptions {
	/** Model the value must be an instance of. */
	model: ModelReference<M>;
}

function resolveModel<M extends Validatable>(reference: ModelReference<M>): ModelType<M> {
	return "isInstance" in reference ? reference : reference();
}

/**
 * A nested model instance, validated with the instance's own `validate()`.
 */
export class ModelField<M extends Validatable = Validatable> extends Field<M> {
	readonly kind = "model";
	private readonly reference: ModelReference<M>;

	constructor(options: ModelFieldOptions<M>) {
		const { model } = options;
		const type: TypeDescriptor<M> = {
			get name() {
				return resolveModel(model).modelName;
			},
			matches: (value): value is M => resolveModel(model).isInstance(value),
		};
		super([type], options);
		this.reference = model;
	}

	/**
	 * The model type, resolving a lazy reference.
	 */
	get model(): ModelType<M> {
		return resolveModel(this.reference);
	}

	protected override validateContent(value: M): void {
		value.validate();
	}
}
