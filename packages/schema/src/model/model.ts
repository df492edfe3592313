/**
 * @title Model Module
 * @description Model classes: construction, mapping import/export and validation.
 *
 * Models are declared with {@link defineModel}:
 *
 * ```ts
 * const Person = defineModel({
 *   name: "Person",
 *   fields: {
 *     name: new StringField(),
 *     age: new IntegralField({ nullable: true, min: 0 }),
 *   },
 * });
 *
 * const person = Person.fromMapping({ name: "Ada", age: 36 });
 * person.validate();
 * ```
 *
 * An instance holds an ordered mapping from attribute name to value. Every
 * declared field is present (null when not given); imported mappings may add
 * attributes the schema does not declare. Nothing is validated until
 * `validate()` is called.
 *
 * @module model
 */

import {
	UnexpectedKeywordError,
	UnknownAttributeError,
	config,
	isRecord,
	type Field,
	type ModelType,
	type Validatable,
} from "@schemata/core";
import { ModelSchema, type FieldMap } from "./schema.js";

/** Type of the values a field accepts. */
export type FieldValue<F> = F extends Field<infer T> ? T : never;

/** Keyword values accepted when constructing a model. */
export type ModelValues<F> = { [K in keyof F]?: FieldValue<F[K]> | null };

/** A mapping imported into a model instance. */
export type MappingInput = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

/**
 * Unknown-attribute policy of a call.
 */
export interface UnknownDataOptions {
	/**
	 * Whether attributes absent from the schema are allowed. Falls back to the
	 * model's own setting, then to the configured default.
	 */
	allowUnknownData?: boolean;
}

/**
 * Base class of every declared model.
 */
export abstract class Model<F = FieldMap> implements Validatable {
	private readonly schema: ModelSchema;
	private readonly data = new Map<string, unknown>();

	protected constructor(schema: ModelSchema, values: object = {}) {
		this.schema = schema;

		for (const key of Object.keys(values)) {
			if (!schema.has(key)) {
				throw new UnexpectedKeywordError(key, schema.name);
			}
		}

		for (const name of schema.fields.keys()) {
			const value: unknown = Object.hasOwn(values, name) ? Reflect.get(values, name) : null;
			this.data.set(name, value);
		}
	}

	/**
	 * The resolved schema of the instance's model.
	 */
	getSchema(): ModelSchema {
		return this.schema;
	}

	/**
	 * Current value of an attribute (undefined if the instance does not hold it).
	 */
	get(name: string): unknown {
		return this.data.get(name);
	}

	/**
	 * Set an attribute. Names absent from the schema become unknown attributes.
	 */
	set(name: string, value: unknown): this {
		this.data.set(name, value);
		return this;
	}

	/**
	 * Whether the instance holds an attribute.
	 */
	has(name: string): boolean {
		return this.data.has(name);
	}

	/**
	 * Held attribute names that the schema does not declare.
	 */
	unknownAttributes(): string[] {
		return [...this.data.keys()].filter((name) => !this.schema.has(name));
	}

	/**
	 * Copy every entry of a mapping onto the instance.
	 *
	 * @throws UnknownAttributeError when the effective policy forbids unknown
	 *   data and the mapping carries a name the schema does not declare; nothing
	 *   is copied in that case
	 */
	assign(mapping: MappingInput, options: UnknownDataOptions = {}): this {
		const entries: Array<[string, unknown]> =
			mapping instanceof Map ? [...mapping.entries()] : Object.entries(mapping);

		if (!this.resolveAllowUnknownData(options)) {
			const unknown = entries.find(([name]) => !this.schema.has(name));
			if (unknown) {
				throw new UnknownAttributeError(unknown[0], this.schema.name);
			}
		}

		for (const [name, value] of entries) {
			this.data.set(name, value);
		}
		return this;
	}

	/**
	 * Snapshot of every held attribute, declared and unknown.
	 */
	toDict(): Record<string, unknown> {
		return Object.fromEntries(this.data);
	}

	/**
	 * Validate the instance against its schema.
	 *
	 * Unknown attributes are checked first (when forbidden), then every
	 * declared field in table order. The first failure is thrown.
	 *
	 * @throws ValidationFailure describing the first violation
	 */
	validate(options: UnknownDataOptions = {}): void {
		if (!this.resolveAllowUnknownData(options)) {
			for (const name of this.data.keys()) {
				if (!this.schema.has(name)) {
					throw new UnknownAttributeError(name, this.schema.name);
				}
			}
		}

		for (const [name, field] of this.schema.fields) {
			field.validate(this.data.get(name));
		}
	}

	/**
	 * Render declared fields, e.g. `Person(name = "Ada", age = 36)`.
	 */
	toString(): string {
		const args = this.schema.fieldNames().map((name) => `${name} = ${formatValue(this.data.get(name))}`);
		return `${this.schema.name}(${args.join(", ")})`;
	}

	private resolveAllowUnknownData(options: UnknownDataOptions): boolean {
		return options.allowUnknownData ?? this.schema.allowUnknownData ?? config().allowUnknownData;
	}
}

function formatValue(value: unknown): string {
	if (value instanceof Model) {
		return value.toString();
	}
	if (typeof value === "string") {
		return JSON.stringify(value);
	}
	if (typeof value === "bigint") {
		return `${value}n`;
	}
	if (Array.isArray(value)) {
		return `[${value.map(formatValue).join(", ")}]`;
	}
	if (value instanceof Map || isRecord(value)) {
		const entries: Array<[unknown, unknown]> =
			value instanceof Map ? [...value.entries()] : Object.entries(value);
		return `{${entries.map(([key, item]) => `${formatValue(key)}: ${formatValue(item)}`).join(", ")}}`;
	}
	return String(value);
}

/**
 * Static side shared by every model class, whatever its fields.
 */
export interface AnyModelClass extends ModelType<Model> {
	/** Resolved schema. */
	readonly schema: ModelSchema;
	/** Resolved field table. */
	readonly fields: ReadonlyMap<string, Field>;
	/** Non-field declarations. */
	readonly attributes: Readonly<Record<string, unknown>>;
	/**
	 * Create an instance from a mapping, copying every key verbatim.
	 *
	 * Unknown keys are kept unless `allowUnknownData` is explicitly false.
	 * No validation is performed.
	 */
	fromMapping(mapping: MappingInput, options?: UnknownDataOptions): Model;
}

/**
 * A declared model class.
 *
 * @typeParam F - Resolved fields: the model's own, then those it inherits
 */
export interface ModelClass<F = FieldMap> extends AnyModelClass {
	/**
	 * Construct an instance. Fields not given are null. No validation is performed.
	 *
	 * @throws UnexpectedKeywordError for a name the schema does not declare
	 */
	new (values?: ModelValues<F>): Model<F>;
	fromMapping(mapping: MappingInput, options?: UnknownDataOptions): Model<F>;
	isInstance(value: unknown): value is Model<F>;
}

/** Resolved fields of a model class. */
type FieldsOf<M> = M extends ModelClass<infer F> ? F : Record<never, never>;

/** Fields inherited from ancestors; an earlier ancestor wins a name conflict. */
export type InheritedFields<A extends readonly AnyModelClass[]> = A extends readonly [
	infer Head,
	...infer Tail extends readonly AnyModelClass[],
]
	? FieldsOf<Head> & Omit<InheritedFields<Tail>, keyof FieldsOf<Head>>
	: Record<never, never>;

/** Own fields over inherited ones. */
export type ResolvedFields<F, A extends readonly AnyModelClass[]> = F & Omit<InheritedFields<A>, keyof F>;

/**
 * Declaration of a model.
 */
export interface ModelDefinition<F extends FieldMap, A extends readonly AnyModelClass[] = []> {
	/** Model name. */
	name: string;
	/** Fields declared directly on the model. */
	fields?: F;
	/** Ancestor models; an earlier ancestor wins a field name conflict. */
	extends?: A;
	/** Default unknown-attribute policy for `validate()`. */
	allowUnknownData?: boolean;
	/** Non-field declarations, passed through untouched. */
	attributes?: Readonly<Record<string, unknown>>;
}

/**
 * Declare a model class.
 *
 * @param definition - Model name, fields, ancestors and options
 * @returns The model class
 * @throws DeclarationError if the definition is malformed
 */
export function defineModel<F extends FieldMap = Record<never, never>, const A extends readonly AnyModelClass[] = []>(
	definition: ModelDefinition<F, A>,
): ModelClass<ResolvedFields<F, A>> {
	type Fields = ResolvedFields<F, A>;

	const ancestors: readonly AnyModelClass[] = definition.extends ?? [];
	const schema = ModelSchema.resolve({
		name: definition.name,
		fields: definition.fields,
		ancestors: ancestors.map((ancestor) => ancestor.schema),
		allowUnknownData: definition.allowUnknownData,
		attributes: definition.attributes,
	});

	class DeclaredModel extends Model<Fields> {
		static readonly modelName = schema.name;
		static readonly schema = schema;
		static readonly fields = schema.fields;
		static readonly attributes = schema.attributes;

		constructor(values?: ModelValues<Fields>) {
			super(schema, values);
		}

		static isInstance(value: unknown): value is DeclaredModel {
			return value instanceof Model && value.getSchema().inherits(schema);
		}

		static fromMapping(mapping: MappingInput, options: UnknownDataOptions = {}): DeclaredModel {
			return new DeclaredModel().assign(mapping, { allowUnknownData: options.allowUnknownData ?? true });
		}
	}

	Object.defineProperty(DeclaredModel, "name", { value: schema.name });
	return DeclaredModel;
}
