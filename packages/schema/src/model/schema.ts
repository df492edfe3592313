/**
 * @title Model Schema Module
 * @description Resolution of field declarations into per-model field tables.
 *
 * A model's table is built once, when the model is declared:
 * 1. ancestor tables are merged from the last-listed ancestor to the first,
 *    so an earlier-listed ancestor wins a name conflict;
 * 2. the model's own fields override every inherited entry;
 * 3. each own field is bound to its table key.
 *
 * A name redefined in step 1 or 2 keeps the position of its first insertion.
 *
 * @module model
 */

import { Field, createLogger } from "@schemata/core";
import { DeclarationError } from "../errors.js";

const log = createLogger("schema");

/** Named field declarations. */
export type FieldMap = Readonly<Record<string, Field>>;

/**
 * Input of schema resolution.
 */
export interface SchemaDeclaration {
	/** Model name. */
	name: string;
	/** Fields declared directly on the model. */
	fields?: FieldMap;
	/** Resolved schemas of the ancestors, highest precedence first. */
	ancestors?: readonly ModelSchema[];
	/** Default unknown-attribute policy of the model. */
	allowUnknownData?: boolean;
	/** Non-field declarations, passed through untouched. */
	attributes?: Readonly<Record<string, unknown>>;
}

/**
 * Read-only view of a map. Exposes no mutators, even at run time.
 */
class MapView<K, V> implements ReadonlyMap<K, V> {
	private readonly table: ReadonlyMap<K, V>;

	constructor(entries: Iterable<readonly [K, V]>) {
		this.table = new Map(entries);
		Object.freeze(this);
	}

	get size(): number {
		return this.table.size;
	}

	get(key: K): V | undefined {
		return this.table.get(key);
	}

	has(key: K): boolean {
		return this.table.has(key);
	}

	forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
		this.table.forEach((value, key) => callback.call(thisArg, value, key, this));
	}

	entries() {
		return this.table.entries();
	}

	keys() {
		return this.table.keys();
	}

	values() {
		return this.table.values();
	}

	[Symbol.iterator]() {
		return this.table[Symbol.iterator]();
	}
}

/**
 * The resolved, read-only field table of one model.
 */
export class ModelSchema {
	/** Model name. */
	readonly name: string;
	/** Field table, in validation order. */
	readonly fields: ReadonlyMap<string, Field>;
	/** Direct ancestors, highest precedence first. */
	readonly ancestors: readonly ModelSchema[];
	/** Default unknown-attribute policy, if the model or an ancestor sets one. */
	readonly allowUnknownData: boolean | undefined;
	/** Non-field declarations. */
	readonly attributes: Readonly<Record<string, unknown>>;
	private readonly lineage: ReadonlySet<ModelSchema>;

	private constructor(
		name: string,
		fields: ReadonlyMap<string, Field>,
		ancestors: readonly ModelSchema[],
		allowUnknownData: boolean | undefined,
		attributes: Readonly<Record<string, unknown>>,
	) {
		this.name = name;
		this.fields = new MapView(fields);
		this.ancestors = Object.freeze([...ancestors]);
		this.allowUnknownData = allowUnknownData;
		this.attributes = Object.freeze({ ...attributes });

		const lineage = new Set<ModelSchema>([this]);
		for (const ancestor of ancestors) {
			for (const schema of ancestor.lineage) {
				lineage.add(schema);
			}
		}
		this.lineage = lineage;
		Object.freeze(this);
	}

	/**
	 * Resolve a declaration into a schema.
	 *
	 * @throws DeclarationError if the declaration is malformed
	 */
	static resolve(declaration: SchemaDeclaration): ModelSchema {
		const { name, fields = {}, ancestors = [] } = declaration;

		if (typeof name !== "string" || name.trim() === "") {
			throw new DeclarationError("Model name must be a non-empty string.");
		}

		const table = new Map<string, Field>();
		const attributes: Record<string, unknown> = {};

		for (const ancestor of [...ancestors].reverse()) {
			for (const [fieldName, field] of ancestor.fields) {
				table.set(fieldName, field);
			}
			Object.assign(attributes, ancestor.attributes);
		}

		for (const [fieldName, field] of Object.entries(fields)) {
			if (!(field instanceof Field)) {
				throw new DeclarationError(`Field "${fieldName}" of model "${name}" is not a Field instance.`, {
					suggestion: "Declare non-field values under attributes",
				});
			}
			table.set(fieldName, field.bind(fieldName));
		}

		Object.assign(attributes, declaration.attributes);

		const allowUnknownData =
			declaration.allowUnknownData ??
			ancestors.find((ancestor) => ancestor.allowUnknownData !== undefined)?.allowUnknownData;

		const schema = new ModelSchema(name, table, ancestors, allowUnknownData, attributes);
		log.debug(
			{ model: name, fields: [...table.keys()], ancestors: ancestors.map((ancestor) => ancestor.name) },
			"Resolved model schema",
		);
		return schema;
	}

	/**
	 * Whether the schema declares a field with this name.
	 */
	has(name: string): boolean {
		return this.fields.has(name);
	}

	/**
	 * The field declared under a name.
	 */
	get(name: string): Field | undefined {
		return this.fields.get(name);
	}

	/**
	 * Declared field names, in validation order.
	 */
	fieldNames(): string[] {
		return [...this.fields.keys()];
	}

	/**
	 * Whether this schema is `other` or inherits from it, directly or not.
	 */
	inherits(other: ModelSchema): boolean {
		return this.lineage.has(other);
	}
}

/**
 * Resolve a declaration into a schema.
 *
 * @see ModelSchema.resolve
 */
export function resolveSchema(declaration: SchemaDeclaration): ModelSchema {
	return ModelSchema.resolve(declaration);
}
