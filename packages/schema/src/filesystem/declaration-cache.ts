/**
 * @title Declaration Cache Module
 * @description Lazily loaded declaration directories sharing one registry.
 *
 * Every directory registers its models into the cache's registry, so a model
 * in one directory may extend or refer to a model loaded from another.
 * Directories without a declaration file are remembered too, until
 * invalidated.
 *
 * @module filesystem
 */

import { createLogger, getErrorMessage } from "@schemata/core";
import type { DeclarationLoadResult } from "../declaration/parse.js";
import { ModelRegistry } from "../registry/model-registry.js";
import { readDeclarations } from "./declarations.js";

const log = createLogger("declaration-cache");

/**
 * Cache of loaded declaration directories, keyed by directory.
 */
export class DeclarationCache {
	/** Registry every directory loads into. */
	readonly registry: ModelRegistry;
	private loaded = new Map<string, DeclarationLoadResult | null>();
	private errors = new Map<string, string>();

	constructor(registry: ModelRegistry = new ModelRegistry()) {
		this.registry = registry;
	}

	/**
	 * Get the declarations of a directory, loading them on first access.
	 *
	 * Models already in the registry (from earlier directories) may be
	 * extended and referred to. A failed load registers nothing and is retried
	 * on the next access.
	 *
	 * @param directory - Path to the directory
	 * @returns Loaded declarations, or null if the directory has no declaration file or loading failed
	 */
	get(directory: string): DeclarationLoadResult | null {
		const cached = this.loaded.get(directory);
		if (cached !== undefined) {
			return cached;
		}

		try {
			const result = readDeclarations(directory, this.registry);
			this.errors.delete(directory);
			this.loaded.set(directory, result);
			if (result) {
				log.debug({ directory, models: [...result.models.keys()] }, "Loaded declaration directory");
			}
			return result;
		} catch (error) {
			const message = getErrorMessage(error);
			this.errors.set(directory, message);
			log.warn({ directory }, message);
			return null;
		}
	}

	/**
	 * Get the load error of a directory, if its last load failed.
	 */
	getError(directory: string): string | null {
		return this.errors.get(directory) ?? null;
	}

	/**
	 * Check whether a directory has been looked up, including directories
	 * found to have no declaration file.
	 */
	has(directory: string): boolean {
		return this.loaded.has(directory);
	}

	/**
	 * Forget a directory and unregister the models it declared.
	 *
	 * Models from other directories that extend them keep their resolved
	 * fields; references to them resolve through the registry again.
	 */
	invalidate(directory: string): void {
		const result = this.loaded.get(directory);
		for (const name of result?.models.keys() ?? []) {
			this.registry.unregister(name);
		}
		this.loaded.delete(directory);
		this.errors.delete(directory);
	}

	/**
	 * Forget every directory and unregister their models.
	 */
	invalidateAll(): void {
		for (const directory of [...this.loaded.keys()]) {
			this.invalidate(directory);
		}
		this.errors.clear();
	}
}
