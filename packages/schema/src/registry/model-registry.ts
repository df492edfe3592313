/**
 * @title Model Registry Module
 * @description Named collection of declared model classes.
 *
 * Declaration files refer to models by name (ancestors, model fields); the
 * registry is where those names resolve.
 *
 * @module registry
 */

import { DeclarationError } from "../errors.js";
import type { AnyModelClass } from "../model/model.js";

/**
 * Registry of model classes keyed by model name.
 */
export class ModelRegistry {
	private models = new Map<string, AnyModelClass>();

	/**
	 * Register a model under its name.
	 *
	 * @throws DeclarationError if a model with the same name is registered
	 */
	register(model: AnyModelClass): void {
		if (this.models.has(model.modelName)) {
			throw new DeclarationError(`Model "${model.modelName}" is already registered.`, {
				suggestion: "Rename the model or unregister the existing one first",
			});
		}
		this.models.set(model.modelName, model);
	}

	/**
	 * Get a model by name.
	 *
	 * @returns The model, or undefined if none is registered under the name
	 */
	get(name: string): AnyModelClass | undefined {
		return this.models.get(name);
	}

	/**
	 * Get a model by name, failing when it is not registered.
	 *
	 * @throws DeclarationError if no model is registered under the name
	 */
	require(name: string): AnyModelClass {
		const model = this.models.get(name);
		if (!model) {
			const known = this.names();
			throw new DeclarationError(`Unknown model "${name}".`, {
				suggestion: known.length > 0 ? `Known models: ${known.join(", ")}` : "Declare the model before referring to it",
			});
		}
		return model;
	}

	/**
	 * Check whether a model is registered under the name.
	 */
	has(name: string): boolean {
		return this.models.has(name);
	}

	/**
	 * Registered model names, in registration order.
	 */
	names(): string[] {
		return [...this.models.keys()];
	}

	/**
	 * Remove a model.
	 *
	 * @returns True if a model was removed
	 */
	unregister(name: string): boolean {
		return this.models.delete(name);
	}

	/**
	 * Remove every model.
	 */
	clear(): void {
		this.models.clear();
	}
}
