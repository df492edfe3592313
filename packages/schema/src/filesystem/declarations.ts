/**
 * @title Declaration Files Module
 * @description Locate and read model declaration files in a directory.
 *
 * @module filesystem
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { parseDeclarationFile, type DeclarationLoadResult } from "../declaration/parse.js";
import type { ModelRegistry } from "../registry/model-registry.js";

/** Supported declaration file names, ordered by precedence (JSON first). */
export const DECLARATION_FILENAMES = ["_models.json", "_models.yml", "_models.yaml"] as const;

/**
 * Find the declaration file in a directory.
 *
 * @param directory - Directory to search
 * @returns Path to the declaration file or null if not found
 */
export function findDeclarationFile(directory: string): string | null {
	for (const filename of DECLARATION_FILENAMES) {
		const declarationPath = path.join(directory, filename);
		if (fs.existsSync(declarationPath)) {
			return declarationPath;
		}
	}
	return null;
}

/**
 * Read the declarations of a directory.
 *
 * @param directory - Directory containing the declaration file
 * @param registry - Registry to register the models into (default: a new registry)
 * @returns Loaded declarations or null if the directory has no declaration file
 * @throws DeclarationError if reading or parsing fails
 */
export function readDeclarations(directory: string, registry?: ModelRegistry): DeclarationLoadResult | null {
	const declarationPath = findDeclarationFile(directory);

	if (!declarationPath) {
		return null;
	}

	return parseDeclarationFile(declarationPath, { registry });
}
