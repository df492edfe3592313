/**
 * @title Errors
 * @description Error types for @schemata/schema.
 *
 * @module errors
 */

import { SchemataError } from "@schemata/core";

/**
 * Error when a model declaration is invalid or a declaration file cannot be loaded.
 */
export class DeclarationError extends SchemataError {
	/** Path to the declaration file. */
	readonly declarationPath?: string;

	constructor(message: string, options?: { declarationPath?: string; suggestion?: string; cause?: unknown }) {
		super(message, "DECLARATION_ERROR", {
			suggestion:
				options?.suggestion ??
				(options?.declarationPath ? `Check the declaration file at: ${options.declarationPath}` : undefined),
			cause: options?.cause,
		});
		this.name = "DeclarationError";
		this.declarationPath = options?.declarationPath;
	}
}
