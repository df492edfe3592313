/**
 * Filesystem module exports.
 */

export { DECLARATION_FILENAMES, findDeclarationFile, readDeclarations } from "./declarations.js";

export { DeclarationCache } from "./declaration-cache.js";
