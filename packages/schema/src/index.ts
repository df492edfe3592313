/**
 * @schemata/schema - Model schemas, registry, and declaration files.
 *
 * This library provides functionality for:
 * - Model declaration and schema resolution (multi-ancestor field inheritance)
 * - Model instances (construction, mapping import/export, validation)
 * - A registry of named models
 * - Declaration file parsing and validation (YAML and JSON)
 */

// Error exports
export { DeclarationError } from "./errors.js";

// Model exports
export * from "./model/index.js";

// Registry exports
export * from "./registry/index.js";

// Declaration exports
export * from "./declaration/index.js";

// Filesystem exports
export * from "./filesystem/index.js";
