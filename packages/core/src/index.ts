/**
 * @schemata/core - Field types and validation errors for schemata.
 *
 * This library provides functionality for:
 * - Runtime value classification (type descriptors)
 * - The field type hierarchy (string, numeric, integral, list, dict, model)
 * - The validation failure taxonomy
 * - Configuration and structured logging shared by schemata packages
 */

// Type exports
export * from "./types/index.js";

// Error exports
export {
	SchemataError,
	ValidationFailure,
	NullNotAllowedError,
	TypeMismatchError,
	OutOfBoundsError,
	UnknownAttributeError,
	UnexpectedKeywordError,
	isSchemataError,
	isValidationFailure,
	getErrorMessage,
	wrapError,
	formatBounds,
	type Bounds,
	type SchemataErrorOptions,
	type ValidationFailureCode,
} from "./errors.js";

// Field exports
export * from "./fields/index.js";

// Configuration exports
export {
	LOG_LEVELS,
	DEFAULT_CONFIG,
	config,
	getConfig,
	parseLogLevel,
	parseBooleanFlag,
	type LogLevel,
	type SchemataConfig,
} from "./config.js";

// Logging exports
export { logger, createLogger, type Logger } from "./log.js";
