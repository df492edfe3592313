/**
 * @title Configuration Module
 * @description Runtime configuration from environment variables.
 *
 * @module config
 *
 * @envvar SCHEMATA_LOG_LEVEL - Log level (fatal, error, warn, info, debug, trace, silent). Default: info.
 * @envvar SCHEMATA_ALLOW_UNKNOWN_DATA - Default unknown-attribute policy for validate()
 *   when neither the call nor the model sets one. Default: true.
 *
 * The uppercase variants take precedence over lowercase if both are set.
 *
 * @example Forbidding unknown attributes everywhere
 * ```bash
 * export SCHEMATA_ALLOW_UNKNOWN_DATA=false
 * ```
 */

/** Levels understood by the logger. */
export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Schemata configuration.
 */
export interface SchemataConfig {
	/** Minimum level of emitted log records. */
	logLevel: LogLevel;
	/** Fallback unknown-attribute policy for model validation. */
	allowUnknownData: boolean;
}

export const DEFAULT_CONFIG: Readonly<SchemataConfig> = Object.freeze({
	logLevel: "info",
	allowUnknownData: true,
});

type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Get a variable from the environment, checking uppercase first, then lowercase.
 */
function getEnv(env: Environment, name: string): string | undefined {
	return env[name.toUpperCase()] ?? env[name.toLowerCase()];
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse a log level, falling back to the default for unknown values.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
	const level = value?.trim().toLowerCase();
	return level && isLogLevel(level) ? level : DEFAULT_CONFIG.logLevel;
}

/**
 * Parse a boolean flag. Unset or unrecognised values yield the fallback.
 */
export function parseBooleanFlag(value: string | undefined, fallback: boolean): boolean {
	switch (value?.trim().toLowerCase()) {
		case "1":
		case "true":
		case "yes":
		case "on":
			return true;
		case "0":
		case "false":
		case "no":
		case "off":
			return false;
		default:
			return fallback;
	}
}

/**
 * Read configuration from an environment.
 *
 * @param env - Environment variables (defaults to process.env)
 * @returns Parsed configuration
 */
export function getConfig(env: Environment = process.env): SchemataConfig {
	return {
		logLevel: parseLogLevel(getEnv(env, "SCHEMATA_LOG_LEVEL")),
		allowUnknownData: parseBooleanFlag(getEnv(env, "SCHEMATA_ALLOW_UNKNOWN_DATA"), DEFAULT_CONFIG.allowUnknownData),
	};
}

let current: SchemataConfig | undefined;

/**
 * Configuration of the running process, read once on first access.
 */
export function config(): SchemataConfig {
	current ??= getConfig();
	return current;
}
