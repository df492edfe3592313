/**
 * @title Logging
 * @description Structured logging with pino.
 *
 * @module log
 */

import { pino, type Logger } from "pino";
import { config } from "./config.js";

export type { Logger };

export const logger: Logger = pino({
	name: "schemata",
	level: config().logLevel,
});

/**
 * Create a child logger tagged with a component name.
 *
 * @param component - Component emitting the records (e.g. "schema", "declaration")
 */
export function createLogger(component: string): Logger {
	return logger.child({ component });
}
