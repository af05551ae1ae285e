/**
 * Minimal logging surface used throughout the library.
 *
 * Hosts can pass their own implementation (pino, winston, a Home
 * Assistant bridge...) through the `logger` option of any factory.
 * The default writes to the console with a scoped prefix.
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/** Prefix shared by every console line the library writes */
export const LOG_PREFIX = "em1003-ble";

/**
 * Creates a console-backed logger whose lines are prefixed with
 * `[em1003-ble:<scope>]`.
 *
 * @example
 * ```typescript
 * const log = createConsoleLogger("connection");
 * log.warn("Fast-fail active", { remainingMs: 12000 });
 * // [em1003-ble:connection] Fast-fail active { remainingMs: 12000 }
 * ```
 */
export function createConsoleLogger(scope: string): Logger {
	const prefix = `[${LOG_PREFIX}:${scope}]`;
	return {
		debug: (message, ...args) => console.debug(prefix, message, ...args),
		info: (message, ...args) => console.info(prefix, message, ...args),
		warn: (message, ...args) => console.warn(prefix, message, ...args),
		error: (message, ...args) => console.error(prefix, message, ...args),
	};
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
