import { connectWithRetry, type RetryOptions, readWithTimeout } from "./ble/transport";
import { normalizeError } from "./errors";
import { DEVICE_NAME_CHARACTERISTIC } from "./protocol/constants";
import type { BLEAdapter, BLEDeviceHandle } from "./types";
import { createConsoleLogger, type Logger } from "./utils/logger";

export interface ReadDeviceNameOptions extends RetryOptions {
	/** Timeout for the characteristic read in ms (default: 5000) */
	readTimeoutMs?: number;
	logger?: Logger;
}

/**
 * Reads the standard GATT device name (`2a00`) once, for a friendly label
 * at setup. Connects with up to three attempts on transient errors and
 * always disconnects afterwards.
 *
 * Falls back to the advertised name when the characteristic is empty or
 * unreadable.
 *
 * @returns The trimmed name, or null if none could be obtained
 *
 * @example
 * ```typescript
 * const name = (await readDeviceName(adapter, "AA:BB:CC:DD:EE:FF")) ?? "EM1003";
 * ```
 */
export async function readDeviceName<THandle extends BLEDeviceHandle>(
	adapter: BLEAdapter<THandle>,
	address: string,
	options: ReadDeviceNameOptions = {},
): Promise<string | null> {
	const {
		readTimeoutMs,
		logger = createConsoleLogger("device-name"),
		...retryOptions
	} = options;

	let advertised: string | null = null;
	try {
		const { handle, connection } = await connectWithRetry(adapter, address, {
			maxAttempts: 3,
			...retryOptions,
			onRetry: (attempt, delayMs, error) => {
				logger.debug(
					`Connect attempt ${attempt} to ${address} failed, retrying in ${delayMs}ms: ${error.message}`,
				);
				retryOptions.onRetry?.(attempt, delayMs, error);
			},
		});
		advertised = handle.name?.trim() || null;

		try {
			const value = await readWithTimeout(
				connection,
				DEVICE_NAME_CHARACTERISTIC,
				readTimeoutMs,
			);
			const name = new TextDecoder("utf-8").decode(value).trim();
			if (name.length > 0) {
				logger.info(`Read device name from ${address}: ${name}`);
				return name;
			}
			logger.debug(`Device name characteristic of ${address} is empty`);
		} catch (e) {
			logger.warn(
				`Could not read device name from ${address}: ${normalizeError(e).message}`,
			);
		} finally {
			try {
				await connection.disconnect();
			} catch (e) {
				logger.debug("Error disconnecting after name read:", e);
			}
		}
	} catch (e) {
		logger.warn(
			`Could not connect to ${address} to read its name: ${normalizeError(e).message}`,
		);
		return null;
	}

	if (advertised) {
		logger.debug(`Using advertised name for ${address}: ${advertised}`);
	}
	return advertised;
}
