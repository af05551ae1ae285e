import pRetry, { AbortError as PRetryAbortError } from "p-retry";
import {
	DeviceNotFoundError,
	isTransientBLEError,
	normalizeError,
	throwIfAborted,
	withTimeout,
} from "../errors/errors";
import type { BLEAdapter, BLEConnection, BLEDeviceHandle } from "../types";

/** Default timeout for BLE write operations in milliseconds */
export const DEFAULT_WRITE_TIMEOUT_MS = 5000;

/** Default timeout for BLE read operations in milliseconds */
export const DEFAULT_READ_TIMEOUT_MS = 5000;

/**
 * Writes a frame to a characteristic with a timeout.
 * BLE writes can hang indefinitely, so every request frame goes through this.
 *
 * @warning **Non-cancellable Operation**: the timeout rejects early, but the
 * underlying write continues in the background and the device may still
 * process the frame. A late response is then unmatched and discarded.
 *
 * @throws Error if data is empty
 * @throws TimeoutError if the operation times out
 */
export async function writeWithTimeout(
	connection: BLEConnection,
	characteristic: string,
	data: Uint8Array,
	timeoutMs: number = DEFAULT_WRITE_TIMEOUT_MS,
): Promise<void> {
	if (data.byteLength === 0) {
		throw new Error(
			"Empty data: cannot write zero bytes to BLE characteristic",
		);
	}

	await withTimeout(
		connection.write(characteristic, data),
		timeoutMs,
		"BLE write",
	);
}

/**
 * Reads a characteristic with a timeout.
 *
 * @throws TimeoutError if the read takes too long
 */
export async function readWithTimeout(
	connection: BLEConnection,
	characteristic: string,
	timeoutMs: number = DEFAULT_READ_TIMEOUT_MS,
): Promise<Uint8Array> {
	return withTimeout(connection.read(characteristic), timeoutMs, "BLE read");
}

/**
 * Options for configuring retry behavior with exponential backoff.
 */
export interface RetryOptions {
	/** Maximum number of attempts, the first included (default: 3) */
	maxAttempts?: number;
	/** Initial delay in ms (default: 1000) */
	initialDelayMs?: number;
	/** Maximum delay in ms (default: 30000) */
	maxDelayMs?: number;
	/** Multiplier for exponential backoff (default: 2) */
	backoffMultiplier?: number;
	/** Add random jitter between attempts (default: true) */
	jitter?: boolean;
	/** AbortSignal to cancel retries */
	signal?: AbortSignal;
	/** Called before each retry with attempt number and delay */
	onRetry?: (attempt: number, delayMs: number, error: Error) => void;
	/** Predicate to determine if error is retryable (default: isTransientBLEError) */
	isRetryable?: (error: Error) => boolean;
}

/**
 * Executes an operation with automatic retry and exponential backoff.
 * Uses p-retry under the hood.
 *
 * Radio-level retries belong here and in the host's BLE stack; the
 * session's own operations never retry, the circuit breaker decides.
 *
 * @example
 * ```typescript
 * const name = await withRetry(() => readName(connection), {
 *   maxAttempts: 3,
 *   onRetry: (attempt, delay, error) => {
 *     console.log(`Retry ${attempt} after ${delay}ms: ${error.message}`);
 *   },
 * });
 * ```
 *
 * @throws The last error if all attempts fail, the first non-retryable
 * error, or AbortError if cancelled
 */
export async function withRetry<T>(
	operation: () => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const {
		maxAttempts = 3,
		initialDelayMs = 1000,
		maxDelayMs = 30000,
		backoffMultiplier = 2,
		jitter = true,
		signal,
		onRetry,
		isRetryable = isTransientBLEError,
	} = options;

	if (maxAttempts < 1) {
		throw new RangeError(`maxAttempts must be >= 1, got ${maxAttempts}`);
	}

	throwIfAborted(signal);

	// p-retry requires minTimeout <= maxTimeout
	const effectiveInitialDelay = Math.min(initialDelayMs, maxDelayMs);

	try {
		return await pRetry(
			async () => {
				try {
					return await operation();
				} catch (e) {
					const error = normalizeError(e);
					// p-retry rejects with the wrapped original error
					if (!isRetryable(error)) {
						throw new PRetryAbortError(error);
					}
					throw error;
				}
			},
			{
				// p-retry counts retries after the first attempt
				retries: maxAttempts - 1,
				minTimeout: effectiveInitialDelay,
				maxTimeout: maxDelayMs,
				factor: backoffMultiplier,
				randomize: jitter,
				...(signal && { signal }),
				onFailedAttempt: (error) => {
					if (error.retriesLeft > 0 && onRetry) {
						// Approximate; p-retry handles the actual timing
						const attempt = error.attemptNumber;
						const delayMs = Math.min(
							effectiveInitialDelay * backoffMultiplier ** (attempt - 1),
							maxDelayMs,
						);
						onRetry(attempt, delayMs, error);
					}
				},
			},
		);
	} catch (e) {
		// Surface cancellation as our AbortError whatever p-retry rejected with
		throwIfAborted(signal);
		throw e;
	}
}

/**
 * Finds and connects to a device with automatic retry on transient
 * failures. An absent device fails at once with DeviceNotFoundError.
 *
 * @example
 * ```typescript
 * const connection = await connectWithRetry(adapter, "AA:BB:CC:DD:EE:FF", {
 *   maxAttempts: 3,
 * });
 * ```
 */
export async function connectWithRetry<THandle extends BLEDeviceHandle>(
	adapter: BLEAdapter<THandle>,
	address: string,
	retryOptions: RetryOptions = {},
): Promise<{ handle: THandle; connection: BLEConnection }> {
	const { signal } = retryOptions;

	return withRetry(async () => {
		const handle = await adapter.findDevice(address);
		if (!handle) {
			throw new DeviceNotFoundError(address);
		}
		const connection = await adapter.connect(handle, signal ? { signal } : {});
		return { handle, connection };
	}, retryOptions);
}
