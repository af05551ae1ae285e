/**
 * Custom error class for timeout operations.
 *
 * Note: The underlying BLE operation may still complete in the background
 * after a timeout is thrown. Neither BlueZ nor most other stacks support
 * true cancellation of an in-flight GATT operation.
 */
export class TimeoutError extends Error {
	constructor(
		public readonly operation: string,
		public readonly timeout: number,
	) {
		super(`${operation} timed out after ${timeout}ms`);
		this.name = "TimeoutError";
	}
}

/**
 * Error thrown when an operation is cancelled through an AbortSignal.
 */
export class AbortError extends Error {
	constructor(message = "Operation aborted") {
		super(message);
		this.name = "AbortError";
	}
}

/**
 * Throws an AbortError if the given signal is aborted.
 * Use this at the start of async operations to fail fast on abort.
 */
export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		const reason: unknown = signal.reason;
		const message =
			reason instanceof Error
				? reason.message
				: typeof reason === "string"
					? reason
					: "Operation aborted";
		throw new AbortError(message);
	}
}

/**
 * Error thrown when attempting an operation that requires a connection
 * but the device is not connected.
 */
export class NotConnectedError extends Error {
	constructor() {
		super("Not connected to device");
		this.name = "NotConnectedError";
	}
}

/**
 * Base class for every failure to obtain a usable connection. The session
 * records a circuit-breaker failure and clears its cached handle whenever
 * one of these escapes `ensureConnected()`.
 */
export class ConnectionError extends Error {
	constructor(
		message: string,
		public readonly address: string,
	) {
		super(message);
		this.name = "ConnectionError";
	}
}

/** The BLE layer has no connectable device for the address. */
export class DeviceNotFoundError extends ConnectionError {
	constructor(address: string) {
		super(
			`Device not found: ${address}. Make sure the device is powered on and nearby.`,
			address,
		);
		this.name = "DeviceNotFoundError";
	}
}

/**
 * Failure categories for a transport-level connect. Only `abort` feeds the
 * adaptive reconnect backoff; the rest are diagnostic.
 */
export type ConnectFailureKind =
	| "abort"
	| "timeout"
	| "unreachable"
	| "auth"
	| "busy"
	| "other";

/** The transport connect itself failed. */
export class TransportConnectError extends ConnectionError {
	constructor(
		address: string,
		public readonly kind: ConnectFailureKind,
		public override readonly cause: Error,
	) {
		super(`Connection to ${address} failed (${kind}): ${cause.message}`, address);
		this.name = "TransportConnectError";
	}
}

/** Connected, but enabling notifications failed; the link was torn down. */
export class SubscriptionError extends ConnectionError {
	constructor(
		address: string,
		public override readonly cause: Error,
	) {
		super(
			`Failed to subscribe to notifications on ${address}: ${cause.message}`,
			address,
		);
		this.name = "SubscriptionError";
	}
}

/** Rejected without touching the radio because a connect failed moments ago. */
export class FastFailError extends ConnectionError {
	constructor(
		address: string,
		public readonly sinceFailureMs: number,
		public readonly remainingMs: number,
	) {
		super(
			`Fast-fail: connection to ${address} failed ${Math.round(sinceFailureMs / 1000)}s ago, ` +
				`will retry after ${Math.round(remainingMs / 1000)}s`,
			address,
		);
		this.name = "FastFailError";
	}
}

/** Header fields of a frame, present whenever at least 3 bytes arrived. */
export interface FrameHeader {
	sequence: number;
	command: number;
	target: number;
}

export type DecodeErrorReason = "too-short" | "insufficient-payload";

/**
 * A notification that cannot be decoded. Not fatal: the frame is logged
 * and discarded. When the header was readable it is attached so the
 * matching request can be completed as "device returned no data".
 */
export class DecodeError extends Error {
	constructor(
		public readonly reason: DecodeErrorReason,
		message: string,
		public readonly header?: FrameHeader,
	) {
		super(message);
		this.name = "DecodeError";
	}
}

/**
 * Normalizes any thrown value into an Error instance.
 * Ensures consistent error handling throughout the codebase.
 */
export function normalizeError(e: unknown): Error {
	if (e instanceof Error) {
		return e;
	}

	if (e === null) {
		return new Error("null");
	}

	if (e === undefined) {
		return new Error("undefined");
	}

	if (typeof e === "string") {
		return new Error(e);
	}

	if (typeof e === "object") {
		try {
			return new Error(JSON.stringify(e));
		} catch {
			// Circular reference or other JSON error
			return new Error(String(e));
		}
	}

	return new Error(String(e));
}

/**
 * Wraps a promise with a timeout.
 * If the promise doesn't resolve/reject within the specified time,
 * rejects with a TimeoutError.
 *
 * **Important:** This does NOT cancel the underlying operation.
 * The original promise continues running in the background even after
 * timeout. For BLE operations, this means a write may still complete
 * after the timeout rejects.
 *
 * @param promise - The promise to wrap with a timeout
 * @param ms - Timeout duration in milliseconds
 * @param label - Descriptive label for the operation (used in error message)
 * @throws {TimeoutError} If the operation times out
 */
export function withTimeout<T>(
	promise: Promise<T>,
	ms: number,
	label: string,
): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timeoutId = setTimeout(() => {
			reject(new TimeoutError(label, ms));
		}, ms);

		promise
			.then((value) => {
				clearTimeout(timeoutId);
				resolve(value);
			})
			.catch((error: unknown) => {
				clearTimeout(timeoutId);
				reject(error);
			});
	});
}

const ABORT_PATTERNS = ["connection abort", "software caused connection abort"];
const TIMEOUT_PATTERNS = ["timeout", "timed out"];
const UNREACHABLE_PATTERNS = [
	"device unreachable",
	"no route to host",
	"host is down",
];
const AUTH_PATTERNS = ["authentication", "pairing"];
const BUSY_PATTERNS = ["resource busy", "device busy", "in progress"];

function matchesAny(message: string, patterns: readonly string[]): boolean {
	return patterns.some((pattern) => message.includes(pattern));
}

/**
 * Classifies a transport connect failure from its message and type.
 *
 * "Connection abort" errors (BlueZ `le-connection-abort-by-local`,
 * `ECONNABORTED`) typically follow a reconnect issued too soon after an
 * abrupt disconnect; they are the only kind that grows the reconnect delay.
 *
 * @example
 * ```typescript
 * classifyConnectError(new Error("le-connection-abort-by-local")); // "abort"
 * classifyConnectError(new TimeoutError("BLE connect", 30000));    // "timeout"
 * ```
 */
export function classifyConnectError(error: Error): ConnectFailureKind {
	const message = error.message.toLowerCase();

	if (
		matchesAny(message, ABORT_PATTERNS) ||
		message.includes("connection-abort")
	) {
		return "abort";
	}
	if (error instanceof TimeoutError || matchesAny(message, TIMEOUT_PATTERNS)) {
		return "timeout";
	}
	if (matchesAny(message, UNREACHABLE_PATTERNS)) {
		return "unreachable";
	}
	if (matchesAny(message, AUTH_PATTERNS)) {
		return "auth";
	}
	if (matchesAny(message, BUSY_PATTERNS)) {
		return "busy";
	}
	return "other";
}

/**
 * Determines if a BLE error is transient and worth retrying.
 *
 * Retries on:
 * - Timeout errors
 * - Connection aborts and disconnects
 * - GATT/D-Bus operation failures
 *
 * Does NOT retry on:
 * - Cancellation (AbortError)
 * - Device not found
 * - Authentication/pairing and permission errors
 * - Unknown errors (fail-fast behavior for safety)
 */
export function isTransientBLEError(error: Error): boolean {
	if (
		error instanceof DeviceNotFoundError ||
		error instanceof AbortError ||
		error.name === "AbortError"
	) {
		return false;
	}

	if (error instanceof TimeoutError || error.name === "TimeoutError") {
		return true;
	}

	const message = error.message.toLowerCase();
	const name = error.name.toLowerCase();

	const nonRetryablePatterns = [
		"not found",
		"permission denied",
		"notpermitted",
		"authentication",
		"pairing",
	];

	for (const pattern of nonRetryablePatterns) {
		if (message.includes(pattern) || name.includes(pattern)) {
			return false;
		}
	}

	const retryablePatterns = [
		"abort",
		"gatt",
		"connection",
		"disconnect",
		"operation failed",
		"not connected",
		"in progress",
	];

	for (const pattern of retryablePatterns) {
		if (message.includes(pattern) || name.includes(pattern)) {
			return true;
		}
	}

	// Default: do NOT retry unknown errors (fail-fast for safety)
	return false;
}
