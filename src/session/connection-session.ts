import { sleep as defaultSleep } from "../async/sleep";
import type { SessionTimings } from "../config";
import { DEFAULTS } from "../config";
import {
	classifyConnectError,
	ConnectionError,
	DeviceNotFoundError,
	FastFailError,
	normalizeError,
	SubscriptionError,
	TimeoutError,
	TransportConnectError,
	withTimeout,
} from "../errors";
import {
	CONNECTION_TRANSITIONS,
	type ConnectionState,
	createStateMachine,
	type TransitionCallback,
} from "../state/state-machine";
import type { BLEAdapter, BLEConnection, BLEDeviceHandle } from "../types";
import { type Logger, silentLogger } from "../utils/logger";
import type { CircuitBreaker } from "./circuit-breaker";

export type ConnectionTimings = Pick<
	SessionTimings,
	| "fastFailWindowMs"
	| "baseReconnectDelayMs"
	| "abortBackoffCapMs"
	| "abortDecayMs"
	| "discoveryTimeoutMs"
	| "connectTimeoutMs"
	| "disconnectTimeoutMs"
>;

export interface ConnectionSessionOptions<THandle extends BLEDeviceHandle> {
	adapter: BLEAdapter<THandle>;
	address: string;
	/** Characteristic subscribed right after connecting */
	notifyCharacteristic: string;
	/** Receives every notification of the live connection */
	onNotification: (frame: Uint8Array) => void;
	/**
	 * Runs whenever a cached connection goes away, whether discarded,
	 * disconnected or lost. Responses can no longer arrive on it.
	 */
	onConnectionClosed?: (reason: string) => void;
	/** Fast-fail is bypassed while this breaker is half-open */
	circuitBreaker?: Pick<CircuitBreaker, "getState">;
	timings?: Partial<ConnectionTimings>;
	now?: () => number;
	sleep?: (ms: number) => Promise<void>;
	logger?: Logger;
}

/**
 * Owns the single logical connection to one device.
 *
 * @example
 * ```typescript
 * const connection = createConnectionSession({
 *   adapter,
 *   address: "AA:BB:CC:DD:EE:FF",
 *   notifyCharacteristic: NOTIFY_UUID,
 *   onNotification: (frame) => mailbox.push(frame),
 * });
 *
 * const conn = await connection.ensureConnected();
 * await conn.write(WRITE_UUID, request);
 * ```
 */
export interface ConnectionSession {
	/**
	 * Returns the live connection, connecting and subscribing first when
	 * there is none. Concurrent callers share one attempt.
	 *
	 * @throws FastFailError within the fast-fail window after a failure
	 * @throws DeviceNotFoundError if the adapter cannot find the address
	 * @throws TransportConnectError if discovery or the connect fails or times out
	 * @throws SubscriptionError if enabling notifications fails
	 */
	ensureConnected(): Promise<BLEConnection>;
	/**
	 * Stops notifications and closes the link. Safe to call when idle.
	 * Each step is bounded by `disconnectTimeoutMs`; a step that hangs is
	 * logged and abandoned.
	 */
	disconnect(): Promise<void>;
	/**
	 * Drops a connection that failed mid-exchange so the next
	 * `ensureConnected()` connects afresh.
	 */
	discard(reason: string): Promise<void>;
	readonly isConnected: boolean;
	readonly abortCount: number;
	getState(): ConnectionState;
	onTransition(callback: TransitionCallback<ConnectionState>): () => void;
}

/** Signal band for diagnostics; thresholds in dBm */
export function describeRssi(rssi: number | undefined): string {
	if (rssi === undefined) return "unknown";
	if (rssi < -90) return "very weak";
	if (rssi < -80) return "weak";
	if (rssi < -70) return "fair";
	return "good";
}

interface LiveConnection {
	connection: BLEConnection;
	unsubscribe: () => Promise<void>;
	detachDisconnect: (() => void) | undefined;
}

export function createConnectionSession<THandle extends BLEDeviceHandle>(
	options: ConnectionSessionOptions<THandle>,
): ConnectionSession {
	const {
		adapter,
		address,
		notifyCharacteristic,
		onNotification,
		onConnectionClosed,
		circuitBreaker,
		now = Date.now,
		sleep = defaultSleep,
		logger = silentLogger,
	} = options;
	const timings: ConnectionTimings = { ...DEFAULTS, ...options.timings };

	const machine = createStateMachine(CONNECTION_TRANSITIONS, "disconnected", {
		logger,
	});

	let live: LiveConnection | undefined;
	let inFlight: Promise<BLEConnection> | undefined;
	let lastFailureAt: number | undefined;
	let lastDisconnectAt: number | undefined;
	let abortCount = 0;
	let lastAbortAt: number | undefined;

	function moveTo(state: ConnectionState): void {
		if (machine.getState() !== state) {
			machine.transition(state);
		}
	}

	function abortBackoffMs(): number {
		if (lastAbortAt !== undefined && now() - lastAbortAt > timings.abortDecayMs) {
			logger.debug(`Resetting connection abort count (was ${abortCount})`);
			abortCount = 0;
			lastAbortAt = undefined;
		}
		if (abortCount === 0) {
			return 0;
		}
		return Math.min(2 ** abortCount * 1000, timings.abortBackoffCapMs);
	}

	async function waitBeforeConnect(): Promise<void> {
		const abortBackoff = abortBackoffMs();
		const minDelay = timings.baseReconnectDelayMs + abortBackoff;

		if (lastDisconnectAt !== undefined) {
			const sinceDisconnect = now() - lastDisconnectAt;
			if (sinceDisconnect < minDelay) {
				const delay = minDelay - sinceDisconnect;
				if (abortBackoff > 0) {
					logger.info(
						`Waiting ${(delay / 1000).toFixed(1)}s before reconnect (connection abort backoff)`,
					);
				}
				await sleep(delay);
			}
		} else if (abortBackoff > 0) {
			logger.info(
				`Waiting ${(abortBackoff / 1000).toFixed(1)}s before reconnect (connection abort backoff)`,
			);
			await sleep(abortBackoff);
		}
	}

	function assertNotFastFailing(): void {
		if (lastFailureAt === undefined) return;
		const sinceFailure = now() - lastFailureAt;
		if (sinceFailure >= timings.fastFailWindowMs) return;
		if (circuitBreaker?.getState().kind === "half-open") return;

		const remaining = timings.fastFailWindowMs - sinceFailure;
		logger.debug(
			`Fast-fail: connection failed ${Math.round(sinceFailure / 1000)}s ago, skipping attempt for ${Math.round(remaining / 1000)}s more`,
		);
		throw new FastFailError(address, sinceFailure, remaining);
	}

	async function connectTransport(handle: THandle): Promise<BLEConnection> {
		const startedAt = now();
		logger.info(
			`Connecting to ${address} (RSSI: ${handle.rssi ?? "N/A"}, ${describeRssi(handle.rssi)})`,
		);

		const connecting = adapter.connect(handle);
		try {
			const connection = await withTimeout(
				connecting,
				timings.connectTimeoutMs,
				"BLE connect",
			);
			logger.info(
				`Connected to ${address} in ${((now() - startedAt) / 1000).toFixed(2)}s`,
			);
			return connection;
		} catch (e) {
			const error = normalizeError(e);
			if (error instanceof TimeoutError) {
				// A connect that completes after the timeout still holds an adapter slot
				void connecting
					.then((late) => late.disconnect())
					.catch((lateError: unknown) => {
						logger.debug("Timed-out connect attempt ended with:", lateError);
					});
			}

			const kind = classifyConnectError(error);
			if (kind === "abort") {
				abortCount++;
				lastAbortAt = now();
				logger.error(
					`Connection to ${address} aborted by the Bluetooth stack (count: ${abortCount}), next backoff ${abortBackoffMs() / 1000}s`,
				);
			} else {
				logger.error(
					`Connection to ${address} failed after ${((now() - startedAt) / 1000).toFixed(2)}s (${kind}): ${error.message}; ` +
						`name=${handle.name ?? "Unknown"}, RSSI=${handle.rssi ?? "N/A"} (${describeRssi(handle.rssi)})`,
				);
			}
			throw new TransportConnectError(address, kind, error);
		}
	}

	async function findHandle(): Promise<THandle> {
		let handle: THandle | null;
		try {
			handle = await withTimeout(
				adapter.findDevice(address),
				timings.discoveryTimeoutMs,
				"BLE discovery",
			);
		} catch (e) {
			const error = normalizeError(e);
			if (error instanceof ConnectionError) throw error;
			const kind = classifyConnectError(error);
			logger.error(`Discovery of ${address} failed (${kind}): ${error.message}`);
			throw new TransportConnectError(address, kind, error);
		}
		if (!handle) {
			throw new DeviceNotFoundError(address);
		}
		return handle;
	}

	/** Runs one teardown step, giving up on it after `disconnectTimeoutMs` */
	function boundedTeardown(step: Promise<void>, label: string): Promise<void> {
		return withTimeout(step, timings.disconnectTimeoutMs, label);
	}

	async function subscribe(connection: BLEConnection): Promise<LiveConnection> {
		try {
			const unsubscribe = await withTimeout(
				connection.subscribe(notifyCharacteristic, onNotification),
				timings.connectTimeoutMs,
				"BLE subscribe",
			);
			const detachDisconnect = connection.onDisconnect?.(() => {
				handleLinkLost(connection);
			});
			return { connection, unsubscribe, detachDisconnect };
		} catch (e) {
			const error = normalizeError(e);
			logger.error(`Failed to subscribe to notifications: ${error.message}`);
			try {
				await boundedTeardown(connection.disconnect(), "BLE disconnect");
			} catch (disconnectError) {
				logger.debug("Error during cleanup disconnect:", disconnectError);
			}
			throw new SubscriptionError(address, error);
		}
	}

	async function establish(): Promise<BLEConnection> {
		assertNotFastFailing();
		moveTo("connecting");

		try {
			await waitBeforeConnect();

			const handle = await findHandle();
			const connection = await connectTransport(handle);
			live = await subscribe(connection);

			if (abortCount > 0) {
				logger.debug(`Resetting connection abort count after success (was ${abortCount})`);
			}
			abortCount = 0;
			lastAbortAt = undefined;
			lastFailureAt = undefined;
			moveTo("connected");
			logger.debug(`Connected and subscribed to ${address}`);
			return connection;
		} catch (e) {
			lastFailureAt = now();
			moveTo("error");
			throw e;
		}
	}

	function detach(reason: string): LiveConnection | undefined {
		const current = live;
		if (!current) return undefined;
		live = undefined;
		current.detachDisconnect?.();
		lastDisconnectAt = now();
		if (machine.getState() === "connected") {
			machine.transition("disconnected");
		}
		logger.debug(`Connection to ${address} closed: ${reason}`);
		onConnectionClosed?.(reason);
		return current;
	}

	function handleLinkLost(connection: BLEConnection): void {
		if (live?.connection !== connection) return;
		logger.warn(`Connection to ${address} lost`);
		detach("link lost");
	}

	async function ensureConnected(): Promise<BLEConnection> {
		if (live) {
			if (live.connection.isConnected) {
				logger.debug(`Reusing active connection to ${address}`);
				return live.connection;
			}
			await discard("stale handle");
		}

		if (!inFlight) {
			inFlight = establish().finally(() => {
				inFlight = undefined;
			});
		}
		return inFlight;
	}

	async function discard(reason: string): Promise<void> {
		const current = detach(reason);
		if (!current) return;
		try {
			await boundedTeardown(current.connection.disconnect(), "BLE disconnect");
		} catch (e) {
			logger.debug("Error disconnecting discarded connection:", e);
		}
	}

	async function disconnect(): Promise<void> {
		const current = detach("disconnect requested");
		if (!current) return;
		try {
			await boundedTeardown(current.unsubscribe(), "BLE stop notifications");
		} catch (e) {
			logger.debug("Error stopping notifications:", e);
		}
		try {
			await boundedTeardown(current.connection.disconnect(), "BLE disconnect");
			logger.debug(`Disconnected from ${address}`);
		} catch (e) {
			logger.warn("Error during disconnect:", e);
		}
	}

	return {
		ensureConnected,
		disconnect,
		discard,
		get isConnected(): boolean {
			return live?.connection.isConnected ?? false;
		},
		get abortCount(): number {
			return abortCount;
		},
		getState: machine.getState,
		onTransition: machine.onTransition,
	};
}
