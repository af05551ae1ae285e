import { createOperationQueue } from "../async/operation-queue";
import { sleep as defaultSleep } from "../async/sleep";
import { writeWithTimeout } from "../ble/transport";
import {
	resolveSessionConfig,
	type SessionConfig,
	type SessionConfigOptions,
} from "../config";
import { normalizeError, NotConnectedError } from "../errors";
import {
	BUZZER_TARGET,
	decodeFrame,
	encodeBuzzerQuery,
	encodeBuzzerSet,
	encodeReadSensorRequest,
	isDecodeError,
	type ParsedResponse,
	type SensorId,
	sensorLabel,
} from "../protocol";
import { createEventEmitter } from "../state/event-emitter";
import type { ConnectionState } from "../state/state-machine";
import type {
	BLEAdapter,
	BLEConnection,
	BLEDeviceHandle,
	SensorSnapshot,
} from "../types";
import { toHex, toHexByte } from "../utils/buffer";
import { createConsoleLogger, type Logger } from "../utils/logger";
import {
	type CircuitState,
	type CircuitStateKind,
	createCircuitBreaker,
} from "./circuit-breaker";
import { createConnectionSession } from "./connection-session";
import { createNotificationMailbox } from "./notification-mailbox";
import { createPendingRequestTable, type RequestKey } from "./pending-requests";
import { createSequenceIdAllocator } from "./sequence-allocator";

export type SensorSessionEvents = {
	circuit: { from: CircuitStateKind; to: CircuitStateKind };
	connection: { from: ConnectionState; to: ConnectionState };
	/** Every finished `readAllSensors()`, throttled batches included */
	snapshot: SensorSnapshot;
};

export interface SensorSessionOptions<THandle extends BLEDeviceHandle = BLEDeviceHandle>
	extends SessionConfigOptions {
	adapter: BLEAdapter<THandle>;
	/** Used by every component; defaults to scoped console loggers */
	logger?: Logger;
	now?: () => number;
	sleep?: (ms: number) => Promise<void>;
	/** Randomness for sequence ids */
	random?: () => number;
}

/**
 * The single entry point for talking to one EM1003.
 *
 * Every operation runs through one operation queue, so at most one
 * request is ever in flight. Per-operation failures come back as `null`
 * or `false`; only `readAllSensors()` raises, and only when no connection
 * could be obtained.
 *
 * @example
 * ```typescript
 * const session = createSensorSession({
 *   adapter: createBluezAdapter(),
 *   address: "AA:BB:CC:DD:EE:FF",
 *   writeCharacteristic: WRITE_UUID,
 *   notifyCharacteristic: NOTIFY_UUID,
 * });
 *
 * session.on("circuit", ({ to }) => setAvailable(to !== "open"));
 *
 * const snapshot = await session.readAllSensors();
 * snapshot.get(0x01); // temperature in °C, or null
 * await session.setBuzzerState(false);
 * ```
 */
export interface SensorSession {
	/** @returns The converted reading, or null when none was obtained */
	readSensor(id: SensorId): Promise<number | null>;
	/**
	 * Reads every configured sensor over one connection.
	 *
	 * While the breaker is open this returns an all-null snapshot without
	 * any I/O.
	 *
	 * @throws ConnectionError if no connection could be established
	 */
	readAllSensors(): Promise<SensorSnapshot>;
	/** @returns The reported buzzer state, or null when unknown */
	readBuzzerState(): Promise<boolean | null>;
	/** @returns true once the device reports the requested state */
	setBuzzerState(on: boolean): Promise<boolean>;
	disconnect(): Promise<void>;
	on<K extends keyof SensorSessionEvents>(
		event: K,
		callback: (data: SensorSessionEvents[K]) => void,
	): () => void;
	readonly breakerState: CircuitState;
	readonly connectionState: ConnectionState;
	readonly config: Readonly<SessionConfig>;
}

/** Outcome of one request/response exchange. */
type ExchangeResult =
	| { status: "ok"; response: ParsedResponse }
	/** The device answered with a header but no usable payload */
	| { status: "no-data" }
	| { status: "timeout" }
	/** The link failed; the connection has been discarded */
	| { status: "failed"; error: Error };

export function createSensorSession<THandle extends BLEDeviceHandle>(
	options: SensorSessionOptions<THandle>,
): SensorSession {
	const {
		adapter,
		logger: customLogger,
		now = Date.now,
		sleep = defaultSleep,
		random = Math.random,
		...configOptions
	} = options;
	const config = resolveSessionConfig(configOptions);
	const logFor = (scope: string): Logger =>
		customLogger ?? createConsoleLogger(scope);
	const logger = logFor("session");

	const events = createEventEmitter<SensorSessionEvents>({ logger });
	const queue = createOperationQueue();

	const allocator = createSequenceIdAllocator({
		random,
		logger: logFor("sequence"),
	});

	const pending = createPendingRequestTable<ParsedResponse | null>({
		now,
		logger: logFor("pending"),
		onSettle: (key) => {
			allocator.release(key.sequence);
		},
	});

	const breaker = createCircuitBreaker({
		failureThreshold: config.breakerFailureThreshold,
		baseTimeoutMs: config.breakerBaseTimeoutMs,
		maxTimeoutMs: config.breakerMaxTimeoutMs,
		now,
		logger: logFor("circuit"),
	});
	breaker.onTransition((from, to) => {
		events.emit("circuit", { from, to });
	});

	const mailbox = createNotificationMailbox({
		deliver: handleFrame,
		logger,
	});

	const connection = createConnectionSession({
		adapter,
		address: config.address,
		notifyCharacteristic: config.notifyCharacteristic,
		onNotification: (frame) => {
			mailbox.push(frame);
		},
		onConnectionClosed: (reason) => {
			mailbox.clear();
			const invalidated = pending.invalidateAll();
			if (invalidated > 0) {
				logger.debug(`Invalidated ${invalidated} pending request(s): ${reason}`);
			}
		},
		circuitBreaker: breaker,
		timings: config,
		now,
		sleep,
		logger: logFor("connection"),
	});
	connection.onTransition((from, to) => {
		events.emit("connection", { from, to });
	});

	function handleFrame(frame: Uint8Array): void {
		logger.debug(`RX ${toHex(frame)}`);
		const parsed = decodeFrame(frame);

		if (isDecodeError(parsed)) {
			const { header } = parsed;
			if (!header) {
				logger.warn(`Discarding malformed notification: ${parsed.message}`);
				return;
			}
			if (pending.resolve(header, null)) {
				logger.warn(
					`${sensorLabel(header.target)}: device returned no data (${parsed.message})`,
				);
			} else {
				logger.debug(`Unmatched short notification ${toHex(frame)}`);
			}
			return;
		}

		if (!pending.resolve(parsed, parsed)) {
			logger.debug(
				`Unmatched notification seq=${toHexByte(parsed.sequence)} target=${toHexByte(parsed.target)}`,
			);
		}
	}

	/** Gate shared by every operation; logs the remaining open window */
	function gate(operation: string): boolean {
		const decision = breaker.canAttempt();
		if (!decision.allowed) {
			logger.debug(
				`Circuit breaker ${decision.reason}, skipping ${operation} (retry in ${Math.round(decision.remainingMs / 1000)}s)`,
			);
		}
		return decision.allowed;
	}

	async function exchange(
		link: BLEConnection,
		target: number,
		encode: (sequence: number) => Uint8Array,
	): Promise<ExchangeResult> {
		const sequence = allocator.allocate();
		const key: RequestKey = { sequence, target };
		const slot = pending.register(key);
		const request = encode(sequence);

		logger.debug(`TX ${toHex(request)}`);
		try {
			await writeWithTimeout(
				link,
				config.writeCharacteristic,
				request,
				config.writeTimeoutMs,
			);
		} catch (e) {
			const error = normalizeError(e);
			pending.cancel(key, "write-failed");
			logger.warn(`Write failed for ${sensorLabel(target)}: ${error.message}`);
			await connection.discard(`write failed: ${error.message}`);
			return { status: "failed", error };
		}

		const outcome = await slot.wait(config.responseTimeoutMs);
		if (outcome.status === "cancelled") {
			if (outcome.reason === "invalidated") {
				return { status: "failed", error: new NotConnectedError() };
			}
			logger.warn(
				`No response for ${sensorLabel(target)} (seq=${toHexByte(sequence)}, ${outcome.reason})`,
			);
			return { status: "timeout" };
		}
		if (outcome.value === null) {
			return { status: "no-data" };
		}
		return { status: "ok", response: outcome.value };
	}

	async function requestSensor(
		link: BLEConnection,
		id: SensorId,
	): Promise<ExchangeResult> {
		const result = await exchange(link, id, (sequence) =>
			encodeReadSensorRequest(sequence, id),
		);
		if (result.status === "ok" && result.response.kind !== "sensor") {
			logger.warn(`${sensorLabel(id)}: unexpected ${result.response.kind} response`);
			return { status: "no-data" };
		}
		return result;
	}

	/** Connects for a single exchange; failures count against the breaker */
	async function connectOrNull(operation: string): Promise<BLEConnection | null> {
		try {
			return await connection.ensureConnected();
		} catch (e) {
			breaker.recordFailure();
			logger.warn(`${operation}: ${normalizeError(e).message}`);
			return null;
		}
	}

	/** Records the breaker outcome of a single exchange */
	function settleBreaker(result: ExchangeResult): void {
		if (result.status === "ok" || result.status === "no-data") {
			breaker.recordSuccess();
		} else {
			breaker.recordFailure();
		}
	}

	function readSensor(id: SensorId): Promise<number | null> {
		return queue.enqueue(async () => {
			const label = sensorLabel(id);
			if (!gate(`read of ${label}`)) return null;
			pending.sweepExpired(config.pendingMaxAgeMs);

			const link = await connectOrNull(`Read of ${label}`);
			if (!link) return null;

			const result = await requestSensor(link, id);
			settleBreaker(result);
			if (result.status === "ok" && result.response.kind === "sensor") {
				logger.debug(`${label} = ${result.response.value}`);
				return result.response.value;
			}
			return null;
		});
	}

	function readAllSensors(): Promise<SensorSnapshot> {
		return queue.enqueue(async () => {
			const snapshot: SensorSnapshot = new Map(
				config.sensorIds.map((id): [SensorId, number | null] => [id, null]),
			);
			if (!gate("batch read")) {
				events.emit("snapshot", new Map(snapshot));
				return snapshot;
			}
			pending.sweepExpired(config.pendingMaxAgeMs);

			let link: BLEConnection;
			try {
				link = await connection.ensureConnected();
			} catch (e) {
				breaker.recordFailure();
				await connection.discard("connect failed");
				throw e;
			}

			let responded = 0;
			const total = config.sensorIds.length;
			for (const [index, id] of config.sensorIds.entries()) {
				if (index > 0) {
					await sleep(config.pacingDelayMs);
				}
				if (!link.isConnected) {
					logger.warn(
						`Connection lost mid-batch, skipping ${total - index} remaining sensor(s)`,
					);
					break;
				}

				const result = await requestSensor(link, id);
				if (result.status === "ok" && result.response.kind === "sensor") {
					snapshot.set(id, result.response.value);
					responded++;
				} else if (result.status === "no-data") {
					responded++;
				} else if (result.status === "failed") {
					logger.warn(
						`Aborting batch after ${sensorLabel(id)}: ${result.error.message}`,
					);
					break;
				}
			}

			const ratio = responded / total;
			logger.debug(
				`Batch complete: ${responded}/${total} sensors responded (${Math.round(ratio * 100)}%)`,
			);
			if (ratio >= config.batchSuccessRatio) {
				breaker.recordSuccess();
			} else {
				breaker.recordFailure();
			}

			if (config.disconnectPolicy === "after-batch") {
				await connection.disconnect();
			}

			events.emit("snapshot", new Map(snapshot));
			return snapshot;
		});
	}

	function readBuzzerState(): Promise<boolean | null> {
		return queue.enqueue(async () => {
			if (!gate("buzzer query")) return null;
			pending.sweepExpired(config.pendingMaxAgeMs);

			const link = await connectOrNull("Buzzer query");
			if (!link) return null;

			const result = await exchange(link, BUZZER_TARGET, encodeBuzzerQuery);
			settleBreaker(result);
			if (result.status === "ok" && result.response.kind === "buzzer") {
				logger.debug(`Buzzer state = ${result.response.on ? "ON" : "OFF"}`);
				return result.response.on;
			}
			return null;
		});
	}

	function setBuzzerState(on: boolean): Promise<boolean> {
		return queue.enqueue(async () => {
			const wanted = on ? "ON" : "OFF";
			if (!gate(`buzzer ${wanted}`)) return false;
			pending.sweepExpired(config.pendingMaxAgeMs);

			const link = await connectOrNull(`Buzzer ${wanted}`);
			if (!link) return false;

			const result = await exchange(link, BUZZER_TARGET, (sequence) =>
				encodeBuzzerSet(sequence, on),
			);
			settleBreaker(result);
			if (result.status !== "ok" || result.response.kind !== "buzzer") {
				return false;
			}
			if (result.response.on !== on) {
				logger.warn(
					`Buzzer reported ${result.response.on ? "ON" : "OFF"} after request for ${wanted}`,
				);
				return false;
			}
			logger.info(`Buzzer turned ${wanted}`);
			return true;
		});
	}

	return {
		readSensor,
		readAllSensors,
		readBuzzerState,
		setBuzzerState,
		disconnect(): Promise<void> {
			return queue.enqueue(() => connection.disconnect());
		},
		on: events.on,
		get breakerState(): CircuitState {
			return breaker.getState();
		},
		get connectionState(): ConnectionState {
			return connection.getState();
		},
		config,
	};
}
