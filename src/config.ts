import type { SensorId } from "./protocol/sensors";
import { DEFAULT_SENSOR_IDS, isSensorId } from "./protocol/sensors";
import { normalizeUuid } from "./utils/uuid";

/**
 * When the session drops the link.
 * - `"after-batch"`: disconnect once every `readAllSensors()` finishes
 * - `"keep-alive"`: keep the link until it drops or `disconnect()` is called
 */
export type DisconnectPolicy = "after-batch" | "keep-alive";

/** Timing and threshold settings shared by every session component. */
export interface SessionTimings {
	/** Wait for one response notification, in ms */
	responseTimeoutMs: number;
	/** Delay between consecutive sensor requests in a batch, in ms */
	pacingDelayMs: number;
	/** Pending requests older than this are swept, in ms */
	pendingMaxAgeMs: number;
	/** Window after a connection failure during which connects fail fast, in ms */
	fastFailWindowMs: number;
	/** Minimum gap between a disconnect and the next connect, in ms */
	baseReconnectDelayMs: number;
	/** Upper bound of the abort-driven extra delay, in ms */
	abortBackoffCapMs: number;
	/** Quiet period after which the abort counter resets, in ms */
	abortDecayMs: number;
	/** Bound on finding the device before a connect, in ms */
	discoveryTimeoutMs: number;
	/** Bound on one transport connect, in ms */
	connectTimeoutMs: number;
	/** Bound on stopping notifications and on closing the link, each in ms */
	disconnectTimeoutMs: number;
	/** Bound on one characteristic write, in ms */
	writeTimeoutMs: number;
	/** Consecutive failures that open the circuit */
	breakerFailureThreshold: number;
	/** First open window, in ms */
	breakerBaseTimeoutMs: number;
	/** Longest open window, in ms */
	breakerMaxTimeoutMs: number;
	/** Share of a batch that must succeed for the breaker to record success */
	batchSuccessRatio: number;
	disconnectPolicy: DisconnectPolicy;
}

export const DEFAULTS: Readonly<SessionTimings> = {
	responseTimeoutMs: 2000,
	pacingDelayMs: 300,
	pendingMaxAgeMs: 10000,
	fastFailWindowMs: 30000,
	baseReconnectDelayMs: 2000,
	abortBackoffCapMs: 30000,
	abortDecayMs: 300000,
	discoveryTimeoutMs: 20000,
	connectTimeoutMs: 30000,
	disconnectTimeoutMs: 5000,
	writeTimeoutMs: 5000,
	breakerFailureThreshold: 3,
	breakerBaseTimeoutMs: 60000,
	breakerMaxTimeoutMs: 3600000,
	batchSuccessRatio: 0.5,
	disconnectPolicy: "after-batch",
};

/** Caller-facing options: the device, its characteristics and any overrides. */
export interface SessionConfigOptions extends Partial<SessionTimings> {
	/** Bluetooth address of the sensor */
	address: string;
	/** Characteristic requests are written to */
	writeCharacteristic: string;
	/** Characteristic responses are notified on */
	notifyCharacteristic: string;
	/** Sensors read by `readAllSensors()` */
	sensorIds?: readonly SensorId[];
}

export interface SessionConfig extends SessionTimings {
	address: string;
	writeCharacteristic: string;
	notifyCharacteristic: string;
	sensorIds: readonly SensorId[];
}

function assertNonNegative(name: string, value: number): void {
	if (!Number.isFinite(value) || value < 0) {
		throw new RangeError(`${name} must be a finite number >= 0, got ${value}`);
	}
}

function assertPositive(name: string, value: number): void {
	if (!Number.isFinite(value) || value <= 0) {
		throw new RangeError(`${name} must be a finite number > 0, got ${value}`);
	}
}

/**
 * Merges caller options over {@link DEFAULTS} and validates the result.
 *
 * @throws RangeError if a timing is negative or not finite, a threshold is
 * not a positive integer, the success ratio is outside [0, 1], the breaker
 * cap is below its base, or the address is empty
 * @throws Error if a characteristic UUID is malformed
 *
 * @example
 * ```typescript
 * const config = resolveSessionConfig({
 *   address: "AA:BB:CC:DD:EE:FF",
 *   writeCharacteristic: "0000fff1-0000-1000-8000-00805f9b34fb",
 *   notifyCharacteristic: "0000fff4-0000-1000-8000-00805f9b34fb",
 *   pacingDelayMs: 500,
 * });
 * config.responseTimeoutMs; // 2000
 * ```
 */
export function resolveSessionConfig(
	options: SessionConfigOptions,
): SessionConfig {
	const config: SessionConfig = {
		...DEFAULTS,
		...options,
		address: options.address.trim(),
		writeCharacteristic: normalizeUuid(options.writeCharacteristic),
		notifyCharacteristic: normalizeUuid(options.notifyCharacteristic),
		sensorIds: options.sensorIds ?? DEFAULT_SENSOR_IDS,
	};

	if (config.address.length === 0) {
		throw new RangeError("address must not be empty");
	}
	if (config.sensorIds.length === 0) {
		throw new RangeError("sensorIds must name at least one sensor");
	}
	for (const id of config.sensorIds) {
		if (!isSensorId(id)) {
			throw new RangeError(`Unknown sensor id ${id}`);
		}
	}

	assertPositive("responseTimeoutMs", config.responseTimeoutMs);
	assertNonNegative("pacingDelayMs", config.pacingDelayMs);
	assertPositive("pendingMaxAgeMs", config.pendingMaxAgeMs);
	assertNonNegative("fastFailWindowMs", config.fastFailWindowMs);
	assertNonNegative("baseReconnectDelayMs", config.baseReconnectDelayMs);
	assertNonNegative("abortBackoffCapMs", config.abortBackoffCapMs);
	assertPositive("abortDecayMs", config.abortDecayMs);
	assertPositive("discoveryTimeoutMs", config.discoveryTimeoutMs);
	assertPositive("connectTimeoutMs", config.connectTimeoutMs);
	assertPositive("disconnectTimeoutMs", config.disconnectTimeoutMs);
	assertPositive("writeTimeoutMs", config.writeTimeoutMs);
	assertPositive("breakerBaseTimeoutMs", config.breakerBaseTimeoutMs);
	assertPositive("breakerMaxTimeoutMs", config.breakerMaxTimeoutMs);

	if (
		!Number.isInteger(config.breakerFailureThreshold) ||
		config.breakerFailureThreshold < 1
	) {
		throw new RangeError(
			`breakerFailureThreshold must be an integer >= 1, got ${config.breakerFailureThreshold}`,
		);
	}
	if (config.breakerMaxTimeoutMs < config.breakerBaseTimeoutMs) {
		throw new RangeError(
			`breakerMaxTimeoutMs (${config.breakerMaxTimeoutMs}) must be >= breakerBaseTimeoutMs (${config.breakerBaseTimeoutMs})`,
		);
	}
	if (
		!Number.isFinite(config.batchSuccessRatio) ||
		config.batchSuccessRatio < 0 ||
		config.batchSuccessRatio > 1
	) {
		throw new RangeError(
			`batchSuccessRatio must be between 0 and 1, got ${config.batchSuccessRatio}`,
		);
	}
	if (
		config.disconnectPolicy !== "after-batch" &&
		config.disconnectPolicy !== "keep-alive"
	) {
		throw new RangeError(
			`disconnectPolicy must be "after-batch" or "keep-alive", got ${String(config.disconnectPolicy)}`,
		);
	}

	return config;
}
