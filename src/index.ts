/**
 * em1003-ble - Session engine for EM1003 BLE air-quality sensors.
 *
 * @packageDocumentation
 *
 * @example Basic usage
 * ```typescript
 * import {
 *   createBluezAdapter,
 *   createSensorSession,
 *   readDeviceName,
 *   SENSORS,
 * } from "em1003-ble";
 *
 * const adapter = createBluezAdapter();
 * const address = "AA:BB:CC:DD:EE:FF";
 * // Vendor characteristics of the unit at hand
 * const WRITE_UUID = "0000fff1-0000-1000-8000-00805f9b34fb";
 * const NOTIFY_UUID = "0000fff4-0000-1000-8000-00805f9b34fb";
 * const label = (await readDeviceName(adapter, address)) ?? "EM1003";
 *
 * const session = createSensorSession({
 *   adapter,
 *   address,
 *   writeCharacteristic: WRITE_UUID,
 *   notifyCharacteristic: NOTIFY_UUID,
 * });
 *
 * for (const [id, value] of await session.readAllSensors()) {
 *   const { name, unit } = SENSORS[id];
 *   console.log(label, name, value ?? "unavailable", unit);
 * }
 * ```
 */

// Adapter
export {
	type BluezAdapter,
	type BluezAdapterOptions,
	type BluezDeviceHandle,
	createBluezAdapter,
} from "./adapter";
// Async utilities
export { createOperationQueue, type OperationQueue, sleep } from "./async";
// BLE transport
export {
	connectWithRetry,
	type RetryOptions,
	readWithTimeout,
	withRetry,
	writeWithTimeout,
} from "./ble";
// Configuration
export {
	DEFAULTS,
	type DisconnectPolicy,
	resolveSessionConfig,
	type SessionConfig,
	type SessionConfigOptions,
	type SessionTimings,
} from "./config";
export { type ReadDeviceNameOptions, readDeviceName } from "./device-name";
// Errors
export {
	AbortError,
	type ConnectFailureKind,
	ConnectionError,
	classifyConnectError,
	DecodeError,
	type DecodeErrorReason,
	DeviceNotFoundError,
	FastFailError,
	type FrameHeader,
	isTransientBLEError,
	NotConnectedError,
	normalizeError,
	SubscriptionError,
	TimeoutError,
	TransportConnectError,
	withTimeout,
} from "./errors";
// Wire protocol
export {
	applyTransform,
	type BuzzerResponse,
	DEFAULT_SENSOR_IDS,
	decodeFrame,
	encodeBuzzerQuery,
	encodeBuzzerSet,
	encodeReadSensorRequest,
	getSensor,
	isDecodeError,
	isSensorId,
	type ParsedResponse,
	SENSORS,
	type SensorDescriptor,
	type SensorId,
	type SensorKey,
	type SensorResponse,
	sensorLabel,
} from "./protocol";
// Session engine
export {
	type AttemptDecision,
	type CancelReason,
	type CircuitBreaker,
	type CircuitState,
	type CircuitStateKind,
	type ConnectionSession,
	createCircuitBreaker,
	createConnectionSession,
	createNotificationMailbox,
	createPendingRequestTable,
	createSensorSession,
	createSequenceIdAllocator,
	type NotificationMailbox,
	type PendingRequestTable,
	type PendingSlot,
	type RequestKey,
	type SensorSession,
	type SensorSessionEvents,
	type SensorSessionOptions,
	type SequenceIdAllocator,
	type SlotOutcome,
} from "./session";
// State management
export {
	type ConnectionState,
	createEventEmitter,
	createStateMachine,
	type EventMap,
	type StateMachine,
	type TransitionCallback,
	type TypedEventEmitter,
} from "./state";
// Core types
export type {
	BLEAdapter,
	BLEConnection,
	BLEConnectOptions,
	BLEDeviceHandle,
	SensorSnapshot,
} from "./types";
// Utilities
export {
	createConsoleLogger,
	type Logger,
	silentLogger,
	toHex,
} from "./utils";
