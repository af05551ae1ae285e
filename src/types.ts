/**
 * @fileoverview Core type definitions for em1003-ble.
 *
 * ## Null vs Undefined Conventions
 *
 * - **`null`**: Intentionally empty or "not found"
 *   - `findDevice()` returns `null` when the address is not discoverable
 *   - a sensor reading is `null` when it was requested and produced no value
 *   - `readDeviceName()` returns `null` when no name could be obtained
 *
 * - **`undefined`**: Not set yet or optional property
 *   - `BLEDeviceHandle.name` is `undefined` when the device advertised none
 *   - Optional interface properties use `undefined` for unset values
 *
 * In a `SensorSnapshot`, a missing key means the sensor was never requested
 * while a `null` value means it was requested and no value arrived.
 */

import type { SensorId } from "./protocol/sensors";

/**
 * A discovered peripheral, as returned by {@link BLEAdapter.findDevice}.
 * Adapters may extend it with their own native object.
 */
export interface BLEDeviceHandle {
	/** Bluetooth address, e.g. `"AA:BB:CC:DD:EE:FF"` */
	readonly address: string;
	/** Advertised local name, when one was seen */
	readonly name: string | undefined;
	/** Last known signal strength in dBm */
	readonly rssi?: number | undefined;
}

/**
 * Options for {@link BLEAdapter.connect}.
 */
export interface BLEConnectOptions {
	/** AbortSignal to cancel the connection attempt */
	signal?: AbortSignal;
}

/**
 * A live GATT connection. Characteristics are addressed by UUID in short
 * (`"2a00"`) or full 128-bit form.
 *
 * The session treats any rejection from these methods as proof the link
 * is unusable and discards the connection.
 */
export interface BLEConnection {
	readonly address: string;
	/** False once the link dropped or `disconnect()` ran */
	readonly isConnected: boolean;
	/** Writes without waiting for a GATT-level acknowledgement */
	write(characteristic: string, data: Uint8Array): Promise<void>;
	read(characteristic: string): Promise<Uint8Array>;
	/**
	 * Enables notifications and routes every value to `onData`.
	 * @returns A function that stops notifications
	 */
	subscribe(
		characteristic: string,
		onData: (data: Uint8Array) => void,
	): Promise<() => Promise<void>>;
	disconnect(): Promise<void>;
	/**
	 * Registers a callback for link loss. Adapters that cannot report it
	 * leave this out; the session then relies on `isConnected`.
	 * @returns Unsubscribe function
	 */
	onDisconnect?(callback: () => void): () => void;
}

/**
 * The BLE stack the session drives. Scanning, pairing and radio-level
 * retries live behind this interface.
 *
 * @example Test double
 * ```typescript
 * const adapter: BLEAdapter = {
 *   findDevice: async (address) => ({ address, name: "EM1003" }),
 *   connect: async (handle) => createFakeConnection(handle.address),
 * };
 * ```
 */
export interface BLEAdapter<THandle extends BLEDeviceHandle = BLEDeviceHandle> {
	/** Resolves the address to a connectable handle, or `null` if absent */
	findDevice(address: string): Promise<THandle | null>;
	connect(handle: THandle, options?: BLEConnectOptions): Promise<BLEConnection>;
}

/**
 * Result of one batch read. Keys are the sensors requested; `null` marks a
 * sensor that produced no value.
 */
export type SensorSnapshot = Map<SensorId, number | null>;
