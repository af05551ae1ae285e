import NodeBle from "node-ble";
import { normalizeError, throwIfAborted } from "../errors";
import type {
	BLEAdapter,
	BLEConnection,
	BLEConnectOptions,
	BLEDeviceHandle,
} from "../types";
import { copyFrame } from "../utils/buffer";
import { createConsoleLogger, type Logger } from "../utils/logger";
import { normalizeUuid, uuidMatches } from "../utils/uuid";

/** A device found through BlueZ, with the D-Bus proxy used to connect. */
export interface BluezDeviceHandle extends BLEDeviceHandle {
	readonly device: NodeBle.Device;
}

export interface BluezAdapterOptions {
	/** HCI adapter name such as `"hci1"`; the default adapter otherwise */
	adapterName?: string;
	/**
	 * How long `findDevice` waits for the address to show up, in ms.
	 * @default 15000
	 */
	discoveryTimeoutMs?: number;
	logger?: Logger;
}

export interface BluezAdapter extends BLEAdapter<BluezDeviceHandle> {
	/** Releases the D-Bus connection. The adapter is unusable afterwards. */
	close(): void;
}

/**
 * BLE adapter for Linux, driving BlueZ over D-Bus through node-ble.
 *
 * The process needs D-Bus permission for `org.bluez`.
 *
 * @example
 * ```typescript
 * const adapter = createBluezAdapter({ adapterName: "hci0" });
 * const session = createSensorSession({ adapter, address, ... });
 * // on shutdown
 * await session.disconnect();
 * adapter.close();
 * ```
 */
export function createBluezAdapter(
	options: BluezAdapterOptions = {},
): BluezAdapter {
	const {
		adapterName,
		discoveryTimeoutMs = 15000,
		logger = createConsoleLogger("bluez"),
	} = options;

	let bluez: ReturnType<typeof NodeBle.createBluetooth> | undefined;
	let adapterPromise: Promise<NodeBle.Adapter> | undefined;

	function getAdapter(): Promise<NodeBle.Adapter> {
		if (!adapterPromise) {
			bluez = NodeBle.createBluetooth();
			const { bluetooth } = bluez;
			adapterPromise = adapterName
				? bluetooth.getAdapter(adapterName)
				: bluetooth.defaultAdapter();
		}
		return adapterPromise;
	}

	async function readName(device: NodeBle.Device): Promise<string | undefined> {
		try {
			return await device.getName();
		} catch (e) {
			// BlueZ has no Name property for devices that advertise none
			logger.debug("Device has no advertised name:", normalizeError(e).message);
			return undefined;
		}
	}

	async function readRssi(device: NodeBle.Device): Promise<number | undefined> {
		try {
			const rssi = Number(await device.getRSSI());
			return Number.isFinite(rssi) ? rssi : undefined;
		} catch (e) {
			logger.debug("RSSI unavailable:", normalizeError(e).message);
			return undefined;
		}
	}

	async function findDevice(address: string): Promise<BluezDeviceHandle | null> {
		const adapter = await getAdapter();
		const startedDiscovery = !(await adapter.isDiscovering());
		if (startedDiscovery) {
			await adapter.startDiscovery();
		}

		try {
			const device = await adapter.waitDevice(
				address.toUpperCase(),
				discoveryTimeoutMs,
			);
			const [name, rssi] = await Promise.all([
				readName(device),
				readRssi(device),
			]);
			return { address, name, rssi, device };
		} catch (e) {
			logger.debug(
				`Device ${address} not found within ${discoveryTimeoutMs}ms: ${normalizeError(e).message}`,
			);
			return null;
		} finally {
			if (startedDiscovery) {
				await adapter.stopDiscovery().catch((e: unknown) => {
					logger.debug("Error stopping discovery:", e);
				});
			}
		}
	}

	async function connect(
		handle: BluezDeviceHandle,
		connectOptions: BLEConnectOptions = {},
	): Promise<BLEConnection> {
		throwIfAborted(connectOptions.signal);
		await handle.device.connect();
		try {
			throwIfAborted(connectOptions.signal);
			const gatt = await handle.device.gatt();
			return createBluezConnection(handle, gatt, logger);
		} catch (e) {
			await handle.device.disconnect().catch((cleanupError: unknown) => {
				logger.debug("Error during cleanup disconnect:", cleanupError);
			});
			throw e;
		}
	}

	return {
		findDevice,
		connect,
		close(): void {
			bluez?.destroy();
			bluez = undefined;
			adapterPromise = undefined;
		},
	};
}

function createBluezConnection(
	handle: BluezDeviceHandle,
	gatt: NodeBle.GattServer,
	logger: Logger,
): BLEConnection {
	const { address, device } = handle;
	const characteristics = new Map<string, NodeBle.GattCharacteristic>();
	const disconnectCallbacks = new Set<() => void>();
	let connected = true;

	const onDeviceDisconnect = (): void => {
		if (!connected) return;
		connected = false;
		for (const callback of [...disconnectCallbacks]) {
			try {
				callback();
			} catch (e) {
				logger.error("Disconnect callback error:", e);
			}
		}
	};
	device.on("disconnect", onDeviceDisconnect);

	async function characteristic(uuid: string): Promise<NodeBle.GattCharacteristic> {
		const wanted = normalizeUuid(uuid);
		const cached = characteristics.get(wanted);
		if (cached) return cached;

		for (const serviceUuid of await gatt.services()) {
			const service = await gatt.getPrimaryService(serviceUuid);
			const match = (await service.characteristics()).find((c) =>
				uuidMatches(c, wanted),
			);
			if (match) {
				const found = await service.getCharacteristic(match);
				characteristics.set(wanted, found);
				return found;
			}
		}
		throw new Error(`Characteristic ${uuid} not found on ${address}`);
	}

	return {
		address,
		get isConnected(): boolean {
			return connected;
		},
		async write(uuid: string, data: Uint8Array): Promise<void> {
			const target = await characteristic(uuid);
			await target.writeValueWithoutResponse(Buffer.from(data));
		},
		async read(uuid: string): Promise<Uint8Array> {
			const target = await characteristic(uuid);
			return copyFrame(await target.readValue());
		},
		async subscribe(
			uuid: string,
			onData: (data: Uint8Array) => void,
		): Promise<() => Promise<void>> {
			const target = await characteristic(uuid);
			const listener = (buffer: Buffer): void => {
				onData(buffer);
			};
			await target.startNotifications();
			target.on("valuechanged", listener);

			let stopped = false;
			return async () => {
				if (stopped) return;
				stopped = true;
				target.removeListener("valuechanged", listener);
				await target.stopNotifications();
			};
		},
		async disconnect(): Promise<void> {
			connected = false;
			device.removeListener("disconnect", onDeviceDisconnect);
			disconnectCallbacks.clear();
			characteristics.clear();
			await device.disconnect();
		},
		onDisconnect(callback: () => void): () => void {
			disconnectCallbacks.add(callback);
			return () => {
				disconnectCallbacks.delete(callback);
			};
		},
	};
}
