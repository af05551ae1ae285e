/**
 * Fixed sensor table for the EM1003.
 *
 * Values arrive as unsigned 16-bit raw readings and are converted with
 * `(raw - offset) / divisor`.
 */

export type SensorId = 0x01 | 0x06 | 0x08 | 0x09 | 0x0a | 0x11 | 0x12 | 0x13;

export type SensorKey =
	| "temperature"
	| "humidity"
	| "noise"
	| "pm25"
	| "formaldehyde"
	| "pm10"
	| "tvoc"
	| "eco2";

export interface SensorTransform {
	readonly offset: number;
	readonly divisor: number;
}

export interface SensorDescriptor {
	readonly id: SensorId;
	readonly key: SensorKey;
	readonly name: string;
	readonly unit: string;
	readonly transform: SensorTransform;
	/** Suggested number of decimals when displaying the value */
	readonly precision: number;
}

const DIRECT: SensorTransform = { offset: 0, divisor: 1 };

export const SENSORS: Readonly<Record<SensorId, SensorDescriptor>> = {
	0x01: {
		id: 0x01,
		key: "temperature",
		name: "Temperature",
		unit: "°C",
		transform: { offset: 4000, divisor: 100 },
		precision: 2,
	},
	0x06: {
		id: 0x06,
		key: "humidity",
		name: "Humidity",
		unit: "%",
		transform: { offset: 0, divisor: 100 },
		precision: 1,
	},
	0x08: {
		id: 0x08,
		key: "noise",
		name: "Noise",
		unit: "dB",
		transform: DIRECT,
		precision: 0,
	},
	0x09: {
		id: 0x09,
		key: "pm25",
		name: "PM2.5",
		unit: "µg/m³",
		transform: DIRECT,
		precision: 0,
	},
	0x0a: {
		id: 0x0a,
		key: "formaldehyde",
		name: "Formaldehyde",
		unit: "mg/m³",
		transform: { offset: 16384, divisor: 1000 },
		precision: 3,
	},
	0x11: {
		id: 0x11,
		key: "pm10",
		name: "PM10",
		unit: "µg/m³",
		transform: DIRECT,
		precision: 0,
	},
	0x12: {
		id: 0x12,
		key: "tvoc",
		name: "TVOC",
		unit: "µg/m³",
		transform: DIRECT,
		precision: 0,
	},
	0x13: {
		id: 0x13,
		key: "eco2",
		name: "eCO2",
		unit: "ppm",
		transform: DIRECT,
		precision: 0,
	},
};

/**
 * Sensors every current firmware answers. Formaldehyde is decodable but
 * only present on some hardware revisions, so it is opt-in.
 */
export const DEFAULT_SENSOR_IDS: readonly SensorId[] = [
	0x01, 0x06, 0x08, 0x09, 0x11, 0x12, 0x13,
];

export function isSensorId(value: number): value is SensorId {
	return Object.hasOwn(SENSORS, value);
}

export function getSensor(id: SensorId): SensorDescriptor {
	return SENSORS[id];
}

/** Display name for logs; unknown ids are rendered as hex. */
export function sensorLabel(id: number): string {
	return isSensorId(id)
		? SENSORS[id].name
		: `0x${id.toString(16).padStart(2, "0")}`;
}

/**
 * Converts a raw reading with the sensor's transform.
 *
 * @example
 * ```typescript
 * applyTransform(SENSORS[0x01], 49);    // -39.51
 * applyTransform(SENSORS[0x06], 10000); // 100
 * ```
 */
export function applyTransform(
	descriptor: SensorDescriptor,
	raw: number,
): number {
	const { offset, divisor } = descriptor.transform;
	return (raw - offset) / divisor;
}
