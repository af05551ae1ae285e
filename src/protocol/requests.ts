import {
	BUZZER_OFF,
	BUZZER_ON,
	BUZZER_TARGET,
	CMD_BUZZER,
	CMD_READ_SENSOR,
} from "./constants";

function assertByte(value: number, label: string): void {
	if (!Number.isInteger(value) || value < 0 || value > 0xff) {
		throw new RangeError(`${label} must be an integer 0-255, got ${value}`);
	}
}

/**
 * Builds a sensor read request `[seq, 0x06, sensorId]`.
 *
 * @example
 * ```typescript
 * encodeReadSensorRequest(0x2a, 0x01); // Uint8Array [0x2a, 0x06, 0x01]
 * ```
 */
export function encodeReadSensorRequest(
	sequence: number,
	sensorId: number,
): Uint8Array {
	assertByte(sequence, "Sequence id");
	assertByte(sensorId, "Sensor id");
	return Uint8Array.of(sequence, CMD_READ_SENSOR, sensorId);
}

/** Builds a buzzer state query `[seq, 0x50, 0x00]`. */
export function encodeBuzzerQuery(sequence: number): Uint8Array {
	assertByte(sequence, "Sequence id");
	return Uint8Array.of(sequence, CMD_BUZZER, BUZZER_TARGET);
}

/** Builds a buzzer set request `[seq, 0x50, 0x00, state]`. */
export function encodeBuzzerSet(sequence: number, on: boolean): Uint8Array {
	assertByte(sequence, "Sequence id");
	return Uint8Array.of(
		sequence,
		CMD_BUZZER,
		BUZZER_TARGET,
		on ? BUZZER_ON : BUZZER_OFF,
	);
}
