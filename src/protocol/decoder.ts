import { DecodeError, type FrameHeader } from "../errors";
import { readByteChecked, readUint16LEChecked } from "../utils/buffer";
import {
	BUZZER_ON,
	CMD_BUZZER,
	FRAME_HEADER_LENGTH,
	SENSOR_PAYLOAD_LENGTH,
} from "./constants";
import { applyTransform, isSensorId, SENSORS } from "./sensors";

export interface SensorResponse extends FrameHeader {
	kind: "sensor";
	/** Unsigned 16-bit little-endian reading */
	raw: number;
	/** Reading after the sensor's transform; unknown targets pass raw through */
	value: number;
}

export interface BuzzerResponse extends FrameHeader {
	kind: "buzzer";
	on: boolean;
}

export type ParsedResponse = SensorResponse | BuzzerResponse;

/**
 * Decodes one notification frame.
 *
 * Layout: byte 0 sequence id, byte 1 command, byte 2 target id, then the
 * payload. A frame carrying the buzzer command is a buzzer-state response
 * (payload byte 0 is the state); anything else is a sensor-value response.
 *
 * Malformed frames are returned, not thrown: the notification path logs
 * and discards them without disturbing pending requests.
 *
 * @example
 * ```typescript
 * const res = decodeFrame(Uint8Array.of(0x2a, 0x06, 0x01, 0x31, 0x00));
 * // { kind: "sensor", sequence: 42, command: 6, target: 1, raw: 49, value: -39.51 }
 * ```
 */
export function decodeFrame(frame: Uint8Array): ParsedResponse | DecodeError {
	if (frame.length < FRAME_HEADER_LENGTH) {
		return new DecodeError(
			"too-short",
			`Notification too short: ${frame.length} bytes`,
		);
	}

	const header: FrameHeader = {
		sequence: frame[0] ?? 0,
		command: frame[1] ?? 0,
		target: frame[2] ?? 0,
	};
	const payload = frame.subarray(FRAME_HEADER_LENGTH);

	if (header.command === CMD_BUZZER) {
		const state = readByteChecked(payload, 0);
		if (state === undefined) {
			return new DecodeError(
				"insufficient-payload",
				"Buzzer response carries no state byte",
				header,
			);
		}
		return { kind: "buzzer", ...header, on: state === BUZZER_ON };
	}

	const raw = readUint16LEChecked(payload, 0);
	if (raw === undefined) {
		return new DecodeError(
			"insufficient-payload",
			`Sensor value too short: got ${payload.length} bytes, need at least ${SENSOR_PAYLOAD_LENGTH}`,
			header,
		);
	}

	const value = isSensorId(header.target)
		? applyTransform(SENSORS[header.target], raw)
		: raw;

	return { kind: "sensor", ...header, raw, value };
}

export function isDecodeError(
	result: ParsedResponse | DecodeError,
): result is DecodeError {
	return result instanceof DecodeError;
}
