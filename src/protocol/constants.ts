/**
 * EM1003 wire protocol constants.
 *
 * Request frames: `[seq, cmd, target, ...payload]`.
 * Notification frames mirror the request header and append a
 * little-endian payload.
 */

/** Read one sensor value: `[seq, 0x06, sensorId]` */
export const CMD_READ_SENSOR = 0x06;

/** Query or set the buzzer: `[seq, 0x50, 0x00]` / `[seq, 0x50, 0x00, state]` */
export const CMD_BUZZER = 0x50;

/** Placeholder target id used by every buzzer exchange */
export const BUZZER_TARGET = 0x00;

export const BUZZER_ON = 0x01;
export const BUZZER_OFF = 0x00;

/** seq + cmd + target */
export const FRAME_HEADER_LENGTH = 3;

/** Bytes of a sensor value payload (unsigned 16-bit little-endian) */
export const SENSOR_PAYLOAD_LENGTH = 2;

/** Sequence ids are a single byte */
export const SEQUENCE_ID_SPACE = 256;

/** Standard GAP Device Name characteristic, read once at setup */
export const DEVICE_NAME_CHARACTERISTIC = "2a00";
