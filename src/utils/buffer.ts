/** Helper to safely read a byte with bounds checking */
function safeReadByte(data: Uint8Array, offset: number): number | undefined {
	if (offset < 0 || offset >= data.length) {
		return undefined;
	}
	return data[offset];
}

/**
 * Reads a single byte, returning undefined for invalid offsets so a
 * missing byte is never confused with a zero byte.
 */
export function readByteChecked(
	data: Uint8Array,
	offset: number,
): number | undefined {
	return safeReadByte(data, offset);
}

/**
 * Reads an unsigned 16-bit little-endian value, returning undefined when
 * fewer than two bytes are available at `offset`.
 *
 * @example
 * ```typescript
 * readUint16LEChecked(new Uint8Array([0x10, 0x27]), 0); // 10000
 * readUint16LEChecked(new Uint8Array([0x10]), 0);       // undefined
 * ```
 */
export function readUint16LEChecked(
	data: Uint8Array,
	offset: number,
): number | undefined {
	const b0 = safeReadByte(data, offset);
	const b1 = safeReadByte(data, offset + 1);
	if (b0 === undefined || b1 === undefined) {
		return undefined;
	}
	return b0 | (b1 << 8);
}

/**
 * Formats bytes as space-separated lowercase hex, the form used in every
 * TX/RX log line.
 *
 * @example
 * ```typescript
 * toHex(new Uint8Array([0x2a, 0x06, 0x01])); // "2a 06 01"
 * ```
 */
export function toHex(data: Uint8Array): string {
	return Array.from(data, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

/** Formats a single byte as `0x`-prefixed hex, e.g. `0x0a`. */
export function toHexByte(value: number): string {
	return `0x${(value & 0xff).toString(16).padStart(2, "0")}`;
}

/**
 * Copies a transport buffer into a fresh Uint8Array so later mutation or
 * pooling of the source (Node Buffers are pooled) cannot alter a frame
 * that is still queued.
 */
export function copyFrame(data: Uint8Array): Uint8Array {
	const copy = new Uint8Array(data.byteLength);
	copy.set(data);
	return copy;
}
