/** Bluetooth Base UUID suffix for constructing full UUIDs */
export const BLUETOOTH_UUID_BASE = "-0000-1000-8000-00805f9b34fb";

const FULL_UUID_PATTERN =
	/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/**
 * Converts a short UUID to a full Bluetooth Base UUID.
 * @param shortId - A number (0-65535) or hex string (1-4 chars)
 * @throws RangeError if number is out of 16-bit range
 * @throws Error if string is invalid hex or empty
 *
 * @example
 * ```typescript
 * toFullUuid(0x2a00);  // "00002a00-0000-1000-8000-00805f9b34fb"
 * toFullUuid("2A00");  // "00002a00-0000-1000-8000-00805f9b34fb"
 * ```
 */
export function toFullUuid(shortId: number | string): string {
	if (typeof shortId === "number") {
		if (!Number.isInteger(shortId) || shortId < 0 || shortId > 0xffff) {
			throw new RangeError(
				`Short UUID must be integer 0-65535, got ${shortId}`,
			);
		}
		return `0000${shortId.toString(16).padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
	}

	if (shortId.length === 0 || shortId.length > 4) {
		throw new Error(
			`Invalid short UUID length: ${shortId.length} (must be 1-4)`,
		);
	}

	if (!/^[0-9a-fA-F]+$/.test(shortId)) {
		throw new Error(`Invalid short UUID format: ${shortId} (must be hex)`);
	}

	return `0000${shortId.toLowerCase().padStart(4, "0")}${BLUETOOTH_UUID_BASE}`;
}

/**
 * Normalizes a characteristic or service identifier to its lowercase
 * 128-bit form. Short ids (1-4 hex chars) are expanded over the Bluetooth
 * Base UUID; full UUIDs are lowercased and validated.
 *
 * BlueZ reports every UUID in the full lowercase form, so lookups compare
 * against the result of this function.
 *
 * @throws Error if the value is neither a short id nor a full UUID
 */
export function normalizeUuid(uuid: string): string {
	const trimmed = uuid.trim().toLowerCase();
	if (trimmed.length <= 4) {
		return toFullUuid(trimmed);
	}
	if (!FULL_UUID_PATTERN.test(trimmed)) {
		throw new Error(`Invalid UUID: ${uuid}`);
	}
	return trimmed;
}

/**
 * Checks whether two UUIDs name the same attribute, whatever form
 * (short or full, any case) each one is written in.
 *
 * @example
 * ```typescript
 * uuidMatches("00002a00-0000-1000-8000-00805f9b34fb", "2a00"); // true
 * uuidMatches("2A00", "2a00");                                 // true
 * uuidMatches("not-a-uuid", "2a00");                           // false
 * ```
 */
export function uuidMatches(a: string, b: string): boolean {
	try {
		return normalizeUuid(a) === normalizeUuid(b);
	} catch {
		return false;
	}
}
