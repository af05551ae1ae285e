import { toHexByte } from "../utils/buffer";
import { type Logger, silentLogger } from "../utils/logger";

/** Correlates a response with its request: (sequence id, target id). */
export interface RequestKey {
	sequence: number;
	target: number;
}

export type CancelReason =
	| "timeout"
	| "expired"
	| "invalidated"
	| "write-failed"
	| "replaced";

/** How a pending request ended. A slot settles exactly once. */
export type SlotOutcome<T> =
	| { status: "resolved"; value: T }
	| { status: "cancelled"; reason: CancelReason };

/**
 * Handle returned by {@link PendingRequestTable.register}.
 */
export interface PendingSlot<T> {
	readonly key: RequestKey;
	/** Epoch ms at registration */
	readonly createdAt: number;
	/** Settles once the request resolves or is cancelled */
	readonly outcome: Promise<SlotOutcome<T>>;
	/**
	 * Waits for the outcome, cancelling the request with reason `timeout`
	 * if nothing arrives within `timeoutMs`. The timer is cleared on every
	 * path so no background work outlives the wait.
	 */
	wait(timeoutMs: number): Promise<SlotOutcome<T>>;
}

export interface PendingRequestTableOptions {
	/** Current time in epoch ms; injectable for tests */
	now?: () => number;
	/**
	 * Runs once per entry, right after it leaves the table, whatever the
	 * outcome. The session releases the sequence id here.
	 */
	onSettle?: (key: RequestKey, outcome: SlotOutcome<unknown>) => void;
	logger?: Logger;
}

/**
 * Tracks in-flight requests and completes them from notifications.
 *
 * Every mutation is synchronous, so a resolve, a timeout, a sweep and an
 * invalidation can never interleave inside one of them: whichever runs
 * first removes the entry and the others find nothing to do.
 *
 * @example
 * ```typescript
 * const table = createPendingRequestTable<number | null>();
 * const slot = table.register({ sequence: 0x2a, target: 0x01 });
 * await conn.write(WRITE_UUID, encodeReadSensorRequest(0x2a, 0x01));
 *
 * // Elsewhere, from the notification path:
 * table.resolve({ sequence: 0x2a, target: 0x01 }, -39.51);
 *
 * const outcome = await slot.wait(2000);
 * // { status: "resolved", value: -39.51 }
 * ```
 */
export interface PendingRequestTable<T> {
	/**
	 * Registers a request. An existing entry under the same key is
	 * cancelled with reason `replaced` first.
	 */
	register(key: RequestKey): PendingSlot<T>;
	/**
	 * Completes the request under `key`.
	 * @returns false if no entry exists (late or unsolicited response)
	 */
	resolve(key: RequestKey, value: T): boolean;
	/** @returns false if no entry exists */
	cancel(key: RequestKey, reason: CancelReason): boolean;
	/**
	 * Cancels every entry strictly older than `maxAgeMs` with reason
	 * `expired`. An entry exactly `maxAgeMs` old is kept.
	 * @returns Number of entries removed
	 */
	sweepExpired(maxAgeMs: number): number;
	/**
	 * Cancels every entry with reason `invalidated`. Called when the
	 * connection closes: responses can no longer arrive.
	 * @returns Number of entries removed
	 */
	invalidateAll(): number;
	has(key: RequestKey): boolean;
	readonly size: number;
}

interface Entry<T> {
	key: RequestKey;
	createdAt: number;
	settle: (outcome: SlotOutcome<T>) => void;
}

function keyOf(key: RequestKey): string {
	return `${key.sequence}:${key.target}`;
}

function describeKey(key: RequestKey): string {
	return `seq=${toHexByte(key.sequence)} target=${toHexByte(key.target)}`;
}

export function createPendingRequestTable<T>(
	options: PendingRequestTableOptions = {},
): PendingRequestTable<T> {
	const { now = Date.now, onSettle, logger = silentLogger } = options;
	const entries = new Map<string, Entry<T>>();

	/**
	 * Removes the entry and settles it. The only place an entry leaves the
	 * table, so settlement happens exactly once.
	 */
	function complete(id: string, outcome: SlotOutcome<T>): boolean {
		const entry = entries.get(id);
		if (!entry) {
			return false;
		}
		entries.delete(id);
		entry.settle(outcome);
		if (onSettle) {
			try {
				onSettle(entry.key, outcome);
			} catch (e) {
				logger.error("onSettle callback threw an error:", e);
			}
		}
		return true;
	}

	function cancel(key: RequestKey, reason: CancelReason): boolean {
		return complete(keyOf(key), { status: "cancelled", reason });
	}

	function register(key: RequestKey): PendingSlot<T> {
		const id = keyOf(key);
		if (entries.has(id)) {
			logger.warn(`Replacing pending request ${describeKey(key)}`);
			complete(id, { status: "cancelled", reason: "replaced" });
		}

		let settle: (outcome: SlotOutcome<T>) => void = () => {};
		const outcome = new Promise<SlotOutcome<T>>((resolve) => {
			settle = resolve;
		});
		const createdAt = now();
		const entry: Entry<T> = { key: { ...key }, createdAt, settle };
		entries.set(id, entry);

		function wait(timeoutMs: number): Promise<SlotOutcome<T>> {
			const timeoutId = setTimeout(() => {
				// No-op when the entry already settled, or was replaced by a
				// newer request under the same key
				if (entries.get(id) === entry) {
					complete(id, { status: "cancelled", reason: "timeout" });
				}
			}, timeoutMs);
			return outcome.finally(() => {
				clearTimeout(timeoutId);
			});
		}

		return { key: entry.key, createdAt, outcome, wait };
	}

	return {
		register,
		resolve(key: RequestKey, value: T): boolean {
			return complete(keyOf(key), { status: "resolved", value });
		},
		cancel,
		sweepExpired(maxAgeMs: number): number {
			const cutoff = now();
			let removed = 0;
			for (const [id, entry] of [...entries]) {
				const age = cutoff - entry.createdAt;
				if (age > maxAgeMs) {
					logger.debug(
						`Removing stale pending request ${describeKey(entry.key)} (age ${age}ms)`,
					);
					complete(id, { status: "cancelled", reason: "expired" });
					removed++;
				}
			}
			return removed;
		},
		invalidateAll(): number {
			let removed = 0;
			for (const id of [...entries.keys()]) {
				if (complete(id, { status: "cancelled", reason: "invalidated" })) {
					removed++;
				}
			}
			return removed;
		},
		has(key: RequestKey): boolean {
			return entries.has(keyOf(key));
		},
		get size(): number {
			return entries.size;
		},
	};
}
