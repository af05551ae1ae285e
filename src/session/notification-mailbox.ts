import { copyFrame, toHex } from "../utils/buffer";
import { type Logger, silentLogger } from "../utils/logger";

export interface NotificationMailboxOptions {
	/** Consumes one frame; called in arrival order */
	deliver: (frame: Uint8Array) => void;
	/**
	 * Frames held before the oldest is dropped.
	 * @default 32
	 */
	capacity?: number;
	logger?: Logger;
}

/**
 * Decouples the transport's notification callback from frame handling.
 *
 * The transport pushes and returns at once; frames are delivered on a
 * microtask, in order, one at a time. A frame is copied on arrival since
 * the transport may reuse its buffer.
 */
export interface NotificationMailbox {
	push(frame: Uint8Array): void;
	/** Drops every undelivered frame */
	clear(): void;
	readonly size: number;
}

export function createNotificationMailbox(
	options: NotificationMailboxOptions,
): NotificationMailbox {
	const { deliver, capacity = 32, logger = silentLogger } = options;

	if (!Number.isInteger(capacity) || capacity < 1) {
		throw new RangeError(`capacity must be an integer >= 1, got ${capacity}`);
	}

	const frames: Uint8Array[] = [];
	let scheduled = false;

	function drain(): void {
		scheduled = false;
		let frame = frames.shift();
		while (frame !== undefined) {
			try {
				deliver(frame);
			} catch (e) {
				logger.error(`Failed to handle notification ${toHex(frame)}:`, e);
			}
			frame = frames.shift();
		}
	}

	return {
		push(frame: Uint8Array): void {
			if (frames.length >= capacity) {
				const dropped = frames.shift();
				if (dropped) {
					logger.warn(`Mailbox full, dropping oldest frame ${toHex(dropped)}`);
				}
			}
			frames.push(copyFrame(frame));
			if (!scheduled) {
				scheduled = true;
				queueMicrotask(drain);
			}
		},
		clear(): void {
			frames.length = 0;
		},
		get size(): number {
			return frames.length;
		},
	};
}
