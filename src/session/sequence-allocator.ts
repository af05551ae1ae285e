import { SEQUENCE_ID_SPACE } from "../protocol/constants";
import { toHexByte } from "../utils/buffer";
import { type Logger, silentLogger } from "../utils/logger";

export interface SequenceIdAllocatorOptions {
	/**
	 * Source of uniform randomness in [0, 1).
	 * @default Math.random
	 */
	random?: () => number;
	/**
	 * In-use count at which the whole set is dropped before allocating.
	 * @default 250
	 */
	highWaterMark?: number;
	/**
	 * Random draws before falling back to a linear scan.
	 * @default 100
	 */
	maxRandomAttempts?: number;
	logger?: Logger;
}

/**
 * Issues one-byte correlation ids for in-flight requests.
 *
 * Ids are drawn at random so requests issued close together by independent
 * callers rarely share an id, which keeps a late notification for an old
 * request from matching a new one.
 */
export interface SequenceIdAllocator {
	/** Returns an id (0-255) not currently marked in use. Never blocks or fails. */
	allocate(): number;
	/** Marks an id free again. Releasing a free id is a no-op. */
	release(id: number): void;
	isInUse(id: number): boolean;
	readonly inUseCount: number;
	clear(): void;
}

export const DEFAULT_HIGH_WATER_MARK = 250;
export const DEFAULT_MAX_RANDOM_ATTEMPTS = 100;

/**
 * Creates a sequence id allocator.
 *
 * Reaching the high-water mark clears the in-use set wholesale. An id that
 * still keys a live request can then be handed out again; the session
 * sweeps expired requests before every allocation and serializes
 * exchanges, so in practice the set never approaches the mark.
 */
export function createSequenceIdAllocator(
	options: SequenceIdAllocatorOptions = {},
): SequenceIdAllocator {
	const {
		random = Math.random,
		highWaterMark = DEFAULT_HIGH_WATER_MARK,
		maxRandomAttempts = DEFAULT_MAX_RANDOM_ATTEMPTS,
		logger = silentLogger,
	} = options;

	if (
		!Number.isInteger(highWaterMark) ||
		highWaterMark < 1 ||
		highWaterMark > SEQUENCE_ID_SPACE
	) {
		throw new RangeError(
			`highWaterMark must be an integer 1-${SEQUENCE_ID_SPACE}, got ${highWaterMark}`,
		);
	}

	const inUse = new Set<number>();

	function draw(): number {
		const id = Math.floor(random() * SEQUENCE_ID_SPACE);
		// Guard against a random source returning exactly 1
		return Math.min(Math.max(id, 0), SEQUENCE_ID_SPACE - 1);
	}

	function take(id: number): number {
		inUse.add(id);
		return id;
	}

	function allocate(): number {
		if (inUse.size >= highWaterMark) {
			logger.debug(
				`Sequence cache nearly full (${inUse.size}), clearing in-use ids`,
			);
			inUse.clear();
		}

		for (let attempt = 0; attempt < maxRandomAttempts; attempt++) {
			const id = draw();
			if (!inUse.has(id)) {
				return take(id);
			}
		}

		for (let id = 0; id < SEQUENCE_ID_SPACE; id++) {
			if (!inUse.has(id)) {
				logger.debug(`Used sequential fallback, seq=${toHexByte(id)}`);
				return take(id);
			}
		}

		// Only reachable with highWaterMark = 256
		logger.warn("All 256 sequence ids exhausted, clearing in-use ids");
		inUse.clear();
		return take(draw());
	}

	return {
		allocate,
		release(id: number): void {
			inUse.delete(id);
		},
		isInUse(id: number): boolean {
			return inUse.has(id);
		},
		get inUseCount(): number {
			return inUse.size;
		},
		clear(): void {
			inUse.clear();
		},
	};
}
