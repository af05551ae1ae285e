/**
 * A single-lane queue that runs async operations strictly one after
 * another. It is the session-scoped lock: the EM1003 accepts one
 * outstanding exchange at a time and the wire protocol has no
 * multiplexing, so every public session operation goes through here.
 *
 * @example
 * ```typescript
 * const queue = createOperationQueue();
 *
 * // These run sequentially, not concurrently
 * const [a, b] = await Promise.all([
 *   queue.enqueue(() => session.exchange(requestA)),
 *   queue.enqueue(() => session.exchange(requestB)),
 * ]);
 * ```
 */
export interface OperationQueue {
	/**
	 * Enqueues an operation. It runs once every previously enqueued
	 * operation has settled, whatever their outcome.
	 */
	enqueue<T>(operation: () => Promise<T>): Promise<T>;

	/** Number of operations queued or running. */
	readonly depth: number;
}

export function createOperationQueue(): OperationQueue {
	// Promise chain acting as a mutex
	let tail: Promise<void> = Promise.resolve();
	let depth = 0;

	function enqueue<T>(operation: () => Promise<T>): Promise<T> {
		depth++;

		const result = tail.then(operation);

		// Keep the chain alive whatever the operation's outcome; the caller
		// observes the rejection through `result`.
		tail = result.then(
			() => {
				depth--;
			},
			() => {
				depth--;
			},
		);

		return result;
	}

	return {
		enqueue,
		get depth(): number {
			return depth;
		},
	};
}
