/**
 * Resolves after `ms` milliseconds. Non-positive delays resolve on the
 * next microtask without touching the timer queue.
 */
export function sleep(ms: number): Promise<void> {
	if (ms <= 0) {
		return Promise.resolve();
	}
	return new Promise((resolve) => {
		setTimeout(resolve, ms);
	});
}
