import type { Logger } from "../utils/logger";

export type EventMap = { [key: string]: unknown };

/**
 * A type-safe event emitter that provides compile-time checking for event names and payloads.
 *
 * @example
 * ```typescript
 * interface SessionEvents {
 *   circuit: { from: CircuitStateKind; to: CircuitStateKind };
 *   snapshot: SensorSnapshot;
 * }
 *
 * const emitter = createEventEmitter<SessionEvents>();
 * const unsubscribe = emitter.on("snapshot", (snapshot) => render(snapshot));
 * emitter.emit("snapshot", new Map());
 * unsubscribe();
 * ```
 */
export interface TypedEventEmitter<T extends EventMap> {
	on<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	once<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	off<K extends keyof T>(event: K, callback: (data: T[K]) => void): void;
	removeAllListeners<K extends keyof T>(event?: K): void;
	emit<K extends keyof T>(event: K, data: T[K]): void;
	listenerCount<K extends keyof T>(event: K): number;
}

type Listener<T extends EventMap, K extends keyof T> = (data: T[K]) => void;

/**
 * Listener bookkeeping per event. `once` listeners are stored with their
 * wrapper so `off(event, original)` removes them too.
 */
interface Registration<T extends EventMap, K extends keyof T> {
	original: Listener<T, K>;
	invoke: Listener<T, K>;
}

export interface EventEmitterOptions {
	/** Receives errors thrown by listeners */
	logger?: Logger;
}

export function createEventEmitter<T extends EventMap>(
	options: EventEmitterOptions = {},
): TypedEventEmitter<T> {
	const { logger } = options;
	const registrations = new Map<keyof T, Registration<T, keyof T>[]>();

	function listFor<K extends keyof T>(event: K): Registration<T, K>[] {
		let list = registrations.get(event);
		if (!list) {
			list = [];
			registrations.set(event, list);
		}
		// Registrations are only ever stored under their own event key
		return list as unknown as Registration<T, K>[];
	}

	function off<K extends keyof T>(event: K, callback: Listener<T, K>): void {
		const list = registrations.get(event);
		if (!list) return;
		const index = list.findIndex((r) => r.original === callback);
		if (index !== -1) {
			list.splice(index, 1);
		}
		if (list.length === 0) {
			registrations.delete(event);
		}
	}

	function on<K extends keyof T>(
		event: K,
		callback: Listener<T, K>,
	): () => void {
		listFor(event).push({ original: callback, invoke: callback });
		return () => off(event, callback);
	}

	function once<K extends keyof T>(
		event: K,
		callback: Listener<T, K>,
	): () => void {
		const invoke: Listener<T, K> = (data) => {
			off(event, callback);
			callback(data);
		};
		listFor(event).push({ original: callback, invoke });
		return () => off(event, callback);
	}

	function removeAllListeners<K extends keyof T>(event?: K): void {
		if (event !== undefined) {
			registrations.delete(event);
		} else {
			registrations.clear();
		}
	}

	function emit<K extends keyof T>(event: K, data: T[K]): void {
		const list = registrations.get(event);
		if (!list) return;
		// Snapshot so listeners may unsubscribe while being called
		for (const registration of [...list] as unknown as Registration<T, K>[]) {
			try {
				registration.invoke(data);
			} catch (err) {
				logger?.error(`Listener for "${String(event)}" threw an error:`, err);
			}
		}
	}

	function listenerCount<K extends keyof T>(event: K): number {
		return registrations.get(event)?.length ?? 0;
	}

	return {
		on,
		once,
		off,
		removeAllListeners,
		emit,
		listenerCount,
	};
}
