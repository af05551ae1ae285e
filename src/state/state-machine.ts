import type { Logger } from "../utils/logger";

export type TransitionCallback<S extends string> = (from: S, to: S) => void;

export type TransitionTable<S extends string> = Readonly<
	Record<S, readonly S[]>
>;

export interface StateMachine<S extends string> {
	getState(): S;
	canTransition(to: S): boolean;
	transition(to: S): void;
	onTransition(callback: TransitionCallback<S>): () => void;
}

/**
 * Connection lifecycle state.
 * - 'disconnected': No cached connection
 * - 'connecting': Discovery, connect or subscribe in progress
 * - 'connected': Live, subscribed connection cached for reuse
 * - 'error': Last attempt failed (fast-fail window may apply)
 */
export type ConnectionState =
	| "disconnected"
	| "connecting"
	| "connected"
	| "error";

/**
 * Valid connection transitions:
 * - disconnected -> connecting
 * - connecting -> connected | error | disconnected (cancelled)
 * - connected -> disconnected | error
 * - error -> disconnected | connecting
 */
export const CONNECTION_TRANSITIONS: TransitionTable<ConnectionState> = {
	disconnected: ["connecting"],
	connecting: ["connected", "error", "disconnected"],
	connected: ["disconnected", "error"],
	error: ["disconnected", "connecting"],
};

export interface StateMachineOptions {
	/** Receives callback errors; defaults to dropping them */
	logger?: Logger;
}

/**
 * Creates a state machine over an explicit transition table.
 * Enforces valid transitions and notifies listeners on changes.
 *
 * @param transitions Allowed targets for every state
 * @param initialState The starting state
 *
 * @example Connection flow
 * ```typescript
 * const machine = createStateMachine(CONNECTION_TRANSITIONS, "disconnected");
 *
 * machine.onTransition((from, to) => {
 *   console.log(`State changed: ${from} -> ${to}`);
 * });
 *
 * machine.transition("connecting");
 * try {
 *   await connect();
 *   machine.transition("connected");
 * } catch (error) {
 *   machine.transition("error");
 * }
 * ```
 */
export function createStateMachine<S extends string>(
	transitions: TransitionTable<S>,
	initialState: S,
	options: StateMachineOptions = {},
): StateMachine<S> {
	const { logger } = options;
	let state: S = initialState;
	const callbacks = new Set<TransitionCallback<S>>();
	let isTransitioning = false;

	function getState(): S {
		return state;
	}

	function canTransition(to: S): boolean {
		return transitions[state].includes(to);
	}

	function transition(to: S): void {
		if (isTransitioning) {
			throw new Error(
				`Cannot transition while another transition is in progress (attempted ${state} -> ${to})`,
			);
		}

		if (!canTransition(to)) {
			throw new Error(`Invalid state transition: ${state} -> ${to}`);
		}

		const from = state;
		state = to;
		isTransitioning = true;

		try {
			for (const cb of callbacks) {
				try {
					cb(from, to);
				} catch (e) {
					logger?.error("Transition callback error:", e);
				}
			}
		} finally {
			isTransitioning = false;
		}
	}

	function onTransition(callback: TransitionCallback<S>): () => void {
		callbacks.add(callback);
		return () => {
			callbacks.delete(callback);
		};
	}

	return {
		getState,
		canTransition,
		transition,
		onTransition,
	};
}
