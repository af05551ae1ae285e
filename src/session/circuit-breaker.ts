import {
	createStateMachine,
	type TransitionCallback,
	type TransitionTable,
} from "../state/state-machine";
import { type Logger, silentLogger } from "../utils/logger";

export type CircuitStateKind = "closed" | "open" | "half-open";

interface CircuitCounters {
	/** Failures since the last success or the last entry to half-open */
	consecutiveFailures: number;
	/** Times the circuit opened since the last success */
	openCycles: number;
}

export type CircuitState =
	| ({ kind: "closed" } & CircuitCounters)
	| ({ kind: "open"; openedAt: number } & CircuitCounters)
	| ({ kind: "half-open" } & CircuitCounters);

export type AttemptDecision =
	| { allowed: true; reason: "closed" | "half-open" }
	| { allowed: false; reason: "open" | "probe-in-flight"; remainingMs: number };

/**
 * Valid breaker transitions:
 * - closed -> open (threshold reached)
 * - open -> half-open (window elapsed) | closed (late success)
 * - half-open -> closed (probe succeeded) | open (probe failed)
 */
export const CIRCUIT_TRANSITIONS: TransitionTable<CircuitStateKind> = {
	closed: ["open"],
	open: ["half-open", "closed"],
	"half-open": ["closed", "open"],
};

export interface CircuitBreakerOptions {
	/** Consecutive failures that open the circuit. @default 3 */
	failureThreshold?: number;
	/** First open window in ms. @default 60000 */
	baseTimeoutMs?: number;
	/** Longest open window in ms. @default 3600000 */
	maxTimeoutMs?: number;
	now?: () => number;
	logger?: Logger;
}

/**
 * Throttles protocol operations against a device that keeps failing.
 *
 * Opening windows grow exponentially: the first open lasts the base
 * window, and each failed half-open probe doubles it until the cap. The
 * failure counter resets on entry to half-open so that historical failures
 * stop compounding once a probe is allowed; the open-cycle counter carries
 * the backoff across probes until a success.
 *
 * Open -> half-open happens lazily inside `canAttempt()`; there is no timer.
 * Half-open admits a single probe: further calls are refused until the
 * probe reports through `recordSuccess()` or `recordFailure()`, or until
 * it has been outstanding for a full open window.
 *
 * @example
 * ```typescript
 * const breaker = createCircuitBreaker();
 * const decision = breaker.canAttempt();
 * if (!decision.allowed) {
 *   return null; // throttled, retry in decision.remainingMs
 * }
 * try {
 *   const value = await exchange();
 *   breaker.recordSuccess();
 *   return value;
 * } catch {
 *   breaker.recordFailure();
 *   return null;
 * }
 * ```
 */
export interface CircuitBreaker {
	canAttempt(): AttemptDecision;
	recordSuccess(): void;
	recordFailure(): void;
	getState(): CircuitState;
	/** Length of the current (or next) open window in ms */
	getOpenDuration(): number;
	/** One-line summary for logs */
	describe(): string;
	onTransition(callback: TransitionCallback<CircuitStateKind>): () => void;
}

export function createCircuitBreaker(
	options: CircuitBreakerOptions = {},
): CircuitBreaker {
	const {
		failureThreshold = 3,
		baseTimeoutMs = 60000,
		maxTimeoutMs = 3600000,
		now = Date.now,
		logger = silentLogger,
	} = options;

	const machine = createStateMachine(CIRCUIT_TRANSITIONS, "closed", {
		logger,
	});
	let consecutiveFailures = 0;
	let openCycles = 0;
	let openedAt = 0;
	let probeStartedAt: number | undefined;

	function getOpenDuration(): number {
		const exponent =
			Math.max(0, consecutiveFailures - failureThreshold) +
			Math.max(0, openCycles - 1);
		return Math.min(baseTimeoutMs * 2 ** exponent, maxTimeoutMs);
	}

	function open(): void {
		openedAt = now();
		openCycles++;
		machine.transition("open");
		logger.warn(
			`Circuit breaker OPEN after ${consecutiveFailures} failures, retry in ${Math.round(getOpenDuration() / 1000)}s`,
		);
	}

	function canAttempt(): AttemptDecision {
		const kind = machine.getState();
		if (kind === "closed") {
			return { allowed: true, reason: kind };
		}

		if (kind === "half-open") {
			const outstanding =
				probeStartedAt === undefined ? Infinity : now() - probeStartedAt;
			const duration = getOpenDuration();
			if (outstanding < duration) {
				return {
					allowed: false,
					reason: "probe-in-flight",
					remainingMs: duration - outstanding,
				};
			}
			if (probeStartedAt !== undefined) {
				logger.warn("Half-open probe never reported, allowing another");
			}
			probeStartedAt = now();
			return { allowed: true, reason: "half-open" };
		}

		const elapsed = now() - openedAt;
		const duration = getOpenDuration();
		if (elapsed >= duration) {
			consecutiveFailures = 0;
			machine.transition("half-open");
			probeStartedAt = now();
			logger.info("Circuit breaker HALF-OPEN, allowing a probe");
			return { allowed: true, reason: "half-open" };
		}

		return { allowed: false, reason: "open", remainingMs: duration - elapsed };
	}

	function recordSuccess(): void {
		const kind = machine.getState();
		probeStartedAt = undefined;
		consecutiveFailures = 0;
		openCycles = 0;
		if (kind !== "closed") {
			machine.transition("closed");
			logger.info("Circuit breaker CLOSED, device recovered");
		}
	}

	function recordFailure(): void {
		probeStartedAt = undefined;
		consecutiveFailures++;
		const kind = machine.getState();

		if (kind === "half-open") {
			open();
			return;
		}
		if (kind === "closed" && consecutiveFailures >= failureThreshold) {
			open();
			return;
		}
		logger.debug(
			`Circuit breaker failure ${consecutiveFailures}/${failureThreshold} (${kind})`,
		);
	}

	function getState(): CircuitState {
		const counters = { consecutiveFailures, openCycles };
		const kind = machine.getState();
		if (kind === "open") {
			return { kind, openedAt, ...counters };
		}
		return { kind, ...counters };
	}

	function describe(): string {
		const state = getState();
		if (state.kind === "open") {
			const remaining = Math.max(0, state.openedAt + getOpenDuration() - now());
			return `open (${state.consecutiveFailures} failures, ${Math.round(remaining / 1000)}s remaining)`;
		}
		return `${state.kind} (${state.consecutiveFailures} failures)`;
	}

	return {
		canAttempt,
		recordSuccess,
		recordFailure,
		getState,
		getOpenDuration,
		describe,
		onTransition: machine.onTransition,
	};
}
