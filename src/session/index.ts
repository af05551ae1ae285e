export {
	type AttemptDecision,
	CIRCUIT_TRANSITIONS,
	type CircuitBreaker,
	type CircuitBreakerOptions,
	type CircuitState,
	type CircuitStateKind,
	createCircuitBreaker,
} from "./circuit-breaker";
export {
	type ConnectionSession,
	type ConnectionSessionOptions,
	type ConnectionTimings,
	createConnectionSession,
	describeRssi,
} from "./connection-session";
export {
	createNotificationMailbox,
	type NotificationMailbox,
	type NotificationMailboxOptions,
} from "./notification-mailbox";
export {
	type CancelReason,
	createPendingRequestTable,
	type PendingRequestTable,
	type PendingRequestTableOptions,
	type PendingSlot,
	type RequestKey,
	type SlotOutcome,
} from "./pending-requests";
export {
	createSensorSession,
	type SensorSession,
	type SensorSessionEvents,
	type SensorSessionOptions,
} from "./sensor-session";
export {
	createSequenceIdAllocator,
	DEFAULT_HIGH_WATER_MARK,
	DEFAULT_MAX_RANDOM_ATTEMPTS,
	type SequenceIdAllocator,
	type SequenceIdAllocatorOptions,
} from "./sequence-allocator";
