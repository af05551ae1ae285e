export {
	createEventEmitter,
	type EventEmitterOptions,
	type EventMap,
	type TypedEventEmitter,
} from "./event-emitter";

export {
	CONNECTION_TRANSITIONS,
	type ConnectionState,
	createStateMachine,
	type StateMachine,
	type StateMachineOptions,
	type TransitionCallback,
	type TransitionTable,
} from "./state-machine";
