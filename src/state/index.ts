export { createEventChannel, type EventChannel } from "./event-channel";

export {
	createEventEmitter,
	type EventMap,
	type TypedEventEmitter,
} from "./event-emitter";

export {
	createStateMachine,
	type StateMachine,
	type TransitionCallback,
} from "./state-machine";
