export { SessionState } from "./types.js";
export type {
	SessionMetadata,
	SessionSnapshot,
	SessionTransition,
	StateError,
	TransitionRecord,
} from "./types.js";
export { StateErrorKind } from "./types.js";
export { SessionStateMachine } from "./state-machine.js";
export { ReconnectionPolicy } from "./reconnection.js";
export type { ReconnectionConfig } from "./reconnection.js";
export { QuoteBook } from "./quote-book.js";
export { SessionCoordinator } from "./session-coordinator.js";
export type { SessionCoordinatorOptions, SessionEvents } from "./session-coordinator.js";
