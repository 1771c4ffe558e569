/**
 * Session lifecycle types.
 *
 * disconnected → connecting → app_authenticated → accounts_authorized →
 * subscribed → running. Any failure drops back to disconnected; stopped is
 * terminal.
 */

// ── States ──────────────────────────────────────────────────────────

export const SessionState = {
	Disconnected: "disconnected",
	Connecting: "connecting",
	/** Application credentials accepted */
	AppAuthenticated: "app_authenticated",
	/** Both trading accounts authorized */
	AccountsAuthorized: "accounts_authorized",
	/** Execution and spot subscriptions active; ledger rebuild in progress */
	Subscribed: "subscribed",
	/** The only state that forwards execution events */
	Running: "running",
	Stopped: "stopped",
} as const;

export type SessionState = (typeof SessionState)[keyof typeof SessionState];

// ── Transitions ─────────────────────────────────────────────────────

export type SessionTransition =
	| { readonly type: "connect" }
	| { readonly type: "app_authenticated" }
	| { readonly type: "accounts_authorized" }
	| { readonly type: "subscribed" }
	| { readonly type: "ledger_rebuilt" }
	| { readonly type: "connection_lost"; readonly reason: string }
	| { readonly type: "stop"; readonly reason: string };

export type SessionMetadata =
	| { readonly type: "none" }
	| { readonly type: "disconnect"; readonly reason: string }
	| { readonly type: "stop"; readonly reason: string };

export interface SessionSnapshot {
	readonly state: SessionState;
	readonly enteredAt: number;
	readonly metadata: SessionMetadata;
}

export interface TransitionRecord {
	readonly from: SessionState;
	readonly to: SessionState;
	readonly transition: SessionTransition["type"];
	readonly timestamp: number;
}

// ── Errors ──────────────────────────────────────────────────────────

export const StateErrorKind = {
	InvalidTransition: "invalid_transition",
	AlreadyTerminal: "already_terminal",
} as const;

export type StateErrorKind = (typeof StateErrorKind)[keyof typeof StateErrorKind];

export interface StateError {
	readonly kind: StateErrorKind;
	readonly message: string;
	readonly from: SessionState;
	readonly transition: SessionTransition["type"];
}
