/**
 * SessionStateMachine: validated connection lifecycle.
 *
 * All moves go through transition(). History is bounded to the last
 * MAX_HISTORY transitions.
 */

import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import {
	type SessionMetadata,
	type SessionSnapshot,
	SessionState,
	type SessionTransition,
	type StateError,
	StateErrorKind,
	type TransitionRecord,
} from "./types.js";

const MAX_HISTORY = 100;

/** Forward path: each step is only legal from the state before it. */
const FORWARD: Readonly<Record<string, { readonly from: SessionState; readonly to: SessionState }>> =
	{
		connect: { from: SessionState.Disconnected, to: SessionState.Connecting },
		app_authenticated: { from: SessionState.Connecting, to: SessionState.AppAuthenticated },
		accounts_authorized: {
			from: SessionState.AppAuthenticated,
			to: SessionState.AccountsAuthorized,
		},
		subscribed: { from: SessionState.AccountsAuthorized, to: SessionState.Subscribed },
		ledger_rebuilt: { from: SessionState.Subscribed, to: SessionState.Running },
	};

export class SessionStateMachine {
	private current: SessionState = SessionState.Disconnected;
	private currentEnteredAt: number;
	private currentMetadata: SessionMetadata = { type: "none" };
	private readonly transitions: TransitionRecord[] = [];
	private readonly clock: Clock;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
		this.currentEnteredAt = clock.now();
	}

	// ── Queries ────────────────────────────────────────────────────

	state(): SessionState {
		return this.current;
	}

	snapshot(): SessionSnapshot {
		return {
			state: this.current,
			enteredAt: this.currentEnteredAt,
			metadata: this.currentMetadata,
		};
	}

	/** Execution events are forwarded only while running. */
	canForward(): boolean {
		return this.current === SessionState.Running;
	}

	isStopped(): boolean {
		return this.current === SessionState.Stopped;
	}

	timeInState(): number {
		return this.clock.now() - this.currentEnteredAt;
	}

	/** Bounded transition history, most recent last. */
	history(): readonly TransitionRecord[] {
		return this.transitions;
	}

	// ── Transitions ────────────────────────────────────────────────

	transition(t: SessionTransition): Result<SessionState, StateError> {
		const from = this.current;

		if (from === SessionState.Stopped) {
			return err({
				kind: StateErrorKind.AlreadyTerminal,
				message: "Session already stopped",
				from,
				transition: t.type,
			});
		}

		const result = this.validateTransition(from, t);
		if (!result.ok) return result;

		const { state, metadata } = result.value;
		this.recordTransition(from, state, t.type);
		this.current = state;
		this.currentEnteredAt = this.clock.now();
		this.currentMetadata = metadata;

		return ok(state);
	}

	// ── Validation ─────────────────────────────────────────────────

	private validateTransition(
		from: SessionState,
		t: SessionTransition,
	): Result<{ state: SessionState; metadata: SessionMetadata }, StateError> {
		switch (t.type) {
			case "connection_lost":
				if (from !== SessionState.Disconnected) {
					return ok({
						state: SessionState.Disconnected,
						metadata: { type: "disconnect", reason: t.reason },
					});
				}
				break;

			case "stop":
				return ok({ state: SessionState.Stopped, metadata: { type: "stop", reason: t.reason } });

			default: {
				const step = FORWARD[t.type];
				if (step && step.from === from) {
					return ok({ state: step.to, metadata: { type: "none" } });
				}
			}
		}

		return err({
			kind: StateErrorKind.InvalidTransition,
			message: `Cannot transition from ${from} via ${t.type}`,
			from,
			transition: t.type,
		});
	}

	private recordTransition(
		from: SessionState,
		to: SessionState,
		transition: SessionTransition["type"],
	): void {
		if (this.transitions.length >= MAX_HISTORY) {
			this.transitions.shift();
		}
		this.transitions.push({ from, to, transition, timestamp: this.clock.now() });
	}
}
