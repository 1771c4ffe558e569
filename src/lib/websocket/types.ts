import type { TradingError } from "../../shared/errors.js";
import type { Result } from "../../shared/result.js";
import type { TypedEmitter } from "../events/index.js";

export interface WsConfig {
	/** ws:// or wss:// */
	readonly url: string;
	/** Interval between ping frames; 0 disables keepalive */
	readonly pingIntervalMs: number;
	/** Terminate the socket when no pong arrives within this window */
	readonly pongTimeoutMs: number;
}

export type WsState = "connecting" | "open" | "closing" | "closed";

export interface WsEvents {
	message: (data: string) => void;
	close: (code: number, reason: string) => void;
	error: (error: Error) => void;
}

/**
 * Socket surface the protocol layer depends on. WsClient is the real one;
 * tests drive an in-memory implementation.
 */
export interface WsClientLike {
	readonly events: TypedEmitter<WsEvents>;
	connect(): Promise<void>;
	send(data: string): Result<void, TradingError>;
	close(): void;
	getState(): WsState;
}
