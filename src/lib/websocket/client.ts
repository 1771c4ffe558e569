import WebSocket from "ws";
import { TransportError } from "../../shared/errors.js";
import type { TradingError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import { TypedEmitter } from "../events/index.js";
import type { WsClientLike, WsConfig, WsEvents, WsState } from "./types.js";

/**
 * ws wrapper with ping/pong keepalive.
 *
 * Socket activity is re-emitted on `events`; send failures come back as
 * Result and never throw.
 */
export class WsClient implements WsClientLike {
	readonly events = new TypedEmitter<WsEvents>();
	private readonly config: WsConfig;
	private ws: WebSocket | null = null;
	private state: WsState = "closed";
	private pingTimer: ReturnType<typeof setInterval> | null = null;
	private pongTimer: ReturnType<typeof setTimeout> | null = null;

	constructor(config: WsConfig) {
		this.config = config;
	}

	/** Rejects with a TransportError if already connecting or open, or if the handshake fails. */
	connect(): Promise<void> {
		if (this.state !== "closed") {
			return Promise.reject(new TransportError("WebSocket is already connecting or open"));
		}
		return new Promise<void>((resolve, reject) => {
			this.state = "connecting";
			const ws = new WebSocket(this.config.url);
			this.ws = ws;

			ws.on("open", () => {
				this.state = "open";
				this.startPing(ws);
				resolve();
			});

			ws.on("message", (data) => {
				this.events.emit("message", data.toString());
			});

			ws.on("close", (code, reason) => {
				this.state = "closed";
				this.ws = null;
				this.clearTimers();
				this.events.emit("close", code, reason.toString());
			});

			ws.on("error", (error) => {
				this.events.emit("error", error);
				if (this.state === "connecting") {
					this.state = "closed";
					this.ws = null;
					this.clearTimers();
					reject(
						new TransportError("WebSocket connection failed", {
							url: this.config.url,
							cause: error.message,
						}),
					);
				}
			});

			ws.on("pong", () => {
				this.clearPongTimeout();
			});
		});
	}

	send(data: string): Result<void, TradingError> {
		if (this.state !== "open" || this.ws === null) {
			return err(new TransportError("WebSocket is not connected"));
		}
		try {
			this.ws.send(data);
			return ok(undefined);
		} catch (error) {
			return err(
				new TransportError("WebSocket send failed", {
					cause: error instanceof Error ? error.message : String(error),
				}),
			);
		}
	}

	close(): void {
		if (this.ws !== null) {
			this.state = "closing";
			this.clearTimers();
			this.ws.close();
		}
	}

	getState(): WsState {
		return this.state;
	}

	private startPing(ws: WebSocket): void {
		if (this.config.pingIntervalMs <= 0) return;
		this.pingTimer = setInterval(() => {
			if (this.state !== "open") return;
			ws.ping();
			this.clearPongTimeout();
			this.pongTimer = setTimeout(() => ws.terminate(), this.config.pongTimeoutMs);
		}, this.config.pingIntervalMs);
	}

	private clearTimers(): void {
		if (this.pingTimer !== null) {
			clearInterval(this.pingTimer);
			this.pingTimer = null;
		}
		this.clearPongTimeout();
	}

	private clearPongTimeout(): void {
		if (this.pongTimer !== null) {
			clearTimeout(this.pongTimer);
			this.pongTimer = null;
		}
	}
}
