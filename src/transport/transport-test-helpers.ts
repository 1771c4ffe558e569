/**
 * In-memory socket for driving OpenApiConnection without a network. Sent
 * frames are recorded; tests push venue frames with `receive`.
 */

import { TypedEmitter } from "../lib/events/index.js";
import type { WsClientLike, WsEvents, WsState } from "../lib/websocket/index.js";
import { TransportError, type TradingError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

export interface SentFrame {
	readonly clientMsgId?: string;
	readonly payloadType: number;
	readonly payload: Record<string, unknown>;
}

function isSentFrame(value: unknown): value is SentFrame {
	return typeof value === "object" && value !== null && "payloadType" in value && "payload" in value;
}

export class MemorySocket implements WsClientLike {
	readonly events = new TypedEmitter<WsEvents>();
	readonly sent: SentFrame[] = [];
	failConnect: Error | null = null;
	private state: WsState = "closed";

	async connect(): Promise<void> {
		if (this.failConnect) throw this.failConnect;
		this.state = "open";
	}

	send(data: string): Result<void, TradingError> {
		if (this.state !== "open") return err(new TransportError("WebSocket is not connected"));
		const parsed: unknown = JSON.parse(data);
		if (isSentFrame(parsed)) this.sent.push(parsed);
		return ok(undefined);
	}

	close(): void {
		if (this.state === "closed") return;
		this.state = "closed";
		this.events.emit("close", 1000, "");
	}

	getState(): WsState {
		return this.state;
	}

	/** Deliver a venue frame. */
	receive(frame: { clientMsgId?: string; payloadType: number; payload?: Record<string, unknown> }): void {
		this.events.emit("message", JSON.stringify(frame));
	}

	/** Simulate the venue dropping the connection. */
	drop(reason = "reset by peer"): void {
		this.state = "closed";
		this.events.emit("close", 1006, reason);
	}

	last(): SentFrame | undefined {
		return this.sent[this.sent.length - 1];
	}

	/** Answer the most recent request with the given payload type and payload. */
	reply(payloadType: number, payload: Record<string, unknown> = {}): void {
		const request = this.last();
		if (!request) throw new Error("no request to reply to");
		const frame: { clientMsgId?: string; payloadType: number; payload: Record<string, unknown> } = {
			payloadType,
			payload,
		};
		if (request.clientMsgId !== undefined) frame.clientMsgId = request.clientMsgId;
		this.receive(frame);
	}
}

/** Let pending promise continuations run. */
export async function flush(): Promise<void> {
	for (let i = 0; i < 5; i++) await Promise.resolve();
}
