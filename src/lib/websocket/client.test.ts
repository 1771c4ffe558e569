import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WebSocketServer } from "ws";
import { ErrorKind } from "../../shared/errors.js";
import { isOk } from "../../shared/result.js";
import { WsClient } from "./client.js";
import type { WsConfig } from "./types.js";

const settle = () => new Promise((resolve) => setTimeout(resolve, 100));

describe("WsClient", () => {
	let wss: WebSocketServer;
	let port: number;

	function testConfig(overrides?: Partial<WsConfig>): WsConfig {
		return {
			url: `ws://127.0.0.1:${port}`,
			pingIntervalMs: 30_000,
			pongTimeoutMs: 5_000,
			...overrides,
		};
	}

	beforeEach(async () => {
		wss = new WebSocketServer({ port: 0 });
		await new Promise<void>((resolve) => wss.once("listening", () => resolve()));
		const addr = wss.address();
		port = typeof addr === "object" && addr !== null ? addr.port : 0;
	});

	afterEach(async () => {
		for (const socket of wss.clients) socket.terminate();
		await new Promise((resolve) => wss.close(resolve));
	});

	it("starts closed", () => {
		expect(new WsClient(testConfig()).getState()).toBe("closed");
	});

	it("opens and echoes a frame", async () => {
		wss.on("connection", (ws) => {
			ws.on("message", (data) => ws.send(data.toString()));
		});
		const client = new WsClient(testConfig());
		await client.connect();
		expect(client.getState()).toBe("open");

		const received: string[] = [];
		client.events.on("message", (data) => received.push(data));
		expect(isOk(client.send('{"payloadType":51}'))).toBe(true);

		await settle();
		expect(received).toEqual(['{"payloadType":51}']);
		client.close();
	});

	it("emits server-pushed frames in order", async () => {
		wss.on("connection", (ws) => {
			ws.send("first");
			ws.send("second");
		});
		const client = new WsClient(testConfig());
		const received: string[] = [];
		client.events.on("message", (data) => received.push(data));
		await client.connect();
		await settle();
		expect(received).toEqual(["first", "second"]);
		client.close();
	});

	it("emits close and returns to closed", async () => {
		const client = new WsClient(testConfig());
		const onClose = vi.fn();
		client.events.on("close", onClose);
		await client.connect();
		client.close();
		await settle();
		expect(client.getState()).toBe("closed");
		expect(onClose).toHaveBeenCalledTimes(1);
	});

	it("send while disconnected returns a transport error", () => {
		const result = new WsClient(testConfig()).send("x");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe(ErrorKind.Transport);
	});

	it("rejects a second connect while open", async () => {
		const client = new WsClient(testConfig());
		await client.connect();
		await expect(client.connect()).rejects.toThrow("already connecting or open");
		client.close();
	});

	it("rejects and emits error when nothing listens", async () => {
		const client = new WsClient({ ...testConfig(), url: "ws://127.0.0.1:1" });
		const onError = vi.fn();
		client.events.on("error", onError);
		await expect(client.connect()).rejects.toThrow("WebSocket connection failed");
		expect(onError).toHaveBeenCalled();
		expect(client.getState()).toBe("closed");
	});
});
