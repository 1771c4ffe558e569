import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { unwrapCredentials } from "../auth/credentials.js";
import { ConfigError } from "../shared/errors.js";
import { idToNumber } from "../shared/identifiers.js";
import { PolicyKind } from "../sizing/types.js";
import { configFromEnv, mergeOverrides } from "./env.js";
import { loadConfig, parseConfig } from "./load-config.js";

function baseRaw(): Record<string, unknown> {
	return {
		clientId: "test-client",
		clientSecret: "test-secret",
		master: { accountId: 1001, accessToken: "master-token" },
		slave: { accountId: 2002, accessToken: "slave-token" },
		volume: { globalMultiplier: "0.5" },
	};
}

describe("parseConfig", () => {
	it("applies defaults", () => {
		const result = parseConfig(baseRaw());
		expect(result.ok).toBe(true);
		if (!result.ok) return;
		const config = result.value;

		expect(config.environment).toBe("demo");
		expect(config.endpoint).toEqual({ host: "demo.ctraderapi.com", port: 5036 });
		expect(idToNumber(config.masterAccountId)).toBe(1001);
		expect(idToNumber(config.slaveAccountId)).toBe(2002);
		expect(config.volume.limits.minLotSize.toString()).toBe("0.01");
		expect(config.volume.limits.maxLotMultiplier.toString()).toBe("10");
		expect(config.dispatch).toEqual({
			maxAttempts: 3,
			baseDelayMs: 250,
			maxDelayMs: 5_000,
			jitterFactor: 0.1,
			requestTimeoutMs: 10_000,
			rateLimitTimeoutMs: 30_000,
		});
		expect(config.session.reconnect.maxAttempts).toBe(10);
		expect(config.engine).toEqual({ workerConcurrency: 4, shutdownGraceMs: 10_000 });
		expect(config.reconciliation).toEqual({ openTimeToleranceMs: 5_000, mirrorUnpaired: true });
		expect(config.logLevel).toBe("info");
		expect(config.symbolAliases.size).toBe(0);
	});

	it("seals credentials", () => {
		const result = parseConfig(baseRaw());
		if (!result.ok) throw result.error;
		expect(JSON.stringify(result.value.credentials)).toBe('"[REDACTED]"');
		expect(unwrapCredentials(result.value.credentials)).toEqual({
			clientId: "test-client",
			clientSecret: "test-secret",
			masterAccessToken: "master-token",
			slaveAccessToken: "slave-token",
		});
	});

	it("selects the highest-precedence policy among those configured", () => {
		const raw = {
			...baseRaw(),
			volume: {
				pipEqualization: { riskRatio: 1 },
				instrumentMultipliers: { table: { XAUUSD: "0.2" }, defaultMultiplier: 0.5 },
			},
		};
		const result = parseConfig(raw);
		if (!result.ok) throw result.error;
		expect(result.value.volume.configured.map((p) => p.kind)).toEqual([
			PolicyKind.InstrumentMultiplier,
			PolicyKind.PipEqualization,
		]);
		const policy = result.value.volume.policy;
		expect(policy.kind).toBe(PolicyKind.InstrumentMultiplier);
		if (policy.kind === PolicyKind.InstrumentMultiplier) {
			expect(policy.multipliers.get("XAUUSD")?.toString()).toBe("0.2");
			expect(policy.defaultMultiplier.toString()).toBe("0.5");
		}
	});

	it("requires at least one policy", () => {
		const result = parseConfig({ ...baseRaw(), volume: { minLotSize: "0.01" } });
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error).toBeInstanceOf(ConfigError);
		expect(result.error.message).toBe(
			"Invalid configuration: volume: at least one volume policy must be configured",
		);
	});

	it("reports every invalid field", () => {
		const result = parseConfig({
			...baseRaw(),
			master: { accountId: -1, accessToken: "" },
			volume: { globalMultiplier: "abc" },
		});
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.context["issues"]).toEqual([
			"master.accountId: Number must be greater than 0",
			"master.accessToken: String must contain at least 1 character(s)",
			'volume.globalMultiplier: Decimal.from: invalid decimal string "abc"',
		]);
	});

	it("rejects mirroring an account onto itself", () => {
		const result = parseConfig({ ...baseRaw(), slave: { accountId: 1001, accessToken: "x" } });
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.message).toBe("master and slave must be different accounts");
	});

	it("rejects a non-object root", () => {
		const result = parseConfig([1, 2]);
		expect(result.ok).toBe(false);
	});

	it("uses an explicit endpoint over the environment default", () => {
		const result = parseConfig({
			...baseRaw(),
			environment: "live",
			endpoint: { host: "localhost", port: 9000 },
		});
		if (!result.ok) throw result.error;
		expect(result.value.environment).toBe("live");
		expect(result.value.endpoint).toEqual({ host: "localhost", port: 9000 });
	});
});

describe("configFromEnv", () => {
	it("maps MIRROR_* variables onto config paths", () => {
		expect(
			configFromEnv({
				MIRROR_CLIENT_SECRET: "env-secret",
				MIRROR_SLAVE_ACCOUNT_ID: "3003",
				MIRROR_GLOBAL_MULTIPLIER: " 0.25 ",
				MIRROR_LOG_LEVEL: "debug",
				MIRROR_PORT: "",
			}),
		).toEqual({
			clientSecret: "env-secret",
			slave: { accountId: 3003 },
			volume: { globalMultiplier: "0.25" },
			logLevel: "debug",
		});
	});

	it("rejects non-integer ids", () => {
		expect(() => configFromEnv({ MIRROR_MASTER_ACCOUNT_ID: "12abc" })).toThrow(
			'Invalid MIRROR_MASTER_ACCOUNT_ID: "12abc" must be an integer',
		);
	});

	it("overrides win over file values without dropping siblings", () => {
		const merged = mergeOverrides(baseRaw(), { slave: { accountId: 3003 } });
		expect(merged["slave"]).toEqual({ accountId: 3003, accessToken: "slave-token" });
		expect(merged["clientId"]).toBe("test-client");
	});
});

describe("loadConfig", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "mirror-config-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("reads the file and applies environment overrides", async () => {
		const path = join(dir, "mirror.json");
		await writeFile(path, JSON.stringify(baseRaw()));
		const config = await loadConfig(path, { MIRROR_MIN_LOT_SIZE: "0.02" });
		expect(config.volume.limits.minLotSize.toString()).toBe("0.02");
	});

	it("throws ConfigError for a missing file", async () => {
		await expect(loadConfig(join(dir, "missing.json"), {})).rejects.toThrow(
			/^Cannot read config file/,
		);
	});

	it("throws ConfigError for malformed JSON", async () => {
		const path = join(dir, "broken.json");
		await writeFile(path, "{ not json");
		await expect(loadConfig(path, {})).rejects.toBeInstanceOf(ConfigError);
	});
});
