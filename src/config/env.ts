/**
 * MIRROR_* environment overrides.
 *
 * Each variable maps onto a path in the config file; values from the
 * environment win over the file. Secrets are usually supplied this way so
 * the file can be committed without them.
 */

import { ConfigError } from "../shared/errors.js";

type EnvKind = "string" | "int" | "decimal";

interface EnvBinding {
	readonly env: string;
	readonly path: readonly [string, ...string[]];
	readonly kind: EnvKind;
}

export const ENV_BINDINGS: readonly EnvBinding[] = [
	{ env: "MIRROR_ENVIRONMENT", path: ["environment"], kind: "string" },
	{ env: "MIRROR_HOST", path: ["endpoint", "host"], kind: "string" },
	{ env: "MIRROR_PORT", path: ["endpoint", "port"], kind: "int" },
	{ env: "MIRROR_CLIENT_ID", path: ["clientId"], kind: "string" },
	{ env: "MIRROR_CLIENT_SECRET", path: ["clientSecret"], kind: "string" },
	{ env: "MIRROR_MASTER_ACCOUNT_ID", path: ["master", "accountId"], kind: "int" },
	{ env: "MIRROR_MASTER_ACCESS_TOKEN", path: ["master", "accessToken"], kind: "string" },
	{ env: "MIRROR_SLAVE_ACCOUNT_ID", path: ["slave", "accountId"], kind: "int" },
	{ env: "MIRROR_SLAVE_ACCESS_TOKEN", path: ["slave", "accessToken"], kind: "string" },
	{ env: "MIRROR_GLOBAL_MULTIPLIER", path: ["volume", "globalMultiplier"], kind: "decimal" },
	{ env: "MIRROR_MIN_LOT_SIZE", path: ["volume", "minLotSize"], kind: "decimal" },
	{ env: "MIRROR_MAX_LOT_MULTIPLIER", path: ["volume", "maxLotMultiplier"], kind: "decimal" },
	{ env: "MIRROR_WORKER_CONCURRENCY", path: ["engine", "workerConcurrency"], kind: "int" },
	{ env: "MIRROR_SHUTDOWN_GRACE_MS", path: ["engine", "shutdownGraceMs"], kind: "int" },
	{ env: "MIRROR_LOG_LEVEL", path: ["logLevel"], kind: "string" },
];

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function setAt(target: Record<string, unknown>, path: readonly string[], value: unknown): void {
	const [head, ...rest] = path;
	if (head === undefined) return;
	if (rest.length === 0) {
		target[head] = value;
		return;
	}
	const existing = target[head];
	const child: Record<string, unknown> = isRecord(existing) ? existing : {};
	target[head] = child;
	setAt(child, rest, value);
}

/**
 * Read overrides from the environment into a partial config object.
 * Empty variables are ignored.
 * @throws ConfigError if an integer variable does not hold an integer
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const binding of ENV_BINDINGS) {
		const raw = env[binding.env];
		if (raw === undefined || raw.trim() === "") continue;

		if (binding.kind === "int") {
			const parsed = strictParseInt(raw);
			if (Number.isNaN(parsed)) {
				throw new ConfigError(`Invalid ${binding.env}: "${raw}" must be an integer`);
			}
			setAt(result, binding.path, parsed);
		} else {
			setAt(result, binding.path, raw.trim());
		}
	}
	return result;
}

/** Deep-merge plain objects; `overrides` wins, arrays and scalars are replaced. */
export function mergeOverrides(
	base: Record<string, unknown>,
	overrides: Record<string, unknown>,
): Record<string, unknown> {
	const merged: Record<string, unknown> = { ...base };
	for (const [key, value] of Object.entries(overrides)) {
		const current = merged[key];
		merged[key] = isRecord(current) && isRecord(value) ? mergeOverrides(current, value) : value;
	}
	return merged;
}
