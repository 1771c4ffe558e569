import type { Credentials } from "../auth/types.js";
import type { RetryConfig } from "../dispatch/retry.js";
import type { LogLevel } from "../lib/logger/index.js";
import type { ReconnectionConfig } from "../session/reconnection.js";
import type { AccountId } from "../shared/identifiers.js";
import type { SizingLimits, VolumePolicy } from "../sizing/types.js";

export type Environment = "demo" | "live";

export interface Endpoint {
	readonly host: string;
	readonly port: number;
}

/** Open API JSON endpoints. */
export const DEFAULT_ENDPOINTS: Readonly<Record<Environment, Endpoint>> = {
	demo: { host: "demo.ctraderapi.com", port: 5036 },
	live: { host: "live.ctraderapi.com", port: 5036 },
};

export interface DispatchConfig extends RetryConfig {
	/** How long to wait for the venue to answer one request */
	readonly requestTimeoutMs: number;
	/** How long a request may queue for a rate-limit token */
	readonly rateLimitTimeoutMs: number;
}

export interface SessionConfig {
	readonly heartbeatIntervalMs: number;
	readonly reconnect: ReconnectionConfig;
}

export interface VolumeConfig {
	/** The policy in effect, picked by precedence from `configured` */
	readonly policy: VolumePolicy;
	readonly configured: readonly VolumePolicy[];
	readonly limits: SizingLimits;
}

export interface ReconciliationConfig {
	/** Largest open-time gap accepted when pairing positions by heuristic */
	readonly openTimeToleranceMs: number;
	/** Open slave copies for master positions left unpaired after a rebuild */
	readonly mirrorUnpaired: boolean;
}

/** Fully validated runtime configuration. */
export interface MirrorConfig {
	readonly environment: Environment;
	readonly endpoint: Endpoint;
	readonly credentials: Credentials;
	readonly masterAccountId: AccountId;
	readonly slaveAccountId: AccountId;
	readonly volume: VolumeConfig;
	/** master symbol name → slave symbol name */
	readonly symbolAliases: ReadonlyMap<string, string>;
	readonly dispatch: DispatchConfig;
	readonly session: SessionConfig;
	readonly reconciliation: ReconciliationConfig;
	readonly engine: { readonly workerConcurrency: number; readonly shutdownGraceMs: number };
	readonly logLevel: LogLevel;
}
