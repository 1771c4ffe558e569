export type {
	DispatchConfig,
	Endpoint,
	Environment,
	MirrorConfig,
	ReconciliationConfig,
	SessionConfig,
	VolumeConfig,
} from "./types.js";
export { DEFAULT_ENDPOINTS } from "./types.js";
export { ENV_BINDINGS, configFromEnv, mergeOverrides } from "./env.js";
export { loadConfig, parseConfig } from "./load-config.js";
export { mirrorConfigSchema } from "./schema.js";
