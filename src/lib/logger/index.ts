/**
 * Logger wrapper: domain-agnostic structured logging backed by pino.
 *
 * Auto-redacts opaque credential objects (anything with `__opaque: true`)
 * and supports configurable path-based redaction for sensitive fields.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
	/** Static fields added to every record, e.g. `{ service: "position-mirror" }` */
	readonly base?: Record<string, unknown>;
}

type LogMethod = {
	(msg: string): void;
	(obj: Record<string, unknown>, msg: string): void;
};

/** Structured logger interface with auto-redaction of opaque credentials. */
export interface Logger {
	readonly debug: LogMethod;
	readonly info: LogMethod;
	readonly warn: LogMethod;
	readonly error: LogMethod;
	readonly fatal: LogMethod;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Credential serializer ───────────────────────────────────────────

function isOpaqueCredential(value: unknown): boolean {
	return (
		typeof value === "object" && value !== null && "__opaque" in value && value.__opaque === true
	);
}

function redactCredentials(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaqueCredential(value) ? "[REDACTED]" : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type PinoLevel = "debug" | "info" | "warn" | "error" | "fatal";

function bind(pinoLogger: pino.Logger, level: PinoLevel): LogMethod {
	return (msgOrObj: string | Record<string, unknown>, msg?: string): void => {
		if (typeof msgOrObj === "string") {
			pinoLogger[level](msgOrObj);
		} else {
			pinoLogger[level](redactCredentials(msgOrObj), msg ?? "");
		}
	};
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		debug: bind(pinoLogger, "debug"),
		info: bind(pinoLogger, "info"),
		warn: bind(pinoLogger, "warn"),
		error: bind(pinoLogger, "error"),
		fatal: bind(pinoLogger, "fatal"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(redactCredentials(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with auto-redaction and optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ masterPositionId: 1001 }, "[OPEN] slave order accepted");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.base) {
		pinoOptions.base = { ...config.base };
	}

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	const pinoLogger = destination
		? pino(pinoOptions, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** A logger that discards everything, for components constructed without one. */
export function silentLogger(): Logger {
	const noop: LogMethod = () => {};
	const logger: Logger = {
		debug: noop,
		info: noop,
		warn: noop,
		error: noop,
		fatal: noop,
		child: () => logger,
	};
	return logger;
}
