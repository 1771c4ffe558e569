import { type LogLevel, type Logger, createLogger } from "./index.js";

export interface CapturedLogger {
	readonly logger: Logger;
	/** Parsed JSON records, oldest first */
	readonly lines: Record<string, unknown>[];
	/** `msg` of every record */
	messages(): string[];
}

/** A real pino logger writing parsed records into memory. */
export function captureLogger(level: LogLevel = "debug"): CapturedLogger {
	const lines: Record<string, unknown>[] = [];
	const logger = createLogger({
		level,
		destination: {
			write(msg: string) {
				lines.push(JSON.parse(msg));
			},
		},
	});
	return {
		logger,
		lines,
		messages: () => lines.map((line) => String(line["msg"])),
	};
}
