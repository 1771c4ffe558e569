#!/usr/bin/env node
/**
 * position-mirror [config.json]
 *
 * Config path: first argument, else $MIRROR_CONFIG, else ./mirror.config.json.
 * SIGINT/SIGTERM stop the engine gracefully; a fatal session error exits 1.
 */

import { loadConfig } from "../config/load-config.js";
import { createMirror } from "../engine/create-mirror.js";
import { createLogger } from "../lib/logger/index.js";
import { SessionState } from "../session/types.js";
import { classifyError } from "../shared/errors.js";

const DEFAULT_CONFIG_PATH = "mirror.config.json";

async function main(): Promise<number> {
	const path = process.argv[2] ?? process.env["MIRROR_CONFIG"] ?? DEFAULT_CONFIG_PATH;
	const config = await loadConfig(path);
	const logger = createLogger({
		level: config.logLevel,
		base: { service: "position-mirror", environment: config.environment },
	});

	const { engine, session } = createMirror({ config, logger });

	let exitCode = 0;
	const shutdown = (reason: string): void => {
		engine.stop(reason).then(
			(report) => {
				logger.info({ reason, dropped: report.dropped }, "exiting");
				process.exit(exitCode);
			},
			(error: unknown) => {
				logger.fatal({ err: classifyError(error).message }, "shutdown failed");
				process.exit(1);
			},
		);
	};

	process.on("SIGINT", () => shutdown("SIGINT"));
	process.on("SIGTERM", () => shutdown("SIGTERM"));
	process.on("unhandledRejection", (reason) => {
		logger.error({ err: classifyError(reason).message }, "unhandled promise rejection");
	});

	// Already logged by the session; a failed start returns its own result.
	session.events.on("fatal", () => {
		exitCode = 1;
		if (session.history().some((h) => h.to === SessionState.Running)) shutdown("fatal");
	});

	const started = await engine.start();
	if (!started.ok) {
		logger.fatal({ code: started.error.code, err: started.error.message }, "could not start");
		await engine.stop("start failed");
		return 1;
	}
	return 0;
}

main().then(
	(code) => {
		if (code !== 0) process.exit(code);
	},
	(error: unknown) => {
		console.error(classifyError(error).message);
		process.exit(1);
	},
);
