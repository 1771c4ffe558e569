/**
 * Config file schema.
 *
 * Decimal-valued fields accept a JSON string or number ("0.01" or 0.01) and
 * come out as Decimal. Every section except the credentials and the volume
 * block has defaults.
 */

import { LOG_LEVELS, type LogLevel } from "../lib/logger/index.js";
import { z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";

const decimal = z.union([z.string(), z.number()]).transform((value, ctx) => {
	try {
		return Decimal.from(value);
	} catch (e) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: e instanceof Error ? e.message : `invalid decimal ${String(value)}`,
			fatal: true,
		});
		return z.NEVER;
	}
});

const positiveDecimal = decimal.refine((d) => d.isPositive(), { message: "must be greater than 0" });

const accountSchema = z.object({
	accountId: z.number().int().positive(),
	accessToken: z.string().min(1),
});

const endpointSchema = z.object({
	host: z.string().min(1),
	port: z.number().int().min(1).max(65_535),
});

const volumeSchema = z
	.object({
		minLotSize: positiveDecimal.default("0.01"),
		maxLotMultiplier: positiveDecimal.default("10"),
		globalMultiplier: positiveDecimal.optional(),
		instrumentMultipliers: z
			.object({
				table: z.record(positiveDecimal).default({}),
				defaultMultiplier: positiveDecimal.default("1"),
			})
			.optional(),
		balancePercentage: z
			.object({
				lotPercentage: positiveDecimal,
				microLotsPerDollar: z.record(positiveDecimal).default({}),
				defaultMicroLotsPerDollar: positiveDecimal,
			})
			.optional(),
		pipEqualization: z
			.object({
				riskRatio: positiveDecimal.default("1"),
				fallbackMultiplier: positiveDecimal.default("1"),
			})
			.optional(),
	})
	.refine(
		(v) =>
			v.globalMultiplier !== undefined ||
			v.instrumentMultipliers !== undefined ||
			v.balancePercentage !== undefined ||
			v.pipEqualization !== undefined,
		{ message: "at least one volume policy must be configured" },
	);

const logLevelSchema = z.custom<LogLevel>(
	(v) => typeof v === "string" && LOG_LEVELS.some((level) => level === v),
	{ message: `must be one of ${LOG_LEVELS.join(", ")}` },
);

export const mirrorConfigSchema = z.object({
	environment: z.enum(["demo", "live"]).default("demo"),
	endpoint: endpointSchema.optional(),
	clientId: z.string().min(1),
	clientSecret: z.string().min(1),
	master: accountSchema,
	slave: accountSchema,
	volume: volumeSchema,
	symbols: z
		.object({
			/** master symbol name → slave symbol name */
			aliases: z.record(z.string().min(1)).default({}),
		})
		.default({}),
	dispatch: z
		.object({
			maxAttempts: z.number().int().min(1).max(10).default(3),
			baseDelayMs: z.number().int().nonnegative().default(250),
			maxDelayMs: z.number().int().positive().default(5_000),
			jitterFactor: z.number().min(0).max(1).default(0.1),
			requestTimeoutMs: z.number().int().positive().default(10_000),
			rateLimitTimeoutMs: z.number().int().positive().default(30_000),
		})
		.default({}),
	session: z
		.object({
			heartbeatIntervalMs: z.number().int().positive().default(10_000),
			reconnect: z
				.object({
					baseDelayMs: z.number().int().positive().default(1_000),
					maxDelayMs: z.number().int().positive().default(30_000),
					maxAttempts: z.number().int().positive().default(10),
					jitterFactor: z.number().min(0).max(1).default(0.2),
				})
				.default({}),
		})
		.default({}),
	reconciliation: z
		.object({
			openTimeToleranceMs: z.number().int().nonnegative().default(5_000),
			mirrorUnpaired: z.boolean().default(true),
		})
		.default({}),
	engine: z
		.object({
			workerConcurrency: z.number().int().min(1).max(64).default(4),
			shutdownGraceMs: z.number().int().nonnegative().default(10_000),
		})
		.default({}),
	logLevel: logLevelSchema.default("info"),
});

/** Parsed file content, before credentials are sealed and policies are built. */
export type ParsedMirrorConfig = z.output<typeof mirrorConfigSchema>;
