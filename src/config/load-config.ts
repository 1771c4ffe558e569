import { readFile } from "node:fs/promises";
import { createCredentials } from "../auth/credentials.js";
import { formatIssue, validate } from "../lib/validation/index.js";
import { ConfigError } from "../shared/errors.js";
import { accountId } from "../shared/identifiers.js";
import { type Result, err, ok, unwrap } from "../shared/result.js";
import { PolicyKind, type VolumePolicy } from "../sizing/types.js";
import { selectPolicy } from "../sizing/volume-calculator.js";
import { normalizeSymbolName } from "../symbols/symbol-mapper.js";
import { configFromEnv, isRecord, mergeOverrides } from "./env.js";
import { type ParsedMirrorConfig, mirrorConfigSchema } from "./schema.js";
import { DEFAULT_ENDPOINTS, type MirrorConfig } from "./types.js";

function symbolTable<T>(table: Record<string, T>): Map<string, T> {
	return new Map(Object.entries(table).map(([name, value]) => [normalizeSymbolName(name), value]));
}

function buildPolicies(volume: ParsedMirrorConfig["volume"]): VolumePolicy[] {
	const policies: VolumePolicy[] = [];
	if (volume.globalMultiplier) {
		policies.push({ kind: PolicyKind.GlobalMultiplier, multiplier: volume.globalMultiplier });
	}
	if (volume.instrumentMultipliers) {
		policies.push({
			kind: PolicyKind.InstrumentMultiplier,
			multipliers: symbolTable(volume.instrumentMultipliers.table),
			defaultMultiplier: volume.instrumentMultipliers.defaultMultiplier,
		});
	}
	if (volume.balancePercentage) {
		policies.push({
			kind: PolicyKind.BalancePercentage,
			lotPercentage: volume.balancePercentage.lotPercentage,
			microLotsPerDollar: symbolTable(volume.balancePercentage.microLotsPerDollar),
			defaultMicroLotsPerDollar: volume.balancePercentage.defaultMicroLotsPerDollar,
		});
	}
	if (volume.pipEqualization) {
		policies.push({
			kind: PolicyKind.PipEqualization,
			riskRatio: volume.pipEqualization.riskRatio,
			fallbackMultiplier: volume.pipEqualization.fallbackMultiplier,
		});
	}
	return policies;
}

function buildConfig(parsed: ParsedMirrorConfig): Result<MirrorConfig, ConfigError> {
	if (parsed.master.accountId === parsed.slave.accountId) {
		return err(
			new ConfigError("master and slave must be different accounts", {
				accountId: parsed.master.accountId,
			}),
		);
	}

	const configured = buildPolicies(parsed.volume);
	const policy = selectPolicy(configured);
	if (!policy) {
		return err(new ConfigError("at least one volume policy must be configured"));
	}

	return ok({
		environment: parsed.environment,
		endpoint: parsed.endpoint ?? DEFAULT_ENDPOINTS[parsed.environment],
		credentials: createCredentials({
			clientId: parsed.clientId,
			clientSecret: parsed.clientSecret,
			masterAccessToken: parsed.master.accessToken,
			slaveAccessToken: parsed.slave.accessToken,
		}),
		masterAccountId: accountId(parsed.master.accountId),
		slaveAccountId: accountId(parsed.slave.accountId),
		volume: {
			policy,
			configured,
			limits: {
				minLotSize: parsed.volume.minLotSize,
				maxLotMultiplier: parsed.volume.maxLotMultiplier,
			},
		},
		symbolAliases: new Map(Object.entries(parsed.symbols.aliases)),
		dispatch: parsed.dispatch,
		session: parsed.session,
		reconciliation: parsed.reconciliation,
		engine: parsed.engine,
		logLevel: parsed.logLevel,
	});
}

/**
 * Validate raw config content, with environment overrides applied on top.
 * @param overrides - output of configFromEnv()
 */
export function parseConfig(
	raw: unknown,
	overrides: Record<string, unknown> = {},
): Result<MirrorConfig, ConfigError> {
	if (!isRecord(raw)) {
		return err(new ConfigError("Config root must be a JSON object"));
	}
	const validated = validate(mirrorConfigSchema, mergeOverrides(raw, overrides));
	if (!validated.ok) {
		const issues = validated.error.issues.map(formatIssue);
		return err(
			new ConfigError(`Invalid configuration: ${issues.join("; ")}`, {
				issues,
				cause: validated.error,
			}),
		);
	}
	return buildConfig(validated.value);
}

/**
 * Read, override and validate a JSON config file.
 * @throws ConfigError when the file is missing, unparsable or invalid
 */
export async function loadConfig(
	path: string,
	env: NodeJS.ProcessEnv = process.env,
): Promise<MirrorConfig> {
	let text: string;
	try {
		text = await readFile(path, "utf8");
	} catch (e) {
		throw new ConfigError(`Cannot read config file ${path}`, { cause: e });
	}

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (e) {
		throw new ConfigError(`Config file ${path} is not valid JSON`, { cause: e });
	}

	return unwrap(parseConfig(raw, configFromEnv(env)));
}
