/**
 * Engine configuration.
 *
 * Defaults, then TICKFILL_* environment variables, then explicit overrides.
 * The merged result is validated before the engine sees it.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { formatIssues, validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { type Result, err, ok } from "./result.js";

export interface EngineConfig {
	/** Human-readable engine name, bound into every log line */
	readonly name: string;
	/** Account the engine holds custody under and initiates its own trades as */
	readonly engineAccount: string;
	/** Maximum fills per triggering trade; the remainder waits for the next trigger */
	readonly maxFillsPerCycle: number;
	readonly logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	name: "tickfill",
	engineAccount: "tickfill-engine",
	maxFillsPerCycle: 32,
	logLevel: "info",
};

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

const engineConfigSchema = z.object({
	name: z.string().trim().min(1),
	engineAccount: z.string().trim().min(1),
	maxFillsPerCycle: z.number().int().positive(),
	logLevel: z.enum(LOG_LEVELS),
});

/** Mutable builder shape for constructing Partial<EngineConfig> without TS4111 index issues. */
interface MutableEngineConfig {
	name?: string;
	engineAccount?: string;
	maxFillsPerCycle?: number;
	logLevel?: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Reads engine config values from environment variables.
 * Supported: TICKFILL_NAME, TICKFILL_ENGINE_ACCOUNT, TICKFILL_MAX_FILLS_PER_CYCLE,
 * TICKFILL_LOG_LEVEL.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(): Partial<EngineConfig> {
	const result: MutableEngineConfig = {};

	const envName = process.env["TICKFILL_NAME"];
	if (envName) {
		result.name = envName;
	}

	const envAccount = process.env["TICKFILL_ENGINE_ACCOUNT"];
	if (envAccount) {
		result.engineAccount = envAccount;
	}

	const rawFills = process.env["TICKFILL_MAX_FILLS_PER_CYCLE"];
	if (rawFills) {
		const parsed = strictParseInt(rawFills);
		if (Number.isNaN(parsed) || parsed <= 0) {
			throw new ConfigError(
				`Invalid TICKFILL_MAX_FILLS_PER_CYCLE: "${rawFills}" must be a positive integer`,
			);
		}
		result.maxFillsPerCycle = parsed;
	}

	const rawLevel = process.env["TICKFILL_LOG_LEVEL"];
	if (rawLevel) {
		if (!isLogLevel(rawLevel)) {
			throw new ConfigError(
				`Invalid TICKFILL_LOG_LEVEL: "${rawLevel}" must be one of ${LOG_LEVELS.join(", ")}`,
			);
		}
		result.logLevel = rawLevel;
	}

	return result;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

/**
 * Merge defaults, environment and explicit overrides (explicit wins) and validate.
 * Environment errors surface as ConfigError results rather than throws.
 */
export function resolveConfig(
	overrides: Partial<EngineConfig> = {},
): Result<EngineConfig, ConfigError> {
	let fromEnv: Partial<EngineConfig>;
	try {
		fromEnv = configFromEnv();
	} catch (e) {
		return err(e instanceof ConfigError ? e : new ConfigError(String(e), { cause: e }));
	}

	const merged = { ...DEFAULT_ENGINE_CONFIG, ...fromEnv, ...overrides };
	const checked = validate(engineConfigSchema, merged);
	if (!checked.ok) {
		return err(
			new ConfigError(`Invalid engine config: ${formatIssues(checked.error.issues)}`, {
				cause: checked.error,
			}),
		);
	}
	return ok(checked.value);
}
