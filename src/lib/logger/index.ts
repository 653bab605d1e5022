/**
 * Logger wrapper — domain-agnostic structured logging backed by pino.
 *
 * Auto-redacts opaque objects (anything with `__opaque: true`), renders
 * bigint fields as decimal strings and supports path-based redaction.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe, plus `silent`. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Field normalization ─────────────────────────────────────────────

interface OpaqueMarker {
	__opaque: boolean;
}

function isOpaque(value: unknown): boolean {
	return (
		typeof value === "object" &&
		value !== null &&
		"__opaque" in value &&
		(value as OpaqueMarker).__opaque === true
	);
}

function normalizeValue(value: unknown): unknown {
	if (typeof value === "bigint") return value.toString(10);
	if (isOpaque(value)) return "[REDACTED]";
	return value;
}

function normalizeFields(obj: Record<string, unknown>): Record<string, unknown> {
	if (isOpaque(obj)) return { value: "[REDACTED]" };
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = normalizeValue(value);
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type LevelMethod = "info" | "warn" | "error" | "debug";

function forward(
	pinoLogger: pino.Logger,
	level: LevelMethod,
	msgOrObj: string | Record<string, unknown>,
	msg?: string,
): void {
	if (typeof msgOrObj === "string") {
		pinoLogger[level](msgOrObj);
	} else {
		pinoLogger[level](normalizeFields(msgOrObj), msg ?? "");
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			forward(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			forward(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			forward(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: string | Record<string, unknown>, msg?: string): void {
			forward(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(normalizeFields(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with field normalization and an optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ marketId: "eth-usd", amount: 5n }, "Order placed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	let pinoLogger: pino.Logger;

	if (config.destination) {
		const destination = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		pinoLogger = pino(pinoOptions, stream);
	} else {
		pinoLogger = pino(pinoOptions);
	}

	return wrapPino(pinoLogger);
}

/** A logger that discards everything; the default when the host passes none. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
