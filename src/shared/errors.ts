/**
 * TradingError hierarchy — structured error classification.
 *
 * Every error has a category (retryable, non-retryable, fatal). Callers use
 * the category to decide whether re-submitting the same operation can help;
 * the engine itself never retries.
 */

/** Error severity categories. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing TradingError subclasses with optional cause chain. */
interface TradingErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for all engine operations, with category-based retry semantics. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** A requested operation would violate a non-negativity, alignment or argument invariant. */
export class InvalidOrderError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_ORDER", ErrorCategory.NonRetryable, rest);
		this.name = "InvalidOrderError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Redemption attempted against a position with zero claimable output. */
export class NothingToClaimError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"NOTHING_TO_CLAIM",
			ErrorCategory.NonRetryable,
			rest,
			"The position has not been filled yet",
		);
		this.name = "NothingToClaimError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Caller's claim share is smaller than the amount requested for cancellation or redemption. */
export class InsufficientShareError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "INSUFFICIENT_SHARE", ErrorCategory.NonRetryable, rest);
		this.name = "InsufficientShareError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable error reported by the Market collaborator (liquidity exhaustion, bad parameters). */
export class MarketFailureError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "MARKET_FAILURE", ErrorCategory.Retryable, rest);
		this.name = "MarketFailureError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-retryable error when an account lacks the balance or allowance for a transfer. */
export class TransferFailureError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "TRANSFER_FAILURE", ErrorCategory.NonRetryable, rest);
		this.name = "TransferFailureError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/**
 * Classify an unknown thrown value into the TradingError hierarchy.
 * Anything that is not already a TradingError becomes a SystemError carrying the original as cause.
 */
export function classifyError(error: unknown): TradingError {
	if (error instanceof TradingError) return error;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		if (msg.includes("insufficient liquidity") || msg.includes("price limit")) {
			return new MarketFailureError(error.message, { cause: error });
		}
		if (msg.includes("insufficient balance") || msg.includes("allowance")) {
			return new TransferFailureError(error.message, { cause: error });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for InvalidOrderError. */
export function isInvalidOrder(e: unknown): e is InvalidOrderError {
	return e instanceof InvalidOrderError;
}

/** Type guard for NothingToClaimError. */
export function isNothingToClaim(e: unknown): e is NothingToClaimError {
	return e instanceof NothingToClaimError;
}

/** Type guard for InsufficientShareError. */
export function isInsufficientShare(e: unknown): e is InsufficientShareError {
	return e instanceof InsufficientShareError;
}

/** Type guard for MarketFailureError. */
export function isMarketFailure(e: unknown): e is MarketFailureError {
	return e instanceof MarketFailureError;
}

/** Type guard for TransferFailureError. */
export function isTransferFailure(e: unknown): e is TransferFailureError {
	return e instanceof TransferFailureError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

/** Type guard for SystemError. */
export function isSystemError(e: unknown): e is SystemError {
	return e instanceof SystemError;
}
