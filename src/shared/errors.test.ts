import { describe, expect, it } from "vitest";
import {
	ConfigError,
	ErrorCategory,
	InsufficientShareError,
	InvalidOrderError,
	MarketFailureError,
	NothingToClaimError,
	SystemError,
	TradingError,
	TransferFailureError,
	classifyError,
	isConfigError,
	isInsufficientShare,
	isInvalidOrder,
	isMarketFailure,
	isNothingToClaim,
	isSystemError,
	isTransferFailure,
} from "./errors.js";

describe("TradingError hierarchy", () => {
	describe("error categories", () => {
		const cases: Array<[string, TradingError, ErrorCategory]> = [
			["InvalidOrderError", new InvalidOrderError("bad"), ErrorCategory.NonRetryable],
			["NothingToClaimError", new NothingToClaimError("empty"), ErrorCategory.NonRetryable],
			["InsufficientShareError", new InsufficientShareError("low"), ErrorCategory.NonRetryable],
			["MarketFailureError", new MarketFailureError("dry"), ErrorCategory.Retryable],
			["TransferFailureError", new TransferFailureError("no funds"), ErrorCategory.NonRetryable],
			["ConfigError", new ConfigError("bad config"), ErrorCategory.Fatal],
			["SystemError", new SystemError("panic"), ErrorCategory.Fatal],
		];

		it.each(cases)("%s has category %s", (_name, error, expected) => {
			expect(error.category).toBe(expected);
		});
	});

	describe("error properties", () => {
		it("preserves message, code, and context", () => {
			const e = new InvalidOrderError("amount must be positive", { amount: "0" });
			expect(e.message).toBe("amount must be positive");
			expect(e.code).toBe("INVALID_ORDER");
			expect(e.context).toEqual({ amount: "0" });
		});

		it("keeps cause out of context", () => {
			const root = new Error("root");
			const e = new MarketFailureError("trade failed", { cause: root, marketId: "m-1" });
			expect(e.cause).toBe(root);
			expect(e.context).toEqual({ marketId: "m-1" });
		});

		it("NothingToClaimError carries a hint", () => {
			expect(new NothingToClaimError("empty").hint).toBe("The position has not been filled yet");
		});

		it("is instanceof Error", () => {
			expect(new InsufficientShareError("low")).toBeInstanceOf(Error);
			expect(new InsufficientShareError("low")).toBeInstanceOf(TradingError);
		});
	});

	describe("type guards", () => {
		it("narrow to the matching class only", () => {
			expect(isInvalidOrder(new InvalidOrderError("x"))).toBe(true);
			expect(isInvalidOrder(new SystemError("x"))).toBe(false);
			expect(isNothingToClaim(new NothingToClaimError("x"))).toBe(true);
			expect(isInsufficientShare(new InsufficientShareError("x"))).toBe(true);
			expect(isMarketFailure(new MarketFailureError("x"))).toBe(true);
			expect(isTransferFailure(new TransferFailureError("x"))).toBe(true);
			expect(isTransferFailure(new Error("x"))).toBe(false);
			expect(isConfigError(new ConfigError("x"))).toBe(true);
			expect(isSystemError(new SystemError("x"))).toBe(true);
			expect(isSystemError(new ConfigError("x"))).toBe(false);
		});
	});
});

describe("classifyError", () => {
	it("returns TradingError as-is", () => {
		const original = new InsufficientShareError("low");
		expect(classifyError(original)).toBe(original);
	});

	it("classifies liquidity errors as market failures", () => {
		const e = classifyError(new Error("Insufficient liquidity for trade"));
		expect(e).toBeInstanceOf(MarketFailureError);
		expect(e.isRetryable).toBe(true);
	});

	it("classifies balance errors as transfer failures", () => {
		const e = classifyError(new Error("insufficient balance"));
		expect(e).toBeInstanceOf(TransferFailureError);
	});

	it("classifies unknown errors as SystemError", () => {
		const e = classifyError(new Error("something weird"));
		expect(e).toBeInstanceOf(SystemError);
		expect(e.category).toBe(ErrorCategory.Fatal);
	});

	it("handles non-Error thrown values", () => {
		const e = classifyError("string error");
		expect(e).toBeInstanceOf(SystemError);
		expect(e.message).toBe("string error");
	});
});

describe("toJSON", () => {
	it("serializes all fields", () => {
		const e = new TransferFailureError("no funds", { asset: "usd" });
		expect(e.toJSON()).toEqual({
			name: "TransferFailureError",
			message: "no funds",
			code: "TRANSFER_FAILURE",
			category: ErrorCategory.NonRetryable,
			retryable: false,
			context: { asset: "usd" },
		});
	});

	it("includes the hint when present", () => {
		const json = new NothingToClaimError("empty").toJSON();
		expect(json["hint"]).toBe("The position has not been filled yet");
	});
});
