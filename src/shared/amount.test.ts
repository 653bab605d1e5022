import { describe, expect, it } from "vitest";
import { formatAmount, isPositiveAmount, mulDivDown, parseAmount } from "./amount.js";

describe("Amount helpers", () => {
	describe("mulDivDown", () => {
		it("floors the quotient", () => {
			expect(mulDivDown(50n, 500n, 1000n)).toBe(25n);
			expect(mulDivDown(1n, 2n, 3n)).toBe(0n);
			expect(mulDivDown(7n, 10n, 3n)).toBe(23n);
		});

		it("does not overflow on large intermediates", () => {
			const big = 10n ** 30n;
			expect(mulDivDown(big, big, big)).toBe(big);
		});

		it("throws on zero denominator", () => {
			expect(() => mulDivDown(1n, 1n, 0n)).toThrow("division by zero");
		});

		it("throws on negative operands", () => {
			expect(() => mulDivDown(-1n, 1n, 1n)).toThrow("non-negative");
		});
	});

	describe("parseAmount", () => {
		it("parses canonical integers", () => {
			expect(parseAmount("0")).toBe(0n);
			expect(parseAmount("1000000000000000000000")).toBe(10n ** 21n);
		});

		it.each(["", "-1", "1.5", "1e3", "01", " 1", "abc"])("rejects %j", (raw) => {
			expect(() => parseAmount(raw)).toThrow("not a non-negative integer");
		});
	});

	it("formatAmount round-trips through parseAmount", () => {
		expect(parseAmount(formatAmount(123456789n))).toBe(123456789n);
	});

	it("isPositiveAmount", () => {
		expect(isPositiveAmount(1n)).toBe(true);
		expect(isPositiveAmount(0n)).toBe(false);
		expect(isPositiveAmount(-5n)).toBe(false);
	});
});
