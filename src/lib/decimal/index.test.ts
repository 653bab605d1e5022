import { describe, expect, it } from "vitest";
import { LibDecimal } from "./index.js";

describe("LibDecimal", () => {
	describe("from", () => {
		it("parses strings and numbers", () => {
			expect(LibDecimal.from("1.0001").toString()).toBe("1.0001");
			expect(LibDecimal.from(2.5).toString()).toBe("2.5");
		});

		it("rejects non-finite numbers and empty strings", () => {
			expect(() => LibDecimal.from(Number.NaN)).toThrow("invalid number");
			expect(() => LibDecimal.from("  ")).toThrow("empty string");
		});

		it("rejects non-numeric strings", () => {
			expect(() => LibDecimal.from("abc")).toThrow('not a number "abc"');
		});
	});

	describe("powInt", () => {
		it("computes exact small powers", () => {
			expect(LibDecimal.from("1.0001").powInt(2).toString()).toBe("1.00020001");
			expect(LibDecimal.from("2").powInt(10).toString()).toBe("1024");
		});

		it("supports negative exponents", () => {
			expect(LibDecimal.from("2").powInt(-2).toString()).toBe("0.25");
		});

		it("x^0 is one", () => {
			expect(LibDecimal.from("1.0001").powInt(0).toString()).toBe("1");
		});

		it("rejects fractional exponents", () => {
			expect(() => LibDecimal.from("2").powInt(0.5)).toThrow("exponent must be an integer");
		});
	});

	describe("ln", () => {
		it("ln(1) is zero", () => {
			expect(LibDecimal.one().ln().toString()).toBe("0");
		});

		it("throws for non-positive values", () => {
			expect(() => LibDecimal.from("0").ln()).toThrow("ln of non-positive");
		});
	});

	describe("div", () => {
		it("divides and guards against zero", () => {
			expect(LibDecimal.from("1").div(LibDecimal.from("4")).toString()).toBe("0.25");
			expect(() => LibDecimal.one().div(LibDecimal.from(0))).toThrow("division by zero");
		});
	});

	describe("floorToNumber", () => {
		it("floors toward negative infinity", () => {
			expect(LibDecimal.from("2.9").floorToNumber()).toBe(2);
			expect(LibDecimal.from("-2.1").floorToNumber()).toBe(-3);
			expect(LibDecimal.from("-2").floorToNumber()).toBe(-2);
		});
	});

	describe("comparison and formatting", () => {
		it("compares", () => {
			const a = LibDecimal.from("1.5");
			const b = LibDecimal.from("2");
			expect(a.lte(b)).toBe(true);
			expect(b.gt(a)).toBe(true);
			expect(a.isPositive()).toBe(true);
		});

		it("toFixed and toSignificant", () => {
			expect(LibDecimal.from("1.23456").toFixed(2)).toBe("1.23");
			expect(LibDecimal.from("1.00020001").toSignificant(3)).toBe("1");
		});
	});
});
