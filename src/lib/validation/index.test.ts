import { describe, expect, it } from "vitest";
import { TradingError } from "../../shared/errors.js";
import { isErr, isOk } from "../../shared/result.js";
import {
	ValidationError,
	amountString,
	formatIssues,
	priceCoordinate,
	validate,
	z,
} from "./index.js";

describe("validation wrapper", () => {
	describe("validate()", () => {
		it("returns ok(data) for valid input", () => {
			const result = validate(z.string(), "hello");

			expect(isOk(result)).toBe(true);
			if (result.ok) {
				expect(result.value).toBe("hello");
			}
		});

		it("returns err(ValidationError) for invalid input", () => {
			const result = validate(z.number(), "not a number");

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(ValidationError);
			}
		});

		it("includes issue details with path for nested objects", () => {
			const schema = z.object({
				market: z.object({
					spacing: z.number(),
				}),
			});
			const result = validate(schema, { market: { spacing: "ten" } });

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error.issues).toHaveLength(1);
				expect(result.error.issues[0]?.path).toEqual(["market", "spacing"]);
			}
		});
	});

	describe("formatIssues", () => {
		it("joins path and message per issue", () => {
			const text = formatIssues([
				{ path: ["a", 0], message: "bad" },
				{ path: [], message: "worse" },
			]);
			expect(text).toBe("a.0: bad; <root>: worse");
		});
	});

	describe("amountString", () => {
		it("accepts decimal integer strings beyond the safe integer range", () => {
			const result = validate(amountString, "1000000000000000000000");
			expect(result.ok && result.value).toBe("1000000000000000000000");
		});

		it.each(["-1", "1.5", "01", ""])("rejects %j", (raw) => {
			expect(validate(amountString, raw).ok).toBe(false);
		});
	});

	describe("priceCoordinate", () => {
		it("accepts signed integers and rejects fractions", () => {
			expect(validate(priceCoordinate, -120).ok).toBe(true);
			expect(validate(priceCoordinate, 1.5).ok).toBe(false);
		});
	});

	describe("ValidationError", () => {
		it("extends TradingError with correct code and category", () => {
			const issues = [{ path: ["field"] as readonly (string | number)[], message: "bad" }];
			const error = new ValidationError("Validation failed", issues);

			expect(error).toBeInstanceOf(TradingError);
			expect(error.code).toBe("VALIDATION_FAILED");
			expect(error.category).toBe("non_retryable");
			expect(error.context).toEqual({ issueCount: 1 });
			expect(error.issues).toBe(issues);
		});
	});
});
