import { describe, expect, it } from "vitest";
import { isInvalidOrder } from "../shared/errors.js";
import { levelAtPrice, priceAtLevel } from "./tick-math.js";

describe("priceAtLevel", () => {
	it("level 0 is price 1", () => {
		expect(priceAtLevel(0).toString()).toBe("1");
	});

	it("one step is one basis point", () => {
		expect(priceAtLevel(1).toString()).toBe("1.0001");
		expect(priceAtLevel(2).toString()).toBe("1.00020001");
	});

	it("negative levels are reciprocals", () => {
		expect(priceAtLevel(-1).mul(priceAtLevel(1)).toFixed(30)).toBe(`1.${"0".repeat(30)}`);
	});
});

describe("levelAtPrice", () => {
	it("exact powers map to their level", () => {
		expect(levelAtPrice("1")).toEqual({ ok: true, value: 0 });
		expect(levelAtPrice("1.0001")).toEqual({ ok: true, value: 1 });
		expect(levelAtPrice("1.00020001")).toEqual({ ok: true, value: 2 });
	});

	it("floors prices between levels", () => {
		expect(levelAtPrice("1.00015")).toEqual({ ok: true, value: 1 });
		expect(levelAtPrice("0.9999")).toEqual({ ok: true, value: -2 });
	});

	it("round-trips through priceAtLevel", () => {
		for (const level of [-500, -60, 0, 60, 4055]) {
			const result = levelAtPrice(priceAtLevel(level).toString());
			expect(result).toEqual({ ok: true, value: level });
		}
	});

	it("rejects non-positive and malformed prices", () => {
		const zero = levelAtPrice("0");
		expect(!zero.ok && isInvalidOrder(zero.error)).toBe(true);
		expect(levelAtPrice("-1").ok).toBe(false);
		expect(levelAtPrice("cheap").ok).toBe(false);
	});
});
