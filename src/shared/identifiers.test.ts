import { describe, expect, it } from "vitest";
import { accountId, assetId, idToString, marketId, positionIdFromHex } from "./identifiers.js";

describe("branded identifiers", () => {
	describe("factory functions", () => {
		it("trims surrounding whitespace", () => {
			expect(idToString(marketId("  eth-usd "))).toBe("eth-usd");
			expect(idToString(accountId("alice\n"))).toBe("alice");
			expect(idToString(assetId("\tusd"))).toBe("usd");
		});

		it("rejects empty strings", () => {
			expect(() => marketId("")).toThrow("MarketId cannot be empty");
			expect(() => accountId("   ")).toThrow("AccountId cannot be empty");
			expect(() => assetId("")).toThrow("AssetId cannot be empty");
		});
	});

	describe("positionIdFromHex", () => {
		it("accepts 0x-prefixed 32-byte lowercase hex", () => {
			const hex = `0x${"ab".repeat(32)}`;
			expect(idToString(positionIdFromHex(hex))).toBe(hex);
		});

		it("rejects values of the wrong shape", () => {
			expect(() => positionIdFromHex("0x1234")).toThrow("PositionId must be");
			expect(() => positionIdFromHex("ab".repeat(32))).toThrow("PositionId must be");
			expect(() => positionIdFromHex(`0x${"AB".repeat(32)}`)).toThrow("PositionId must be");
		});
	});
});
