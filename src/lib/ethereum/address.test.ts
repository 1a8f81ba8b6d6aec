import { describe, expect, it } from "vitest";
import {
	NATIVE_ASSET,
	deriveAddress,
	hashLabel,
	isHexOfSize,
	parseEther,
	toAddress,
} from "./address.js";

const ZERO = "0x0000000000000000000000000000000000000000";

describe("address helpers", () => {
	describe("toAddress", () => {
		it("checksums regardless of input case", () => {
			const lower = "0x742d35cc6634c0532925a3b844bc9e7595f0feb1";
			const address = toAddress(lower);
			expect(address.toLowerCase()).toBe(lower);
			expect(toAddress(lower.toUpperCase().replace("0X", "0x"))).toBe(address);
		});

		it("trims whitespace", () => {
			expect(toAddress(`  ${ZERO}  `)).toBe(ZERO);
		});

		it("throws on malformed input", () => {
			expect(() => toAddress("0x1234")).toThrow("Invalid address: 0x1234");
		});
	});

	it("keeps the native marker in checksummed form", () => {
		expect(NATIVE_ASSET).toBe("0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE");
		expect(toAddress(NATIVE_ASSET.toLowerCase())).toBe(NATIVE_ASSET);
	});

	describe("deriveAddress", () => {
		it("is deterministic per label", () => {
			expect(deriveAddress("deposit-pool")).toBe(deriveAddress("deposit-pool"));
			expect(deriveAddress("deposit-pool")).not.toBe(deriveAddress("converter"));
		});

		it("produces a valid checksummed address", () => {
			const address = deriveAddress("delegate:0");
			expect(isHexOfSize(address, 20)).toBe(true);
			expect(toAddress(address)).toBe(address);
		});
	});

	describe("isHexOfSize", () => {
		it("checks the byte length", () => {
			expect(isHexOfSize(`0x${"ab".repeat(48)}`, 48)).toBe(true);
			expect(isHexOfSize(`0x${"ab".repeat(47)}`, 48)).toBe(false);
		});

		it("rejects non-hex strings", () => {
			expect(isHexOfSize("0xzz", 1)).toBe(false);
			expect(isHexOfSize("abcd", 2)).toBe(false);
		});
	});

	it("hashLabel returns a 32-byte hash", () => {
		expect(isHexOfSize(hashLabel("genesis"), 32)).toBe(true);
	});

	it("parses ether units", () => {
		expect(parseEther("1.5")).toBe(1_500_000_000_000_000_000n);
	});
});
