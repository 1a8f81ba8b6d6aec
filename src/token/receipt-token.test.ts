import { describe, expect, it } from "vitest";
import { deriveAddress } from "../lib/ethereum/index.js";
import { Chain } from "../runtime/chain.js";
import { LedgerReceiptToken } from "./receipt-token.js";

const POOL = deriveAddress("deposit-pool");
const ALICE = deriveAddress("alice");
const BOB = deriveAddress("bob");

function setup() {
	const chain = new Chain();
	const token = new LedgerReceiptToken(chain, deriveAddress("receipt-token"), [POOL]);
	return { chain, token };
}

describe("LedgerReceiptToken", () => {
	it("lets a minter mint and burn", () => {
		const { token } = setup();
		expect(token.mint(POOL, ALICE, 10n).ok).toBe(true);
		expect(token.burn(POOL, ALICE, 4n).ok).toBe(true);
		expect(token.balanceOf(ALICE)).toBe(6n);
		expect(token.totalSupply()).toBe(6n);
	});

	it("rejects mint and burn from other callers", () => {
		const { token } = setup();
		const minted = token.mint(ALICE, ALICE, 10n);
		expect(minted.ok).toBe(false);
		if (!minted.ok) expect(minted.error.code).toBe("UNAUTHORIZED");
		expect(token.burn(ALICE, ALICE, 0n).ok).toBe(false);
	});

	it("grants rights through addMinter", () => {
		const { token } = setup();
		token.addMinter(BOB);
		expect(token.mint(BOB, ALICE, 1n).ok).toBe(true);
	});

	it("rejects a zero mint", () => {
		const { token } = setup();
		const result = token.mint(POOL, ALICE, 0n);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe("INVALID_AMOUNT");
	});

	it("moves balances between holders", () => {
		const { token } = setup();
		token.mint(POOL, ALICE, 5n);
		expect(token.transfer(ALICE, BOB, 2n).ok).toBe(true);
		expect(token.balanceOf(BOB)).toBe(2n);

		const overdraw = token.transfer(ALICE, BOB, 4n);
		expect(overdraw.ok).toBe(false);
		if (!overdraw.ok) expect(overdraw.error.code).toBe("TRANSFER_FAILED");
	});

	it("keeps balances in the chain ledger so reverts undo mints", () => {
		const { chain, token } = setup();
		const result = chain.transact(() => {
			token.mint(POOL, ALICE, 5n);
			return token.burn(POOL, ALICE, 6n);
		});
		expect(result.ok).toBe(false);
		expect(token.balanceOf(ALICE)).toBe(0n);
		expect(token.totalSupply()).toBe(0n);
	});
});
