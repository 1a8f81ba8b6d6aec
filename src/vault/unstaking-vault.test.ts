import { describe, expect, it } from "vitest";
import { DelegateDirectory } from "../delegate/delegate-directory.js";
import { NATIVE_ASSET, deriveAddress, parseEther } from "../lib/ethereum/index.js";
import { InMemoryAssetRegistry } from "../registry/asset-registry.js";
import { Chain } from "../runtime/chain.js";
import { strategyId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { InMemoryStakingProtocol } from "../staking/in-memory-protocol.js";
import { UnstakingVault } from "./unstaking-vault.js";

const STETH = deriveAddress("asset:steth");
const STRATEGY = strategyId("strategy:steth");
const DELEGATE = deriveAddress("delegate:0");
const MANAGER = deriveAddress("withdrawal-manager");
const STRANGER = deriveAddress("stranger");

function setup() {
	const chain = new Chain();
	const protocol = new InMemoryStakingProtocol(chain, deriveAddress("staking-protocol"));
	protocol.addStrategy(STRATEGY, STETH);
	const registry = new InMemoryAssetRegistry([
		{ asset: NATIVE_ASSET, depositLimit: parseEther("100") },
		{ asset: STETH, depositLimit: parseEther("100"), strategy: STRATEGY },
	]);
	const delegates = new DelegateDirectory();
	delegates.register({
		address: DELEGATE,
		heldBalance: () => 0n,
		getAssetBalance: () => 0n,
		getAssetShares: () => 0n,
		getNativeStakedBalance: () => 0n,
	});
	const vault = new UnstakingVault({
		chain,
		address: deriveAddress("unstaking-vault"),
		registry,
		protocol,
		delegates,
	});
	vault.setWithdrawalManager(MANAGER);
	return { chain, protocol, vault };
}

describe("UnstakingVault", () => {
	describe("share counters", () => {
		it("tracks shares per asset for registered delegates", () => {
			const { chain, vault } = setup();
			unwrap(vault.addSharesUnstaking(DELEGATE, STETH, parseEther("3")));
			unwrap(vault.addSharesUnstaking(DELEGATE, STETH, parseEther("2")));
			unwrap(vault.reduceSharesUnstaking(DELEGATE, STETH, parseEther("1")));

			expect(vault.sharesUnstaking(STETH)).toBe(parseEther("4"));
			expect(vault.sharesUnstaking(NATIVE_ASSET)).toBe(0n);
			const changes = chain.events.ofType("shares_unstaking_changed").map((r) => r.event.delta);
			expect(changes).toEqual([parseEther("3"), parseEther("2"), -parseEther("1")]);
		});

		it("rejects callers that are neither delegates nor the withdrawal manager", () => {
			const { vault } = setup();
			const result = vault.addSharesUnstaking(STRANGER, STETH, 1n);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("UNAUTHORIZED");
			expect(vault.addSharesUnstaking(MANAGER, STETH, 1n).ok).toBe(true);
		});

		it("refuses to reduce below zero", () => {
			const { vault } = setup();
			unwrap(vault.addSharesUnstaking(DELEGATE, STETH, 5n));
			const result = vault.reduceSharesUnstaking(DELEGATE, STETH, 6n);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("INVALID_AMOUNT");
			expect(vault.sharesUnstaking(STETH)).toBe(5n);
		});

		it("rejects a zero share count", () => {
			const { vault } = setup();
			expect(vault.addSharesUnstaking(DELEGATE, STETH, 0n).ok).toBe(false);
		});
	});

	describe("getAssetsUnstaking", () => {
		it("values token shares through the asset's strategy", () => {
			const { chain, protocol, vault } = setup();
			chain.fund(STETH, DELEGATE, parseEther("10"));
			unwrap(protocol.depositIntoStrategy(DELEGATE, STRATEGY, parseEther("10")));
			protocol.accrueYield(STRATEGY, parseEther("10"));
			unwrap(vault.addSharesUnstaking(DELEGATE, STETH, parseEther("3")));

			expect(vault.getAssetsUnstaking(STETH)).toBe(parseEther("6"));
		});

		it("counts native shares one to one", () => {
			const { vault } = setup();
			unwrap(vault.addSharesUnstaking(DELEGATE, NATIVE_ASSET, parseEther("32")));
			expect(vault.getAssetsUnstaking(NATIVE_ASSET)).toBe(parseEther("32"));
		});
	});

	describe("redeem", () => {
		it("pays out held assets to the withdrawal manager's recipient", () => {
			const { chain, vault } = setup();
			chain.fund(STETH, vault.address, parseEther("5"));
			unwrap(vault.redeem(MANAGER, STETH, parseEther("2"), STRANGER));

			expect(vault.balanceOf(STETH)).toBe(parseEther("3"));
			expect(chain.balanceOf(STETH, STRANGER)).toBe(parseEther("2"));
		});

		it("only the withdrawal manager may redeem", () => {
			const { chain, vault } = setup();
			chain.fund(STETH, vault.address, parseEther("5"));
			const result = vault.redeem(DELEGATE, STETH, 1n, DELEGATE);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("UNAUTHORIZED");
		});

		it("cannot pay more than it holds", () => {
			const { vault } = setup();
			const result = vault.redeem(MANAGER, STETH, 1n, STRANGER);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("INSUFFICIENT_BALANCE");
		});
	});
});
