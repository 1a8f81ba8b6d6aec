import { describe, expect, it } from "vitest";
import { NATIVE_ASSET, parseEther } from "../lib/ethereum/index.js";
import { VALIDATOR_DEPOSIT } from "../shared/fixed-point.js";
import { strategyId, withdrawalRoot } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { ProtocolBuilder } from "../testing/protocol-builder.js";
import { validatorDeposit } from "../testing/fixtures.js";

const STETH_STRATEGY = strategyId("strategy:steth");

function deploy(protocolDelay = 0) {
	const d = new ProtocolBuilder()
		.withAsset("steth")
		.withAsset("reth", { withStrategy: false })
		.withWorkers(1)
		.withProtocolDelay(protocolDelay)
		.build();
	return { d, worker: d.worker(0), steth: d.asset("steth") };
}

describe("DelegateWorker", () => {
	describe("depositIntoStrategy", () => {
		it("stakes the whole held balance and reports it as staked", () => {
			const { d, worker, steth } = deploy();
			d.chain.fund(steth, worker.address, parseEther("10"));

			const shares = unwrap(worker.depositIntoStrategy(d.as("manager"), steth));

			expect(shares).toBe(parseEther("10"));
			expect(worker.heldBalance(steth)).toBe(0n);
			expect(worker.getAssetBalance(steth)).toBe(parseEther("10"));
			expect(d.chain.events.ofType("asset_deposited_into_strategy")).toHaveLength(1);
		});

		it("follows strategy yield in the reported balance", () => {
			const { d, worker, steth } = deploy();
			d.chain.fund(steth, worker.address, parseEther("10"));
			unwrap(worker.depositIntoStrategy(d.as("manager"), steth));
			d.protocol.accrueYield(STETH_STRATEGY, parseEther("1"));

			expect(worker.getAssetBalance(steth)).toBe(parseEther("11"));
		});

		it("is restricted to managers", () => {
			const { d, worker, steth } = deploy();
			d.chain.fund(steth, worker.address, 1n);
			const result = worker.depositIntoStrategy(d.as("operator"), steth);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("UNAUTHORIZED");
		});

		it("rejects native, strategy-less and empty deposits", () => {
			const { d, worker, steth } = deploy();
			const codes = [
				worker.depositIntoStrategy(d.as("manager"), NATIVE_ASSET),
				worker.depositIntoStrategy(d.as("manager"), d.asset("reth")),
				worker.depositIntoStrategy(d.as("manager"), steth),
			].map((r) => (r.ok ? "ok" : r.error.code));
			expect(codes).toEqual(["UNSUPPORTED_ASSET", "STRATEGY_NOT_SET", "INVALID_AMOUNT"]);
		});
	});

	describe("native staking", () => {
		it("counts a validator as unverified until its credentials are verified", () => {
			const { d, worker } = deploy();
			d.chain.fund(NATIVE_ASSET, worker.address, VALIDATOR_DEPOSIT);

			unwrap(worker.stakeNative(d.as("manager"), validatorDeposit(1)));
			expect(worker.stakedButUnverifiedNative()).toBe(VALIDATOR_DEPOSIT);
			expect(worker.getNativeStakedBalance()).toBe(VALIDATOR_DEPOSIT);
			expect(worker.heldBalance(NATIVE_ASSET)).toBe(0n);

			unwrap(worker.verifyValidator(d.as("operator"), validatorDeposit(1).pubkey));
			expect(worker.stakedButUnverifiedNative()).toBe(0n);
			expect(d.protocol.podShares(worker.address)).toBe(VALIDATOR_DEPOSIT);
			expect(worker.getNativeStakedBalance()).toBe(VALIDATOR_DEPOSIT);
			expect(worker.getAssetBalance(NATIVE_ASSET)).toBe(VALIDATOR_DEPOSIT);
		});

		it("needs a full validator deposit on hand", () => {
			const { d, worker } = deploy();
			d.chain.fund(NATIVE_ASSET, worker.address, parseEther("31"));
			const result = worker.stakeNative(d.as("manager"), validatorDeposit(1));
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("INSUFFICIENT_BALANCE");
			expect(worker.stakedButUnverifiedNative()).toBe(0n);
		});

		it("rejects malformed deposit data", () => {
			const { d, worker } = deploy();
			d.chain.fund(NATIVE_ASSET, worker.address, VALIDATOR_DEPOSIT);
			const result = worker.stakeNative(d.as("manager"), {
				...validatorDeposit(1),
				pubkey: "0x1234",
			});
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("INVALID_AMOUNT");
		});

		it("refuses to stake against a stale deposit root", () => {
			const { d, worker } = deploy();
			d.chain.fund(NATIVE_ASSET, worker.address, 2n * VALIDATOR_DEPOSIT);
			const observed = d.protocol.depositRoot();
			unwrap(worker.stakeNativeValidated(d.as("manager"), validatorDeposit(1), observed));

			const result = worker.stakeNativeValidated(d.as("manager"), validatorDeposit(2), observed);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("DEPOSIT_ROOT_MISMATCH");
			expect(worker.stakedButUnverifiedNative()).toBe(VALIDATOR_DEPOSIT);
			expect(worker.heldBalance(NATIVE_ASSET)).toBe(VALIDATOR_DEPOSIT);
		});

		it("cannot verify without unverified stake", () => {
			const { d, worker } = deploy();
			const result = worker.verifyValidator(d.as("operator"), validatorDeposit(1).pubkey);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("INSUFFICIENT_BALANCE");
		});

		it("keeps the unverified counter when the protocol rejects verification", () => {
			const { d, worker } = deploy();
			d.chain.fund(NATIVE_ASSET, worker.address, VALIDATOR_DEPOSIT);
			unwrap(worker.stakeNative(d.as("manager"), validatorDeposit(1)));

			const result = worker.verifyValidator(d.as("operator"), validatorDeposit(9).pubkey);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("REQUEST_NOT_FOUND");
			expect(worker.stakedButUnverifiedNative()).toBe(VALIDATOR_DEPOSIT);
		});
	});

	describe("transferBack", () => {
		it("returns held assets to the pool", () => {
			const { d, worker, steth } = deploy();
			d.chain.fund(steth, worker.address, parseEther("5"));
			unwrap(worker.transferBack(d.as("manager"), steth, parseEther("2")));

			expect(d.chain.balanceOf(steth, d.pool.address)).toBe(parseEther("2"));
			expect(worker.heldBalance(steth)).toBe(parseEther("3"));
		});

		it("cannot return more than it holds", () => {
			const { d, worker, steth } = deploy();
			d.chain.fund(steth, worker.address, 1n);
			const result = worker.transferBack(d.as("manager"), steth, 2n);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("INSUFFICIENT_BALANCE");
		});
	});

	describe("unstaking", () => {
		function staked(delay = 0) {
			const ctx = deploy(delay);
			ctx.d.chain.fund(ctx.steth, ctx.worker.address, parseEther("10"));
			unwrap(ctx.worker.depositIntoStrategy(ctx.d.as("manager"), ctx.steth));
			return ctx;
		}

		it("records unstaking shares in the vault, then forwards the payout to it", () => {
			const { d, worker, steth } = staked();
			const root = unwrap(
				worker.initiateUnstaking(d.as("operator"), [STETH_STRATEGY], [parseEther("4")]),
			);
			expect(d.vault.sharesUnstaking(steth)).toBe(parseEther("4"));
			expect(worker.pendingUnstakes()).toEqual([root]);
			expect(worker.getAssetBalance(steth)).toBe(parseEther("6"));

			const payouts = unwrap(worker.completeUnstaking(d.as("operator"), root));
			expect(payouts.map((p) => p.amount)).toEqual([parseEther("4")]);
			expect(d.vault.sharesUnstaking(steth)).toBe(0n);
			expect(d.vault.balanceOf(steth)).toBe(parseEther("4"));
			expect(worker.heldBalance(steth)).toBe(0n);
			expect(worker.pendingUnstakes()).toEqual([]);
		});

		it("rejects the native strategy and strategies not assigned to their asset", () => {
			const { d, worker } = staked();
			const rogue = strategyId("strategy:rogue");
			d.protocol.addStrategy(rogue, d.asset("steth"));

			const codes = [
				worker.initiateUnstaking(d.as("operator"), [d.protocol.nativeStrategy], [1n]),
				worker.initiateUnstaking(d.as("operator"), [rogue], [1n]),
				worker.initiateUnstaking(d.as("operator"), [STETH_STRATEGY], [0n]),
				worker.initiateUnstaking(d.as("operator"), [STETH_STRATEGY], []),
			].map((r) => (r.ok ? "ok" : r.error.code));
			expect(codes).toEqual([
				"INVALID_STRATEGY",
				"INVALID_STRATEGY",
				"INVALID_AMOUNT",
				"INVALID_AMOUNT",
			]);
		});

		it("undoes the vault bookkeeping when the protocol refuses the withdrawal", () => {
			const { d, worker, steth } = staked();
			const result = worker.initiateUnstaking(
				d.as("operator"),
				[STETH_STRATEGY],
				[parseEther("11")],
			);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("INSUFFICIENT_BALANCE");
			expect(d.vault.sharesUnstaking(steth)).toBe(0n);
		});

		it("keeps the withdrawal pending until the protocol delay has passed", () => {
			const { d, worker } = staked(10);
			const root = unwrap(worker.initiateUnstaking(d.as("operator"), [STETH_STRATEGY], [1n]));

			const early = worker.completeUnstaking(d.as("operator"), root);
			expect(early.ok).toBe(false);
			if (!early.ok) expect(early.error.code).toBe("REQUEST_NOT_READY");
			expect(worker.pendingUnstakes()).toEqual([root]);

			d.clock.advance(10);
			expect(worker.completeUnstaking(d.as("operator"), root).ok).toBe(true);
		});

		it("reports an unknown root", () => {
			const { d, worker } = staked();
			const result = worker.completeUnstaking(d.as("operator"), withdrawalRoot("0xabc"));
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("REQUEST_NOT_FOUND");
		});
	});
});
