import { beforeEach, describe, expect, it } from "vitest";
import { NATIVE_ASSET, deriveAddress, parseEther } from "../lib/ethereum/index.js";
import { VALIDATOR_DEPOSIT } from "../shared/fixed-point.js";
import { strategyId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { type ProtocolDeployment, ProtocolBuilder } from "../testing/protocol-builder.js";
import { validatorDeposit } from "../testing/fixtures.js";

const ALICE = deriveAddress("user:alice");
const BOB = deriveAddress("user:bob");
const STETH_STRATEGY = strategyId("strategy:steth");
const WITHDRAWAL_DELAY = 5;

describe("restaking lifecycle", () => {
	let d: ProtocolDeployment;
	let delivered: string[];
	let subscribedAt: number;

	beforeEach(() => {
		d = new ProtocolBuilder()
			.withConfig({ withdrawalDelayBlocks: WITHDRAWAL_DELAY })
			.withAsset("steth")
			.withAsset("x", { price: parseEther("1.1"), convertible: true, withStrategy: false })
			.withWorkers(2)
			.build();
		delivered = [];
		subscribedAt = d.chain.events.size;
		d.chain.events.onAny((record) => delivered.push(record.event.type));

		d.chain.fund(NATIVE_ASSET, ALICE, VALIDATOR_DEPOSIT);
		d.chain.fund(d.asset("steth"), ALICE, parseEther("10"));
		d.chain.fund(d.asset("x"), BOB, parseEther("2"));
		unwrap(d.pool.depositNative({ sender: ALICE, value: VALIDATOR_DEPOSIT }, 0n, "alice"));
		unwrap(d.pool.depositAsset({ sender: ALICE }, d.asset("steth"), parseEther("10"), 0n, "alice"));
		unwrap(d.pool.depositAsset({ sender: BOB }, d.asset("x"), parseEther("2"), 0n, "bob"));
		unwrap(d.pool.addDelegates(d.as("admin"), [d.worker(0).address, d.worker(1).address]));
	});

	it("mints receipt tokens for every deposit", () => {
		expect(d.token.balanceOf(ALICE)).toBe(parseEther("42"));
		expect(d.token.balanceOf(BOB)).toBe(parseEther("2.2"));
	});

	it("keeps total backing through staking, yield, unstaking and withdrawal", () => {
		const steth = d.asset("steth");
		const [w0, w1] = [d.worker(0), d.worker(1)];

		unwrap(d.pool.transferNativeToDelegate(d.as("manager"), 0, VALIDATOR_DEPOSIT));
		unwrap(w0.stakeNative(d.as("manager"), validatorDeposit(1)));
		unwrap(w0.verifyValidator(d.as("operator"), validatorDeposit(1).pubkey));
		expect(d.pool.getNativeDistributionData().stakedInProtocol).toBe(VALIDATOR_DEPOSIT);
		expect(d.pool.getTotalAssetDeposits(NATIVE_ASSET)).toBe(VALIDATOR_DEPOSIT);

		unwrap(d.pool.transferAssetToDelegate(d.as("manager"), 1, steth, parseEther("10")));
		unwrap(w1.depositIntoStrategy(d.as("manager"), steth));
		d.protocol.accrueYield(STETH_STRATEGY, parseEther("1"));
		expect(d.pool.getTotalAssetDeposits(steth)).toBe(parseEther("11"));

		const root = unwrap(
			w1.initiateUnstaking(d.as("operator"), [STETH_STRATEGY], [parseEther("10")]),
		);
		expect(d.pool.getAssetDistributionData(steth).unstakingFromProtocol).toBe(parseEther("11"));
		expect(d.pool.getTotalAssetDeposits(steth)).toBe(parseEther("11"));

		unwrap(w1.completeUnstaking(d.as("operator"), root));
		expect(d.pool.getAssetDistributionData(steth).lyingInUnstakingVault).toBe(parseEther("11"));
		expect(d.pool.getTotalAssetDeposits(steth)).toBe(parseEther("11"));

		unwrap(d.withdrawals.initiateWithdrawal({ sender: ALICE }, steth, parseEther("5")));
		d.clock.advance(WITHDRAWAL_DELAY);
		expect(unwrap(d.withdrawals.completeWithdrawal({ sender: ALICE }, steth))).toBe(
			parseEther("5"),
		);
		expect(d.chain.balanceOf(steth, ALICE)).toBe(parseEther("5"));
		expect(d.pool.getTotalAssetDeposits(steth)).toBe(parseEther("6"));
		expect(d.token.totalSupply()).toBe(parseEther("39.2"));
	});

	it("converts an asset back into native without losing backing", () => {
		const x = d.asset("x");
		const adapter = d.exitAdapters.get(x);
		if (!adapter) throw new Error("expected an exit adapter for x");

		unwrap(d.converter.transferAssetFromDepositPool(d.as("manager"), x, parseEther("2")));
		expect(d.pool.getTotalAssetDeposits(NATIVE_ASSET)).toBe(parseEther("34.2"));

		const id = unwrap(d.converter.unstake(d.as("operator"), x, parseEther("2")));
		const ticket = d.converter.exitRequest(id)?.ticket;
		if (ticket === undefined) throw new Error("expected a submitted exit");
		adapter.finalize(ticket, parseEther("2.2"));
		unwrap(d.converter.syncExit(d.as("operator"), id));
		unwrap(d.converter.claim(d.as("operator"), id));

		expect(d.converter.ethValueInWithdrawal()).toBe(0n);
		expect(d.pool.getNativeDistributionData().lyingInPool).toBe(parseEther("34.2"));
		expect(d.pool.getTotalAssetDeposits(NATIVE_ASSET)).toBe(parseEther("34.2"));
		expect(d.pool.getTotalAssetDeposits(x)).toBe(0n);
	});

	it("only retires delegates that have been emptied", () => {
		const [w0, w1] = [d.worker(0), d.worker(1)];
		unwrap(d.pool.transferNativeToDelegate(d.as("manager"), 0, VALIDATOR_DEPOSIT));
		unwrap(w0.stakeNative(d.as("manager"), validatorDeposit(1)));

		const batch = d.pool.removeManyDelegates(d.as("admin"), [w1.address, w0.address]);
		expect(batch.ok).toBe(false);
		if (!batch.ok) expect(batch.error.code).toBe("DELEGATE_HAS_NATIVE_BALANCE");
		expect(d.pool.getDelegateQueue()).toEqual([w0.address, w1.address]);

		unwrap(d.pool.removeDelegate(d.as("admin"), w1.address));
		expect(d.pool.getDelegateQueue()).toEqual([w0.address]);
	});

	it("delivers committed events only, in order", () => {
		const [w0, w1] = [d.worker(0), d.worker(1)];
		unwrap(d.pool.transferNativeToDelegate(d.as("manager"), 0, VALIDATOR_DEPOSIT));
		unwrap(w0.stakeNative(d.as("manager"), validatorDeposit(1)));
		d.pool.removeManyDelegates(d.as("admin"), [w1.address, w0.address]);

		expect(delivered).toEqual([
			"native_deposited",
			"asset_deposited",
			"asset_deposited",
			"delegate_added",
			"delegate_added",
			"native_transferred_to_delegate",
			"native_staked",
		]);
		expect(delivered).toHaveLength(d.chain.events.size - subscribedAt);
	});
});
