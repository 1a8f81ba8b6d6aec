/**
 * External staking protocol: the interface each delegate worker stakes through.
 *
 * Token strategies hold one underlying asset and issue shares against it.
 * The native strategy is special: native value is staked per validator and
 * exits through a separate path that the delegate never queues directly.
 */

import type { Address, Hex } from "../lib/ethereum/index.js";
import type { OpResult } from "../runtime/types.js";
import type { StrategyId, WithdrawalRoot } from "../shared/identifiers.js";

/** Deposit data for one validator. */
export interface ValidatorDeposit {
	readonly pubkey: Hex;
	readonly signature: Hex;
	readonly depositDataRoot: Hex;
}

export interface QueuedWithdrawal {
	readonly root: WithdrawalRoot;
	readonly staker: Address;
	readonly strategies: readonly StrategyId[];
	readonly shares: readonly bigint[];
	readonly startBlock: number;
}

/** What a completed withdrawal paid out, per strategy. */
export interface WithdrawalPayout {
	readonly strategy: StrategyId;
	readonly asset: Address;
	readonly shares: bigint;
	readonly amount: bigint;
}

export interface StakingProtocol {
	readonly address: Address;
	readonly nativeStrategy: StrategyId;

	strategyUnderlying(strategy: StrategyId): Address | undefined;
	stakerShares(staker: Address, strategy: StrategyId): bigint;
	sharesToUnderlying(strategy: StrategyId, shares: bigint): bigint;

	/** Pulls `amount` of the strategy's underlying from `staker`; returns shares issued. */
	depositIntoStrategy(staker: Address, strategy: StrategyId, amount: bigint): OpResult<bigint>;
	queueWithdrawal(
		staker: Address,
		strategies: readonly StrategyId[],
		shares: readonly bigint[],
	): OpResult<WithdrawalRoot>;
	queuedWithdrawal(root: WithdrawalRoot): QueuedWithdrawal | undefined;
	/** Pays the underlying back to `staker`. */
	completeQueuedWithdrawal(
		staker: Address,
		root: WithdrawalRoot,
	): OpResult<readonly WithdrawalPayout[]>;

	/** Stakes `value` native for a new validator, pulled from `staker`. */
	stakeNative(staker: Address, deposit: ValidatorDeposit, value: bigint): OpResult<void>;
	/** Live root of the deposit contract; changes with every validator deposit. */
	depositRoot(): Hex;
	/** Native value credited to `staker` for validators whose credentials were verified. */
	podShares(staker: Address): bigint;
	/** Confirms a validator's withdrawal credentials and credits its pod shares. */
	verifyWithdrawalCredentials(staker: Address, pubkey: Hex): OpResult<bigint>;
}
