/**
 * Protocol events: the durable audit trail of every accepted operation.
 *
 * Off-chain indexers reconstruct deposits, delegate membership, transfers
 * and the conversion/withdrawal lifecycle from these records alone; no other
 * persisted log exists.
 */

import type { Address } from "../lib/ethereum/index.js";
import type { ExitRequestId, StrategyId, WithdrawalRoot } from "../shared/identifiers.js";

export type ProtocolEvent =
	| AssetDeposited
	| NativeDeposited
	| DelegateAdded
	| DelegateRemoved
	| AssetTransferredToDelegate
	| NativeTransferredToDelegate
	| NativeSwappedForAsset
	| MinDepositUpdated
	| MaxDelegateCountUpdated
	| ConverterUpdated
	| AssetDepositedIntoStrategy
	| NativeStaked
	| ValidatorVerified
	| AssetTransferredBack
	| UnstakingInitiated
	| UnstakingCompleted
	| SharesUnstakingChanged
	| AssetConvertedOutOfPool
	| EthSwappedForAsset
	| ExitRequested
	| ExitClaimable
	| ExitClaimed
	| EthSentToPool
	| WithdrawalInitiated
	| WithdrawalCompleted;

// ── Deposit pool ─────────────────────────────────────────────────────

export interface AssetDeposited {
	readonly type: "asset_deposited";
	readonly depositor: Address;
	readonly asset: Address;
	readonly amount: bigint;
	readonly minted: bigint;
	readonly referral: string;
}

export interface NativeDeposited {
	readonly type: "native_deposited";
	readonly depositor: Address;
	readonly amount: bigint;
	readonly minted: bigint;
	readonly referral: string;
}

export interface DelegateAdded {
	readonly type: "delegate_added";
	readonly delegate: Address;
}

export interface DelegateRemoved {
	readonly type: "delegate_removed";
	readonly delegate: Address;
}

export interface AssetTransferredToDelegate {
	readonly type: "asset_transferred_to_delegate";
	readonly delegateIndex: number;
	readonly delegate: Address;
	readonly asset: Address;
	readonly amount: bigint;
}

export interface NativeTransferredToDelegate {
	readonly type: "native_transferred_to_delegate";
	readonly delegateIndex: number;
	readonly delegate: Address;
	readonly amount: bigint;
}

export interface NativeSwappedForAsset {
	readonly type: "native_swapped_for_asset";
	readonly counterparty: Address;
	readonly toAsset: Address;
	readonly nativeIn: bigint;
	readonly assetOut: bigint;
}

export interface MinDepositUpdated {
	readonly type: "min_deposit_updated";
	readonly minimumDeposit: bigint;
}

export interface MaxDelegateCountUpdated {
	readonly type: "max_delegate_count_updated";
	readonly maxDelegateCount: number;
}

export interface ConverterUpdated {
	readonly type: "converter_updated";
	readonly converter: Address;
}

// ── Delegate workers ─────────────────────────────────────────────────

export interface AssetDepositedIntoStrategy {
	readonly type: "asset_deposited_into_strategy";
	readonly delegate: Address;
	readonly asset: Address;
	readonly strategy: StrategyId;
	readonly amount: bigint;
	readonly shares: bigint;
}

export interface NativeStaked {
	readonly type: "native_staked";
	readonly delegate: Address;
	readonly pubkey: string;
	readonly amount: bigint;
}

export interface ValidatorVerified {
	readonly type: "validator_verified";
	readonly delegate: Address;
	readonly pubkey: string;
	readonly amount: bigint;
}

export interface AssetTransferredBack {
	readonly type: "asset_transferred_back";
	readonly delegate: Address;
	readonly asset: Address;
	readonly amount: bigint;
}

export interface UnstakingInitiated {
	readonly type: "unstaking_initiated";
	readonly delegate: Address;
	readonly root: WithdrawalRoot;
	readonly strategies: readonly StrategyId[];
	readonly shares: readonly bigint[];
}

export interface UnstakingCompleted {
	readonly type: "unstaking_completed";
	readonly delegate: Address;
	readonly root: WithdrawalRoot;
	readonly asset: Address;
	readonly shares: bigint;
	readonly amount: bigint;
}

// ── Unstaking vault ──────────────────────────────────────────────────

export interface SharesUnstakingChanged {
	readonly type: "shares_unstaking_changed";
	readonly asset: Address;
	readonly delta: bigint;
	readonly sharesUnstaking: bigint;
}

// ── Converter ────────────────────────────────────────────────────────

export interface AssetConvertedOutOfPool {
	readonly type: "asset_converted_out_of_pool";
	readonly asset: Address;
	readonly amount: bigint;
	readonly nativeValue: bigint;
}

export interface EthSwappedForAsset {
	readonly type: "eth_swapped_for_asset";
	readonly operator: Address;
	readonly toAsset: Address;
	readonly nativeIn: bigint;
	readonly assetOut: bigint;
}

export interface ExitRequested {
	readonly type: "exit_requested";
	readonly id: ExitRequestId;
	readonly asset: Address;
	readonly amount: bigint;
}

export interface ExitClaimable {
	readonly type: "exit_claimable";
	readonly id: ExitRequestId;
}

export interface ExitClaimed {
	readonly type: "exit_claimed";
	readonly id: ExitRequestId;
	readonly nativeReceived: bigint;
}

export interface EthSentToPool {
	readonly type: "eth_sent_to_pool";
	readonly amount: bigint;
	readonly valueInWithdrawal: bigint;
}

// ── Withdrawals ──────────────────────────────────────────────────────

export interface WithdrawalInitiated {
	readonly type: "withdrawal_initiated";
	readonly user: Address;
	readonly asset: Address;
	readonly receiptAmount: bigint;
	readonly expectedAssetAmount: bigint;
	readonly requestBlock: number;
}

export interface WithdrawalCompleted {
	readonly type: "withdrawal_completed";
	readonly user: Address;
	readonly asset: Address;
	readonly receiptAmount: bigint;
	readonly assetAmount: bigint;
}

export type ProtocolEventType = ProtocolEvent["type"];

/** Narrows a union member by its `type` tag. */
export type ProtocolEventOf<K extends ProtocolEventType> = Extract<ProtocolEvent, { type: K }>;
