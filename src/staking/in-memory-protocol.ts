/**
 * InMemoryStakingProtocol: an in-process staking protocol.
 *
 * Token strategies price shares against what they hold, so yield accrued
 * with `accrueYield()` raises the value of every outstanding share. Queued
 * withdrawals stop earning for the staker but stay in the strategy's totals
 * until completed, so the share price is unaffected by queueing.
 */

import {
	type Address,
	type Hex,
	NATIVE_ASSET,
	hashLabel,
} from "../lib/ethereum/index.js";
import type { Chain } from "../runtime/chain.js";
import { Contract } from "../runtime/contract.js";
import type { OpResult } from "../runtime/types.js";
import {
	ExternalCallError,
	InsufficientBalanceError,
	InvalidAmountError,
	InvalidStrategyError,
	RequestNotFoundError,
	RequestNotReadyError,
	UnauthorizedError,
} from "../shared/errors.js";
import { VALIDATOR_DEPOSIT, mulDiv } from "../shared/fixed-point.js";
import { type StrategyId, type WithdrawalRoot, strategyId, withdrawalRoot } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import type {
	QueuedWithdrawal,
	StakingProtocol,
	ValidatorDeposit,
	WithdrawalPayout,
} from "./types.js";

interface StrategyState {
	readonly underlying: Address;
	totalShares: bigint;
	held: bigint;
}

interface Validator {
	readonly staker: Address;
	readonly depositDataRoot: Hex;
	verified: boolean;
}

export interface InMemoryStakingProtocolOptions {
	/** Blocks between queueing a withdrawal and completing it */
	readonly withdrawalDelayBlocks?: number;
	readonly nativeStrategy?: StrategyId;
}

const GENESIS_ROOT = hashLabel("deposit-contract-genesis");

export class InMemoryStakingProtocol extends Contract implements StakingProtocol {
	readonly nativeStrategy: StrategyId;
	private readonly withdrawalDelayBlocks: number;
	private strategies = new Map<StrategyId, StrategyState>();
	private shares = new Map<string, bigint>();
	private queued = new Map<WithdrawalRoot, QueuedWithdrawal>();
	private validators = new Map<Hex, Validator>();
	private pods = new Map<Address, bigint>();
	private root: Hex = GENESIS_ROOT;
	private nonce = 0;

	constructor(chain: Chain, address: Address, options: InMemoryStakingProtocolOptions = {}) {
		super(chain, address, "staking-protocol");
		this.withdrawalDelayBlocks = options.withdrawalDelayBlocks ?? 0;
		this.nativeStrategy = options.nativeStrategy ?? strategyId("native-beacon-strategy");
	}

	// ── Setup ──────────────────────────────────────────────────────

	/** Lists a token strategy over `underlying`. */
	addStrategy(strategy: StrategyId, underlying: Address): this {
		if (strategy === this.nativeStrategy || underlying === NATIVE_ASSET) {
			throw new Error("InMemoryStakingProtocol: native staking has no token strategy");
		}
		if (this.strategies.has(strategy)) {
			throw new Error(`InMemoryStakingProtocol: strategy ${strategy} already exists`);
		}
		this.strategies.set(strategy, { underlying, totalShares: 0n, held: 0n });
		return this;
	}

	/** Adds rewards to a strategy, raising the value of every share. */
	accrueYield(strategy: StrategyId, amount: bigint): void {
		const state = this.strategies.get(strategy);
		if (!state) throw new Error(`InMemoryStakingProtocol: unknown strategy ${strategy}`);
		this.chain.fund(state.underlying, this.address, amount);
		state.held += amount;
	}

	/** Replaces the deposit contract root, as a concurrent depositor would. */
	setDepositRoot(root: Hex): void {
		this.root = root;
	}

	// ── Views ──────────────────────────────────────────────────────

	strategyUnderlying(strategy: StrategyId): Address | undefined {
		if (strategy === this.nativeStrategy) return NATIVE_ASSET;
		return this.strategies.get(strategy)?.underlying;
	}

	stakerShares(staker: Address, strategy: StrategyId): bigint {
		return this.shares.get(shareKey(staker, strategy)) ?? 0n;
	}

	sharesToUnderlying(strategy: StrategyId, shares: bigint): bigint {
		const state = this.strategies.get(strategy);
		if (!state || state.totalShares === 0n) return shares;
		return mulDiv(shares, state.held, state.totalShares);
	}

	queuedWithdrawal(root: WithdrawalRoot): QueuedWithdrawal | undefined {
		return this.queued.get(root);
	}

	depositRoot(): Hex {
		return this.root;
	}

	podShares(staker: Address): bigint {
		return this.pods.get(staker) ?? 0n;
	}

	// ── Token strategies ───────────────────────────────────────────

	depositIntoStrategy(staker: Address, strategy: StrategyId, amount: bigint): OpResult<bigint> {
		return this.execute("depositIntoStrategy", () => {
			const state = this.strategies.get(strategy);
			if (!state) {
				return err(new InvalidStrategyError(`Unknown strategy ${strategy}`, { strategy }));
			}
			if (amount <= 0n) {
				return err(new InvalidAmountError("Deposit amount must be positive", { amount }));
			}

			const issued =
				state.totalShares === 0n || state.held === 0n
					? amount
					: mulDiv(amount, state.totalShares, state.held);
			if (issued === 0n) {
				return err(new InvalidAmountError("Deposit too small to issue shares", { amount }));
			}

			state.totalShares += issued;
			state.held += amount;
			const key = shareKey(staker, strategy);
			this.shares.set(key, (this.shares.get(key) ?? 0n) + issued);

			const pulled = this.chain.transfer(state.underlying, staker, this.address, amount);
			if (!pulled.ok) return pulled;
			return ok(issued);
		});
	}

	queueWithdrawal(
		staker: Address,
		strategies: readonly StrategyId[],
		shares: readonly bigint[],
	): OpResult<WithdrawalRoot> {
		return this.execute("queueWithdrawal", () => {
			if (strategies.length === 0 || strategies.length !== shares.length) {
				return err(
					new ExternalCallError("Strategies and shares must be non-empty and the same length", {
						strategies: strategies.length,
						shares: shares.length,
					}),
				);
			}

			for (const [i, strategy] of strategies.entries()) {
				const amount = shares[i] ?? 0n;
				if (!this.strategies.has(strategy)) {
					return err(new InvalidStrategyError(`Unknown strategy ${strategy}`, { strategy }));
				}
				if (amount <= 0n) {
					return err(new InvalidAmountError("Withdrawal shares must be positive", { strategy }));
				}
				const key = shareKey(staker, strategy);
				const held = this.shares.get(key) ?? 0n;
				if (held < amount) {
					return err(
						new InsufficientBalanceError(`Staker holds ${held} shares of ${strategy}`, {
							staker,
							strategy,
							held,
							requested: amount,
						}),
					);
				}
				this.shares.set(key, held - amount);
			}

			this.nonce++;
			const root = withdrawalRoot(hashLabel(`${staker}:${this.nonce}`));
			this.queued.set(root, {
				root,
				staker,
				strategies: [...strategies],
				shares: [...shares],
				startBlock: this.chain.blockNumber(),
			});
			return ok(root);
		});
	}

	completeQueuedWithdrawal(
		staker: Address,
		root: WithdrawalRoot,
	): OpResult<readonly WithdrawalPayout[]> {
		return this.execute("completeQueuedWithdrawal", () => {
			const withdrawal = this.queued.get(root);
			if (!withdrawal) {
				return err(new RequestNotFoundError(`No queued withdrawal ${root}`, { root }));
			}
			if (withdrawal.staker !== staker) {
				return err(new UnauthorizedError("Only the staker can complete its withdrawal", { root }));
			}
			const readyAt = withdrawal.startBlock + this.withdrawalDelayBlocks;
			if (this.chain.blockNumber() < readyAt) {
				return err(
					new RequestNotReadyError(`Withdrawal ${root} completes at block ${readyAt}`, {
						root,
						readyAt,
					}),
				);
			}

			const payouts: WithdrawalPayout[] = [];
			for (const [i, strategy] of withdrawal.strategies.entries()) {
				const state = this.strategies.get(strategy);
				const shares = withdrawal.shares[i] ?? 0n;
				if (!state) continue;
				const amount = this.sharesToUnderlying(strategy, shares);
				state.totalShares -= shares;
				state.held -= amount;
				payouts.push({ strategy, asset: state.underlying, shares, amount });
			}
			this.queued.delete(root);

			for (const payout of payouts) {
				const sent = this.chain.transfer(payout.asset, this.address, staker, payout.amount);
				if (!sent.ok) return sent;
			}
			return ok(payouts);
		});
	}

	// ── Native staking ─────────────────────────────────────────────

	stakeNative(staker: Address, deposit: ValidatorDeposit, value: bigint): OpResult<void> {
		return this.execute("stakeNative", () => {
			if (value !== VALIDATOR_DEPOSIT) {
				return err(
					new InvalidAmountError(`Validator deposits must be exactly ${VALIDATOR_DEPOSIT}`, {
						value,
					}),
				);
			}
			if (this.validators.has(deposit.pubkey)) {
				return err(
					new ExternalCallError("Validator already deposited", { pubkey: deposit.pubkey }),
				);
			}

			this.validators.set(deposit.pubkey, {
				staker,
				depositDataRoot: deposit.depositDataRoot,
				verified: false,
			});
			this.root = hashLabel(`${this.root}:${deposit.depositDataRoot}`);

			return this.chain.transfer(NATIVE_ASSET, staker, this.address, value);
		});
	}

	verifyWithdrawalCredentials(staker: Address, pubkey: Hex): OpResult<bigint> {
		return this.execute("verifyWithdrawalCredentials", () => {
			const validator = this.validators.get(pubkey);
			if (!validator || validator.staker !== staker) {
				return err(new RequestNotFoundError(`No validator ${pubkey} for ${staker}`, { pubkey }));
			}
			if (validator.verified) {
				return err(new ExternalCallError("Validator already verified", { pubkey }));
			}
			validator.verified = true;
			this.pods.set(staker, this.podShares(staker) + VALIDATOR_DEPOSIT);
			return ok(VALIDATOR_DEPOSIT);
		});
	}

	// ── Snapshot ───────────────────────────────────────────────────

	snapshot(): () => void {
		const strategies = new Map<StrategyId, StrategyState>();
		for (const [id, state] of this.strategies) strategies.set(id, { ...state });
		const validators = new Map<Hex, Validator>();
		for (const [key, v] of this.validators) validators.set(key, { ...v });
		const shares = new Map(this.shares);
		const queued = new Map(this.queued);
		const pods = new Map(this.pods);
		const root = this.root;
		const nonce = this.nonce;
		return () => {
			this.strategies = strategies;
			this.validators = validators;
			this.shares = shares;
			this.queued = queued;
			this.pods = pods;
			this.root = root;
			this.nonce = nonce;
		};
	}
}

function shareKey(staker: Address, strategy: StrategyId): string {
	return `${staker}|${strategy}`;
}
