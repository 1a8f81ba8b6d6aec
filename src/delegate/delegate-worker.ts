/**
 * DelegateWorker: custodies a slice of pooled assets and stakes it.
 *
 * Each worker talks to exactly one staking protocol instance. Assets the
 * pool sends it stay "held" until a manager deposits them into the asset's
 * strategy; native value is staked one validator at a time and counted as
 * staked-but-unverified until the protocol confirms the validator.
 */

import { type Address, type Hex, NATIVE_ASSET, isHexOfSize } from "../lib/ethereum/index.js";
import { requireRole } from "../registry/access-control.js";
import { type AccessControl, type AssetRegistry, Role } from "../registry/types.js";
import type { Chain } from "../runtime/chain.js";
import { Contract } from "../runtime/contract.js";
import type { CallContext, OpResult } from "../runtime/types.js";
import {
	DepositRootMismatchError,
	InsufficientBalanceError,
	InvalidAmountError,
	InvalidStrategyError,
	RequestNotFoundError,
	StrategyNotSetError,
	UnsupportedAssetError,
} from "../shared/errors.js";
import { VALIDATOR_DEPOSIT } from "../shared/fixed-point.js";
import type { StrategyId, WithdrawalRoot } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import type { StakingProtocol, ValidatorDeposit, WithdrawalPayout } from "../staking/types.js";
import type { UnstakingVault } from "../vault/unstaking-vault.js";
import type { DelegateBalances } from "./delegate-directory.js";

const PUBKEY_BYTES = 48;
const SIGNATURE_BYTES = 96;
const ROOT_BYTES = 32;

export interface DelegateWorkerDeps {
	readonly chain: Chain;
	readonly address: Address;
	/** Where `transferBack` sends assets. */
	readonly pool: Address;
	readonly registry: AssetRegistry;
	readonly access: AccessControl;
	readonly protocol: StakingProtocol;
	readonly vault: UnstakingVault;
}

/** Shares of one asset inside a queued withdrawal. */
interface PendingLeg {
	readonly asset: Address;
	readonly shares: bigint;
}

export class DelegateWorker extends Contract implements DelegateBalances {
	private readonly pool: Address;
	private readonly registry: AssetRegistry;
	private readonly access: AccessControl;
	private readonly protocol: StakingProtocol;
	private readonly vault: UnstakingVault;
	private stakedButUnverified = 0n;
	private pending = new Map<WithdrawalRoot, readonly PendingLeg[]>();

	constructor(deps: DelegateWorkerDeps) {
		super(deps.chain, deps.address, "delegate-worker");
		this.pool = deps.pool;
		this.registry = deps.registry;
		this.access = deps.access;
		this.protocol = deps.protocol;
		this.vault = deps.vault;
	}

	// ── Strategy deposits ──────────────────────────────────────────

	/** Moves the worker's entire balance of `asset` into the asset's strategy. */
	depositIntoStrategy(ctx: CallContext, asset: Address): OpResult<bigint> {
		return this.execute("depositIntoStrategy", () => {
			const allowed = requireRole(this.access, Role.Manager, ctx.sender, "depositIntoStrategy");
			if (!allowed.ok) return allowed;
			if (asset === NATIVE_ASSET || !this.registry.isSupportedAsset(asset)) {
				return err(new UnsupportedAssetError(`Cannot deposit ${asset} into a strategy`, { asset }));
			}
			const strategy = this.registry.assetStrategy(asset);
			if (strategy === undefined) {
				return err(new StrategyNotSetError(`No strategy assigned to ${asset}`, { asset }));
			}
			const amount = this.heldBalance(asset);
			if (amount === 0n) {
				return err(new InvalidAmountError(`Worker holds no ${asset}`, { asset }));
			}

			const shares = this.protocol.depositIntoStrategy(this.address, strategy, amount);
			if (!shares.ok) return shares;

			this.emit({
				type: "asset_deposited_into_strategy",
				delegate: this.address,
				asset,
				strategy,
				amount,
				shares: shares.value,
			});
			this.logger.debug({ asset, amount, shares: shares.value }, "Deposited into strategy");
			return shares;
		});
	}

	// ── Native staking ─────────────────────────────────────────────

	/** Stakes exactly one validator deposit of native value. */
	stakeNative(ctx: CallContext, deposit: ValidatorDeposit): OpResult<void> {
		return this.execute("stakeNative", () => this.stake(ctx, deposit));
	}

	/**
	 * Same as `stakeNative`, but fails if the deposit contract's root moved
	 * away from `expectedRoot` since the caller observed it.
	 */
	stakeNativeValidated(
		ctx: CallContext,
		deposit: ValidatorDeposit,
		expectedRoot: Hex,
	): OpResult<void> {
		return this.execute("stakeNativeValidated", () => {
			const actual = this.protocol.depositRoot();
			if (actual !== expectedRoot) {
				return err(
					new DepositRootMismatchError("Deposit root changed before staking", {
						expected: expectedRoot,
						actual,
					}),
				);
			}
			return this.stake(ctx, deposit);
		});
	}

	/** Reconciles a validator once the protocol verifies its withdrawal credentials. */
	verifyValidator(ctx: CallContext, pubkey: Hex): OpResult<void> {
		return this.execute("verifyValidator", () => {
			const allowed = requireRole(this.access, Role.Operator, ctx.sender, "verifyValidator");
			if (!allowed.ok) return allowed;
			if (this.stakedButUnverified < VALIDATOR_DEPOSIT) {
				return err(
					new InsufficientBalanceError("No unverified stake left to reconcile", {
						stakedButUnverified: this.stakedButUnverified,
					}),
				);
			}

			this.stakedButUnverified -= VALIDATOR_DEPOSIT;
			const credited = this.protocol.verifyWithdrawalCredentials(this.address, pubkey);
			if (!credited.ok) return credited;

			this.emit({
				type: "validator_verified",
				delegate: this.address,
				pubkey,
				amount: credited.value,
			});
			return ok(undefined);
		});
	}

	// ── Returning assets ───────────────────────────────────────────

	/** Sends held assets (or native value) back to the pool. */
	transferBack(ctx: CallContext, asset: Address, amount: bigint): OpResult<void> {
		return this.execute("transferBack", () => {
			const allowed = requireRole(this.access, Role.Manager, ctx.sender, "transferBack");
			if (!allowed.ok) return allowed;
			if (amount <= 0n) {
				return err(new InvalidAmountError("Transfer amount must be positive", { amount }));
			}
			const held = this.heldBalance(asset);
			if (amount > held) {
				return err(
					new InsufficientBalanceError(`Worker holds ${held} of ${asset}`, { asset, held, amount }),
				);
			}

			const sent = this.chain.transfer(asset, this.address, this.pool, amount);
			if (!sent.ok) return sent;
			this.emit({ type: "asset_transferred_back", delegate: this.address, asset, amount });
			return ok(undefined);
		});
	}

	// ── Unstaking ──────────────────────────────────────────────────

	/**
	 * Queues a withdrawal of token-strategy shares. The shares are recorded
	 * as unstaking in the vault before the protocol is called.
	 */
	initiateUnstaking(
		ctx: CallContext,
		strategies: readonly StrategyId[],
		shares: readonly bigint[],
	): OpResult<WithdrawalRoot> {
		return this.execute("initiateUnstaking", () => {
			const allowed = requireRole(this.access, Role.Operator, ctx.sender, "initiateUnstaking");
			if (!allowed.ok) return allowed;
			if (strategies.length === 0 || strategies.length !== shares.length) {
				return err(
					new InvalidAmountError("Strategies and shares must be non-empty and the same length", {
						strategies: strategies.length,
						shares: shares.length,
					}),
				);
			}

			const legs: PendingLeg[] = [];
			for (const [i, strategy] of strategies.entries()) {
				const leg = this.validateLeg(strategy, shares[i] ?? 0n);
				if (!leg.ok) return leg;
				legs.push(leg.value);
			}

			for (const leg of legs) {
				const recorded = this.vault.addSharesUnstaking(this.address, leg.asset, leg.shares);
				if (!recorded.ok) return recorded;
			}

			const root = this.protocol.queueWithdrawal(this.address, strategies, shares);
			if (!root.ok) return root;
			this.pending.set(root.value, legs);

			this.emit({
				type: "unstaking_initiated",
				delegate: this.address,
				root: root.value,
				strategies: [...strategies],
				shares: [...shares],
			});
			return root;
		});
	}

	/**
	 * Completes a queued withdrawal: releases the vault's tracked shares and
	 * forwards the now-liquid assets to the vault.
	 */
	completeUnstaking(ctx: CallContext, root: WithdrawalRoot): OpResult<readonly WithdrawalPayout[]> {
		return this.execute("completeUnstaking", () => {
			const allowed = requireRole(this.access, Role.Operator, ctx.sender, "completeUnstaking");
			if (!allowed.ok) return allowed;
			if (!this.pending.has(root)) {
				return err(new RequestNotFoundError(`No pending unstake ${root}`, { root }));
			}
			this.pending.delete(root);

			const payouts = this.protocol.completeQueuedWithdrawal(this.address, root);
			if (!payouts.ok) return payouts;

			for (const payout of payouts.value) {
				const reduced = this.vault.reduceSharesUnstaking(this.address, payout.asset, payout.shares);
				if (!reduced.ok) return reduced;
				const forwarded = this.chain.transfer(
					payout.asset,
					this.address,
					this.vault.address,
					payout.amount,
				);
				if (!forwarded.ok) return forwarded;
				this.emit({
					type: "unstaking_completed",
					delegate: this.address,
					root,
					asset: payout.asset,
					shares: payout.shares,
					amount: payout.amount,
				});
			}
			return payouts;
		});
	}

	// ── Views ──────────────────────────────────────────────────────

	heldBalance(asset: Address): bigint {
		return this.chain.balanceOf(asset, this.address);
	}

	/** Value of `asset` staked through this worker, as reported by the protocol. */
	getAssetBalance(asset: Address): bigint {
		if (asset === NATIVE_ASSET) return this.getNativeStakedBalance();
		const strategy = this.registry.assetStrategy(asset);
		if (strategy === undefined) return 0n;
		return this.protocol.sharesToUnderlying(strategy, this.getAssetShares(asset));
	}

	getAssetShares(asset: Address): bigint {
		const strategy = asset === NATIVE_ASSET ? undefined : this.registry.assetStrategy(asset);
		if (strategy === undefined) return 0n;
		return this.protocol.stakerShares(this.address, strategy);
	}

	getNativeStakedBalance(): bigint {
		return this.stakedButUnverified + this.protocol.podShares(this.address);
	}

	stakedButUnverifiedNative(): bigint {
		return this.stakedButUnverified;
	}

	pendingUnstakes(): readonly WithdrawalRoot[] {
		return [...this.pending.keys()];
	}

	snapshot(): () => void {
		const stakedButUnverified = this.stakedButUnverified;
		const pending = new Map(this.pending);
		return () => {
			this.stakedButUnverified = stakedButUnverified;
			this.pending = pending;
		};
	}

	// ── Internal ──────────────────────────────────────────────────

	private stake(ctx: CallContext, deposit: ValidatorDeposit): OpResult<void> {
		const allowed = requireRole(this.access, Role.Manager, ctx.sender, "stakeNative");
		if (!allowed.ok) return allowed;
		if (
			!isHexOfSize(deposit.pubkey, PUBKEY_BYTES) ||
			!isHexOfSize(deposit.signature, SIGNATURE_BYTES) ||
			!isHexOfSize(deposit.depositDataRoot, ROOT_BYTES)
		) {
			return err(
				new InvalidAmountError("Malformed validator deposit data", { pubkey: deposit.pubkey }),
			);
		}
		const held = this.heldBalance(NATIVE_ASSET);
		if (held < VALIDATOR_DEPOSIT) {
			return err(
				new InsufficientBalanceError(`Worker holds ${held} native, needs ${VALIDATOR_DEPOSIT}`, {
					held,
				}),
			);
		}

		this.stakedButUnverified += VALIDATOR_DEPOSIT;
		const staked = this.protocol.stakeNative(this.address, deposit, VALIDATOR_DEPOSIT);
		if (!staked.ok) return staked;

		this.emit({
			type: "native_staked",
			delegate: this.address,
			pubkey: deposit.pubkey,
			amount: VALIDATOR_DEPOSIT,
		});
		this.logger.debug({ pubkey: deposit.pubkey }, "Validator staked");
		return ok(undefined);
	}

	private validateLeg(strategy: StrategyId, shares: bigint): OpResult<PendingLeg> {
		if (strategy === this.protocol.nativeStrategy) {
			return err(
				new InvalidStrategyError("Native stake exits through the validator path", { strategy }),
			);
		}
		const asset = this.protocol.strategyUnderlying(strategy);
		if (asset === undefined || this.registry.assetStrategy(asset) !== strategy) {
			return err(
				new InvalidStrategyError(`${strategy} is not the strategy assigned to its asset`, {
					strategy,
					asset,
				}),
			);
		}
		if (shares <= 0n) {
			return err(new InvalidAmountError("Unstake shares must be positive", { strategy, shares }));
		}
		return ok({ asset, shares });
	}
}
