/**
 * UnstakingVault: bookkeeping for value on its way out of the staking protocol.
 *
 * Tracks, per asset, the protocol shares that delegates have queued for
 * withdrawal, and holds the assets that completed withdrawals paid out until
 * the withdrawal manager distributes them. Only registered delegate workers
 * and the withdrawal manager may touch the counters.
 */

import { type Address, NATIVE_ASSET } from "../lib/ethereum/index.js";
import type { DelegateDirectory } from "../delegate/delegate-directory.js";
import type { AssetRegistry } from "../registry/types.js";
import type { Chain } from "../runtime/chain.js";
import { Contract } from "../runtime/contract.js";
import type { OpResult } from "../runtime/types.js";
import {
	InsufficientBalanceError,
	InvalidAmountError,
	UnauthorizedError,
} from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { StakingProtocol } from "../staking/types.js";

export interface UnstakingVaultDeps {
	readonly chain: Chain;
	readonly address: Address;
	readonly registry: AssetRegistry;
	readonly protocol: StakingProtocol;
	readonly delegates: DelegateDirectory;
}

export class UnstakingVault extends Contract {
	private readonly registry: AssetRegistry;
	private readonly protocol: StakingProtocol;
	private readonly delegates: DelegateDirectory;
	private withdrawalManager: Address | undefined;
	private unstaking = new Map<Address, bigint>();

	constructor(deps: UnstakingVaultDeps) {
		super(deps.chain, deps.address, "unstaking-vault");
		this.registry = deps.registry;
		this.protocol = deps.protocol;
		this.delegates = deps.delegates;
	}

	/** Wires the withdrawal manager; done once at deployment. */
	setWithdrawalManager(manager: Address): void {
		this.withdrawalManager = manager;
	}

	// ── Share counters ─────────────────────────────────────────────

	addSharesUnstaking(caller: Address, asset: Address, shares: bigint): OpResult<void> {
		return this.execute("addSharesUnstaking", () => {
			const allowed = this.checkCaller(caller, "addSharesUnstaking");
			if (!allowed.ok) return allowed;
			if (shares <= 0n) {
				return err(new InvalidAmountError("Shares must be positive", { asset, shares }));
			}
			const next = this.sharesUnstaking(asset) + shares;
			this.unstaking.set(asset, next);
			this.emit({ type: "shares_unstaking_changed", asset, delta: shares, sharesUnstaking: next });
			return ok(undefined);
		});
	}

	reduceSharesUnstaking(caller: Address, asset: Address, shares: bigint): OpResult<void> {
		return this.execute("reduceSharesUnstaking", () => {
			const allowed = this.checkCaller(caller, "reduceSharesUnstaking");
			if (!allowed.ok) return allowed;
			const current = this.sharesUnstaking(asset);
			if (shares <= 0n || shares > current) {
				return err(
					new InvalidAmountError(`Cannot reduce ${current} unstaking shares by ${shares}`, {
						asset,
						shares,
						current,
					}),
				);
			}
			const next = current - shares;
			this.unstaking.set(asset, next);
			this.emit({ type: "shares_unstaking_changed", asset, delta: -shares, sharesUnstaking: next });
			return ok(undefined);
		});
	}

	// ── Distribution ───────────────────────────────────────────────

	/** Pays out assets the vault holds. Withdrawal manager only. */
	redeem(caller: Address, asset: Address, amount: bigint, to: Address): OpResult<void> {
		return this.execute("redeem", () => {
			if (this.withdrawalManager === undefined || caller !== this.withdrawalManager) {
				return err(new UnauthorizedError("Only the withdrawal manager can redeem", { caller }));
			}
			const held = this.chain.balanceOf(asset, this.address);
			if (amount > held) {
				return err(
					new InsufficientBalanceError(`Vault holds ${held} of ${asset}`, { asset, held, amount }),
				);
			}
			return this.chain.transfer(asset, this.address, to, amount);
		});
	}

	// ── Views ──────────────────────────────────────────────────────

	sharesUnstaking(asset: Address): bigint {
		return this.unstaking.get(asset) ?? 0n;
	}

	/**
	 * Asset amount represented by the shares currently mid-unstake, valued
	 * through the asset's assigned strategy. Native shares are 1:1.
	 */
	getAssetsUnstaking(asset: Address): bigint {
		return this.sharesToAssets(asset, this.sharesUnstaking(asset));
	}

	/**
	 * Values `stakedShares` together with the shares mid-unstake in a single
	 * conversion, so moving shares between the two never changes the sum.
	 */
	getAssetsInProtocol(asset: Address, stakedShares: bigint): bigint {
		return this.sharesToAssets(asset, stakedShares + this.sharesUnstaking(asset));
	}

	private sharesToAssets(asset: Address, shares: bigint): bigint {
		if (shares === 0n || asset === NATIVE_ASSET) return shares;
		const strategy = this.registry.assetStrategy(asset);
		if (strategy === undefined) return shares;
		return this.protocol.sharesToUnderlying(strategy, shares);
	}

	/** Amount of `asset` lying in the vault awaiting distribution. */
	balanceOf(asset: Address): bigint {
		return this.chain.balanceOf(asset, this.address);
	}

	snapshot(): () => void {
		const unstaking = new Map(this.unstaking);
		return () => {
			this.unstaking = unstaking;
		};
	}

	private checkCaller(caller: Address, operation: string): OpResult<void> {
		if (this.delegates.has(caller) || caller === this.withdrawalManager) return ok(undefined);
		return err(new UnauthorizedError(`${operation} is restricted to delegates`, { caller }));
	}
}
