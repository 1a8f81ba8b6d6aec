/**
 * DepositPool: entry point for deposits and the ledger of total backing.
 *
 * Users deposit the native coin or a supported token and receive receipt
 * tokens at the oracle rate. The pool then hands assets to the delegate
 * workers in its queue. Every figure the pool reports about an asset is
 * derived from the six places its backing can sit; nothing is cached.
 *
 * Admin operations manage the delegate queue and configuration. Manager
 * operations move assets to delegates and run the internal native swap.
 */

import { type Address, NATIVE_ASSET } from "../lib/ethereum/index.js";
import { type DelegateBalances, type DelegateDirectory } from "../delegate/delegate-directory.js";
import { convert, receiptForAsset } from "../oracle/pricing.js";
import type { PriceOracle } from "../oracle/types.js";
import { requireRole } from "../registry/access-control.js";
import { type AccessControl, type AssetRegistry, Role } from "../registry/types.js";
import type { Chain } from "../runtime/chain.js";
import { Contract } from "../runtime/contract.js";
import type { CallContext, OpResult } from "../runtime/types.js";
import type { ProtocolConfig } from "../shared/config.js";
import {
	DelegateHasAssetBalanceError,
	DelegateHasNativeBalanceError,
	DelegateLimitExceededError,
	DelegateNotFoundError,
	DepositLimitExceededError,
	IndexOutOfRangeError,
	InsufficientBalanceError,
	InvalidAmountError,
	MinimumNotMetError,
	UnauthorizedError,
	UnsupportedAssetError,
} from "../shared/errors.js";
import { saturatingSub, sum } from "../shared/fixed-point.js";
import { err, ok } from "../shared/result.js";
import type { ReceiptToken } from "../token/receipt-token.js";
import type { UnstakingVault } from "../vault/unstaking-vault.js";
import { type AssetDistribution, totalBacking } from "./distribution.js";

/** What the pool needs to know about the converter. */
export interface ConverterLink {
	readonly address: Address;
	/** Native value of assets the converter has sent into exit queues. */
	ethValueInWithdrawal(): bigint;
}

export type PoolConfig = Pick<ProtocolConfig, "minimumDeposit" | "maxDelegateCount">;

export interface DepositPoolDeps {
	readonly chain: Chain;
	readonly address: Address;
	readonly config: PoolConfig;
	readonly registry: AssetRegistry;
	readonly access: AccessControl;
	readonly oracle: PriceOracle;
	readonly receiptToken: ReceiptToken;
	readonly vault: UnstakingVault;
	readonly delegates: DelegateDirectory;
}

export class DepositPool extends Contract {
	private readonly registry: AssetRegistry;
	private readonly access: AccessControl;
	private readonly oracle: PriceOracle;
	private readonly receiptToken: ReceiptToken;
	private readonly vault: UnstakingVault;
	private readonly directory: DelegateDirectory;

	private minDeposit: bigint;
	private maxDelegates: number;
	private queue: Address[] = [];
	private members = new Set<Address>();
	private converter: ConverterLink | undefined;

	constructor(deps: DepositPoolDeps) {
		super(deps.chain, deps.address, "deposit-pool");
		this.registry = deps.registry;
		this.access = deps.access;
		this.oracle = deps.oracle;
		this.receiptToken = deps.receiptToken;
		this.vault = deps.vault;
		this.directory = deps.delegates;
		this.minDeposit = deps.config.minimumDeposit;
		this.maxDelegates = deps.config.maxDelegateCount;
	}

	// ── Deposits ───────────────────────────────────────────────────

	depositAsset(
		ctx: CallContext,
		asset: Address,
		amount: bigint,
		minReceipt: bigint,
		referral: string,
	): OpResult<bigint> {
		return this.execute("depositAsset", () => {
			if (asset === NATIVE_ASSET || !this.registry.isSupportedAsset(asset)) {
				return err(new UnsupportedAssetError(`Asset ${asset} is not accepted`, { asset }));
			}
			const minted = this.checkDeposit(asset, amount, minReceipt);
			if (!minted.ok) return minted;

			const limit = this.registry.depositLimitByAsset(asset);
			const total = this.getTotalAssetDeposits(asset);
			if (total + amount > limit) {
				return err(
					new DepositLimitExceededError(`Deposit would take ${asset} past its limit`, {
						asset,
						amount,
						total,
						limit,
					}),
				);
			}

			const pulled = this.chain.transfer(asset, ctx.sender, this.address, amount);
			if (!pulled.ok) return pulled;
			const issued = this.receiptToken.mint(this.address, ctx.sender, minted.value);
			if (!issued.ok) return issued;

			this.emit({
				type: "asset_deposited",
				depositor: ctx.sender,
				asset,
				amount,
				minted: minted.value,
				referral,
			});
			this.logger.debug({ asset, amount, minted: minted.value }, "Asset deposited");
			return minted;
		});
	}

	/**
	 * Deposits `ctx.value` of native coin. The value arrives with the call,
	 * so the limit is checked against the backing measured before it.
	 */
	depositNative(ctx: CallContext, minReceipt: bigint, referral: string): OpResult<bigint> {
		return this.execute("depositNative", () => {
			const amount = ctx.value ?? 0n;
			const minted = this.checkDeposit(NATIVE_ASSET, amount, minReceipt);
			if (!minted.ok) return minted;

			const limit = this.registry.depositLimitByAsset(NATIVE_ASSET);
			const total = this.getTotalAssetDeposits(NATIVE_ASSET);
			if (total >= limit) {
				return err(
					new DepositLimitExceededError("Native deposits are at their limit", {
						amount,
						total,
						limit,
					}),
				);
			}

			const received = this.chain.transfer(NATIVE_ASSET, ctx.sender, this.address, amount);
			if (!received.ok) return received;
			const issued = this.receiptToken.mint(this.address, ctx.sender, minted.value);
			if (!issued.ok) return issued;

			this.emit({
				type: "native_deposited",
				depositor: ctx.sender,
				amount,
				minted: minted.value,
				referral,
			});
			this.logger.debug({ amount, minted: minted.value }, "Native deposited");
			return minted;
		});
	}

	// ── Accounting views ───────────────────────────────────────────

	getMintAmount(asset: Address, amount: bigint): OpResult<bigint> {
		return receiptForAsset(this.oracle, asset, amount);
	}

	getTotalAssetDeposits(asset: Address): bigint {
		return totalBacking(this.getAssetDistributionData(asset));
	}

	/** Remaining room under the asset's deposit limit, floored at zero. */
	getAssetCurrentLimit(asset: Address): bigint {
		return saturatingSub(
			this.registry.depositLimitByAsset(asset),
			this.getTotalAssetDeposits(asset),
		);
	}

	getAssetDistributionData(asset: Address): AssetDistribution {
		if (asset === NATIVE_ASSET) return this.getNativeDistributionData();
		const workers = this.workers();
		const unstaking = this.vault.getAssetsUnstaking(asset);
		const inProtocol = this.vault.getAssetsInProtocol(
			asset,
			sum(workers.map((w) => w.getAssetShares(asset))),
		);
		return {
			lyingInPool: this.chain.balanceOf(asset, this.address),
			lyingInDelegates: sum(workers.map((w) => w.heldBalance(asset))),
			// Staked and unstaking shares are valued together; staked takes the remainder.
			stakedInProtocol: inProtocol - unstaking,
			unstakingFromProtocol: unstaking,
			lyingInConverter: this.converter ? this.chain.balanceOf(asset, this.converter.address) : 0n,
			lyingInUnstakingVault: this.vault.balanceOf(asset),
		};
	}

	/**
	 * Native split. The converter's share includes the native value of
	 * assets it has sent into exit queues, not only coin it holds.
	 */
	getNativeDistributionData(): AssetDistribution {
		const workers = this.workers();
		const converter = this.converter;
		return {
			lyingInPool: this.nativeBalance(),
			lyingInDelegates: sum(workers.map((w) => w.heldBalance(NATIVE_ASSET))),
			stakedInProtocol: sum(workers.map((w) => w.getNativeStakedBalance())),
			unstakingFromProtocol: this.vault.getAssetsUnstaking(NATIVE_ASSET),
			lyingInConverter: converter
				? this.chain.balanceOf(NATIVE_ASSET, converter.address) + converter.ethValueInWithdrawal()
				: 0n,
			lyingInUnstakingVault: this.vault.balanceOf(NATIVE_ASSET),
		};
	}

	// ── Delegate queue ─────────────────────────────────────────────

	getDelegateQueue(): readonly Address[] {
		return [...this.queue];
	}

	isDelegate(address: Address): boolean {
		return this.members.has(address);
	}

	delegateCount(): number {
		return this.queue.length;
	}

	/** Appends each new delegate. Addresses already queued are skipped. */
	addDelegates(ctx: CallContext, delegates: readonly Address[]): OpResult<void> {
		return this.execute("addDelegates", () => {
			const allowed = this.authorize(Role.Admin, ctx, "addDelegates");
			if (!allowed.ok) return allowed;

			const fresh: Address[] = [];
			for (const delegate of delegates) {
				if (!this.directory.has(delegate)) {
					return err(
						new DelegateNotFoundError(`${delegate} is not a deployed delegate worker`, {
							delegate,
						}),
					);
				}
				if (!this.members.has(delegate) && !fresh.includes(delegate)) fresh.push(delegate);
			}
			if (this.queue.length + fresh.length > this.maxDelegates) {
				return err(
					new DelegateLimitExceededError(
						`Queue would hold ${this.queue.length + fresh.length} delegates, limit is ${this.maxDelegates}`,
						{ current: this.queue.length, adding: fresh.length, limit: this.maxDelegates },
					),
				);
			}

			for (const delegate of fresh) {
				this.queue.push(delegate);
				this.members.add(delegate);
				this.emit({ type: "delegate_added", delegate });
			}
			return ok(undefined);
		});
	}

	removeDelegate(ctx: CallContext, delegate: Address): OpResult<void> {
		return this.execute("removeDelegate", () => {
			const allowed = this.authorize(Role.Admin, ctx, "removeDelegate");
			if (!allowed.ok) return allowed;
			return this.removeOne(delegate);
		});
	}

	/** Removes each delegate in order; one failure keeps them all. */
	removeManyDelegates(ctx: CallContext, delegates: readonly Address[]): OpResult<void> {
		return this.execute("removeManyDelegates", () => {
			const allowed = this.authorize(Role.Admin, ctx, "removeManyDelegates");
			if (!allowed.ok) return allowed;
			for (const delegate of delegates) {
				const removed = this.removeOne(delegate);
				if (!removed.ok) return removed;
			}
			return ok(undefined);
		});
	}

	// ── Transfers to delegates ─────────────────────────────────────

	transferAssetToDelegate(
		ctx: CallContext,
		index: number,
		asset: Address,
		amount: bigint,
	): OpResult<void> {
		return this.execute("transferAssetToDelegate", () => {
			const allowed = this.authorize(Role.Manager, ctx, "transferAssetToDelegate");
			if (!allowed.ok) return allowed;
			if (asset === NATIVE_ASSET || !this.registry.isSupportedAsset(asset)) {
				return err(new UnsupportedAssetError(`Asset ${asset} is not transferable`, { asset }));
			}
			const delegate = this.delegateAt(index);
			if (!delegate.ok) return delegate;
			const sent = this.sendToDelegate(asset, delegate.value, amount);
			if (!sent.ok) return sent;

			this.emit({
				type: "asset_transferred_to_delegate",
				delegateIndex: index,
				delegate: delegate.value,
				asset,
				amount,
			});
			return ok(undefined);
		});
	}

	transferNativeToDelegate(ctx: CallContext, index: number, amount: bigint): OpResult<void> {
		return this.execute("transferNativeToDelegate", () => {
			const allowed = this.authorize(Role.Manager, ctx, "transferNativeToDelegate");
			if (!allowed.ok) return allowed;
			const delegate = this.delegateAt(index);
			if (!delegate.ok) return delegate;
			const sent = this.sendToDelegate(NATIVE_ASSET, delegate.value, amount);
			if (!sent.ok) return sent;

			this.emit({
				type: "native_transferred_to_delegate",
				delegateIndex: index,
				delegate: delegate.value,
				amount,
			});
			return ok(undefined);
		});
	}

	// ── Internal swap ──────────────────────────────────────────────

	/**
	 * Sells pool-held `toAsset` to the caller for the native value attached
	 * to the call, at the oracle rate.
	 */
	swapNativeForAsset(ctx: CallContext, toAsset: Address, minReturn: bigint): OpResult<bigint> {
		return this.execute("swapNativeForAsset", () => {
			const allowed = this.authorize(Role.Manager, ctx, "swapNativeForAsset");
			if (!allowed.ok) return allowed;
			const nativeIn = ctx.value ?? 0n;
			if (nativeIn <= 0n) {
				return err(new InvalidAmountError("Swap needs native value", { nativeIn }));
			}
			if (toAsset === NATIVE_ASSET || !this.registry.isSupportedAsset(toAsset)) {
				return err(new UnsupportedAssetError(`Cannot swap into ${toAsset}`, { toAsset }));
			}

			const assetOut = convert(this.oracle, NATIVE_ASSET, toAsset, nativeIn);
			if (!assetOut.ok) return assetOut;
			if (assetOut.value < minReturn) {
				return err(
					new MinimumNotMetError(`Swap returns ${assetOut.value}, below ${minReturn}`, {
						assetOut: assetOut.value,
						minReturn,
					}),
				);
			}
			const available = this.chain.balanceOf(toAsset, this.address);
			if (assetOut.value > available) {
				return err(
					new InsufficientBalanceError(`Pool holds ${available} of ${toAsset}`, {
						toAsset,
						available,
						assetOut: assetOut.value,
					}),
				);
			}

			const received = this.chain.transfer(NATIVE_ASSET, ctx.sender, this.address, nativeIn);
			if (!received.ok) return received;
			const paid = this.chain.transfer(toAsset, this.address, ctx.sender, assetOut.value);
			if (!paid.ok) return paid;

			this.emit({
				type: "native_swapped_for_asset",
				counterparty: ctx.sender,
				toAsset,
				nativeIn,
				assetOut: assetOut.value,
			});
			return assetOut;
		});
	}

	// ── Converter ──────────────────────────────────────────────────

	/** Hands pool assets to the configured converter. Converter only. */
	releaseToConverter(caller: Address, asset: Address, amount: bigint): OpResult<void> {
		return this.execute("releaseToConverter", () => {
			const converter = this.converter;
			if (converter === undefined || caller !== converter.address) {
				return err(new UnauthorizedError("Only the converter can pull pool assets", { caller }));
			}
			if (amount <= 0n) {
				return err(new InvalidAmountError("Release amount must be positive", { amount }));
			}
			const held = this.chain.balanceOf(asset, this.address);
			if (amount > held) {
				return err(
					new InsufficientBalanceError(`Pool holds ${held} of ${asset}`, { asset, held, amount }),
				);
			}
			return this.chain.transfer(asset, this.address, converter.address, amount);
		});
	}

	// ── Configuration ──────────────────────────────────────────────

	minimumDeposit(): bigint {
		return this.minDeposit;
	}

	maxDelegateCount(): number {
		return this.maxDelegates;
	}

	setMinimumDeposit(ctx: CallContext, amount: bigint): OpResult<void> {
		return this.execute("setMinimumDeposit", () => {
			const allowed = this.authorize(Role.Admin, ctx, "setMinimumDeposit");
			if (!allowed.ok) return allowed;
			if (amount < 0n) {
				return err(new InvalidAmountError("Minimum deposit cannot be negative", { amount }));
			}
			this.minDeposit = amount;
			this.emit({ type: "min_deposit_updated", minimumDeposit: amount });
			return ok(undefined);
		});
	}

	/** The bound can never drop below the number of queued delegates. */
	setMaxDelegateCount(ctx: CallContext, count: number): OpResult<void> {
		return this.execute("setMaxDelegateCount", () => {
			const allowed = this.authorize(Role.Admin, ctx, "setMaxDelegateCount");
			if (!allowed.ok) return allowed;
			if (!Number.isInteger(count) || count < 0) {
				return err(new InvalidAmountError("Delegate bound must be a whole number", { count }));
			}
			if (count < this.queue.length) {
				return err(
					new DelegateLimitExceededError(
						`Queue already holds ${this.queue.length} delegates`,
						{ count, current: this.queue.length },
					),
				);
			}
			this.maxDelegates = count;
			this.emit({ type: "max_delegate_count_updated", maxDelegateCount: count });
			return ok(undefined);
		});
	}

	setConverter(ctx: CallContext, converter: ConverterLink): OpResult<void> {
		return this.execute("setConverter", () => {
			const allowed = this.authorize(Role.Admin, ctx, "setConverter");
			if (!allowed.ok) return allowed;
			this.converter = converter;
			this.emit({ type: "converter_updated", converter: converter.address });
			return ok(undefined);
		});
	}

	snapshot(): () => void {
		const minDeposit = this.minDeposit;
		const maxDelegates = this.maxDelegates;
		const queue = [...this.queue];
		const members = new Set(this.members);
		const converter = this.converter;
		return () => {
			this.minDeposit = minDeposit;
			this.maxDelegates = maxDelegates;
			this.queue = queue;
			this.members = members;
			this.converter = converter;
		};
	}

	// ── Internal ──────────────────────────────────────────────────

	private authorize(role: Role, ctx: CallContext, operation: string): OpResult<void> {
		const allowed = requireRole(this.access, role, ctx.sender, operation);
		if (!allowed.ok && role === Role.Admin) {
			this.logger.warn({ operation, sender: ctx.sender }, "Admin operation rejected");
		}
		return allowed;
	}

	private checkDeposit(asset: Address, amount: bigint, minReceipt: bigint): OpResult<bigint> {
		if (amount <= 0n) {
			return err(new InvalidAmountError("Deposit amount must be positive", { amount }));
		}
		if (amount < this.minDeposit) {
			return err(
				new InvalidAmountError(`Deposit is below the minimum of ${this.minDeposit}`, {
					amount,
					minimumDeposit: this.minDeposit,
				}),
			);
		}
		const minted = receiptForAsset(this.oracle, asset, amount);
		if (!minted.ok) return minted;
		if (minted.value < minReceipt) {
			return err(
				new MinimumNotMetError(`Deposit mints ${minted.value}, below ${minReceipt}`, {
					minted: minted.value,
					minReceipt,
				}),
			);
		}
		return minted;
	}

	private removeOne(delegate: Address): OpResult<void> {
		const worker = this.directory.get(delegate);
		if (!this.members.has(delegate) || worker === undefined) {
			return err(new DelegateNotFoundError(`${delegate} is not in the queue`, { delegate }));
		}

		const native = worker.getNativeStakedBalance() + worker.heldBalance(NATIVE_ASSET);
		if (native > 0n) {
			return err(
				new DelegateHasNativeBalanceError(`Delegate still holds ${native} native`, {
					delegate,
					native,
				}),
			);
		}
		for (const asset of this.registry.getSupportedAssetList()) {
			if (asset === NATIVE_ASSET) continue;
			const amount = worker.heldBalance(asset) + worker.getAssetBalance(asset);
			if (amount > 0n) {
				return err(new DelegateHasAssetBalanceError(asset, amount, { delegate }));
			}
		}

		const index = this.queue.indexOf(delegate);
		const last = this.queue.pop();
		if (last !== undefined && index < this.queue.length) this.queue[index] = last;
		this.members.delete(delegate);
		this.emit({ type: "delegate_removed", delegate });
		return ok(undefined);
	}

	private delegateAt(index: number): OpResult<Address> {
		const delegate = Number.isInteger(index) && index >= 0 ? this.queue[index] : undefined;
		if (delegate === undefined) {
			return err(
				new IndexOutOfRangeError(`No delegate at index ${index}`, {
					index,
					length: this.queue.length,
				}),
			);
		}
		return ok(delegate);
	}

	private sendToDelegate(asset: Address, delegate: Address, amount: bigint): OpResult<void> {
		if (amount <= 0n) {
			return err(new InvalidAmountError("Transfer amount must be positive", { amount }));
		}
		const held = this.chain.balanceOf(asset, this.address);
		if (amount > held) {
			return err(
				new InsufficientBalanceError(`Pool holds ${held} of ${asset}`, { asset, held, amount }),
			);
		}
		return this.chain.transfer(asset, this.address, delegate, amount);
	}

	private workers(): DelegateBalances[] {
		const workers: DelegateBalances[] = [];
		for (const address of this.queue) {
			const worker = this.directory.get(address);
			if (worker) workers.push(worker);
		}
		return workers;
	}
}
