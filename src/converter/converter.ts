/**
 * Converter: turns convertible pool assets back into native coin.
 *
 * Assets pulled out of the pool stop being liquid until their upstream exit
 * pays out, so their native value is tracked in `ethValueInWithdrawal` and
 * reported by the pool as part of the native backing. Claimed native goes
 * straight back to the pool, which releases the tracked value.
 *
 * `conversionLimit` records the cumulative asset amount handed out by
 * `swapEthToAsset`. Nothing in this layer enforces it.
 */

import { type Address, NATIVE_ASSET } from "../lib/ethereum/index.js";
import { assetPrice, convert } from "../oracle/pricing.js";
import type { PriceOracle } from "../oracle/types.js";
import { requireRole } from "../registry/access-control.js";
import { type AccessControl, type AssetRegistry, Role } from "../registry/types.js";
import type { Chain } from "../runtime/chain.js";
import { Contract } from "../runtime/contract.js";
import type { CallContext, OpResult } from "../runtime/types.js";
import {
	InsufficientBalanceError,
	InvalidAmountError,
	InvalidTransitionError,
	MinimumNotMetError,
	RequestNotFoundError,
	RequestNotReadyError,
	UnsupportedAssetError,
} from "../shared/errors.js";
import { saturatingSub, valueAt } from "../shared/fixed-point.js";
import { type ExitRequestId, exitRequestId } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import { applyExitTransition, openExitRequest } from "./exit-request.js";
import {
	type ExitAdapter,
	type ExitRequest,
	ExitState,
	type ExitTransition,
	type PoolLink,
} from "./types.js";

export interface ConverterDeps {
	readonly chain: Chain;
	readonly address: Address;
	readonly pool: PoolLink;
	readonly registry: AssetRegistry;
	readonly access: AccessControl;
	readonly oracle: PriceOracle;
}

export class Converter extends Contract {
	private readonly pool: PoolLink;
	private readonly registry: AssetRegistry;
	private readonly access: AccessControl;
	private readonly oracle: PriceOracle;

	private valueInWithdrawal = 0n;
	private limits = new Map<Address, bigint>();
	private adapters = new Map<Address, ExitAdapter>();
	private requests = new Map<ExitRequestId, ExitRequest>();
	private nonce = 0;

	constructor(deps: ConverterDeps) {
		super(deps.chain, deps.address, "converter");
		this.pool = deps.pool;
		this.registry = deps.registry;
		this.access = deps.access;
		this.oracle = deps.oracle;
	}

	// ── Views ──────────────────────────────────────────────────────

	ethValueInWithdrawal(): bigint {
		return this.valueInWithdrawal;
	}

	conversionLimit(asset: Address): bigint {
		return this.limits.get(asset) ?? 0n;
	}

	exitRequest(id: ExitRequestId): ExitRequest | undefined {
		return this.requests.get(id);
	}

	exitRequests(): readonly ExitRequest[] {
		return [...this.requests.values()];
	}

	exitAdapter(asset: Address): ExitAdapter | undefined {
		return this.adapters.get(asset);
	}

	// ── Configuration ──────────────────────────────────────────────

	setExitAdapter(ctx: CallContext, adapter: ExitAdapter): OpResult<void> {
		return this.execute("setExitAdapter", () => {
			const allowed = requireRole(this.access, Role.Admin, ctx.sender, "setExitAdapter");
			if (!allowed.ok) {
				this.logger.warn({ sender: ctx.sender }, "Admin operation rejected");
				return allowed;
			}
			const asset = this.convertible(adapter.asset);
			if (!asset.ok) return asset;
			this.adapters.set(adapter.asset, adapter);
			return ok(undefined);
		});
	}

	// ── Pool conversion ────────────────────────────────────────────

	/** Pulls `amount` of a convertible asset out of the pool. */
	transferAssetFromDepositPool(ctx: CallContext, asset: Address, amount: bigint): OpResult<bigint> {
		return this.execute("transferAssetFromDepositPool", () => {
			const allowed = requireRole(
				this.access,
				Role.Manager,
				ctx.sender,
				"transferAssetFromDepositPool",
			);
			if (!allowed.ok) return allowed;
			const supported = this.convertible(asset);
			if (!supported.ok) return supported;
			if (amount <= 0n) {
				return err(new InvalidAmountError("Conversion amount must be positive", { amount }));
			}
			const price = assetPrice(this.oracle, asset);
			if (!price.ok) return price;

			const nativeValue = valueAt(amount, price.value);
			this.valueInWithdrawal += nativeValue;

			const pulled = this.pool.releaseToConverter(this.address, asset, amount);
			if (!pulled.ok) return pulled;

			this.emit({ type: "asset_converted_out_of_pool", asset, amount, nativeValue });
			this.logger.debug(
				{ asset, amount, nativeValue, valueInWithdrawal: this.valueInWithdrawal },
				"Asset pulled from pool",
			);
			return ok(nativeValue);
		});
	}

	/** Sells a held asset for the native value attached to the call. */
	swapEthToAsset(ctx: CallContext, toAsset: Address, minReturn: bigint): OpResult<bigint> {
		return this.execute("swapEthToAsset", () => {
			const allowed = requireRole(this.access, Role.Operator, ctx.sender, "swapEthToAsset");
			if (!allowed.ok) return allowed;
			const nativeIn = ctx.value ?? 0n;
			if (nativeIn <= 0n) {
				return err(new InvalidAmountError("Swap needs native value", { nativeIn }));
			}
			const supported = this.convertible(toAsset);
			if (!supported.ok) return supported;

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
			const held = this.chain.balanceOf(toAsset, this.address);
			if (assetOut.value > held) {
				return err(
					new InsufficientBalanceError(`Converter holds ${held} of ${toAsset}`, {
						toAsset,
						held,
						assetOut: assetOut.value,
					}),
				);
			}

			this.limits.set(toAsset, this.conversionLimit(toAsset) + assetOut.value);

			const received = this.chain.transfer(NATIVE_ASSET, ctx.sender, this.address, nativeIn);
			if (!received.ok) return received;
			const paid = this.chain.transfer(toAsset, this.address, ctx.sender, assetOut.value);
			if (!paid.ok) return paid;

			this.emit({
				type: "eth_swapped_for_asset",
				operator: ctx.sender,
				toAsset,
				nativeIn,
				assetOut: assetOut.value,
			});
			return assetOut;
		});
	}

	// ── Exit lifecycle ─────────────────────────────────────────────

	/** Sends held `asset` into its upstream exit queue. */
	unstake(ctx: CallContext, asset: Address, amount: bigint): OpResult<ExitRequestId> {
		return this.execute("unstake", () => {
			const allowed = requireRole(this.access, Role.Operator, ctx.sender, "unstake");
			if (!allowed.ok) return allowed;
			const adapter = this.adapters.get(asset);
			if (!adapter) {
				return err(new UnsupportedAssetError(`No exit path for ${asset}`, { asset }));
			}
			if (amount <= 0n) {
				return err(new InvalidAmountError("Exit amount must be positive", { amount }));
			}
			const held = this.chain.balanceOf(asset, this.address);
			if (amount > held) {
				return err(
					new InsufficientBalanceError(`Converter holds ${held} of ${asset}`, {
						asset,
						held,
						amount,
					}),
				);
			}

			this.nonce++;
			const id = exitRequestId(`exit-${this.nonce}`);
			const request = openExitRequest(id, asset, amount, this.chain.blockNumber());
			this.requests.set(id, request);

			const ticket = adapter.requestUnstake(this.address, amount);
			if (!ticket.ok) return ticket;
			const moved = this.advance(request, { type: "submitted", ticket: ticket.value });
			if (!moved.ok) return moved;

			this.emit({ type: "exit_requested", id, asset, amount });
			return ok(id);
		});
	}

	/** Marks a request claimable once its adapter reports the exit finalized. */
	syncExit(ctx: CallContext, id: ExitRequestId): OpResult<ExitRequest> {
		return this.execute("syncExit", () => {
			const allowed = requireRole(this.access, Role.Operator, ctx.sender, "syncExit");
			if (!allowed.ok) return allowed;
			const found = this.lookup(id);
			if (!found.ok) return found;
			const { request, adapter } = found.value;
			if (request.ticket === undefined || !adapter.isClaimable(request.ticket)) {
				return err(new RequestNotReadyError(`Exit ${id} is not claimable yet`, { id }));
			}

			const moved = this.advance(request, { type: "finalized" });
			if (!moved.ok) return moved;
			this.emit({ type: "exit_claimable", id });
			return moved;
		});
	}

	/** Claims a finalized exit and forwards all native to the pool. */
	claim(ctx: CallContext, id: ExitRequestId): OpResult<bigint> {
		return this.execute("claim", () => {
			const allowed = requireRole(this.access, Role.Operator, ctx.sender, "claim");
			if (!allowed.ok) return allowed;
			const found = this.lookup(id);
			if (!found.ok) return found;
			const { request, adapter } = found.value;
			if (request.state !== ExitState.Claimable || request.ticket === undefined) {
				return err(
					new InvalidTransitionError(`Exit ${id} is ${request.state}, not claimable`, {
						id,
						state: request.state,
					}),
				);
			}

			const before = this.nativeBalance();
			const claimed = adapter.claim(this.address, request.ticket);
			if (!claimed.ok) return claimed;
			const nativeReceived = this.nativeBalance() - before;

			const moved = this.advance(request, { type: "forwarded", nativeReceived });
			if (!moved.ok) return moved;
			this.emit({ type: "exit_claimed", id, nativeReceived });

			const forwarded = this.forwardNative();
			if (!forwarded.ok) return forwarded;
			return ok(nativeReceived);
		});
	}

	/** Sends the converter's whole native balance to the pool. */
	sendEthToDepositPool(ctx: CallContext): OpResult<bigint> {
		return this.execute("sendEthToDepositPool", () => {
			const allowed = requireRole(this.access, Role.Manager, ctx.sender, "sendEthToDepositPool");
			if (!allowed.ok) return allowed;
			return this.forwardNative();
		});
	}

	snapshot(): () => void {
		const valueInWithdrawal = this.valueInWithdrawal;
		const limits = new Map(this.limits);
		const adapters = new Map(this.adapters);
		const requests = new Map(this.requests);
		const nonce = this.nonce;
		return () => {
			this.valueInWithdrawal = valueInWithdrawal;
			this.limits = limits;
			this.adapters = adapters;
			this.requests = requests;
			this.nonce = nonce;
		};
	}

	// ── Internal ──────────────────────────────────────────────────

	private forwardNative(): OpResult<bigint> {
		const amount = this.nativeBalance();
		if (amount === 0n) return ok(0n);

		this.valueInWithdrawal = saturatingSub(this.valueInWithdrawal, amount);
		const sent = this.chain.transfer(NATIVE_ASSET, this.address, this.pool.address, amount);
		if (!sent.ok) return sent;

		this.emit({ type: "eth_sent_to_pool", amount, valueInWithdrawal: this.valueInWithdrawal });
		this.logger.debug({ amount, valueInWithdrawal: this.valueInWithdrawal }, "Native sent to pool");
		return ok(amount);
	}

	private advance(request: ExitRequest, t: ExitTransition): OpResult<ExitRequest> {
		const next = applyExitTransition(request, t, this.chain.blockNumber());
		if (!next.ok) return next;
		this.requests.set(request.id, next.value);
		return next;
	}

	private lookup(id: ExitRequestId): OpResult<{ request: ExitRequest; adapter: ExitAdapter }> {
		const request = this.requests.get(id);
		const adapter = request ? this.adapters.get(request.asset) : undefined;
		if (!request || !adapter) {
			return err(new RequestNotFoundError(`No exit request ${id}`, { id }));
		}
		return ok({ request, adapter });
	}

	private convertible(asset: Address): OpResult<void> {
		if (asset === NATIVE_ASSET || !this.registry.isSupportedAsset(asset)) {
			return err(new UnsupportedAssetError(`Asset ${asset} is not convertible`, { asset }));
		}
		return ok(undefined);
	}
}
