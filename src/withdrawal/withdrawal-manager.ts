/**
 * WithdrawalManager: exchanges receipt tokens for backing assets.
 *
 * A withdrawal locks the caller's receipt tokens and fixes the asset amount
 * owed at the current oracle rate. After the configured delay the oldest
 * request of that user and asset can be completed: the vault pays the lesser
 * of the fixed amount and the amount at today's rate, and the locked tokens
 * are burned. Requests of one user and asset complete in FIFO order.
 */

import { type Address, NATIVE_ASSET } from "../lib/ethereum/index.js";
import { assetForReceipt } from "../oracle/pricing.js";
import type { PriceOracle } from "../oracle/types.js";
import type { AssetRegistry } from "../registry/types.js";
import type { Chain } from "../runtime/chain.js";
import { Contract } from "../runtime/contract.js";
import type { CallContext, OpResult } from "../runtime/types.js";
import type { ProtocolConfig } from "../shared/config.js";
import {
	InsufficientBalanceError,
	InvalidAmountError,
	RequestNotFoundError,
	RequestNotReadyError,
	UnsupportedAssetError,
} from "../shared/errors.js";
import { minBigInt } from "../shared/fixed-point.js";
import { err, ok } from "../shared/result.js";
import type { ReceiptToken } from "../token/receipt-token.js";
import type { UnstakingVault } from "../vault/unstaking-vault.js";

export interface WithdrawalRequest {
	readonly receiptAmount: bigint;
	readonly expectedAssetAmount: bigint;
	readonly requestBlock: number;
}

export interface WithdrawalManagerDeps {
	readonly chain: Chain;
	readonly address: Address;
	readonly config: Pick<ProtocolConfig, "withdrawalDelayBlocks">;
	readonly registry: AssetRegistry;
	readonly oracle: PriceOracle;
	readonly receiptToken: ReceiptToken;
	readonly vault: UnstakingVault;
}

export class WithdrawalManager extends Contract {
	private readonly delayBlocks: number;
	private readonly registry: AssetRegistry;
	private readonly oracle: PriceOracle;
	private readonly receiptToken: ReceiptToken;
	private readonly vault: UnstakingVault;
	private requests = new Map<string, readonly WithdrawalRequest[]>();

	constructor(deps: WithdrawalManagerDeps) {
		super(deps.chain, deps.address, "withdrawal-manager");
		this.delayBlocks = deps.config.withdrawalDelayBlocks;
		this.registry = deps.registry;
		this.oracle = deps.oracle;
		this.receiptToken = deps.receiptToken;
		this.vault = deps.vault;
	}

	initiateWithdrawal(
		ctx: CallContext,
		asset: Address,
		receiptAmount: bigint,
	): OpResult<WithdrawalRequest> {
		return this.execute("initiateWithdrawal", () => {
			if (asset !== NATIVE_ASSET && !this.registry.isSupportedAsset(asset)) {
				return err(new UnsupportedAssetError(`Cannot withdraw ${asset}`, { asset }));
			}
			if (receiptAmount <= 0n) {
				return err(new InvalidAmountError("Withdrawal amount must be positive", { receiptAmount }));
			}
			const expected = assetForReceipt(this.oracle, asset, receiptAmount);
			if (!expected.ok) return expected;
			if (expected.value === 0n) {
				return err(
					new InvalidAmountError("Withdrawal is worth nothing at the current rate", {
						receiptAmount,
					}),
				);
			}

			const request: WithdrawalRequest = {
				receiptAmount,
				expectedAssetAmount: expected.value,
				requestBlock: this.chain.blockNumber(),
			};
			const key = requestKey(ctx.sender, asset);
			this.requests.set(key, [...this.pendingRequests(ctx.sender, asset), request]);

			const locked = this.receiptToken.transfer(ctx.sender, this.address, receiptAmount);
			if (!locked.ok) return locked;

			this.emit({
				type: "withdrawal_initiated",
				user: ctx.sender,
				asset,
				receiptAmount,
				expectedAssetAmount: expected.value,
				requestBlock: request.requestBlock,
			});
			return ok(request);
		});
	}

	/** Completes the caller's oldest request for `asset`; returns the amount paid. */
	completeWithdrawal(ctx: CallContext, asset: Address): OpResult<bigint> {
		return this.execute("completeWithdrawal", () => {
			const [oldest, ...rest] = this.pendingRequests(ctx.sender, asset);
			if (oldest === undefined) {
				return err(
					new RequestNotFoundError(`No pending withdrawal of ${asset}`, {
						user: ctx.sender,
						asset,
					}),
				);
			}
			const readyAt = oldest.requestBlock + this.delayBlocks;
			if (this.chain.blockNumber() < readyAt) {
				return err(
					new RequestNotReadyError(`Withdrawal completes at block ${readyAt}`, {
						readyAt,
						block: this.chain.blockNumber(),
					}),
				);
			}

			const current = assetForReceipt(this.oracle, asset, oldest.receiptAmount);
			if (!current.ok) return current;
			const payout = minBigInt(oldest.expectedAssetAmount, current.value);
			const available = this.vault.balanceOf(asset);
			if (payout > available) {
				return err(
					new InsufficientBalanceError(`Vault holds ${available} of ${asset}`, {
						asset,
						available,
						payout,
					}),
				);
			}

			const key = requestKey(ctx.sender, asset);
			if (rest.length === 0) this.requests.delete(key);
			else this.requests.set(key, rest);

			const burned = this.receiptToken.burn(this.address, this.address, oldest.receiptAmount);
			if (!burned.ok) return burned;
			const paid = this.vault.redeem(this.address, asset, payout, ctx.sender);
			if (!paid.ok) return paid;

			this.emit({
				type: "withdrawal_completed",
				user: ctx.sender,
				asset,
				receiptAmount: oldest.receiptAmount,
				assetAmount: payout,
			});
			this.logger.debug({ user: ctx.sender, asset, payout }, "Withdrawal completed");
			return ok(payout);
		});
	}

	pendingRequests(user: Address, asset: Address): readonly WithdrawalRequest[] {
		return this.requests.get(requestKey(user, asset)) ?? [];
	}

	snapshot(): () => void {
		const requests = new Map(this.requests);
		return () => {
			this.requests = requests;
		};
	}
}

function requestKey(user: Address, asset: Address): string {
	return `${user}|${asset}`;
}
