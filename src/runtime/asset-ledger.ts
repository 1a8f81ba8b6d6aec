/**
 * AssetLedger: balances of every account in every asset, native coin included.
 *
 * The ledger is pure bookkeeping: it never calls out. Receive hooks and
 * atomicity live one level up in Chain.
 */

import type { Address } from "../lib/ethereum/index.js";
import { InsufficientBalanceError, InvalidAmountError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { OpResult, Snapshottable } from "./types.js";

type BalanceBook = Map<Address, bigint>;

export class AssetLedger implements Snapshottable {
	private balances = new Map<Address, BalanceBook>();
	private supplies = new Map<Address, bigint>();

	// ── Queries ────────────────────────────────────────────────────

	balanceOf(asset: Address, account: Address): bigint {
		return this.balances.get(asset)?.get(account) ?? 0n;
	}

	totalSupply(asset: Address): bigint {
		return this.supplies.get(asset) ?? 0n;
	}

	// ── Mutations ──────────────────────────────────────────────────

	/** Creates `amount` of `asset` out of nothing and credits it to `to`. */
	mint(asset: Address, to: Address, amount: bigint): OpResult<void> {
		if (amount < 0n) {
			return err(new InvalidAmountError("Cannot mint a negative amount", { asset, amount }));
		}
		this.credit(asset, to, amount);
		this.supplies.set(asset, this.totalSupply(asset) + amount);
		return ok(undefined);
	}

	/** Destroys `amount` of `asset` held by `from`. */
	burn(asset: Address, from: Address, amount: bigint): OpResult<void> {
		const debited = this.debit(asset, from, amount);
		if (!debited.ok) return debited;
		this.supplies.set(asset, this.totalSupply(asset) - amount);
		return ok(undefined);
	}

	/** Moves `amount` of `asset` from one account to another. */
	move(asset: Address, from: Address, to: Address, amount: bigint): OpResult<void> {
		const debited = this.debit(asset, from, amount);
		if (!debited.ok) return debited;
		this.credit(asset, to, amount);
		return ok(undefined);
	}

	snapshot(): () => void {
		const balances = new Map<Address, BalanceBook>();
		for (const [asset, book] of this.balances) {
			balances.set(asset, new Map(book));
		}
		const supplies = new Map(this.supplies);
		return () => {
			this.balances = balances;
			this.supplies = supplies;
		};
	}

	// ── Internal ──────────────────────────────────────────────────

	private book(asset: Address): BalanceBook {
		let book = this.balances.get(asset);
		if (!book) {
			book = new Map();
			this.balances.set(asset, book);
		}
		return book;
	}

	private credit(asset: Address, account: Address, amount: bigint): void {
		const book = this.book(asset);
		book.set(account, (book.get(account) ?? 0n) + amount);
	}

	private debit(asset: Address, account: Address, amount: bigint): OpResult<void> {
		if (amount < 0n) {
			return err(new InvalidAmountError("Cannot debit a negative amount", { asset, amount }));
		}
		const book = this.book(asset);
		const balance = book.get(account) ?? 0n;
		if (balance < amount) {
			return err(
				new InsufficientBalanceError(`Balance of ${account} is below ${amount}`, {
					asset,
					account,
					balance,
					amount,
				}),
			);
		}
		book.set(account, balance - amount);
		return ok(undefined);
	}
}
