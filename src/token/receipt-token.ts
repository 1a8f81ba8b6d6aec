/**
 * Receipt token: the derivative minted against pooled backing.
 *
 * Balances live in the chain's ledger under the token's own address, so a
 * reverted operation also reverts its mints and burns.
 */

import type { Address } from "../lib/ethereum/index.js";
import type { Chain } from "../runtime/chain.js";
import type { OpResult } from "../runtime/types.js";
import { InvalidAmountError, UnauthorizedError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";

export interface ReceiptToken {
	readonly address: Address;
	mint(caller: Address, to: Address, amount: bigint): OpResult<void>;
	burn(caller: Address, from: Address, amount: bigint): OpResult<void>;
	transfer(from: Address, to: Address, amount: bigint): OpResult<void>;
	balanceOf(account: Address): bigint;
	totalSupply(): bigint;
}

export class LedgerReceiptToken implements ReceiptToken {
	readonly address: Address;
	private readonly chain: Chain;
	private readonly minters: Set<Address>;

	constructor(chain: Chain, address: Address, minters: readonly Address[] = []) {
		this.chain = chain;
		this.address = address;
		this.minters = new Set(minters);
	}

	/** Grants mint/burn rights. Wiring happens once, at deployment. */
	addMinter(minter: Address): void {
		this.minters.add(minter);
	}

	mint(caller: Address, to: Address, amount: bigint): OpResult<void> {
		const allowed = this.checkMinter(caller, "mint");
		if (!allowed.ok) return allowed;
		if (amount <= 0n) {
			return err(new InvalidAmountError("Mint amount must be positive", { amount }));
		}
		return this.chain.transact(() => this.chain.ledger.mint(this.address, to, amount));
	}

	burn(caller: Address, from: Address, amount: bigint): OpResult<void> {
		const allowed = this.checkMinter(caller, "burn");
		if (!allowed.ok) return allowed;
		return this.chain.transact(() => this.chain.ledger.burn(this.address, from, amount));
	}

	/** Moves receipt tokens between holders (e.g. locking them in the withdrawal manager). */
	transfer(from: Address, to: Address, amount: bigint): OpResult<void> {
		return this.chain.transfer(this.address, from, to, amount);
	}

	balanceOf(account: Address): bigint {
		return this.chain.balanceOf(this.address, account);
	}

	totalSupply(): bigint {
		return this.chain.ledger.totalSupply(this.address);
	}

	private checkMinter(caller: Address, operation: string): OpResult<void> {
		if (this.minters.has(caller)) return ok(undefined);
		return err(new UnauthorizedError(`${caller} may not ${operation} receipt tokens`, { caller }));
	}
}
