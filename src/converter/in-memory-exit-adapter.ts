/**
 * InMemoryExitAdapter: an upstream exit queue for one convertible asset.
 *
 * Requests take the asset from the owner. A keeper later finalizes each
 * ticket with the native amount it paid out; the owner then claims it.
 */

import type { Address } from "../lib/ethereum/index.js";
import { NATIVE_ASSET } from "../lib/ethereum/index.js";
import type { Chain } from "../runtime/chain.js";
import { Contract } from "../runtime/contract.js";
import type { OpResult } from "../runtime/types.js";
import {
	InvalidAmountError,
	RequestNotFoundError,
	RequestNotReadyError,
	UnauthorizedError,
} from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { ExitAdapter } from "./types.js";

interface Ticket {
	readonly owner: Address;
	readonly amount: bigint;
	readonly payout: bigint | undefined;
	readonly claimed: boolean;
}

export class InMemoryExitAdapter extends Contract implements ExitAdapter {
	readonly asset: Address;
	private tickets = new Map<string, Ticket>();
	private nonce = 0;

	constructor(chain: Chain, address: Address, asset: Address) {
		super(chain, address, "exit-adapter");
		this.asset = asset;
	}

	requestUnstake(owner: Address, amount: bigint): OpResult<string> {
		return this.execute("requestUnstake", () => {
			if (amount <= 0n) {
				return err(new InvalidAmountError("Exit amount must be positive", { amount }));
			}
			this.nonce++;
			const ticket = `${this.address}:${this.nonce}`;
			this.tickets.set(ticket, { owner, amount, payout: undefined, claimed: false });

			const pulled = this.chain.transfer(this.asset, owner, this.address, amount);
			if (!pulled.ok) return pulled;
			return ok(ticket);
		});
	}

	/** Marks a ticket paid out, funding the adapter with the native it will release. */
	finalize(ticket: string, payout: bigint): void {
		const entry = this.tickets.get(ticket);
		if (!entry) throw new Error(`InMemoryExitAdapter: unknown ticket ${ticket}`);
		if (entry.payout !== undefined) {
			throw new Error(`InMemoryExitAdapter: ticket ${ticket} already finalized`);
		}
		this.chain.fund(NATIVE_ASSET, this.address, payout);
		this.tickets.set(ticket, { ...entry, payout });
	}

	isClaimable(ticket: string): boolean {
		const entry = this.tickets.get(ticket);
		return entry !== undefined && entry.payout !== undefined && !entry.claimed;
	}

	claim(owner: Address, ticket: string): OpResult<bigint> {
		return this.execute("claim", () => {
			const entry = this.tickets.get(ticket);
			if (!entry || entry.claimed) {
				return err(new RequestNotFoundError(`No open ticket ${ticket}`, { ticket }));
			}
			if (entry.owner !== owner) {
				return err(new UnauthorizedError("Only the ticket owner can claim", { ticket, owner }));
			}
			if (entry.payout === undefined) {
				return err(new RequestNotReadyError(`Ticket ${ticket} is not finalized`, { ticket }));
			}
			this.tickets.set(ticket, { ...entry, claimed: true });

			const paid = this.chain.transfer(NATIVE_ASSET, this.address, owner, entry.payout);
			if (!paid.ok) return paid;
			return ok(entry.payout);
		});
	}

	snapshot(): () => void {
		const tickets = new Map(this.tickets);
		const nonce = this.nonce;
		return () => {
			this.tickets = tickets;
			this.nonce = nonce;
		};
	}
}
