/**
 * DelegateDirectory: arena of deployed delegate workers, keyed by address.
 *
 * The pool's queue only holds addresses; balance queries resolve the worker
 * through this directory. Registration is a deployment step and is never
 * rolled back.
 */

import type { Address } from "../lib/ethereum/index.js";

/** The read surface of a delegate worker that the pool aggregates over. */
export interface DelegateBalances {
	readonly address: Address;
	/** Amount of `asset` held directly by the worker, not yet staked. */
	heldBalance(asset: Address): bigint;
	/** Amount of `asset` the worker has staked into the external protocol. */
	getAssetBalance(asset: Address): bigint;
	/** Protocol shares the worker holds in the asset's strategy. */
	getAssetShares(asset: Address): bigint;
	/** Native value staked through the worker, verified or not. */
	getNativeStakedBalance(): bigint;
}

export class DelegateDirectory<D extends DelegateBalances = DelegateBalances> {
	private readonly workers = new Map<Address, D>();

	register(worker: D): void {
		if (this.workers.has(worker.address)) {
			throw new Error(`DelegateDirectory: ${worker.address} is already registered`);
		}
		this.workers.set(worker.address, worker);
	}

	get(address: Address): D | undefined {
		return this.workers.get(address);
	}

	has(address: Address): boolean {
		return this.workers.has(address);
	}

	get size(): number {
		return this.workers.size;
	}
}
