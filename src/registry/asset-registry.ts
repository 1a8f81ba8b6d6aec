/**
 * InMemoryAssetRegistry: admin-maintained asset whitelist.
 *
 * Listing order is preserved; `getSupportedAssetList()` returns assets in
 * the order they were first listed.
 */

import type { Address } from "../lib/ethereum/index.js";
import { ConfigError } from "../shared/errors.js";
import type { StrategyId } from "../shared/identifiers.js";
import type { AssetListing, AssetRegistry } from "./types.js";

interface AssetEntry {
	readonly depositLimit: bigint;
	readonly strategy: StrategyId | undefined;
}

export class InMemoryAssetRegistry implements AssetRegistry {
	private readonly entries = new Map<Address, AssetEntry>();

	constructor(listings: readonly AssetListing[] = []) {
		for (const listing of listings) this.addAsset(listing);
	}

	// ── Admin ──────────────────────────────────────────────────────

	/**
	 * Lists a new asset.
	 * @throws ConfigError if the asset is already listed or the limit is negative
	 */
	addAsset(listing: AssetListing): void {
		if (this.entries.has(listing.asset)) {
			throw new ConfigError(`Asset ${listing.asset} is already supported`);
		}
		assertLimit(listing.depositLimit);
		this.entries.set(listing.asset, {
			depositLimit: listing.depositLimit,
			strategy: listing.strategy,
		});
	}

	updateDepositLimit(asset: Address, depositLimit: bigint): void {
		const entry = this.require(asset);
		assertLimit(depositLimit);
		this.entries.set(asset, { ...entry, depositLimit });
	}

	setAssetStrategy(asset: Address, strategy: StrategyId | undefined): void {
		const entry = this.require(asset);
		this.entries.set(asset, { ...entry, strategy });
	}

	// ── AssetRegistry ──────────────────────────────────────────────

	isSupportedAsset(asset: Address): boolean {
		return this.entries.has(asset);
	}

	depositLimitByAsset(asset: Address): bigint {
		return this.entries.get(asset)?.depositLimit ?? 0n;
	}

	assetStrategy(asset: Address): StrategyId | undefined {
		return this.entries.get(asset)?.strategy;
	}

	getSupportedAssetList(): readonly Address[] {
		return [...this.entries.keys()];
	}

	private require(asset: Address): AssetEntry {
		const entry = this.entries.get(asset);
		if (!entry) {
			throw new ConfigError(`Asset ${asset} is not supported`);
		}
		return entry;
	}
}

function assertLimit(limit: bigint): void {
	if (limit < 0n) {
		throw new ConfigError(`Deposit limit cannot be negative, got ${limit}`);
	}
}
