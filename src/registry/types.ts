/**
 * Registry types: asset metadata and role checks consumed by every contract.
 */

import type { Address } from "../lib/ethereum/index.js";
import type { StrategyId } from "../shared/identifiers.js";

/** Per-asset metadata: support flag, deposit limit and assigned strategy. */
export interface AssetRegistry {
	isSupportedAsset(asset: Address): boolean;
	/** Cap on the asset's total backing, in base units. Zero for unknown assets. */
	depositLimitByAsset(asset: Address): bigint;
	assetStrategy(asset: Address): StrategyId | undefined;
	getSupportedAssetList(): readonly Address[];
}

/** Capability checks. How roles are granted is outside the engine. */
export interface AccessControl {
	isAdmin(account: Address): boolean;
	isManager(account: Address): boolean;
	isOperator(account: Address): boolean;
}

export const Role = {
	Admin: "admin",
	Manager: "manager",
	Operator: "operator",
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export interface AssetListing {
	readonly asset: Address;
	readonly depositLimit: bigint;
	readonly strategy?: StrategyId | undefined;
}
