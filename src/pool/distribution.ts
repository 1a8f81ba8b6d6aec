/**
 * Where one asset's backing currently sits. The six locations are disjoint
 * for a single asset; their sum is the asset's total deposits.
 */
export interface AssetDistribution {
	readonly lyingInPool: bigint;
	readonly lyingInDelegates: bigint;
	readonly stakedInProtocol: bigint;
	readonly unstakingFromProtocol: bigint;
	readonly lyingInConverter: bigint;
	readonly lyingInUnstakingVault: bigint;
}

export function totalBacking(d: AssetDistribution): bigint {
	return (
		d.lyingInPool +
		d.lyingInDelegates +
		d.stakedInProtocol +
		d.unstakingFromProtocol +
		d.lyingInConverter +
		d.lyingInUnstakingVault
	);
}

export const EMPTY_DISTRIBUTION: AssetDistribution = {
	lyingInPool: 0n,
	lyingInDelegates: 0n,
	stakedInProtocol: 0n,
	unstakingFromProtocol: 0n,
	lyingInConverter: 0n,
	lyingInUnstakingVault: 0n,
};
