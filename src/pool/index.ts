export {
	DepositPool,
	type ConverterLink,
	type DepositPoolDeps,
	type PoolConfig,
} from "./deposit-pool.js";
export { type AssetDistribution, EMPTY_DISTRIBUTION, totalBacking } from "./distribution.js";
