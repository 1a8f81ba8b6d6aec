import type { Address } from "../lib/ethereum/index.js";

/**
 * Price source consumed by the pool and the converter.
 * Both prices are native-coin denominated and scaled by 1e18.
 */
export interface PriceOracle {
	getAssetPrice(asset: Address): bigint;
	receiptTokenPrice(): bigint;
}
