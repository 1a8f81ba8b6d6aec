/**
 * StaticPriceOracle: operator-set prices.
 *
 * The native coin is always priced at exactly 1e18. Unknown assets price at
 * zero; consumers reject a zero price before using it.
 */

import { NATIVE_ASSET } from "../lib/ethereum/index.js";
import type { Address } from "../lib/ethereum/index.js";
import { WAD } from "../shared/fixed-point.js";
import type { PriceOracle } from "./types.js";

export class StaticPriceOracle implements PriceOracle {
	private readonly prices = new Map<Address, bigint>();
	private receiptPrice: bigint;

	constructor(receiptPrice: bigint = WAD) {
		this.receiptPrice = receiptPrice;
		this.prices.set(NATIVE_ASSET, WAD);
	}

	setAssetPrice(asset: Address, price: bigint): this {
		if (asset === NATIVE_ASSET) {
			throw new Error("StaticPriceOracle: native price is fixed at 1e18");
		}
		if (price < 0n) {
			throw new Error(`StaticPriceOracle: negative price ${price}`);
		}
		this.prices.set(asset, price);
		return this;
	}

	setReceiptTokenPrice(price: bigint): this {
		if (price < 0n) {
			throw new Error(`StaticPriceOracle: negative price ${price}`);
		}
		this.receiptPrice = price;
		return this;
	}

	getAssetPrice(asset: Address): bigint {
		return this.prices.get(asset) ?? 0n;
	}

	receiptTokenPrice(): bigint {
		return this.receiptPrice;
	}
}
