/**
 * Oracle-rate conversions shared by the pool, the converter and withdrawals.
 */

import type { Address } from "../lib/ethereum/index.js";
import type { OpResult } from "../runtime/types.js";
import { InvalidPriceError } from "../shared/errors.js";
import { mulDiv } from "../shared/fixed-point.js";
import { err, ok } from "../shared/result.js";
import type { PriceOracle } from "./types.js";

function positive(price: bigint, source: string): OpResult<bigint> {
	if (price <= 0n) {
		return err(new InvalidPriceError(`Oracle returned a non-positive price for ${source}`, { price }));
	}
	return ok(price);
}

export function assetPrice(oracle: PriceOracle, asset: Address): OpResult<bigint> {
	return positive(oracle.getAssetPrice(asset), asset);
}

export function receiptPrice(oracle: PriceOracle): OpResult<bigint> {
	return positive(oracle.receiptTokenPrice(), "receipt token");
}

/** Receipt tokens minted for `amount` of `asset`: amount * price(asset) / receiptPrice. */
export function receiptForAsset(oracle: PriceOracle, asset: Address, amount: bigint): OpResult<bigint> {
	const price = assetPrice(oracle, asset);
	if (!price.ok) return price;
	const receipt = receiptPrice(oracle);
	if (!receipt.ok) return receipt;
	return ok(mulDiv(amount, price.value, receipt.value));
}

/** Asset owed for `receiptAmount` receipt tokens: receiptAmount * receiptPrice / price(asset). */
export function assetForReceipt(
	oracle: PriceOracle,
	asset: Address,
	receiptAmount: bigint,
): OpResult<bigint> {
	const price = assetPrice(oracle, asset);
	if (!price.ok) return price;
	const receipt = receiptPrice(oracle);
	if (!receipt.ok) return receipt;
	return ok(mulDiv(receiptAmount, receipt.value, price.value));
}

/** Amount of `to` worth `amount` of `from` at oracle rates. */
export function convert(
	oracle: PriceOracle,
	from: Address,
	to: Address,
	amount: bigint,
): OpResult<bigint> {
	const fromPrice = assetPrice(oracle, from);
	if (!fromPrice.ok) return fromPrice;
	const toPrice = assetPrice(oracle, to);
	if (!toPrice.ok) return toPrice;
	return ok(mulDiv(amount, fromPrice.value, toPrice.value));
}
