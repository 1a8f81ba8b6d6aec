/**
 * Fixed-point arithmetic on bigint with 18 decimals.
 *
 * Every balance, price and share count in the engine is a bigint in base
 * units. Prices are scaled by WAD, so `amount * price / WAD` converts an
 * asset amount into its native-coin value. Division always floors.
 */

const PRECISION = 18;

/** 1e18, the fixed-point unit used by oracle prices. */
export const WAD = 10n ** BigInt(PRECISION);

/** Native value transferred by a single validator deposit. */
export const VALIDATOR_DEPOSIT = 32n * WAD;

/**
 * Computes `floor(a * b / denominator)`.
 * @throws Error if denominator is zero or any operand is negative
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
	if (denominator === 0n) {
		throw new Error("mulDiv: division by zero");
	}
	if (a < 0n || b < 0n || denominator < 0n) {
		throw new Error("mulDiv: negative operand");
	}
	return (a * b) / denominator;
}

/** Native-coin value of `amount` at a WAD-scaled `price`. */
export function valueAt(amount: bigint, price: bigint): bigint {
	return mulDiv(amount, price, WAD);
}

/** Subtraction clamped at zero. */
export function saturatingSub(a: bigint, b: bigint): bigint {
	return a > b ? a - b : 0n;
}

export function sum(values: readonly bigint[]): bigint {
	let total = 0n;
	for (const v of values) total += v;
	return total;
}

export function minBigInt(a: bigint, b: bigint): bigint {
	return a < b ? a : b;
}
