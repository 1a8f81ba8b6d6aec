/**
 * Address and unit helpers: wraps viem's parsing behind the Address brand.
 */

import {
	getAddress,
	isAddress,
	isHex,
	keccak256,
	parseEther as viemParseEther,
	size,
	stringToHex,
} from "viem";
import type { Address, Hex } from "./types.js";

/**
 * Marker address standing in for the chain's native coin wherever an asset
 * address is expected.
 */
export const NATIVE_ASSET = toAddress("0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE");

/**
 * Parses and checksums an address.
 * @throws Error if the value is not a 20-byte hex address
 * @example toAddress("0x742d35cc6634c0532925a3b844bc9e7595f0feb1")
 */
export function toAddress(value: string): Address {
	const trimmed = value.trim();
	if (!isAddress(trimmed, { strict: false })) {
		throw new Error(`Invalid address: ${trimmed}`);
	}
	return getAddress(trimmed) as Address;
}

/** True when `value` is 0x-prefixed hex of exactly `bytes` bytes. */
export function isHexOfSize(value: string, bytes: number): value is Hex {
	return isHex(value, { strict: true }) && size(value) === bytes;
}

/**
 * Derives a deterministic address from a label, for wiring contracts and test accounts.
 * @example deriveAddress("deposit-pool")
 */
export function deriveAddress(label: string): Address {
	const hash = keccak256(stringToHex(label));
	return toAddress(`0x${hash.slice(-40)}`);
}

/** keccak256 of a UTF-8 string, as hex. */
export function hashLabel(label: string): Hex {
	return keccak256(stringToHex(label));
}

/**
 * Parses a decimal ether string into wei.
 * @example parseEther("1.5") // 1500000000000000000n
 */
export function parseEther(value: string): bigint {
	return viemParseEther(value);
}
