/**
 * Ethereum library wrapper: type definitions.
 *
 * Accounts, contracts and assets are all identified by an address.
 * Actual parsing uses viem but domain code never imports viem directly.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
/**
 * Branded type helper: creates a nominal type for domain primitives.
 * @template T The underlying primitive type
 * @template B The brand identifier
 */
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Domain types ─────────────────────────────────────────────────────

/**
 * Checksummed Ethereum address: branded type to prevent accidental string mixing.
 * @example "0x742d35Cc6634C0532925a3b844Bc9e7595f0fEb1"
 */
export type Address = Brand<`0x${string}`, "Address">;

/** Hex string with a 0x prefix, as produced by viem. */
export type Hex = `0x${string}`;
