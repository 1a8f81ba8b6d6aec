/**
 * Domain primitive identifiers: branded types for compile-time safety.
 *
 * Each identifier wraps a string with a unique brand, preventing accidental
 * mixing (e.g., passing a StrategyId where a WithdrawalRoot is expected).
 * Account and asset identities are `Address`, defined in lib/ethereum.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Identifier of a strategy in the external staking protocol. */
export type StrategyId = Brand<string, "StrategyId">;
/** Handle returned by the staking protocol when a withdrawal is queued. */
export type WithdrawalRoot = Brand<string, "WithdrawalRoot">;
/** Converter-assigned identifier of an external exit request. */
export type ExitRequestId = Brand<string, "ExitRequestId">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated StrategyId from a raw string. Throws if empty. */
export function strategyId(value: string): StrategyId {
	return createBrandedId(value, "StrategyId");
}

/** Create a validated WithdrawalRoot from a raw string. Throws if empty. */
export function withdrawalRoot(value: string): WithdrawalRoot {
	return createBrandedId(value, "WithdrawalRoot");
}

/** Create a validated ExitRequestId from a raw string. Throws if empty. */
export function exitRequestId(value: string): ExitRequestId {
	return createBrandedId(value, "ExitRequestId");
}

/** Extract the raw string from any branded identifier type. */
export function idToString(id: StrategyId | WithdrawalRoot | ExitRequestId): string {
	return id as string;
}
