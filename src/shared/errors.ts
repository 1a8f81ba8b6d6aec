/**
 * ProtocolError hierarchy: structured error classification.
 *
 * Every error has a category that tells the caller what went wrong:
 * a rejected input, a missing capability, a guarded invariant, or a
 * collaborator that failed mid-operation. Every category aborts the whole
 * operation; nothing is retried inside the engine.
 */

/** Error categories matching the failure taxonomy of the accounting engine. */
export const ErrorCategory = {
	Validation: "validation",
	Authorization: "authorization",
	Invariant: "invariant",
	Collaborator: "collaborator",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing ProtocolError subclasses with optional cause chain. */
interface ProtocolErrorOptions {
	readonly cause?: unknown;
}

export type ErrorContext = Record<string, unknown> & ProtocolErrorOptions;

/** Base error class for every rejected protocol operation. */
export class ProtocolError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		super(message);
		const { cause, ...rest } = context;
		this.name = "ProtocolError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			context: this.context,
		};
	}
}

// ── Validation ───────────────────────────────────────────────────────

/** Zero amount, or an amount under the configured floor. */
export class InvalidAmountError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INVALID_AMOUNT", ErrorCategory.Validation, context);
		this.name = "InvalidAmountError";
	}
}

export class UnsupportedAssetError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "UNSUPPORTED_ASSET", ErrorCategory.Validation, context);
		this.name = "UnsupportedAssetError";
	}
}

/** Deposit would push the asset's total backing past its limit. */
export class DepositLimitExceededError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "DEPOSIT_LIMIT_EXCEEDED", ErrorCategory.Validation, context);
		this.name = "DepositLimitExceededError";
	}
}

/** Computed output fell below the caller's minimum (slippage protection). */
export class MinimumNotMetError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "MINIMUM_NOT_MET", ErrorCategory.Validation, context);
		this.name = "MinimumNotMetError";
	}
}

export class InsufficientBalanceError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INSUFFICIENT_BALANCE", ErrorCategory.Validation, context);
		this.name = "InsufficientBalanceError";
	}
}

export class StrategyNotSetError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "STRATEGY_NOT_SET", ErrorCategory.Validation, context);
		this.name = "StrategyNotSetError";
	}
}

/** Requested strategy is the native strategy or not the one assigned to its asset. */
export class InvalidStrategyError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INVALID_STRATEGY", ErrorCategory.Validation, context);
		this.name = "InvalidStrategyError";
	}
}

export class DepositRootMismatchError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "DEPOSIT_ROOT_MISMATCH", ErrorCategory.Validation, context);
		this.name = "DepositRootMismatchError";
	}
}

/** A withdrawal or exit request that has not yet reached its completion point. */
export class RequestNotReadyError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "REQUEST_NOT_READY", ErrorCategory.Validation, context);
		this.name = "RequestNotReadyError";
	}
}

export class RequestNotFoundError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "REQUEST_NOT_FOUND", ErrorCategory.Validation, context);
		this.name = "RequestNotFoundError";
	}
}

export class ConfigError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Validation, context);
		this.name = "ConfigError";
	}
}

// ── Authorization ────────────────────────────────────────────────────

export class UnauthorizedError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "UNAUTHORIZED", ErrorCategory.Authorization, context);
		this.name = "UnauthorizedError";
	}
}

// ── Invariant guards ─────────────────────────────────────────────────

export class DelegateNotFoundError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "DELEGATE_NOT_FOUND", ErrorCategory.Invariant, context);
		this.name = "DelegateNotFoundError";
	}
}

export class DelegateHasNativeBalanceError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "DELEGATE_HAS_NATIVE_BALANCE", ErrorCategory.Invariant, context);
		this.name = "DelegateHasNativeBalanceError";
	}
}

/** Delegate still reports a nonzero balance of the named asset. */
export class DelegateHasAssetBalanceError extends ProtocolError {
	readonly asset: string;
	readonly amount: bigint;

	constructor(asset: string, amount: bigint, context: ErrorContext = {}) {
		super(
			`Delegate still holds ${amount} of ${asset}`,
			"DELEGATE_HAS_ASSET_BALANCE",
			ErrorCategory.Invariant,
			context,
		);
		this.name = "DelegateHasAssetBalanceError";
		this.asset = asset;
		this.amount = amount;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), asset: this.asset, amount: this.amount.toString() };
	}
}

export class DelegateLimitExceededError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "DELEGATE_LIMIT_EXCEEDED", ErrorCategory.Invariant, context);
		this.name = "DelegateLimitExceededError";
	}
}

export class IndexOutOfRangeError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INDEX_OUT_OF_RANGE", ErrorCategory.Invariant, context);
		this.name = "IndexOutOfRangeError";
	}
}

/** A non-reentrant entry point was called while another one was still active. */
export class ReentrancyError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "REENTRANT_CALL", ErrorCategory.Invariant, context);
		this.name = "ReentrancyError";
	}
}

/** A state-machine move that the current state does not allow. */
export class InvalidTransitionError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INVALID_TRANSITION", ErrorCategory.Invariant, context);
		this.name = "InvalidTransitionError";
	}
}

// ── Collaborator failures ────────────────────────────────────────────

export class TransferFailedError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "TRANSFER_FAILED", ErrorCategory.Collaborator, context);
		this.name = "TransferFailedError";
	}
}

/** Oracle returned a zero price, which would make any conversion meaningless. */
export class InvalidPriceError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INVALID_PRICE", ErrorCategory.Collaborator, context);
		this.name = "InvalidPriceError";
	}
}

export class ExternalCallError extends ProtocolError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "EXTERNAL_CALL_FAILED", ErrorCategory.Collaborator, context);
		this.name = "ExternalCallError";
	}
}

// ── Type guards ──────────────────────────────────────────────────────

export function isProtocolError(e: unknown): e is ProtocolError {
	return e instanceof ProtocolError;
}

export function isValidationError(e: unknown): e is ProtocolError {
	return e instanceof ProtocolError && e.category === ErrorCategory.Validation;
}

export function isAuthorizationError(e: unknown): e is UnauthorizedError {
	return e instanceof UnauthorizedError;
}

export function isInvariantError(e: unknown): e is ProtocolError {
	return e instanceof ProtocolError && e.category === ErrorCategory.Invariant;
}
