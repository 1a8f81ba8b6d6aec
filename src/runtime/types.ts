/**
 * Runtime types shared by every contract.
 */

import type { Address } from "../lib/ethereum/index.js";
import type { ProtocolError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

/** Who is calling, and how much native value rides along with the call. */
export interface CallContext {
	readonly sender: Address;
	readonly value?: bigint | undefined;
}

/**
 * A component whose state can be rolled back.
 * `snapshot()` captures the current state and returns the function that restores it.
 */
export interface Snapshottable {
	snapshot(): () => void;
}

/** Outcome of a protocol operation. Errors are always ProtocolError subclasses. */
export type OpResult<T> = Result<T, ProtocolError>;

/** A single incoming transfer, as seen by the recipient's receive hook. */
export interface IncomingTransfer {
	readonly asset: Address;
	readonly from: Address;
	readonly to: Address;
	readonly amount: bigint;
}

/**
 * Runs when an account receives a transfer. Returning an error makes the
 * transfer (and the operation that caused it) fail.
 */
export type ReceiveHook = (transfer: IncomingTransfer) => OpResult<void>;

export function callContext(sender: Address, value?: bigint): CallContext {
	return value === undefined ? { sender } : { sender, value };
}
