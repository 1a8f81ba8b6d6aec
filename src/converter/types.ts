/**
 * Converter types: exit lifecycle states and the collaborators the converter
 * drives.
 */

import type { Address } from "../lib/ethereum/index.js";
import type { OpResult } from "../runtime/types.js";
import type { ExitRequestId } from "../shared/identifiers.js";

// ── Exit states ──────────────────────────────────────────────────────

export const ExitState = {
	/** Recorded by the converter, not yet accepted by the adapter */
	Requested: "requested",
	/** Asset sits in the upstream protocol's exit queue */
	Unstaking: "unstaking",
	/** Upstream exit finalized; native can be claimed */
	Claimable: "claimable",
	/** Terminal: native claimed and sent back to the pool */
	Forwarded: "forwarded",
} as const;

export type ExitState = (typeof ExitState)[keyof typeof ExitState];

export type ExitTransition =
	| { readonly type: "submitted"; readonly ticket: string }
	| { readonly type: "finalized" }
	| { readonly type: "forwarded"; readonly nativeReceived: bigint };

export interface ExitRequest {
	readonly id: ExitRequestId;
	readonly asset: Address;
	readonly amount: bigint;
	readonly state: ExitState;
	/** Adapter-side handle, set once the adapter accepts the request. */
	readonly ticket: string | undefined;
	readonly nativeReceived: bigint;
	readonly requestedAt: number;
	readonly updatedAt: number;
}

// ── Collaborators ────────────────────────────────────────────────────

/**
 * Exit path of one convertible asset through its upstream protocol.
 * The adapter takes the asset from `owner` when the request is made and
 * pays native to `owner` on claim.
 */
export interface ExitAdapter {
	readonly address: Address;
	readonly asset: Address;
	requestUnstake(owner: Address, amount: bigint): OpResult<string>;
	isClaimable(ticket: string): boolean;
	claim(owner: Address, ticket: string): OpResult<bigint>;
}

/** The pool surface the converter pulls assets through. */
export interface PoolLink {
	readonly address: Address;
	releaseToConverter(caller: Address, asset: Address, amount: bigint): OpResult<void>;
}
