/**
 * Exit request lifecycle: requested → unstaking → claimable → forwarded.
 *
 * Requests are immutable records; every move goes through
 * `applyExitTransition()`, which returns the next record or refuses.
 */

import type { Address } from "../lib/ethereum/index.js";
import { InvalidTransitionError } from "../shared/errors.js";
import type { ExitRequestId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { type ExitRequest, ExitState, type ExitTransition } from "./types.js";

export function openExitRequest(
	id: ExitRequestId,
	asset: Address,
	amount: bigint,
	block: number,
): ExitRequest {
	return {
		id,
		asset,
		amount,
		state: ExitState.Requested,
		ticket: undefined,
		nativeReceived: 0n,
		requestedAt: block,
		updatedAt: block,
	};
}

export function applyExitTransition(
	request: ExitRequest,
	t: ExitTransition,
	block: number,
): Result<ExitRequest, InvalidTransitionError> {
	const from = request.state;
	switch (t.type) {
		case "submitted":
			if (from === ExitState.Requested) {
				return ok({ ...request, state: ExitState.Unstaking, ticket: t.ticket, updatedAt: block });
			}
			break;

		case "finalized":
			if (from === ExitState.Unstaking) {
				return ok({ ...request, state: ExitState.Claimable, updatedAt: block });
			}
			break;

		case "forwarded":
			if (from === ExitState.Claimable) {
				return ok({
					...request,
					state: ExitState.Forwarded,
					nativeReceived: t.nativeReceived,
					updatedAt: block,
				});
			}
			break;
	}

	return err(
		new InvalidTransitionError(`Cannot move exit ${request.id} from ${from} via ${t.type}`, {
			id: request.id,
			from,
			transition: t.type,
		}),
	);
}

export function isTerminal(request: ExitRequest): boolean {
	return request.state === ExitState.Forwarded;
}
