/**
 * ReentrancyGuard: single-entry lock for one contract instance.
 *
 * At most one guarded call per instance may be active. A call that arrives
 * while the lock is held (typically from a collaborator's callback further
 * down the same call stack) fails immediately without running.
 */

import type { Address } from "../lib/ethereum/index.js";
import { ReentrancyError } from "../shared/errors.js";
import { err } from "../shared/result.js";
import type { OpResult } from "./types.js";

export class ReentrancyGuard {
	private entered = false;
	private readonly owner: Address;

	constructor(owner: Address) {
		this.owner = owner;
	}

	run<T>(operation: string, fn: () => OpResult<T>): OpResult<T> {
		if (this.entered) {
			return err(
				new ReentrancyError(`Re-entrant call to ${operation}`, {
					contract: this.owner,
					operation,
				}),
			);
		}
		this.entered = true;
		try {
			return fn();
		} finally {
			this.entered = false;
		}
	}
}
