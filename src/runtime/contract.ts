/**
 * Contract: base for every stateful component that lives on the chain.
 *
 * Subclasses run each mutating entry point through `execute()`, which opens
 * a transaction and takes the instance's reentrancy lock. Inside, the order
 * is always: validate, compute, mutate own state, then call out.
 */

import type { ProtocolEvent } from "../events/protocol-events.js";
import { type Address, NATIVE_ASSET } from "../lib/ethereum/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { Chain } from "./chain.js";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import type { OpResult, Snapshottable } from "./types.js";

export abstract class Contract implements Snapshottable {
	readonly address: Address;
	protected readonly chain: Chain;
	protected readonly logger: Logger;
	private readonly guard: ReentrancyGuard;

	protected constructor(chain: Chain, address: Address, name: string) {
		this.chain = chain;
		this.address = address;
		this.logger = chain.logger.child({ contract: name, address });
		this.guard = new ReentrancyGuard(address);
		chain.register(this);
	}

	abstract snapshot(): () => void;

	/** Runs a non-reentrant, atomic entry point. */
	protected execute<T>(operation: string, fn: () => OpResult<T>): OpResult<T> {
		const result = this.chain.transact(() => this.guard.run(operation, fn));
		if (!result.ok) {
			this.logger.debug(
				{ operation, code: result.error.code, context: result.error.context },
				"Operation rejected",
			);
		}
		return result;
	}

	protected emit(event: ProtocolEvent): void {
		this.chain.emit(this.address, event);
	}

	protected nativeBalance(): bigint {
		return this.chain.balanceOf(NATIVE_ASSET, this.address);
	}
}
