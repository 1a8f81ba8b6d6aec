/**
 * Chain: the single-threaded world every contract runs in.
 *
 * Owns the asset ledger, the block clock and the event log, and gives every
 * operation all-or-nothing semantics: `transact()` snapshots every registered
 * component and restores them all if the operation fails. Nested calls open
 * their own savepoint, so a failure deep in a call stack never leaves
 * half-applied state behind, whatever the caller does with the error.
 */

import { type HandlerErrorCallback, ProtocolEventLog } from "../events/event-log.js";
import type { ProtocolEvent } from "../events/protocol-events.js";
import type { Address } from "../lib/ethereum/index.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { type BlockClock, ManualBlockClock } from "../shared/block-clock.js";
import { TransferFailedError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import { AssetLedger } from "./asset-ledger.js";
import type { OpResult, ReceiveHook, Snapshottable } from "./types.js";

export interface ChainOptions {
	readonly clock?: BlockClock;
	readonly logger?: Logger;
	/** Receives errors thrown by event subscribers. Defaults to logging them. */
	readonly onHandlerError?: HandlerErrorCallback;
}

export class Chain {
	readonly ledger: AssetLedger;
	readonly events: ProtocolEventLog;
	readonly clock: BlockClock;
	readonly logger: Logger;
	private readonly components: Snapshottable[] = [];
	private readonly hooks = new Map<Address, ReceiveHook>();
	private depth = 0;

	constructor(options: ChainOptions = {}) {
		this.ledger = new AssetLedger();
		this.clock = options.clock ?? new ManualBlockClock();
		const logger = options.logger ?? createLogger({ level: "warn" });
		this.logger = logger;
		this.events = new ProtocolEventLog(
			options.onHandlerError ??
				((error: unknown) => {
					logger.error({ err: error }, "Event subscriber failed");
				}),
		);
		this.components.push(this.ledger, this.events);
	}

	/** Adds a component to the set that every transaction snapshots. */
	register(component: Snapshottable): void {
		this.components.push(component);
	}

	get inTransaction(): boolean {
		return this.depth > 0;
	}

	/**
	 * Runs `fn` atomically. On an error result (or a thrown exception) every
	 * registered component is restored to its state before the call.
	 * Committed events reach subscribers when the outermost call returns.
	 */
	transact<T>(fn: () => OpResult<T>): OpResult<T> {
		const restorers = this.components.map((c) => c.snapshot());
		const restore = (): void => {
			for (const r of restorers) r();
		};

		this.depth++;
		let result: OpResult<T>;
		try {
			result = fn();
		} catch (e) {
			restore();
			throw e;
		} finally {
			this.depth--;
		}

		if (!result.ok) {
			restore();
			return result;
		}
		if (this.depth === 0) this.events.flush();
		return result;
	}

	// ── Native value and tokens ────────────────────────────────────

	/**
	 * Moves an asset and runs the recipient's receive hook. A failing hook or
	 * an insufficient balance fails the transfer and undoes it.
	 */
	transfer(asset: Address, from: Address, to: Address, amount: bigint): OpResult<void> {
		return this.transact(() => {
			const moved = this.ledger.move(asset, from, to, amount);
			if (!moved.ok) {
				return err(
					new TransferFailedError(`Transfer of ${amount} from ${from} failed`, {
						asset,
						from,
						to,
						amount,
						cause: moved.error,
					}),
				);
			}
			const hook = this.hooks.get(to);
			if (hook) {
				const accepted = hook({ asset, from, to, amount });
				if (!accepted.ok) {
					return err(
						new TransferFailedError(`Recipient ${to} rejected transfer`, {
							asset,
							from,
							to,
							amount,
							cause: accepted.error,
						}),
					);
				}
			}
			return ok(undefined);
		});
	}

	/** Registers a receive hook for `account`; returns a function that removes it. */
	onReceive(account: Address, hook: ReceiveHook): () => void {
		this.hooks.set(account, hook);
		return () => {
			if (this.hooks.get(account) === hook) this.hooks.delete(account);
		};
	}

	/** Credits an account out of thin air. Used to fund users and fixtures. */
	fund(asset: Address, account: Address, amount: bigint): void {
		const minted = this.ledger.mint(asset, account, amount);
		if (!minted.ok) throw minted.error;
	}

	balanceOf(asset: Address, account: Address): bigint {
		return this.ledger.balanceOf(asset, account);
	}

	// ── Events ─────────────────────────────────────────────────────

	emit(emitter: Address, event: ProtocolEvent): void {
		this.events.append(emitter, this.clock.blockNumber(), event);
	}

	blockNumber(): number {
		return this.clock.blockNumber();
	}
}
