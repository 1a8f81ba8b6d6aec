/**
 * ProtocolEventLog: append-only audit trail with typed subscriptions.
 *
 * Events are appended as operations run but only reach subscribers once the
 * outermost transaction commits; a reverted transaction truncates its events
 * so nobody ever observes an operation that did not happen.
 */

import { EventEmitter } from "eventemitter3";
import type { Address } from "../lib/ethereum/index.js";
import type { Snapshottable } from "../runtime/types.js";
import type { ProtocolEvent, ProtocolEventOf, ProtocolEventType } from "./protocol-events.js";

/** An event as stored in the log, stamped with its position and origin. */
export interface EventRecord<E extends ProtocolEvent = ProtocolEvent> {
	readonly seq: number;
	readonly block: number;
	readonly emitter: Address;
	readonly event: E;
}

/**
 * Receives an error thrown by a subscriber. Dispatch never rethrows: the
 * operation that emitted the event has already committed.
 */
export type HandlerErrorCallback = (error: unknown) => void;

const ANY = "*";

export class ProtocolEventLog implements Snapshottable {
	private readonly records: EventRecord[] = [];
	private readonly ee = new EventEmitter();
	private readonly onHandlerError: HandlerErrorCallback | null;
	private dispatched = 0;

	constructor(onHandlerError?: HandlerErrorCallback) {
		this.onHandlerError = onHandlerError ?? null;
	}

	// ── Recording ──────────────────────────────────────────────────

	append(emitter: Address, block: number, event: ProtocolEvent): EventRecord {
		const record: EventRecord = { seq: this.records.length, block, emitter, event };
		this.records.push(record);
		return record;
	}

	/** Delivers every committed-but-undelivered record to subscribers, in order. */
	flush(): void {
		while (this.dispatched < this.records.length) {
			const record = this.records[this.dispatched];
			this.dispatched++;
			if (record === undefined) continue;
			this.ee.emit(record.event.type, record);
			this.ee.emit(ANY, record);
		}
	}

	snapshot(): () => void {
		const length = this.records.length;
		return () => {
			this.records.length = length;
			this.dispatched = Math.min(this.dispatched, length);
		};
	}

	// ── Queries ────────────────────────────────────────────────────

	all(): readonly EventRecord[] {
		return this.records;
	}

	ofType<K extends ProtocolEventType>(type: K): EventRecord<ProtocolEventOf<K>>[] {
		const result: EventRecord<ProtocolEventOf<K>>[] = [];
		for (const record of this.records) {
			if (isEventOf(record, type)) result.push(record);
		}
		return result;
	}

	get size(): number {
		return this.records.length;
	}

	// ── Subscriptions ──────────────────────────────────────────────

	/** Subscribe to one event type; returns an unsubscribe function. */
	on<K extends ProtocolEventType>(
		type: K,
		handler: (record: EventRecord<ProtocolEventOf<K>>) => void,
	): () => void {
		const listener = (record: EventRecord): void => {
			if (!isEventOf(record, type)) return;
			this.invoke(() => handler(record));
		};
		this.ee.on(type, listener);
		return () => {
			this.ee.off(type, listener);
		};
	}

	/** Subscribe to every event; returns an unsubscribe function. */
	onAny(handler: (record: EventRecord) => void): () => void {
		const listener = (record: EventRecord): void => {
			this.invoke(() => handler(record));
		};
		this.ee.on(ANY, listener);
		return () => {
			this.ee.off(ANY, listener);
		};
	}

	private invoke(fn: () => void): void {
		try {
			fn();
		} catch (error: unknown) {
			this.reportHandlerError(error);
		}
	}

	private reportHandlerError(error: unknown): void {
		if (this.onHandlerError === null) return;
		try {
			this.onHandlerError(error);
		} catch {
			// The reporter itself threw; remaining handlers still run.
		}
	}
}

function isEventOf<K extends ProtocolEventType>(
	record: EventRecord,
	type: K,
): record is EventRecord<ProtocolEventOf<K>> {
	return record.event.type === type;
}
