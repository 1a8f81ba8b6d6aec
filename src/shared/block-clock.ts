/**
 * Block clock: injectable block height for deterministic testing.
 *
 * Withdrawal delays are measured in blocks, never wall-clock time.
 * Engine code reads `blockNumber()` from the chain's clock so tests can
 * mine blocks without touching globals.
 */

export interface BlockClock {
	blockNumber(): number;
}

/** Manually advanced clock -- the chain mines a block whenever `advance()` is called. */
export class ManualBlockClock implements BlockClock {
	private block: number;

	constructor(startBlock = 0) {
		this.block = startBlock;
	}

	blockNumber(): number {
		return this.block;
	}

	advance(blocks = 1): void {
		if (!Number.isInteger(blocks) || blocks < 0) {
			throw new Error(`ManualBlockClock.advance: invalid block count ${blocks}`);
		}
		this.block += blocks;
	}

	set(block: number): void {
		this.block = block;
	}
}
