import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { NATIVE_ASSET, deriveAddress, parseEther } from "../lib/ethereum/index.js";
import { WAD } from "../shared/fixed-point.js";
import { strategyId } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { ProtocolBuilder } from "../testing/protocol-builder.js";

const ALICE = deriveAddress("user:alice");

const amount = fc.bigInt({ min: 0n, max: 10n ** 24n });
const price = fc.bigInt({ min: 1n, max: 10n * WAD });

describe("DepositPool (property-based)", () => {
	describe("mint amount", () => {
		const d = new ProtocolBuilder().withAsset("steth").build();
		const steth = d.asset("steth");

		it("is additive up to one unit of rounding", () => {
			fc.assert(
				fc.property(amount, amount, price, price, (a, b, assetPrice, receiptPrice) => {
					d.oracle.setAssetPrice(steth, assetPrice).setReceiptTokenPrice(receiptPrice);
					const whole = unwrap(d.pool.getMintAmount(steth, a + b));
					const parts =
						unwrap(d.pool.getMintAmount(steth, a)) + unwrap(d.pool.getMintAmount(steth, b));
					expect(whole - parts >= 0n && whole - parts <= 1n).toBe(true);
				}),
				{ numRuns: 500 },
			);
		});

		it("never decreases as the deposit grows", () => {
			fc.assert(
				fc.property(amount, amount, price, (a, b, assetPrice) => {
					d.oracle.setAssetPrice(steth, assetPrice).setReceiptTokenPrice(WAD);
					const [lo, hi] = a <= b ? [a, b] : [b, a];
					expect(unwrap(d.pool.getMintAmount(steth, lo))).toBeLessThanOrEqual(
						unwrap(d.pool.getMintAmount(steth, hi)),
					);
				}),
				{ numRuns: 500 },
			);
		});
	});

	describe("delegate queue", () => {
		const command = fc.record({
			add: fc.boolean(),
			worker: fc.integer({ min: 0, max: 4 }),
		});

		it("stays duplicate-free and within its bound", () => {
			fc.assert(
				fc.property(fc.array(command, { maxLength: 30 }), (commands) => {
					const d = new ProtocolBuilder()
						.withConfig({ maxDelegateCount: 3 })
						.withWorkers(5)
						.build();
					for (const { add, worker } of commands) {
						const address = d.worker(worker).address;
						if (add) d.pool.addDelegates(d.as("admin"), [address]);
						else d.pool.removeDelegate(d.as("admin"), address);

						const queue = d.pool.getDelegateQueue();
						expect(queue.length).toBeLessThanOrEqual(3);
						expect(new Set(queue).size).toBe(queue.length);
						expect(d.pool.delegateCount()).toBe(queue.length);
						for (const w of d.workers) {
							expect(d.pool.isDelegate(w.address)).toBe(queue.includes(w.address));
						}
					}
				}),
				{ numRuns: 50 },
			);
		});
	});

	describe("internal movements", () => {
		const movement = fc.record({
			kind: fc.constantFrom("toDelegate", "back", "stake", "unstake", "yield"),
			native: fc.boolean(),
			worker: fc.integer({ min: 0, max: 2 }),
			ether: fc.bigInt({ min: 0n, max: 150n }),
			wei: fc.bigInt({ min: 1n, max: 10n ** 18n }),
		});
		const strategy = strategyId("strategy:steth");

		it("never change an asset's total deposits beyond accrued yield", () => {
			fc.assert(
				fc.property(fc.array(movement, { maxLength: 25 }), (movements) => {
					const d = new ProtocolBuilder().withAsset("steth").withWorkers(3).build();
					const steth = d.asset("steth");
					unwrap(d.pool.addDelegates(d.as("admin"), d.workers.map((w) => w.address)));
					d.chain.fund(steth, ALICE, parseEther("100"));
					d.chain.fund(NATIVE_ASSET, ALICE, parseEther("100"));
					unwrap(d.pool.depositAsset({ sender: ALICE }, steth, parseEther("100"), 0n, ""));
					unwrap(d.pool.depositNative({ sender: ALICE, value: parseEther("100") }, 0n, ""));

					let expected = parseEther("100");
					for (const m of movements) {
						const asset = m.native ? NATIVE_ASSET : steth;
						const value = m.ether * WAD;
						const worker = d.worker(m.worker);
						if (m.kind === "toDelegate") {
							if (m.native) d.pool.transferNativeToDelegate(d.as("manager"), m.worker, value);
							else d.pool.transferAssetToDelegate(d.as("manager"), m.worker, asset, value);
						} else if (m.kind === "back") {
							worker.transferBack(d.as("manager"), asset, value);
						} else if (m.kind === "stake") {
							worker.depositIntoStrategy(d.as("manager"), steth);
						} else if (m.kind === "unstake") {
							worker.initiateUnstaking(d.as("operator"), [strategy], [m.wei]);
						} else if (d.protocol.stakerShares(worker.address, strategy) > 0n) {
							// Yield on a strategy with no shares outstanding belongs to nobody.
							d.protocol.accrueYield(strategy, m.wei);
							expected += m.wei;
						}
						expect(d.pool.getTotalAssetDeposits(steth)).toBe(expected);
						expect(d.pool.getTotalAssetDeposits(NATIVE_ASSET)).toBe(parseEther("100"));
					}
				}),
				{ numRuns: 50 },
			);
		});
	});
});
