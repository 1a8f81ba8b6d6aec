export {
	type CallContext,
	type IncomingTransfer,
	type OpResult,
	type ReceiveHook,
	type Snapshottable,
	callContext,
} from "./types.js";
export { AssetLedger } from "./asset-ledger.js";
export { Chain, type ChainOptions } from "./chain.js";
export { Contract } from "./contract.js";
export { ReentrancyGuard } from "./reentrancy-guard.js";
