export type {
	ProtocolEvent,
	ProtocolEventType,
	ProtocolEventOf,
	AssetDeposited,
	NativeDeposited,
	DelegateAdded,
	DelegateRemoved,
	AssetTransferredToDelegate,
	NativeTransferredToDelegate,
	NativeSwappedForAsset,
	AssetDepositedIntoStrategy,
	NativeStaked,
	UnstakingInitiated,
	UnstakingCompleted,
	AssetConvertedOutOfPool,
	EthSentToPool,
	WithdrawalInitiated,
	WithdrawalCompleted,
} from "./protocol-events.js";

export { ProtocolEventLog } from "./event-log.js";
export type { EventRecord, HandlerErrorCallback } from "./event-log.js";
