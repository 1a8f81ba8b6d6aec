export type {
	QueuedWithdrawal,
	StakingProtocol,
	ValidatorDeposit,
	WithdrawalPayout,
} from "./types.js";
export {
	InMemoryStakingProtocol,
	type InMemoryStakingProtocolOptions,
} from "./in-memory-protocol.js";
