export {
	type StrategyId,
	type WithdrawalRoot,
	type ExitRequestId,
	strategyId,
	withdrawalRoot,
	exitRequestId,
	idToString,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
} from "./result.js";

export {
	type ErrorContext,
	ErrorCategory,
	ProtocolError,
	InvalidAmountError,
	UnsupportedAssetError,
	DepositLimitExceededError,
	MinimumNotMetError,
	InsufficientBalanceError,
	StrategyNotSetError,
	InvalidStrategyError,
	DepositRootMismatchError,
	RequestNotReadyError,
	RequestNotFoundError,
	ConfigError,
	UnauthorizedError,
	DelegateNotFoundError,
	DelegateHasNativeBalanceError,
	DelegateHasAssetBalanceError,
	DelegateLimitExceededError,
	IndexOutOfRangeError,
	ReentrancyError,
	InvalidTransitionError,
	TransferFailedError,
	InvalidPriceError,
	ExternalCallError,
	isProtocolError,
	isValidationError,
	isAuthorizationError,
	isInvariantError,
} from "./errors.js";

export { WAD, VALIDATOR_DEPOSIT, mulDiv, valueAt, saturatingSub, sum, minBigInt } from "./fixed-point.js";
export { type BlockClock, ManualBlockClock } from "./block-clock.js";
export {
	type ProtocolConfig,
	DEFAULT_PROTOCOL_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
