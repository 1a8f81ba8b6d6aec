export {
	WithdrawalManager,
	type WithdrawalManagerDeps,
	type WithdrawalRequest,
} from "./withdrawal-manager.js";
