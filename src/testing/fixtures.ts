import type { ValidatorDeposit } from "../staking/types.js";

/** Well-formed deposit data for a validator; distinct seeds give distinct pubkeys. */
export function validatorDeposit(seed: number): ValidatorDeposit {
	const byte = (seed % 256).toString(16).padStart(2, "0");
	return {
		pubkey: `0x${byte.repeat(48)}`,
		signature: `0x${byte.repeat(96)}`,
		depositDataRoot: `0x${byte.repeat(32)}`,
	};
}
