export type { Address, Hex } from "./types.js";
export {
	NATIVE_ASSET,
	deriveAddress,
	hashLabel,
	isHexOfSize,
	parseEther,
	toAddress,
} from "./address.js";
