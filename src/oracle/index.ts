export type { PriceOracle } from "./types.js";
export { StaticPriceOracle } from "./static-oracle.js";
export { assetForReceipt, assetPrice, convert, receiptForAsset, receiptPrice } from "./pricing.js";
