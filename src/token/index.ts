export { type ReceiptToken, LedgerReceiptToken } from "./receipt-token.js";
