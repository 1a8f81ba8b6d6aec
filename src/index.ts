// ── Shared Kernel ────────────────────────────────────────────────────
export * from "./shared/index.js";

// ── Addresses, Logging, Validation ───────────────────────────────────
export * from "./lib/ethereum/index.js";
export { type Logger, type LoggerConfig, type LogLevel, createLogger } from "./lib/logger/index.js";
export { SchemaValidationError, type ValidationIssue, validate } from "./lib/validation/index.js";

// ── Runtime ──────────────────────────────────────────────────────────
export * from "./runtime/index.js";
export * from "./events/index.js";

// ── Collaborators ────────────────────────────────────────────────────
export * from "./registry/index.js";
export * from "./oracle/index.js";
export * from "./token/index.js";
export * from "./staking/index.js";

// ── Contracts ────────────────────────────────────────────────────────
export * from "./pool/index.js";
export * from "./delegate/index.js";
export * from "./vault/index.js";
export * from "./converter/index.js";
export * from "./withdrawal/index.js";

// ── Testing ──────────────────────────────────────────────────────────
export * from "./testing/index.js";
