/**
 * Protocol configuration types.
 *
 * Deployment code starts from DEFAULT_PROTOCOL_CONFIG and overrides it
 * with `configFromEnv()`. Every value is validated before it reaches a
 * contract; invalid values fail fast with ConfigError.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { uintString, validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

export interface ProtocolConfig {
	/** Smallest accepted deposit, in base units of the deposited asset */
	readonly minimumDeposit: bigint;
	/** Upper bound on the delegate queue length */
	readonly maxDelegateCount: number;
	/** Blocks a withdrawal request must wait before it can complete */
	readonly withdrawalDelayBlocks: number;
	/** Log level for every contract logger */
	readonly logLevel: LogLevel;
}

export const DEFAULT_PROTOCOL_CONFIG: ProtocolConfig = {
	minimumDeposit: 0n,
	maxDelegateCount: 10,
	withdrawalDelayBlocks: 7_200,
	logLevel: "warn",
};

const ENV_PREFIX = "RESTAKE_";

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

const envSchema = z.object({
	minimumDeposit: uintString.optional(),
	maxDelegateCount: z.coerce.number().int().positive().optional(),
	withdrawalDelayBlocks: z.coerce.number().int().nonnegative().optional(),
	logLevel: logLevelSchema.optional(),
});

const ENV_KEYS = {
	minimumDeposit: `${ENV_PREFIX}MIN_DEPOSIT`,
	maxDelegateCount: `${ENV_PREFIX}MAX_DELEGATES`,
	withdrawalDelayBlocks: `${ENV_PREFIX}WITHDRAWAL_DELAY_BLOCKS`,
	logLevel: `${ENV_PREFIX}LOG_LEVEL`,
} as const;

/** Mutable builder shape for constructing Partial<ProtocolConfig>. */
interface MutableProtocolConfig {
	minimumDeposit?: bigint;
	maxDelegateCount?: number;
	withdrawalDelayBlocks?: number;
	logLevel?: LogLevel;
}

/**
 * Reads protocol config values from environment variables.
 * Supported: RESTAKE_MIN_DEPOSIT, RESTAKE_MAX_DELEGATES,
 * RESTAKE_WITHDRAWAL_DELAY_BLOCKS, RESTAKE_LOG_LEVEL.
 * @throws ConfigError if any variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ProtocolConfig> {
	const raw: Record<string, string> = {};
	for (const [configKey, envKey] of Object.entries(ENV_KEYS)) {
		const value = env[envKey];
		if (value !== undefined && value.trim().length > 0) {
			raw[configKey] = value.trim();
		}
	}

	const parsed = validate(envSchema, raw);
	if (!parsed.ok) {
		throw new ConfigError(`Invalid protocol environment: ${parsed.error.issues[0]?.message}`, {
			issues: parsed.error.context["issues"],
			cause: parsed.error,
		});
	}

	const result: MutableProtocolConfig = {};
	const { minimumDeposit, maxDelegateCount, withdrawalDelayBlocks, logLevel } = parsed.value;
	if (minimumDeposit !== undefined) result.minimumDeposit = minimumDeposit;
	if (maxDelegateCount !== undefined) result.maxDelegateCount = maxDelegateCount;
	if (withdrawalDelayBlocks !== undefined) result.withdrawalDelayBlocks = withdrawalDelayBlocks;
	if (logLevel !== undefined) result.logLevel = logLevel;
	return result;
}

/** Merges overrides onto the defaults and checks cross-field constraints. */
export function resolveConfig(overrides: Partial<ProtocolConfig> = {}): ProtocolConfig {
	const config: ProtocolConfig = { ...DEFAULT_PROTOCOL_CONFIG, ...overrides };
	if (!Number.isInteger(config.maxDelegateCount) || config.maxDelegateCount <= 0) {
		throw new ConfigError(`maxDelegateCount must be a positive integer, got ${config.maxDelegateCount}`);
	}
	if (!Number.isInteger(config.withdrawalDelayBlocks) || config.withdrawalDelayBlocks < 0) {
		throw new ConfigError(
			`withdrawalDelayBlocks must be a non-negative integer, got ${config.withdrawalDelayBlocks}`,
		);
	}
	if (config.minimumDeposit < 0n) {
		throw new ConfigError("minimumDeposit cannot be negative");
	}
	return config;
}
