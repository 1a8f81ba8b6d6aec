/**
 * Logger wrapper: domain-agnostic structured logging backed by pino.
 *
 * Every amount in the engine is a bigint, which JSON cannot encode, so
 * bigint fields are rendered as decimal strings before they reach pino.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface with bigint-safe bindings. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Serialization ───────────────────────────────────────────────────

function toLoggable(value: unknown, seen: WeakSet<object>): unknown {
	if (typeof value === "bigint") return value.toString();
	if (value === null || typeof value !== "object" || value instanceof Error) return value;
	if (seen.has(value)) return "[Circular]";
	seen.add(value);
	if (Array.isArray(value)) return value.map((v) => toLoggable(v, seen));
	const result: Record<string, unknown> = {};
	for (const [key, inner] of Object.entries(value)) {
		result[key] = toLoggable(inner, seen);
	}
	return result;
}

function toBindings(obj: object): Record<string, unknown> {
	const seen = new WeakSet<object>([obj]);
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = toLoggable(value, seen);
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type LevelMethod = "info" | "warn" | "error" | "debug";

function logAt(pinoLogger: pino.Logger, level: LevelMethod, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		pinoLogger[level](String(msgOrObj ?? ""));
		return;
	}
	if (typeof msgOrObj === "object") {
		pinoLogger[level](toBindings(msgOrObj), msg ?? "");
		return;
	}
	pinoLogger[level](String(msgOrObj));
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			logAt(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			logAt(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			logAt(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			logAt(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(toBindings(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional path redaction and custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ asset, amount: 10n ** 18n }, "Deposit accepted");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	let pinoLogger: pino.Logger;

	if (config.destination) {
		const destination = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		pinoLogger = pino(pinoOptions, stream);
	} else {
		pinoLogger = pino(pinoOptions);
	}

	return wrapPino(pinoLogger);
}
