/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, SchemaValidationError>.
 *
 * Domain code uses this instead of importing Zod directly.
 * Re-exports `z` so schemas can be built without a direct zod dependency.
 */

import { z } from "zod";
import { ErrorCategory, ProtocolError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Validation-category error containing one or more schema issues. */
export class SchemaValidationError extends ProtocolError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "SCHEMA_VALIDATION_FAILED", ErrorCategory.Validation, {
			issues: issues.map((i) => `${i.path.join(".")}: ${i.message}`),
		});
		this.name = "SchemaValidationError";
		this.issues = issues;
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, SchemaValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new SchemaValidationError("Validation failed", issues));
}

/**
 * Schema for a non-negative integer amount written as a decimal string
 * (base units), e.g. "1000000000000000000".
 */
export const uintString = z
	.string()
	.trim()
	.regex(/^\d+$/, "must be a non-negative integer")
	.transform((s) => BigInt(s));
