import { describe, expect, it } from "vitest";
import { ErrorCategory, ProtocolError } from "../../shared/errors.js";
import { isErr, isOk } from "../../shared/result.js";
import { SchemaValidationError, uintString, validate, z } from "./index.js";

describe("validation wrapper", () => {
	describe("validate()", () => {
		it("returns ok(data) for valid input", () => {
			const result = validate(z.string(), "hello");

			expect(isOk(result)).toBe(true);
			if (result.ok) {
				expect(result.value).toBe("hello");
			}
		});

		it("returns err(SchemaValidationError) for invalid input", () => {
			const result = validate(z.number(), "not a number");

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(SchemaValidationError);
				expect(result.error).toBeInstanceOf(ProtocolError);
				expect(result.error.category).toBe(ErrorCategory.Validation);
				expect(result.error.code).toBe("SCHEMA_VALIDATION_FAILED");
			}
		});

		it("includes issue paths for nested objects", () => {
			const schema = z.object({
				asset: z.object({
					limit: z.number(),
					strategy: z.string(),
				}),
			});
			const result = validate(schema, { asset: { limit: "100", strategy: 7 } });

			expect(isErr(result)).toBe(true);
			if (!result.ok) {
				expect(result.error.issues).toHaveLength(2);
				expect(result.error.issues.map((i) => i.path)).toEqual([
					["asset", "limit"],
					["asset", "strategy"],
				]);
			}
		});
	});

	describe("uintString", () => {
		it("parses a decimal string into bigint", () => {
			const result = validate(uintString, " 1000000000000000000 ");
			expect(result).toEqual({ ok: true, value: 1_000_000_000_000_000_000n });
		});

		it("rejects negative and fractional values", () => {
			expect(validate(uintString, "-1").ok).toBe(false);
			expect(validate(uintString, "1.5").ok).toBe(false);
		});
	});
});
