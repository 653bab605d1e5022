/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Domain code imports `z` from here rather than from "zod" directly, so the
 * dependency stays behind a single import path.
 */

import { z } from "zod";
import { TradingError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error containing one or more validation issues. */
export class ValidationError extends TradingError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", "non_retryable", { issueCount: issues.length });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError("Validation failed", issues));
}

/** One line per issue, `path: message`, for error messages. */
export function formatIssues(issues: readonly ValidationIssue[]): string {
	return issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
}

// ── Shared schemas ──────────────────────────────────────────────────

/** Non-negative base-unit amount serialized as a decimal string. */
export const amountString = z
	.string()
	.regex(/^(0|[1-9][0-9]*)$/, "must be a non-negative integer string");

/** Signed integer price coordinate. */
export const priceCoordinate = z.number().int().safe();
