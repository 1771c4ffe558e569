/**
 * Validation wrapper: zod schemas in, Result<T, ValidationError> out.
 *
 * Config files and inbound protocol payloads are validated here. `z` is
 * re-exported so schema modules depend on this path rather than on zod.
 */

import { z } from "zod";
import { ErrorCategory, ErrorKind, TradingError } from "../../shared/errors.js";
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
		super(message, ErrorKind.Validation, ErrorCategory.NonRetryable, {
			issues: issues.map(formatIssue),
		});
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** `master.accountId: Expected number, received string` */
export function formatIssue(issue: ValidationIssue): string {
	const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
	return `${path}: ${issue.message}`;
}

/**
 * Validate data against a zod schema, returning a Result instead of throwing.
 * Transforms run, so the success value is the schema's output type.
 */
export function validate<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
	label = "Validation failed",
): Result<z.output<S>, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	return err(new ValidationError(label, issues));
}
