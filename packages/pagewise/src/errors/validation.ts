/**
 * Contextual Validation Utilities
 *
 * Zod validation wrappers that name what was being validated when they fail.
 *
 * @example
 * ```typescript
 * const options = validateInput(pagewiseOptionsSchema, input, "engine options");
 * ```
 */

import { type ZodError, type ZodType } from "zod";

import { ValidationError, type ValidationIssue } from "./index";

/**
 * Converts Zod issues to ValidationIssue format.
 */
export function zodIssuesToValidationIssues(
  error: ZodError,
): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validates caller input against a schema.
 *
 * @throws ValidationError listing every failed issue
 */
export function validateInput<T>(
  schema: ZodType<T>,
  input: unknown,
  subject: string,
): T {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = zodIssuesToValidationIssues(result.error);
  const summary = issues
    .map((issue) => `${issue.path || "(root)"}: ${issue.message}`)
    .join("; ");

  throw new ValidationError(
    `Invalid ${subject}: ${summary}`,
    { subject, issues },
    { cause: result.error },
  );
}
