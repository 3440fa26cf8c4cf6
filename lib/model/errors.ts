/**
 * Boundary errors. Inputs are parsed once at construction; anything that
 * fails is surfaced to the caller as InvalidInputError.
 */

import type { ZodError, ZodType, ZodTypeDef } from "zod";

export interface InputIssue {
  code: string;
  message: string;
  /** Dotted path of the offending field, when it came from a schema. */
  path?: string;
}

export class InvalidInputError extends Error {
  readonly code = "INVALID_INPUT";
  readonly issues: InputIssue[];

  constructor(issues: InputIssue[]) {
    super(issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; "));
    this.name = "InvalidInputError";
    this.issues = issues;
  }
}

function issuesFromZod(error: ZodError, codePrefix: string): InputIssue[] {
  return error.issues.map((issue) => ({
    code: `${codePrefix}_${issue.code.toUpperCase()}`,
    message: issue.message,
    path: issue.path.length > 0 ? issue.path.join(".") : undefined,
  }));
}

/** Parse with a schema; a failed parse becomes InvalidInputError. */
export function parseInput<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  value: unknown,
  codePrefix: string
): Output {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidInputError(issuesFromZod(parsed.error, codePrefix));
  }
  return parsed.data;
}

export function invalidInput(code: string, message: string): InvalidInputError {
  return new InvalidInputError([{ code, message }]);
}
