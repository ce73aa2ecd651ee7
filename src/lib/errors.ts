import type { ZodIssue } from "zod";

export type CelsheetErrorCode = "INVALID_SPEC" | "INVALID_TIMING" | "INVALID_CONFIG";

/**
 * Base class for every failure celsheet reports to its callers.
 * `issues` lists individual validation problems as `path: message`.
 */
export class CelsheetError extends Error {
  readonly code: CelsheetErrorCode;
  readonly issues: string[];

  constructor(code: CelsheetErrorCode, message: string, issues: string[] = []) {
    super(message);
    this.name = "CelsheetError";
    this.code = code;
    this.issues = issues;
  }
}

/** Cel list is empty or holds a value that is not a positive integer. */
export class InvalidSpecError extends CelsheetError {
  constructor(message: string, issues: string[] = []) {
    super("INVALID_SPEC", message, issues);
    this.name = "InvalidSpecError";
  }
}

/** Frame rate or iteration count is out of range. */
export class InvalidTimingError extends CelsheetError {
  constructor(message: string, issues: string[] = []) {
    super("INVALID_TIMING", message, issues);
    this.name = "InvalidTimingError";
  }
}

export class ConfigError extends CelsheetError {
  constructor(message: string, issues: string[] = []) {
    super("INVALID_CONFIG", message, issues);
    this.name = "ConfigError";
  }
}

export function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
