import { CelsheetError } from "./errors.js";
import { log } from "./log.js";

export interface ErrorResult {
  exitCode: number;
  message: string;
}

/**
 * Map a failure to what the CLI prints and exits with.
 * Returns null for errors celsheet does not own; the caller rethrows those.
 */
export function handleCliError(error: unknown): ErrorResult | null {
  if (!(error instanceof CelsheetError)) {
    return null;
  }

  log("error", error.message, { code: error.code, issues: error.issues });

  const lines = [`${error.name}: ${error.message}`];
  for (const issue of error.issues) {
    lines.push(`  - ${issue}`);
  }

  return {
    exitCode: 1,
    message: lines.join("\n"),
  };
}
