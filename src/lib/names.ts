import { randomBytes } from "node:crypto";
import { PrefixSchema } from "./config/schema.js";
import { ConfigError, formatIssues } from "./errors.js";
import type { NameGenerator } from "../types/cel.js";

/** Random per process, so ids from separate page builds rarely meet. */
const PROCESS_TOKEN = randomBytes(4).toString("hex");

/** Shared by every generator in the process; ids never repeat. */
let counter = 0;

export type NameGeneratorOptions = {
  prefix?: string;
};

/**
 * Create the `nextId()` collaborator used for @keyframes names.
 * Ids look like `cel-1a2b3c4d-7`.
 */
export function createNameGenerator(options: NameGeneratorOptions = {}): NameGenerator {
  const parsed = PrefixSchema.safeParse(options.prefix ?? "cel");
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid keyframe name prefix "${options.prefix}"`,
      formatIssues(parsed.error.issues)
    );
  }
  const prefix = parsed.data;

  return () => {
    counter += 1;
    return `${prefix}-${PROCESS_TOKEN}-${counter}`;
  };
}
