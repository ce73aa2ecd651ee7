import type { StyleOutput } from "../types/cel.js";
import type { StyleFormatter } from "../cli-output.js";

type JsonFormatterOptions = {
  /** Indentation passed to JSON.stringify; 0 writes a single line */
  indent?: number;
  write?: (text: string) => void;
};

/**
 * Writes the generator output unrounded, for build steps that post-process it.
 */
export function createJsonFormatter(options: JsonFormatterOptions = {}): StyleFormatter {
  const write = options.write ?? ((text: string) => process.stdout.write(text));
  const indent = options.indent ?? 2;

  const format = (output: StyleOutput) => {
    write(JSON.stringify(output, null, indent) + "\n");
  };

  return { format };
}
