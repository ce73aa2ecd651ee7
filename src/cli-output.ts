import type { StyleOutput } from "./types/cel.js";
import type { OutputFormat } from "./lib/config/schema.js";
import { createCssFormatter } from "./formats/css.js";
import { createJsonFormatter } from "./formats/json.js";

export type StyleFormatter = {
  format: (output: StyleOutput) => void;
};

export function createStyleFormatter(options: {
  format: OutputFormat;
  precision?: number;
  write?: (text: string) => void;
}): StyleFormatter {
  return options.format === "json"
    ? createJsonFormatter({ write: options.write })
    : createCssFormatter({ precision: options.precision, write: options.write });
}
