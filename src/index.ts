export { generate, validateTiming, DEFAULT_SELECTOR } from "./generate.js";
export type { GenerateOptions } from "./generate.js";
export { partition, validateCels } from "./timeline.js";
export { synthesize } from "./keyframes.js";
export type { SynthesisResult } from "./keyframes.js";
export { emit, buildSharedDeclarations, resolveIterationCount } from "./emitter.js";
export { renderCss, formatNumber, createCssFormatter } from "./formats/css.js";
export { createJsonFormatter } from "./formats/json.js";
export { createStyleFormatter } from "./cli-output.js";
export type { StyleFormatter } from "./cli-output.js";
export { createNameGenerator } from "./lib/names.js";
export {
  CelsheetError,
  InvalidSpecError,
  InvalidTimingError,
  ConfigError,
} from "./lib/errors.js";
export type { CelsheetErrorCode } from "./lib/errors.js";
export { ConfigSchema, TimingConfigSchema, CelSpecSchema } from "./lib/config/schema.js";
export type { UserConfig, TimingInput, OutputFormat } from "./lib/config/schema.js";
export { loadConfig } from "./lib/config/loader.js";
export { initLog, setVerbose, log } from "./lib/log.js";
export type * from "./types/cel.js";
