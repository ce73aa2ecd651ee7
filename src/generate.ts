import { TimingConfigSchema, type TimingInput } from "./lib/config/schema.js";
import { InvalidTimingError, formatIssues } from "./lib/errors.js";
import { createNameGenerator } from "./lib/names.js";
import { log } from "./lib/log.js";
import { partition, validateCels } from "./timeline.js";
import { synthesize } from "./keyframes.js";
import { emit } from "./emitter.js";
import type { CelSpec, NameGenerator, StyleOutput, TimingConfig } from "./types/cel.js";

export const DEFAULT_SELECTOR = ".cel-animation";

export type GenerateOptions = {
  /** Container whose direct children are the cels */
  selector?: string;
  nameGen?: NameGenerator;
};

export function validateTiming(timing: TimingInput = {}): TimingConfig {
  const result = TimingConfigSchema.safeParse(timing);
  if (!result.success) {
    throw new InvalidTimingError("Invalid timing configuration", formatIssues(result.error.issues));
  }
  return result.data;
}

/**
 * Turn a list of per-cel frame counts into keyframe rules and child bindings.
 * All input is validated before anything is computed.
 */
export function generate(
  cels: CelSpec,
  timing: TimingInput = {},
  options: GenerateOptions = {}
): StyleOutput {
  validateCels(cels);
  const config = validateTiming(timing);
  const nameGen = options.nameGen ?? createNameGenerator();

  const timeline = partition(cels);
  const synthesis = synthesize(timeline.windows, nameGen);
  const output = emit(options.selector ?? DEFAULT_SELECTOR, timeline, synthesis, config);

  log("generate", "Generated cel animation", {
    cels: cels.length,
    totalFrames: timeline.totalFrames,
    duration: output.shared.duration,
    iterationCount: output.shared.iterationCount,
  });

  return output;
}
