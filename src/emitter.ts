import type { SynthesisResult } from "./keyframes.js";
import type {
  IterationCount,
  SharedDeclarations,
  StyleOutput,
  Timeline,
  TimingConfig,
} from "./types/cel.js";

/**
 * A finite alternating animation counts the forward and backward pass as
 * separate iterations; callers count the round trip as one.
 */
export function resolveIterationCount(iterations: IterationCount, alternate: boolean): IterationCount {
  if (iterations === "infinite" || !alternate) {
    return iterations;
  }
  return iterations * 2;
}

export function buildSharedDeclarations(totalFrames: number, timing: TimingConfig): SharedDeclarations {
  const shared: SharedDeclarations = {
    duration: totalFrames * timing.frameRate,
    timingFunction: "steps(1)",
    iterationCount: resolveIterationCount(timing.iterations, timing.alternate),
  };
  if (timing.alternate) {
    shared.direction = "alternate";
  }
  return shared;
}

export function emit(
  selector: string,
  timeline: Timeline,
  synthesis: SynthesisResult,
  timing: TimingConfig
): StyleOutput {
  return {
    selector,
    shared: buildSharedDeclarations(timeline.totalFrames, timing),
    keyframes: synthesis.rules,
    bindings: synthesis.bindings,
    timeline,
  };
}
