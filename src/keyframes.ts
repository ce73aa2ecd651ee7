import { InvalidSpecError } from "./lib/errors.js";
import { log } from "./lib/log.js";
import type { Binding, CelWindow, KeyframeRule, NameGenerator } from "./types/cel.js";

export type SynthesisResult = {
  rules: KeyframeRule[];
  bindings: Binding[];
};

/**
 * Build one visibility rule per window: opacity 1 at the window start and
 * 0 at its end. Each rule is bound to the child at the window's position.
 */
export function synthesize(windows: readonly CelWindow[], nameGen: NameGenerator): SynthesisResult {
  const rules: KeyframeRule[] = [];
  const bindings: Binding[] = [];
  const seen = new Set<string>();

  for (const celWindow of windows) {
    const id = nameGen();
    if (seen.has(id)) {
      throw new InvalidSpecError(`Name generator returned duplicate keyframe name "${id}"`);
    }
    seen.add(id);

    rules.push({ id, appearAt: celWindow.start, disappearAt: celWindow.end });
    bindings.push({ ruleId: id, index: celWindow.index });
  }

  log("keyframes", "Synthesized keyframe rules", { count: rules.length });

  return { rules, bindings };
}
