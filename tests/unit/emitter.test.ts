import { describe, it, expect } from "vitest";
import { buildSharedDeclarations, emit, resolveIterationCount } from "../../src/emitter.js";
import { partition } from "../../src/timeline.js";
import { synthesize } from "../../src/keyframes.js";
import { createMockTiming, createSequentialNameGenerator } from "../helpers/mock-factories.js";

describe("resolveIterationCount", () => {
  it("doubles finite counts when alternating", () => {
    expect(resolveIterationCount(2, true)).toBe(4);
    expect(resolveIterationCount(1, true)).toBe(2);
  });

  it("leaves finite counts alone without alternation", () => {
    expect(resolveIterationCount(3, false)).toBe(3);
  });

  it("never doubles infinite", () => {
    expect(resolveIterationCount("infinite", true)).toBe("infinite");
    expect(resolveIterationCount("infinite", false)).toBe("infinite");
  });
});

describe("buildSharedDeclarations", () => {
  it("uses the defaults for a plain animation", () => {
    expect(buildSharedDeclarations(3, createMockTiming())).toEqual({
      duration: 0.75,
      timingFunction: "steps(1)",
      iterationCount: "infinite",
    });
  });

  it("sets direction and doubles iterations when alternating", () => {
    const shared = buildSharedDeclarations(6, createMockTiming({ frameRate: 0.1, alternate: true, iterations: 2 }));

    expect(shared.duration).toBe(6 * 0.1);
    expect(shared.direction).toBe("alternate");
    expect(shared.iterationCount).toBe(4);
    expect(shared.timingFunction).toBe("steps(1)");
  });

  it("omits direction when not alternating", () => {
    const shared = buildSharedDeclarations(4, createMockTiming({ iterations: 5 }));
    expect("direction" in shared).toBe(false);
    expect(shared.iterationCount).toBe(5);
  });
});

describe("emit", () => {
  it("assembles shared declarations, rules and bindings", () => {
    const timeline = partition([2, 2]);
    const synthesis = synthesize(timeline.windows, createSequentialNameGenerator());
    const output = emit(".reel", timeline, synthesis, createMockTiming());

    expect(output.selector).toBe(".reel");
    expect(output.shared.duration).toBe(1);
    expect(output.keyframes).toBe(synthesis.rules);
    expect(output.bindings).toBe(synthesis.bindings);
    expect(output.timeline).toBe(timeline);
  });
});
