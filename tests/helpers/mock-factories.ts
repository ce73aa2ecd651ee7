/**
 * Mock factories for creating test data with sensible defaults.
 * Use these to create consistent mock objects in tests.
 */
import type { NameGenerator, TimingConfig } from "../../src/types/cel.js";

/**
 * Creates a predictable name generator: `test-1`, `test-2`, ...
 * Each call returns an independent sequence.
 *
 * @example
 * ```ts
 * const nameGen = createSequentialNameGenerator("anim");
 * nameGen(); // "anim-1"
 * ```
 */
export function createSequentialNameGenerator(prefix: string = "test"): NameGenerator {
  let n = 0;
  return () => {
    n += 1;
    return `${prefix}-${n}`;
  };
}

/**
 * Creates a name generator that replays the given ids in order, then repeats the last one.
 */
export function createScriptedNameGenerator(ids: string[]): NameGenerator {
  let i = 0;
  return () => {
    const id = ids[Math.min(i, ids.length - 1)] ?? "unnamed";
    i += 1;
    return id;
  };
}

/**
 * Creates a TimingConfig with the documented defaults.
 * Override any field by passing it in the overrides object.
 */
export function createMockTiming(overrides?: Partial<TimingConfig>): TimingConfig {
  return {
    frameRate: 0.25,
    alternate: false,
    iterations: "infinite",
    ...overrides,
  };
}
