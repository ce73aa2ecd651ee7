/**
 * Shared types for cel timeline generation.
 */

/** Frame counts, one per positional child (1-based on the page). */
export type CelSpec = readonly number[];

export type IterationCount = number | "infinite";

export type TimingConfig = {
  /** Seconds per frame */
  frameRate: number;
  alternate: boolean;
  iterations: IterationCount;
};

export interface CelWindow {
  /** 1-based child position */
  index: number;
  frames: number;
  framesBefore: number;
  /** Percentage of the timeline where the cel appears */
  start: number;
  /** Percentage of the timeline where the cel disappears */
  end: number;
}

export interface Timeline {
  totalFrames: number;
  /** Percentage points per frame */
  frameFraction: number;
  windows: CelWindow[];
}

export interface KeyframeRule {
  id: string;
  appearAt: number;
  disappearAt: number;
}

export interface Binding {
  ruleId: string;
  index: number;
}

export type NameGenerator = () => string;

export type SharedDeclarations = {
  /** Seconds */
  duration: number;
  timingFunction: "steps(1)";
  iterationCount: IterationCount;
  direction?: "alternate";
};

export interface StyleOutput {
  selector: string;
  shared: SharedDeclarations;
  keyframes: KeyframeRule[];
  bindings: Binding[];
  timeline: Timeline;
}
