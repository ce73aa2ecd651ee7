import { CelSpecSchema } from "./lib/config/schema.js";
import { InvalidSpecError, formatIssues } from "./lib/errors.js";
import type { CelSpec, CelWindow, Timeline } from "./types/cel.js";

/**
 * Validate a cel list. Throws InvalidSpecError when it is empty or holds
 * anything other than positive integers.
 */
export function validateCels(cels: CelSpec): number[] {
  const result = CelSpecSchema.safeParse(cels);
  if (!result.success) {
    throw new InvalidSpecError("Invalid cel list", formatIssues(result.error.issues));
  }
  return result.data;
}

/**
 * Split the 0-100% timeline into one contiguous window per cel.
 *
 * Offsets come from the accumulated integer frame count, so each window's
 * start equals the previous window's end exactly and the last end is 100.
 */
export function partition(cels: CelSpec): Timeline {
  const frames = validateCels(cels);

  let totalFrames = 0;
  for (const count of frames) {
    totalFrames += count;
  }

  const toPercent = (frameCount: number) => (frameCount * 100) / totalFrames;

  const windows: CelWindow[] = [];
  let framesBefore = 0;
  frames.forEach((count, i) => {
    const framesThrough = framesBefore + count;
    windows.push({
      index: i + 1,
      frames: count,
      framesBefore,
      start: toPercent(framesBefore),
      end: toPercent(framesThrough),
    });
    framesBefore = framesThrough;
  });

  return {
    totalFrames,
    frameFraction: 100 / totalFrames,
    windows,
  };
}
