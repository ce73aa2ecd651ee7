import { z } from 'zod';

export const IterationsSchema = z.union([
  z.literal('infinite'),
  z.number().int().positive(),
]);

/**
 * Upper bound on the summed frame count. Below it `frames * 100` stays an
 * exact integer and one frame spans far more than an ulp of 100, so windows
 * keep `start < end` and the last one ends at exactly 100.
 */
export const MAX_TOTAL_FRAMES = 2 ** 46;

export const CelSpecSchema = z
  .array(z.number().int().positive().safe())
  .min(1, 'at least one cel is required')
  .refine((cels) => cels.reduce((sum, n) => sum + n, 0) <= MAX_TOTAL_FRAMES, {
    message: `total frames must not exceed ${MAX_TOTAL_FRAMES}`,
  });

export const TimingConfigSchema = z.object({
  frameRate: z.number().positive().finite().default(0.25),
  alternate: z.boolean().default(false),
  iterations: IterationsSchema.default('infinite'),
});

/** CSS identifier start: the prefix lands at the front of every @keyframes name. */
export const PrefixSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, 'must be a valid CSS identifier');

export const OutputFormatSchema = z.enum(['css', 'json']);

export const ConfigSchema = TimingConfigSchema.extend({
  selector: z.string().trim().min(1).default('.cel-animation'),
  prefix: PrefixSchema.default('cel'),
  precision: z.number().int().min(0).max(10).default(4),
  format: OutputFormatSchema.default('css'),
}).strict();

export type UserConfig = z.infer<typeof ConfigSchema>;
export type TimingInput = z.input<typeof TimingConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
