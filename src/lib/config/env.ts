import { OutputFormatSchema, type UserConfig } from './schema.js';

function parseBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  return undefined;
}

export function parseIterations(value: string): UserConfig['iterations'] | undefined {
  const trimmed = value.trim().toLowerCase();
  if (trimmed === 'infinite') return 'infinite';
  if (!/^\d+$/.test(trimmed)) return undefined;
  return parseInt(trimmed, 10);
}

export function loadEnvVariables(env: NodeJS.ProcessEnv = process.env): Partial<UserConfig> {
  const config: Partial<UserConfig> = {};

  if (env.CELSHEET_FRAME_RATE) {
    const frameRate = parseFloat(env.CELSHEET_FRAME_RATE);
    if (!isNaN(frameRate)) config.frameRate = frameRate;
  }
  if (env.CELSHEET_ALTERNATE) {
    const alternate = parseBoolean(env.CELSHEET_ALTERNATE);
    if (alternate !== undefined) config.alternate = alternate;
  }
  if (env.CELSHEET_ITERATIONS) {
    const iterations = parseIterations(env.CELSHEET_ITERATIONS);
    if (iterations !== undefined) config.iterations = iterations;
  }
  if (env.CELSHEET_SELECTOR) config.selector = env.CELSHEET_SELECTOR;
  if (env.CELSHEET_PREFIX) config.prefix = env.CELSHEET_PREFIX;
  if (env.CELSHEET_FORMAT) {
    const format = OutputFormatSchema.safeParse(env.CELSHEET_FORMAT.trim().toLowerCase());
    if (format.success) config.format = format.data;
  }

  return config;
}
