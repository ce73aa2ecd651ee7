import yargs from "yargs";
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { generate } from "./generate.js";
import { createStyleFormatter } from "./cli-output.js";
import { createNameGenerator } from "./lib/names.js";
import { loadConfig } from "./lib/config/loader.js";
import { parseIterations } from "./lib/config/env.js";
import type { OutputFormat, TimingInput, UserConfig } from "./lib/config/schema.js";
import { ConfigError, InvalidTimingError } from "./lib/errors.js";
import { handleCliError } from "./lib/error-handler.js";
import { initLog, log, setVerbose } from "./lib/log.js";
import { getLogDir } from "./lib/paths.js";

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Walk up from this module to the nearest package.json; works from src/ and dist/src/.
 */
function readVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, "package.json");
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, "utf-8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
      return "0.0.0";
    }
    const parent = dirname(dir);
    if (parent === dir) return "0.0.0";
    dir = parent;
  }
}

/**
 * Accepts `3 1 2`, `3,1,2`, or a mix. Anything that is not a number is kept
 * as NaN so validation reports it instead of silently dropping it.
 */
export function parseCelArgs(values: ReadonlyArray<string | number>): number[] {
  const cels: number[] = [];
  for (const value of values) {
    if (typeof value === "number") {
      cels.push(value);
      continue;
    }
    for (const token of value.split(",")) {
      const trimmed = token.trim();
      cels.push(trimmed === "" ? NaN : Number(trimmed));
    }
  }
  return cels;
}

function parseFormat(value: string | undefined): OutputFormat | undefined {
  if (value === undefined) return undefined;
  if (value === "css" || value === "json") return value;
  throw new ConfigError(`Unknown output format "${value}" (expected css or json)`);
}

/**
 * Run the celsheet CLI. Resolves to the process exit code.
 */
export async function runCli(args: string[], io: CliIO = defaultIO): Promise<number> {
  try {
    const argv = await yargs(args)
      .scriptName("celsheet")
      .usage("$0 <cels..> [options]\n\nGenerate a stepped CSS cel animation from per-cel frame counts.")
      .example("$0 3 1 2 --frame-rate 0.1", "three cels shown for 3, 1 and 2 frames")
      .example("$0 1,1,1 --alternate --iterations 2", "play forward and back twice")
      .option("frame-rate", {
        type: "number",
        description: "Seconds per frame (default 0.25)",
      })
      .option("alternate", {
        type: "boolean",
        default: undefined,
        description: "Reverse direction on every other pass",
      })
      .option("iterations", {
        type: "string",
        description: 'Positive integer or "infinite" (default infinite)',
      })
      .option("selector", {
        type: "string",
        description: "Container selector whose direct children are the cels",
      })
      .option("prefix", {
        type: "string",
        description: "Prefix for generated @keyframes names",
      })
      .option("precision", {
        type: "number",
        description: "Decimal places kept in CSS output",
      })
      .option("format", {
        type: "string",
        description: "Output format: css or json",
      })
      .option("output", {
        alias: "o",
        type: "string",
        description: "Write to a file instead of stdout",
      })
      .option("config", {
        type: "string",
        description: "Path to a JSON config file",
      })
      .option("debug", {
        type: "boolean",
        default: false,
        description: "Record every log category",
      })
      .strictOptions()
      .fail((msg, err) => {
        if (err) throw err;
        throw new ConfigError(msg);
      })
      .version(readVersion())
      .help()
      .parse();

    setVerbose(argv.debug);
    if (!initLog(false)) {
      io.stderr(`Warning: logging disabled, cannot write to ${getLogDir()}\n`);
    }

    const overrides: Partial<UserConfig> = {};
    if (argv.selector !== undefined) overrides.selector = argv.selector;
    if (argv.prefix !== undefined) overrides.prefix = argv.prefix;
    if (argv.precision !== undefined) overrides.precision = argv.precision;
    const format = parseFormat(argv.format);
    if (format !== undefined) overrides.format = format;

    const config = loadConfig({ configPath: argv.config, overrides });

    // Timing flags skip the config schema so they fail as timing errors.
    const timing: TimingInput = {
      frameRate: argv.frameRate ?? config.frameRate,
      alternate: argv.alternate ?? config.alternate,
      iterations: config.iterations,
    };
    if (argv.iterations !== undefined) {
      const iterations = parseIterations(argv.iterations);
      if (iterations === undefined) {
        throw new InvalidTimingError(`Invalid iteration count "${argv.iterations}"`);
      }
      timing.iterations = iterations;
    }

    const cels = parseCelArgs(argv._);
    log("main", "celsheet starting", { cels, timing, format: config.format });

    const output = generate(cels, timing, {
      selector: config.selector,
      nameGen: createNameGenerator({ prefix: config.prefix }),
    });

    let text = "";
    createStyleFormatter({
      format: config.format,
      precision: config.precision,
      write: (chunk) => {
        text += chunk;
      },
    }).format(output);

    if (argv.output) {
      const target = resolve(process.cwd(), argv.output);
      writeFileSync(target, text, "utf-8");
      log("main", "Wrote output file", { path: target });
    } else {
      io.stdout(text);
    }
    return 0;
  } catch (error) {
    const result = handleCliError(error);
    if (!result) throw error;
    io.stderr(result.message + "\n");
    return result.exitCode;
  }
}
