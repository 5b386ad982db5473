/**
 * CLI configuration — flags, environment variables, defaults.
 *
 * All parsing functions are pure (no side effects, deterministic output).
 * Only `buildConfig()` touches `process`.
 *
 * Uses minimist for CLI argument parsing.
 */

import minimist from "minimist";
import { type LogLevel, LogLevelSchema, validLogLevels } from "./loggers/console_logger.ts";
import { readRelativeFile } from "./utils.ts";

/**
 * Package version, read from package.json.
 */
export const VERSION: string = readVersion();

export interface CliConfig {
  /** Diagram file to read */
  readonly input: string;
  /** Destination file; stdout when undefined */
  readonly output: string | undefined;
  /** Wrap output in an `<mxfile>` envelope */
  readonly mxfile: boolean;
  /** Compress the page inside the envelope (implies `mxfile`) */
  readonly compress: boolean;
  readonly pretty: boolean;
  /** Print cell counts instead of XML */
  readonly summary: boolean;
  readonly logLevel: LogLevel;
}

const DEFAULT_LOG_LEVEL: LogLevel = "info";

const BOOLEAN_FLAGS = ["compress", "mxfile", "pretty", "summary", "help"] as const;

function readVersion(): string {
  const pkg: unknown = JSON.parse(readRelativeFile(import.meta.url, "..", "package.json"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

/**
 * Parse log level value - pure function
 */
export const parseLogLevel = (
  value: string | undefined,
): LogLevel | Error => {
  if (!value || value.trim().length === 0) {
    return DEFAULT_LOG_LEVEL;
  }
  const parsed = LogLevelSchema.safeParse(value.trim().toLowerCase());
  if (parsed.success) {
    return parsed.data;
  }
  return new Error(
    `Invalid log level "${value}". Supported levels: ${validLogLevels.join(", ")}`,
  );
};

/**
 * Interpret an environment flag; only "true" and "1" switch it on.
 */
export const parseEnvFlag = (value: string | undefined): boolean => {
  const normalized = value?.trim().toLowerCase();
  return normalized === "true" || normalized === "1";
};

/**
 * Check if help was requested - pure function
 */
export const shouldShowHelp = (args: readonly string[]): boolean => {
  return args.includes("--help") || args.includes("-h");
};

/**
 * Parse command line arguments into a configuration object.
 * CLI flags take precedence over environment variables.
 */
export const parseConfig = (
  args: readonly string[],
  env: Record<string, string | undefined> = {},
): CliConfig | Error => {
  const unknownFlags: string[] = [];
  const parsed = minimist([...args], {
    string: ["output"],
    boolean: [...BOOLEAN_FLAGS],
    alias: { o: "output", h: "help" },
    unknown: (arg) => {
      if (arg.startsWith("-")) {
        unknownFlags.push(arg);
        return false;
      }
      return true;
    },
  });

  if (unknownFlags.length > 0) {
    return new Error(`Unknown option "${unknownFlags[0]}"`);
  }

  // Repeated flags arrive as arrays; last one wins.
  const rawOutput: unknown = Array.isArray(parsed.output) ? parsed.output.at(-1) : parsed.output;
  if (rawOutput === "") {
    return new Error("--output flag requires a file path");
  }
  const output = typeof rawOutput === "string" ? rawOutput : undefined;

  const positional = parsed._.map(String);
  if (positional.length === 0) {
    return new Error("An input diagram file is required");
  }
  if (positional.length > 1) {
    return new Error(`Expected one input file, got ${positional.length}`);
  }

  const logLevel = parseLogLevel(env.LOG_LEVEL);
  if (logLevel instanceof Error) {
    return logLevel;
  }

  const compress = parsed.compress === true || parseEnvFlag(env.DRAWIO_COMPRESS);

  return {
    input: positional[0],
    output,
    mxfile: compress || parsed.mxfile === true,
    compress,
    pretty: parsed.pretty === true,
    summary: parsed.summary === true,
    logLevel,
  };
};

/**
 * Build configuration from the running process.
 *
 * @param args — CLI arguments (defaults to `process.argv.slice(2)`)
 * @param env  — environment variables (defaults to `process.env`)
 */
export const buildConfig = (
  args: readonly string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env,
): CliConfig | Error => {
  return parseConfig(args, env);
};
