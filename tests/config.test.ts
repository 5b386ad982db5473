import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  buildConfig,
  type CliConfig,
  parseConfig,
  parseEnvFlag,
  parseLogLevel,
  shouldShowHelp,
  VERSION,
} from "../src/config.ts";

/** Parse and fail the test on an Error result. */
function parseOk(args: string[], env: Record<string, string | undefined> = {}): CliConfig {
  const result = parseConfig(args, env);
  if (result instanceof Error) {
    assert.fail(`unexpected config error: ${result.message}`);
  }
  return result;
}

describe("parseLogLevel", () => {
  it("returns info when unset", () => {
    assert.equal(parseLogLevel(undefined), "info");
    assert.equal(parseLogLevel("  "), "info");
  });
  it("normalizes case and whitespace", () => {
    assert.equal(parseLogLevel(" DEBUG "), "debug");
  });
  it("rejects unknown levels", () => {
    const result = parseLogLevel("verbose");
    assert.ok(result instanceof Error);
    assert.equal(result.message, 'Invalid log level "verbose". Supported levels: error, warning, info, debug');
  });
});

describe("parseEnvFlag", () => {
  it("accepts true and 1", () => {
    assert.equal(parseEnvFlag("true"), true);
    assert.equal(parseEnvFlag("1"), true);
    assert.equal(parseEnvFlag("TRUE"), true);
  });
  it("treats anything else as off", () => {
    assert.equal(parseEnvFlag(undefined), false);
    assert.equal(parseEnvFlag("false"), false);
    assert.equal(parseEnvFlag("yes"), false);
  });
});

describe("shouldShowHelp", () => {
  it("detects --help and -h", () => {
    assert.equal(shouldShowHelp(["--help"]), true);
    assert.equal(shouldShowHelp(["in.drawio", "-h"]), true);
    assert.equal(shouldShowHelp(["in.drawio"]), false);
  });
});

describe("parseConfig", () => {
  it("applies defaults", () => {
    assert.deepEqual(parseOk(["in.drawio"]), {
      input: "in.drawio",
      output: undefined,
      mxfile: false,
      compress: false,
      pretty: false,
      summary: false,
      logLevel: "info",
    });
  });

  it("reads the output path from --output and -o", () => {
    assert.equal(parseOk(["in.drawio", "--output", "out.drawio"]).output, "out.drawio");
    assert.equal(parseOk(["-o", "out.drawio", "--pretty", "in.drawio"]).output, "out.drawio");
  });

  it("keeps the input when boolean flags precede it", () => {
    const config = parseOk(["--pretty", "--summary", "in.drawio"]);
    assert.equal(config.input, "in.drawio");
    assert.equal(config.pretty, true);
    assert.equal(config.summary, true);
  });

  it("makes --compress imply --mxfile", () => {
    const config = parseOk(["in.drawio", "--compress"]);
    assert.equal(config.compress, true);
    assert.equal(config.mxfile, true);
  });

  it("enables --mxfile on its own", () => {
    const config = parseOk(["in.drawio", "--mxfile"]);
    assert.equal(config.mxfile, true);
    assert.equal(config.compress, false);
  });

  it("reads compression and log level from the environment", () => {
    const config = parseOk(["in.drawio"], { DRAWIO_COMPRESS: "1", LOG_LEVEL: "warning" });
    assert.equal(config.compress, true);
    assert.equal(config.logLevel, "warning");
  });

  it("requires an input file", () => {
    const result = parseConfig(["--pretty"]);
    assert.ok(result instanceof Error);
    assert.equal(result.message, "An input diagram file is required");
  });

  it("rejects more than one input file", () => {
    const result = parseConfig(["a.drawio", "b.drawio"]);
    assert.ok(result instanceof Error);
    assert.equal(result.message, "Expected one input file, got 2");
  });

  it("rejects a bare --output flag", () => {
    const result = parseConfig(["in.drawio", "--output"]);
    assert.ok(result instanceof Error);
    assert.equal(result.message, "--output flag requires a file path");
  });

  it("rejects unknown options", () => {
    const result = parseConfig(["in.drawio", "--bogus"]);
    assert.ok(result instanceof Error);
    assert.equal(result.message, 'Unknown option "--bogus"');
  });

  it("surfaces an invalid LOG_LEVEL", () => {
    assert.ok(parseConfig(["in.drawio"], { LOG_LEVEL: "loud" }) instanceof Error);
  });
});

describe("buildConfig", () => {
  it("accepts explicit arguments and environment", () => {
    const result = buildConfig(["in.drawio", "--summary"], {});
    assert.ok(!(result instanceof Error));
    assert.equal(result.summary, true);
  });
});

describe("VERSION", () => {
  it("is read from package.json", () => {
    assert.equal(VERSION, "1.0.0");
  });
});
