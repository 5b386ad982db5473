#!/usr/bin/env node
/**
 * Command-line entry point: read a draw.io file, then print a summary or
 * re-encode it.
 *
 * This file is the only place with process-level side effects.
 */

import { buildConfig, shouldShowHelp, VERSION } from "./config.ts";
import { DiagramFileError } from "./errors.ts";
import { create_logger } from "./loggers/console_logger.ts";
import { readDiagramFile, renderDiagram, writeDiagramFile } from "./utils.ts";

/**
 * Display help message and exit.
 */
function showHelp(): never {
  console.log(`
drawio-graph (${VERSION})

Usage: drawio-graph <input.drawio> [options]

Options:
  --output, -o <file>  Write the diagram to <file> instead of stdout
  --mxfile             Wrap the output in an <mxfile> envelope
  --compress           Compress the page inside the envelope (implies --mxfile)
  --pretty             Indent a bare <mxGraphModel> document
  --summary            Print cell counts instead of XML
  --help, -h           Show this help message

Environment variables:
  LOG_LEVEL            error, warning, info or debug (default: info)
  DRAWIO_COMPRESS      Same as --compress when set to "true" or "1"

Examples:
  drawio-graph diagram.drawio --summary
  drawio-graph diagram.drawio --pretty
  drawio-graph plain.drawio --compress -o packed.drawio
  `);
  process.exit(0);
}

function main(args: readonly string[]): number {
  if (shouldShowHelp(args)) {
    showHelp();
  }

  const config = buildConfig(args);
  if (config instanceof Error) {
    create_logger().error(config.message);
    console.error("Run with --help for usage.");
    return 1;
  }

  const log = create_logger(config.logLevel);

  try {
    const model = readDiagramFile(config.input);
    log.debug(`Decoded ${config.input}`, model.getStats());

    if (config.summary) {
      const stats = model.getStats();
      console.log(`cells:    ${stats.cells}`);
      console.log(`vertices: ${stats.vertices}`);
      console.log(`edges:    ${stats.edges}`);
      console.log(`layers:   ${stats.layers}`);
      return 0;
    }

    if (config.output) {
      const bytes = writeDiagramFile(config.output, model, { ...config, logger: log });
      log.info(`Wrote ${config.output} (${bytes} bytes)`);
    } else {
      process.stdout.write(`${renderDiagram(model, config)}\n`);
    }
    return 0;
  } catch (error) {
    if (error instanceof DiagramFileError) {
      log.error(`${error.message} [${error.code}]`);
      if (error.suggestion) log.info(error.suggestion);
    } else {
      log.error(error instanceof Error ? error.message : String(error));
    }
    return 1;
  }
}

process.exitCode = main(process.argv.slice(2));
