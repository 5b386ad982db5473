/**
 * Shared utility functions: module-relative paths and diagram file I/O.
 *
 * Uses Node's `node:fs`, `node:path` and `node:url`.
 */

import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { type GraphModel } from "./diagram_model.ts";
import { DiagramFileError, isStructuredError } from "./errors.ts";
import { create_logger, type Logger } from "./loggers/console_logger.ts";
import { decodeGraphModel, encodeGraphModel, wrapInMxFile } from "./xml_codec.ts";

const log = create_logger();

export interface WriteDiagramOptions {
  /** Wrap the model in an `<mxfile>` envelope */
  mxfile?: boolean;
  /** Compress the page; implies `mxfile` */
  compress?: boolean;
  /** Indent a bare `<mxGraphModel>`; ignored inside an envelope */
  pretty?: boolean;
  /** Defaults to a console logger at `info` */
  logger?: Logger;
}

/**
 * ESM equivalent of the CommonJS `__dirname` global.
 *
 * @param importMetaUrl — pass `import.meta.url` from the calling module.
 */
export function esmDirname(importMetaUrl: string): string {
  return dirname(fileURLToPath(importMetaUrl));
}

/**
 * Read a UTF-8 text file resolved relative to the calling module's directory.
 *
 * @param importMetaUrl — pass `import.meta.url` from the calling module.
 * @param pathSegments  — path segments joined via `resolve`.
 */
export function readRelativeFile(importMetaUrl: string, ...pathSegments: string[]): string {
  return readFileSync(resolve(esmDirname(importMetaUrl), ...pathSegments), "utf8");
}

/**
 * Render a model in the requested form: bare, enveloped or compressed.
 */
export function renderDiagram(model: GraphModel, options?: WriteDiagramOptions): string {
  if (options?.compress || options?.mxfile) {
    return wrapInMxFile(model, { compress: options.compress });
  }
  return encodeGraphModel(model, { pretty: options?.pretty });
}

/**
 * Encode `model` and write it to `path`, creating parent directories.
 * Returns the number of bytes written.
 */
export function writeDiagramFile(path: string, model: GraphModel, options?: WriteDiagramOptions): number {
  const xml = renderDiagram(model, options);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, xml, "utf8");
  const bytes = Buffer.byteLength(xml, "utf8");
  (options?.logger ?? log).debug(`Wrote ${path} (${bytes} bytes, ${model.root.length} cells)`);
  return bytes;
}

/**
 * Read and decode a diagram file.
 *
 * @throws DiagramFileError when the content is not a decodable diagram.
 */
export function readDiagramFile(path: string): GraphModel {
  const result = decodeGraphModel(readFileSync(path, "utf8"));
  if (isStructuredError(result)) {
    throw new DiagramFileError(path, result.error);
  }
  return result;
}

/**
 * File name of the form `YYYYMMDD_HHMMSS_<name>.drawio`, in UTC.
 */
export function timestampedFileName(name: string, now: Date = new Date()): string {
  const timestamp = now.toISOString()
    .replace(/[-:]/g, "")
    .replace(/T/, "_")
    .split(".")[0];
  return `${timestamp}_${name}.drawio`;
}
