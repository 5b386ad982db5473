/**
 * `<mxGraphModel>` XML encoding and decoding.
 *
 * Encoding renders the model with template strings so attribute order and
 * omission rules stay exactly as draw.io writes them. Decoding goes through
 * fast-xml-parser and accepts a bare `<mxGraphModel>` or an `<mxfile>`
 * envelope whose first page is either plain or compressed.
 *
 * Compression follows draw.io's `Graph.compress`:
 * `encodeURIComponent` → raw deflate → base64.
 */

import { deflateRawSync, inflateRawSync } from "node:zlib";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import {
  CANVAS_ATTRIBUTES,
  type Cell,
  type Geometry,
  GraphModel,
  type Point,
} from "./diagram_model.ts";
import { type ErrorResult, type StructuredError } from "./errors.ts";
import { decodeStyle, encodeStyle, stripEmptyKey } from "./style.ts";

/** Shared parser instance; attributes come back unprefixed and as strings. */
const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  isArray: (name: string) => name === "diagram" || name === "mxCell" || name === "mxPoint",
  processEntities: true,
  htmlEntities: true,
  parseTagValue: false,
  trimValues: false,
});

export interface EncodeOptions {
  /** Indent nested elements by two spaces, one element per line */
  pretty?: boolean;
}

export interface MxFileOptions {
  /** Store the page deflated and base64-encoded, as draw.io desktop does */
  compress?: boolean;
  pageId?: string;
  pageName?: string;
}

interface XmlElement {
  name: string;
  attrs: string;
  children: XmlElement[];
}

/** Encode a model as an `<mxGraphModel>` document. */
export function encodeGraphModel(model: GraphModel, options?: EncodeOptions): string {
  const pretty = options?.pretty ?? false;
  return renderElement(graphModelElement(model), pretty, 0);
}

/**
 * Encode a model inside an `<mxfile>` envelope with a single page.
 *
 * @param options.compress - If `true`, the page content is compressed.
 *   Defaults to `false` (plain XML).
 */
export function wrapInMxFile(model: GraphModel, options?: MxFileOptions): string {
  const graphModelXml = encodeGraphModel(model);
  const content = options?.compress ? compressXml(graphModelXml) : graphModelXml;
  const pageId = escapeXml(options?.pageId ?? "page-1");
  const pageName = escapeXml(options?.pageName ?? "Page-1");
  return `<mxfile host="drawio-graph"><diagram id="${pageId}" name="${pageName}">${content}</diagram></mxfile>`;
}

/**
 * Decode an `<mxGraphModel>` document, or the first page of an `<mxfile>`.
 * Absent `x`/`y`/`dx`/`dy` read as 0 and an absent style as `{}`. The
 * empty-key entry left by a style's trailing `;` is dropped, so an encoded
 * model decodes back to an equal one.
 */
export function decodeGraphModel(xml: string): GraphModel | ErrorResult {
  if (!xml || !xml.trim()) {
    return {
      error: {
        code: "EMPTY_XML",
        message: "XML string is empty",
        suggestion: "Provide a draw.io document",
      },
    };
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    return {
      error: {
        code: "INVALID_XML",
        message: `Malformed XML at line ${validation.err.line}, column ${validation.err.col}: ${validation.err.msg}`,
      },
    };
  }

  try {
    return readGraphModel(locateGraphModel(xmlParser.parse(xml)));
  } catch (error) {
    if (error instanceof DecodeFailure) {
      return { error: error.detail };
    }
    throw error;
  }
}

/** Compress a page the way draw.io stores it inside `<diagram>`. */
export function compressXml(xml: string): string {
  const deflated = deflateRawSync(Buffer.from(encodeURIComponent(xml), "utf8"));
  return deflated.toString("base64");
}

/** Reverse of `compressXml`: base64 → inflate → `decodeURIComponent`. */
export function decompressXml(compressed: string): string {
  const inflated = inflateRawSync(Buffer.from(compressed.trim(), "base64"));
  return decodeURIComponent(inflated.toString("utf8"));
}

// ─── Encoding ─────────────────────────────────────────────────

function graphModelElement(model: GraphModel): XmlElement {
  let attrs = ` dx="${toInt(model.dx)}" dy="${toInt(model.dy)}"`;
  for (const name of CANVAS_ATTRIBUTES) {
    attrs += stringAttr(name, model[name]);
  }
  return {
    name: "mxGraphModel",
    attrs,
    children: [{ name: "root", attrs: "", children: model.root.map(cellElement) }],
  };
}

function cellElement(cell: Cell): XmlElement {
  const attrs = stringAttr("id", cell.id) +
    stringAttr("value", cell.value) +
    stringAttr("style", encodeStyle(cell.style)) +
    stringAttr("parent", cell.parentId) +
    stringAttr("vertex", cell.vertex) +
    stringAttr("edge", cell.edge) +
    stringAttr("source", cell.source) +
    stringAttr("target", cell.target);
  return {
    name: "mxCell",
    attrs,
    children: cell.geometry ? [geometryElement(cell.geometry)] : [],
  };
}

function geometryElement(geometry: Geometry): XmlElement {
  const attrs = intAttr("x", geometry.x) +
    intAttr("y", geometry.y) +
    stringAttr("width", geometry.width) +
    stringAttr("height", geometry.height) +
    stringAttr("relative", geometry.relative) +
    ` as="${escapeXml(geometry.as)}"`;
  return {
    name: "mxGeometry",
    attrs,
    children: geometry.point ? [pointElement(geometry.point)] : [],
  };
}

function pointElement(point: Point): XmlElement {
  return {
    name: "mxPoint",
    attrs: intAttr("x", point.x) + intAttr("y", point.y) + ` as="${escapeXml(point.as)}"`,
    children: [],
  };
}

function renderElement(element: XmlElement, pretty: boolean, depth: number): string {
  const indent = pretty ? "  ".repeat(depth) : "";
  if (element.children.length === 0) {
    return `${indent}<${element.name}${element.attrs}/>`;
  }
  const separator = pretty ? "\n" : "";
  const children = element.children.map(child => renderElement(child, pretty, depth + 1));
  return [
    `${indent}<${element.name}${element.attrs}>`,
    ...children,
    `${indent}</${element.name}>`,
  ].join(separator);
}

/** Omitted when empty or absent. */
function stringAttr(name: string, value: string | undefined): string {
  return value ? ` ${name}="${escapeXml(value)}"` : "";
}

/** Omitted when zero; draw.io reads an absent coordinate as 0. */
function intAttr(name: string, value: number): string {
  const int = toInt(value);
  return int !== 0 ? ` ${name}="${int}"` : "";
}

/** Coordinates are integers on the wire: fractions are truncated, non-finite values read as 0. */
function toInt(value: number): number {
  return Number.isFinite(value) ? Math.trunc(value) : 0;
}

/** Lookup map for single-pass XML escaping */
const XML_ESCAPE_MAP: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
  "\n": "&#xa;",
  "\r": "&#xd;",
  "\t": "&#x9;",
};

function escapeXml(str: string): string {
  return str.replace(/[&<>"'\n\r\t]/g, ch => XML_ESCAPE_MAP[ch] ?? ch);
}

// ─── Decoding ─────────────────────────────────────────────────

/** Carries a structured error out of the nested readers. */
class DecodeFailure extends Error {
  constructor(readonly detail: StructuredError) {
    super(detail.message);
    this.name = "DecodeFailure";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Self-closed elements without attributes parse to `""`; treat them as empty. */
function toRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function asRecords(value: unknown): Record<string, unknown>[] {
  if (Array.isArray(value)) {
    return value.map(toRecord);
  }
  return value === undefined ? [] : [toRecord(value)];
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return value === undefined ? undefined : String(value);
}

function readInt(obj: Record<string, unknown>, key: string, element: string): number {
  const raw = optionalString(obj, key);
  if (raw === undefined) {
    return 0;
  }
  if (!/^[+-]?\d+$/.test(raw.trim())) {
    throw new DecodeFailure({
      code: "INVALID_NUMBER",
      message: `Attribute '${key}' of <${element}> is not an integer: "${raw}"`,
    });
  }
  return parseInt(raw, 10);
}

/** Find the `<mxGraphModel>` object in a parsed document. */
function locateGraphModel(parsed: Record<string, unknown>): Record<string, unknown> {
  if (parsed.mxGraphModel !== undefined) {
    return toRecord(parsed.mxGraphModel);
  }

  if (parsed.mxfile === undefined) {
    throw new DecodeFailure({
      code: "NOT_A_DIAGRAM",
      message: "XML does not appear to be a draw.io file",
      suggestion: "Provide XML whose root is <mxfile> or <mxGraphModel>",
    });
  }

  const pages = toRecord(parsed.mxfile).diagram;
  const page: unknown = Array.isArray(pages) ? pages[0] : pages;
  if (page === undefined) {
    throw new DecodeFailure({
      code: "NOT_A_DIAGRAM",
      message: "<mxfile> contains no <diagram> page",
      suggestion: "Add a <diagram> element holding an <mxGraphModel>",
    });
  }

  const pageRecord = toRecord(page);
  if (pageRecord.mxGraphModel !== undefined) {
    return toRecord(pageRecord.mxGraphModel);
  }

  // A page with a text node instead of a child element holds compressed content.
  const text = typeof page === "string" ? page : pageRecord["#text"];
  if (typeof text === "string" && text.trim()) {
    let inner: Record<string, unknown>;
    try {
      inner = xmlParser.parse(decompressXml(text));
    } catch (error) {
      throw new DecodeFailure({
        code: "DECOMPRESSION_FAILED",
        message: `Could not decompress diagram page: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
    if (inner.mxGraphModel !== undefined) {
      return toRecord(inner.mxGraphModel);
    }
  }

  throw new DecodeFailure({
    code: "NOT_A_DIAGRAM",
    message: "<diagram> page holds no <mxGraphModel>",
  });
}

function readGraphModel(obj: Record<string, unknown>): GraphModel {
  const model = new GraphModel();
  model.dx = readInt(obj, "dx", "mxGraphModel");
  model.dy = readInt(obj, "dy", "mxGraphModel");
  for (const name of CANVAS_ATTRIBUTES) {
    model[name] = optionalString(obj, name);
  }
  model.root = asRecords(toRecord(obj.root).mxCell).map(readCell);
  return model;
}

/** Optional cell fields and the attributes they are read from. */
const CELL_ATTRIBUTES = [
  ["value", "value"],
  ["parentId", "parent"],
  ["vertex", "vertex"],
  ["edge", "edge"],
  ["source", "source"],
  ["target", "target"],
] as const;

const GEOMETRY_ATTRIBUTES = ["width", "height", "relative"] as const;

function readCell(obj: Record<string, unknown>): Cell {
  const style = optionalString(obj, "style");
  const cell: Cell = {
    id: optionalString(obj, "id") ?? "",
    style: style === undefined ? {} : stripEmptyKey(decodeStyle(style)),
  };
  // Absent attributes stay absent rather than becoming `undefined` keys.
  for (const [field, attribute] of CELL_ATTRIBUTES) {
    const value = optionalString(obj, attribute);
    if (value !== undefined) cell[field] = value;
  }
  if (obj.mxGeometry !== undefined) {
    cell.geometry = readGeometry(toRecord(obj.mxGeometry));
  }
  return cell;
}

function readGeometry(obj: Record<string, unknown>): Geometry {
  const geometry: Geometry = {
    x: readInt(obj, "x", "mxGeometry"),
    y: readInt(obj, "y", "mxGeometry"),
    as: optionalString(obj, "as") ?? "",
  };
  for (const attribute of GEOMETRY_ATTRIBUTES) {
    const value = optionalString(obj, attribute);
    if (value !== undefined) geometry[attribute] = value;
  }
  const [point] = asRecords(obj.mxPoint);
  if (point) {
    geometry.point = {
      x: readInt(point, "x", "mxPoint"),
      y: readInt(point, "y", "mxPoint"),
      as: optionalString(point, "as") ?? "",
    };
  }
  return geometry;
}
