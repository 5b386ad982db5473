/**
 * Tests for draw.io page compression (deflate-raw + base64) and the
 * `<mxfile>` envelope.
 */
import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { inflateRawSync } from "node:zlib";
import { newGraph, newShape } from "../src/diagram_model.ts";
import { isStructuredError } from "../src/errors.ts";
import {
  compressXml,
  decodeGraphModel,
  decompressXml,
  encodeGraphModel,
  wrapInMxFile,
} from "../src/xml_codec.ts";

describe("compressXml / decompressXml", () => {
  it("restores the original XML", () => {
    const xml = encodeGraphModel(newGraph().add(newShape("n1", "1")));
    assert.equal(decompressXml(compressXml(xml)), xml);
  });

  it("URL-encodes before deflating", () => {
    const compressed = compressXml('<a b="é"/>');
    const inflated = inflateRawSync(Buffer.from(compressed, "base64")).toString("utf8");
    assert.equal(inflated, "%3Ca%20b%3D%22%C3%A9%22%2F%3E");
  });

  it("produces base64 output", () => {
    assert.match(compressXml("<mxGraphModel/>"), /^[A-Za-z0-9+/]+=*$/);
  });

  it("tolerates surrounding whitespace in compressed text", () => {
    const compressed = compressXml("<x/>");
    assert.equal(decompressXml(`\n  ${compressed}\n`), "<x/>");
  });
});

describe("wrapInMxFile", () => {
  it("embeds the plain model in a single page", () => {
    const graph = newGraph();
    assert.equal(
      wrapInMxFile(graph),
      `<mxfile host="drawio-graph"><diagram id="page-1" name="Page-1">${encodeGraphModel(graph)}</diagram></mxfile>`,
    );
  });

  it("escapes the page name", () => {
    assert.ok(wrapInMxFile(newGraph(), { pageName: "A & B" }).includes('name="A &amp; B"'));
  });

  it("stores the compressed page as text", () => {
    const graph = newGraph();
    const xml = wrapInMxFile(graph, { compress: true, pageId: "p1" });
    assert.equal(
      xml,
      `<mxfile host="drawio-graph"><diagram id="p1" name="Page-1">${compressXml(encodeGraphModel(graph))}</diagram></mxfile>`,
    );
    assert.equal(xml.includes("<mxGraphModel"), false);
  });
});

describe("decoding enveloped pages", () => {
  it("decodes a plain page", () => {
    const graph = newGraph().add(newShape("n1", "1"));
    assert.deepEqual(decodeGraphModel(wrapInMxFile(graph)), graph);
  });

  it("decodes a compressed page", () => {
    const shape = newShape("n1", "1");
    shape.value = "Compressed";
    shape.style = { fillColor: "#f8cecc", rounded: "1" };
    const graph = newGraph().add(shape);
    assert.deepEqual(decodeGraphModel(wrapInMxFile(graph, { compress: true })), graph);
  });

  it("decodes only the first page", () => {
    const first = newGraph().add(newShape("first", "1"));
    const second = newGraph().add(newShape("second", "1"));
    const xml = `<mxfile><diagram id="a">${encodeGraphModel(first)}</diagram>` +
      `<diagram id="b">${encodeGraphModel(second)}</diagram></mxfile>`;
    assert.deepEqual(decodeGraphModel(xml), first);
  });

  it("reports a page that cannot be decompressed", () => {
    const result = decodeGraphModel("<mxfile><diagram>AAAA</diagram></mxfile>");
    assert.ok(isStructuredError(result));
    assert.equal(result.error.code, "DECOMPRESSION_FAILED");
  });
});
