/**
 * Library entry point: build draw.io graph models in code and encode them.
 */

export {
  type CanvasAttributes,
  type Cell,
  cloneCell,
  DEFAULT_LAYER_ID,
  type Geometry,
  GraphModel,
  newEdge,
  newGraph,
  newImage,
  newImageXY,
  newPoint,
  newShape,
  type Point,
  ROOT_CELL_ID,
} from "./diagram_model.ts";
export { DiagramFileError, type ErrorResult, isStructuredError, type StructuredError } from "./errors.ts";
export { create_logger, type Logger, type LogLevel } from "./loggers/console_logger.ts";
export { decodeStyle, encodeStyle, mergeStyle, type Style, stripEmptyKey } from "./style.ts";
export {
  readDiagramFile,
  renderDiagram,
  timestampedFileName,
  type WriteDiagramOptions,
  writeDiagramFile,
} from "./utils.ts";
export {
  compressXml,
  decodeGraphModel,
  decompressXml,
  type EncodeOptions,
  encodeGraphModel,
  type MxFileOptions,
  wrapInMxFile,
} from "./xml_codec.ts";
