/**
 * Draw.io graph model: the in-memory tree that `xml_codec.ts` turns into an
 * `<mxGraphModel>` document.
 *
 * A model owns its cells by value, each cell owns at most one geometry and
 * each geometry at most one point. `parentId`, `source` and `target` are
 * plain ids; nothing here checks that they resolve, or that ids are unique.
 * A model is meant for a single owner at a time.
 */

import { type Style } from "./style.ts";

/** Id of the canvas root cell every document starts with. */
export const ROOT_CELL_ID = "0";
/** Id of the default layer most cells are parented to. */
export const DEFAULT_LAYER_ID = "1";

/** Labelled coordinate inside a geometry, e.g. an edge's source point. */
export interface Point {
  x: number;
  y: number;
  /** `"sourcePoint"` or `"targetPoint"` for edge endpoints */
  as: string;
}

export interface Geometry {
  x: number;
  y: number;
  width?: string;
  height?: string;
  relative?: string;
  /** Always `"geometry"` for a cell's own geometry */
  as: string;
  point?: Point;
}

/**
 * A vertex (`vertex: "1"`) or an edge (`edge: "1"`). The two flags are
 * mutually exclusive by convention only.
 */
export interface Cell {
  id: string;
  value?: string;
  style: Style;
  parentId?: string;
  vertex?: string;
  edge?: string;
  /** Source cell id, for edges */
  source?: string;
  /** Target cell id, for edges */
  target?: string;
  geometry?: Geometry;
}

/** Optional `<mxGraphModel>` canvas attributes, written only when non-empty. */
export interface CanvasAttributes {
  grid?: string;
  gridSize?: string;
  guides?: string;
  tooltips?: string;
  connect?: string;
  arrows?: string;
  fold?: string;
  page?: string;
  pageScale?: string;
  pageWidth?: string;
  pageHeight?: string;
  background?: string;
  math?: string;
  shadow?: string;
}

/** Canvas attribute names in document order. */
export const CANVAS_ATTRIBUTES = [
  "grid",
  "gridSize",
  "guides",
  "tooltips",
  "connect",
  "arrows",
  "fold",
  "page",
  "pageScale",
  "pageWidth",
  "pageHeight",
  "background",
  "math",
  "shadow",
] as const satisfies readonly (keyof CanvasAttributes)[];

export class GraphModel implements CanvasAttributes {
  dx: number = 0;
  dy: number = 0;

  grid?: string;
  gridSize?: string;
  guides?: string;
  tooltips?: string;
  connect?: string;
  arrows?: string;
  fold?: string;
  page?: string;
  pageScale?: string;
  pageWidth?: string;
  pageHeight?: string;
  background?: string;
  math?: string;
  shadow?: string;

  /** Cells in document order; append-only through `add`. */
  root: Cell[] = [];

  /**
   * Append a copy of `cell`. Later changes to the argument do not reach the
   * stored cell. Returns the model for chaining.
   */
  add(cell: Cell): this {
    this.root.push(cloneCell(cell));
    return this;
  }

  getCell(id: string): Cell | undefined {
    return this.root.find(c => c.id === id);
  }

  getStats(): { cells: number; vertices: number; edges: number; layers: number } {
    let vertices = 0;
    let edges = 0;
    let layers = 0;
    for (const cell of this.root) {
      if (cell.vertex === "1") vertices++;
      else if (cell.edge === "1") edges++;
      else if (cell.parentId === ROOT_CELL_ID) layers++;
    }
    return { cells: this.root.length, vertices, edges, layers };
  }
}

/**
 * A model holding only the canvas root and the default layer, both styled
 * `html=1`. Draw.io refuses documents without this pair.
 */
export function newGraph(): GraphModel {
  const graph = new GraphModel();
  graph.dx = 640;
  graph.dy = 480;
  graph.root = [
    { id: ROOT_CELL_ID, style: { html: "1" } },
    { id: DEFAULT_LAYER_ID, parentId: ROOT_CELL_ID, style: { html: "1" } },
  ];
  return graph;
}

/**
 * A vertex with the given id and parent. Carries a default geometry at
 * (10, 10) which you will usually want to resize.
 */
export function newShape(id: string, parentId: string): Cell {
  return {
    ...newCell(id, parentId),
    vertex: "1",
    geometry: newGeometry(),
  };
}

/**
 * An image vertex. The style is replaced outright, so anything set on the
 * shape beforehand is gone; use `mergeStyle` to layer more on top.
 */
export function newImage(id: string, parentId: string, url: string): Cell {
  const image = newShape(id, parentId);
  image.style = {
    shape: "image",
    imageAspect: "0",
    image: url,
  };
  return image;
}

/** An image vertex placed at (x, y). */
export function newImageXY(id: string, parentId: string, url: string, x: number, y: number): Cell {
  const image = newImage(id, parentId, url);
  image.geometry = { ...newGeometry(), x, y };
  return image;
}

/** An edge between two cells, with the relative geometry draw.io expects. */
export function newEdge(id: string, parentId: string, source: string, target: string): Cell {
  return {
    ...newCell(id, parentId),
    edge: "1",
    source,
    target,
    geometry: { x: 0, y: 0, relative: "1", as: "geometry" },
  };
}

export function newPoint(as: string, x: number, y: number): Point {
  return { x, y, as };
}

/** Deep copy of a cell, down to its style, geometry and point. */
export function cloneCell(cell: Cell): Cell {
  const copy: Cell = { ...cell, style: { ...cell.style } };
  if (cell.geometry) {
    copy.geometry = { ...cell.geometry };
    if (cell.geometry.point) {
      copy.geometry.point = { ...cell.geometry.point };
    }
  }
  return copy;
}

function newCell(id: string, parentId: string): Cell {
  return { id, parentId, style: {} };
}

function newGeometry(): Geometry {
  return { x: 10, y: 10, as: "geometry" };
}
