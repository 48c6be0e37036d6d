export type CellID = number;
export type VertexID = number;

export type XY = [number, number];

export interface Vertex {
  id: VertexID;
  x: number;
  y: number;
  z?: number;
}

/** Polygon cell. `vertex_ids` may carry trailing `null` padding. */
export interface Cell2D {
  cell_id: CellID;
  center_x: number;
  center_y: number;
  vertex_ids: readonly (VertexID | null)[];
}

/** Line cell; a grid built from these always has one layer. */
export interface Cell1D {
  cell_id: CellID;
  center_x: number;
  center_y: number;
  center_z: number;
  vertex_ids: readonly (VertexID | null)[];
}

export type CellKind = "cell2d" | "cell1d";

export interface ReferenceFrame {
  xoffset: number;
  yoffset: number;
  rotation: number; // radians, counter-clockwise
}

export interface Extent {
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
}

export type LayeredArray = readonly (readonly number[])[];

export interface CellCenters {
  x: number[];
  y: number[];
  z: number[][] | null; // [layer][cell]
}

export interface CellVertices {
  x: number[][]; // [cell][ring position]
  y: number[][];
  z: number[][] | null; // 1-D: [cell][ring position], 2-D: top_botm [layer][cell]
}

export interface CellCentersView {
  readonly x: readonly number[];
  readonly y: readonly number[];
  readonly z: LayeredArray | null;
}

export interface CellVerticesView {
  readonly x: LayeredArray;
  readonly y: LayeredArray;
  readonly z: LayeredArray | null;
}

export interface GeometryBundles {
  cellcenters: CellCenters;
  xyzgrid: CellVertices;
}

export interface GeometryViews {
  cellcenters: CellCentersView;
  xyzgrid: CellVerticesView;
}

export type GeometryKey = keyof GeometryBundles;

export interface ElevationInput {
  top?: readonly number[];
  botm?: LayeredArray;
}

export interface ElevationMidpointResult {
  zVertices: number[][] | null;
  zCenters: number[][] | null;
}

/** Produces vertical vertex/center tables aligned with the cell ordering. */
export type ElevationMidpoints = (elevations: ElevationInput) => ElevationMidpointResult;

export interface LayerShape {
  nlay: number;
  ncpl: number;
}
