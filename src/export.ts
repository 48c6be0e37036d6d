import type { Feature, FeatureCollection, LineString, Polygon } from "geojson";
import { ShapeMismatchError } from "./errors.js";
import { closeRing } from "./render.js";
import type { CellKind, XY } from "./types.js";

export interface ExportSource {
  readonly ncpl: number;
  readonly cellKind: CellKind | undefined;
  getCellVertices(cellid: number): XY[];
}

export type AttributeValue = number | string | null;
export type CellAttributes = Record<string, ArrayLike<AttributeValue>>;

export interface CellProperties {
  cell_id: number;
  [column: string]: AttributeValue;
}

/** One row per cell, each holding that cell's closed ring as a single polygon. */
export function cellPolygonRows(grid: ExportSource): XY[][][] {
  const rows: XY[][][] = [];
  for (let cell = 0; cell < grid.ncpl; cell++) {
    rows.push([closeRing(grid.getCellVertices(cell))]);
  }
  return rows;
}

function checkAttributes(attributes: CellAttributes, ncpl: number): void {
  for (const [column, values] of Object.entries(attributes)) {
    if (column === "cell_id") {
      throw new ShapeMismatchError("attribute column name cell_id is reserved");
    }
    if (values.length !== ncpl) {
      throw new ShapeMismatchError(`attribute ${column} has ${values.length} values, expected ${ncpl}`);
    }
  }
}

/**
 * GeoJSON features for every cell of one layer, joined with per-cell
 * attribute columns. 1-D grids export line strings.
 */
export function toFeatureCollection(
  grid: ExportSource,
  attributes: CellAttributes = {}
): FeatureCollection<Polygon | LineString, CellProperties> {
  checkAttributes(attributes, grid.ncpl);
  const columns = Object.entries(attributes);
  const features: Feature<Polygon | LineString, CellProperties>[] = [];
  for (let cell = 0; cell < grid.ncpl; cell++) {
    const ring = grid.getCellVertices(cell);
    const geometry: Polygon | LineString =
      grid.cellKind === "cell1d"
        ? { type: "LineString", coordinates: ring }
        : { type: "Polygon", coordinates: [closeRing(ring)] };
    const properties: CellProperties = { cell_id: cell };
    for (const [column, values] of columns) properties[column] = values[cell];
    features.push({ type: "Feature", id: cell, geometry, properties });
  }
  return { type: "FeatureCollection", features };
}
