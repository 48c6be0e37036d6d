/**
 * Vertex Grid Core
 * ----------------
 * Geometry of layered unstructured grids: cached cell geometry, reference
 * frame transforms, point location and per-layer array projection.
 */
export * from "./types.js";

export { VertexGrid, type VertexGridOptions } from "./grid.js";

export { TopologyStore } from "./topology.js";

export { GeometryCache } from "./cache.js";

export { buildGridGeometry, type BuildGeometryInput } from "./builder.js";

export { layerMidpoints, stackTopBotm } from "./elevation.js";

export {
  IDENTITY_FRAME,
  isIdentityFrame,
  toWorld,
  toLocal,
  transformCoords,
  toRadians,
  toDegrees,
} from "./transform.js";

export {
  locate,
  findCell,
  containsPoint,
  pointInRing,
  distanceToRing,
  isClockwise,
  boundaryRadius,
  type LocateOptions,
  type LocateSource,
  type CellMatch,
} from "./locate.js";

export {
  projectLayerArray,
  countPlottableLayers,
  shapeOf,
  type LayerArrayInput,
  type NestedArray,
  type NumericVector,
} from "./layers.js";

export { gridLines, cellPolygons, cellRing, closeRing, type GridLine } from "./render.js";

export {
  cellPolygonRows,
  toFeatureCollection,
  type ExportSource,
  type CellAttributes,
  type CellProperties,
  type AttributeValue,
} from "./export.js";

export {
  GridError,
  ConstructionIncompleteError,
  IndexOutOfRangeError,
  ShapeMismatchError,
  LocationNotFoundError,
  InternalConsistencyError,
} from "./errors.js";

export { DEFAULT_GRID_CONFIG, BOUNDARY_TOLERANCE_ENV, resolveGridConfig, type GridConfig } from "./config.js";
