import {
  gridFromFeatures,
  gridFromTopology,
  isFeatureCollection,
  isTopology,
  type GridIngestOptions,
  type IngestedGrid,
  type TopologyIngestOptions,
} from "./gridIngest.js";
import { formatGridSummary } from "./summary.js";

/**
 * Build a grid from parsed JSON that is either a TopoJSON topology or a
 * GeoJSON feature collection of polygons.
 */
export function loadGrid(data: unknown, options: TopologyIngestOptions = {}): IngestedGrid {
  if (isTopology(data)) return gridFromTopology(data, options);
  if (isFeatureCollection(data)) return gridFromFeatures(data, options);
  throw new Error("Expected a TopoJSON Topology or a GeoJSON FeatureCollection");
}

export { gridFromFeatures, gridFromTopology, isFeatureCollection, isTopology, formatGridSummary };
export type { GridIngestOptions, IngestedGrid, TopologyIngestOptions };
