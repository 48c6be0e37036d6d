import { geoIdentity, geoPath } from "d3-geo";
import { feature } from "topojson-client";
import type { FeatureCollection, Geometry, Position } from "geojson";
import type { Topology } from "topojson-specification";
import { VertexGrid } from "@vertex-grid/core";
import type { Cell2D, Vertex, VertexGridOptions } from "@vertex-grid/core";

export interface GridIngestOptions extends Omit<VertexGridOptions, "vertices" | "cell2d" | "cell1d"> {
  /** Decimal digits used when merging coincident coordinates into one vertex. */
  precision?: number;
}

export interface TopologyIngestOptions extends GridIngestOptions {
  /** Topology object to read; defaults to the first one. */
  objectName?: string;
}

export interface IngestedGrid {
  grid: VertexGrid;
  skipped: string[];
}

// geoIdentity keeps coordinates planar, so centroids are plain area-weighted means.
const planarPath = geoPath(geoIdentity());

function openRing(ring: Position[]): Position[] {
  if (ring.length < 2) return ring;
  const first = ring[0];
  const last = ring[ring.length - 1];
  return first[0] === last[0] && first[1] === last[1] ? ring.slice(0, -1) : ring;
}

class VertexTable {
  readonly vertices: Vertex[] = [];
  private readonly byKey = new Map<string, number>();

  constructor(private readonly precision?: number) {}

  private key(p: Position): string {
    if (this.precision === undefined) return `${p[0]},${p[1]}`;
    return `${p[0].toFixed(this.precision)},${p[1].toFixed(this.precision)}`;
  }

  idFor(p: Position): number {
    const k = this.key(p);
    let id = this.byKey.get(k);
    if (id === undefined) {
      id = this.vertices.length;
      this.vertices.push({ id, x: p[0], y: p[1] });
      this.byKey.set(k, id);
    }
    return id;
  }
}

/**
 * Build a grid from polygon features. Each polygon's outer ring becomes one
 * cell, in feature order; coordinates shared between rings become shared
 * vertices and ring order is kept as given.
 */
export function gridFromFeatures(
  collection: FeatureCollection<Geometry | null>,
  options: GridIngestOptions = {}
): IngestedGrid {
  const { precision, ...gridOptions } = options;
  const table = new VertexTable(precision);
  const cells: Cell2D[] = [];
  const skipped: string[] = [];

  collection.features.forEach((f, i) => {
    const label = `feature ${f.id ?? i}`;
    const geometry = f.geometry;
    if (!geometry || geometry.type !== "Polygon") {
      skipped.push(`${label}: unsupported geometry ${geometry?.type ?? "null"}`);
      return;
    }
    const ring = openRing(geometry.coordinates[0] ?? []);
    if (ring.length < 3) {
      skipped.push(`${label}: ring has fewer than 3 distinct vertices`);
      return;
    }
    const [cx, cy] = planarPath.centroid(geometry);
    cells.push({
      cell_id: cells.length,
      center_x: cx,
      center_y: cy,
      vertex_ids: ring.map((p) => table.idFor(p)),
    });
  });

  const grid = new VertexGrid({ ...gridOptions, vertices: table.vertices, cell2d: cells });
  return { grid, skipped };
}

/** Decode one object of a TopoJSON topology and build a grid from its polygons. */
export function gridFromTopology(topology: Topology, options: TopologyIngestOptions = {}): IngestedGrid {
  const { objectName, ...gridOptions } = options;
  const name = objectName ?? Object.keys(topology.objects)[0];
  const object = name === undefined ? undefined : topology.objects[name];
  if (!object) throw new Error(`Topology has no object named ${name ?? "(none)"}`);
  const collection: FeatureCollection<Geometry | null> =
    object.type === "GeometryCollection"
      ? feature(topology, object)
      : { type: "FeatureCollection", features: [feature(topology, object)] };
  return gridFromFeatures(collection, gridOptions);
}

export function isTopology(value: unknown): value is Topology {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    value.type === "Topology" &&
    "objects" in value &&
    typeof value.objects === "object" &&
    value.objects !== null &&
    "arcs" in value &&
    Array.isArray(value.arcs)
  );
}

export function isFeatureCollection(value: unknown): value is FeatureCollection<Geometry | null> {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    value.type === "FeatureCollection" &&
    "features" in value &&
    Array.isArray(value.features)
  );
}
