import { IndexOutOfRangeError } from "./errors.js";
import type { Cell1D, Cell2D, CellKind, Vertex, VertexID } from "./types.js";

function compactIds(ids: readonly (VertexID | null)[]): VertexID[] {
  const out: VertexID[] = [];
  for (const id of ids) {
    if (id === null) continue;
    out.push(id);
  }
  return out;
}

/**
 * Raw grid topology: the vertex table plus every cell's vertex ring stored as
 * one flat id arena with per-cell offsets (`ids[offsets[c]..offsets[c + 1]]`).
 */
export class TopologyStore {
  private readonly vertexById: Map<VertexID, Vertex>;

  private constructor(
    readonly kind: CellKind,
    readonly vertices: readonly Vertex[],
    private readonly centersX: Float64Array,
    private readonly centersY: Float64Array,
    private readonly centersZ: Float64Array | null,
    private readonly offsets: Uint32Array,
    private readonly ids: Int32Array
  ) {
    this.vertexById = new Map(vertices.map((v) => [v.id, v]));
  }

  static fromCell2d(vertices: readonly Vertex[], cells: readonly Cell2D[]): TopologyStore {
    const { offsets, ids } = TopologyStore.packRings(cells);
    return new TopologyStore(
      "cell2d",
      vertices,
      Float64Array.from(cells, (c) => c.center_x),
      Float64Array.from(cells, (c) => c.center_y),
      null,
      offsets,
      ids
    );
  }

  static fromCell1d(vertices: readonly Vertex[], cells: readonly Cell1D[]): TopologyStore {
    const { offsets, ids } = TopologyStore.packRings(cells);
    return new TopologyStore(
      "cell1d",
      vertices,
      Float64Array.from(cells, (c) => c.center_x),
      Float64Array.from(cells, (c) => c.center_y),
      Float64Array.from(cells, (c) => c.center_z),
      offsets,
      ids
    );
  }

  private static packRings(cells: readonly (Cell2D | Cell1D)[]): { offsets: Uint32Array; ids: Int32Array } {
    const rings = cells.map((c) => compactIds(c.vertex_ids));
    const offsets = new Uint32Array(cells.length + 1);
    for (let i = 0; i < rings.length; i++) {
      offsets[i + 1] = offsets[i] + rings[i].length;
    }
    const ids = new Int32Array(offsets[cells.length]);
    rings.forEach((ring, i) => ids.set(ring, offsets[i]));
    return { offsets, ids };
  }

  get cellCount(): number {
    return this.offsets.length - 1;
  }

  get vertexCount(): number {
    return this.vertices.length;
  }

  private checkCell(cell: number): void {
    if (!Number.isInteger(cell) || cell < 0 || cell >= this.cellCount) {
      throw new IndexOutOfRangeError(`cell ${cell} out of range for ${this.cellCount} cells`);
    }
  }

  /** Ordered vertex ids of one cell. The returned array is a view into the arena. */
  cellVertexIds(cell: number): Int32Array {
    this.checkCell(cell);
    return this.ids.subarray(this.offsets[cell], this.offsets[cell + 1]);
  }

  cellVertexCount(cell: number): number {
    this.checkCell(cell);
    return this.offsets[cell + 1] - this.offsets[cell];
  }

  vertex(id: VertexID): Vertex {
    const v = this.vertexById.get(id);
    if (!v) throw new IndexOutOfRangeError(`vertex id ${id} is not in the vertex table`);
    return v;
  }

  centerX(cell: number): number {
    this.checkCell(cell);
    return this.centersX[cell];
  }

  centerY(cell: number): number {
    this.checkCell(cell);
    return this.centersY[cell];
  }

  /** Explicit center elevation; only 1-D topologies carry one. */
  centerZ(cell: number): number | undefined {
    this.checkCell(cell);
    return this.centersZ ? this.centersZ[cell] : undefined;
  }

  cell2dRecords(): Cell2D[] {
    const out: Cell2D[] = [];
    for (let c = 0; c < this.cellCount; c++) {
      out.push({
        cell_id: c,
        center_x: this.centersX[c],
        center_y: this.centersY[c],
        vertex_ids: Array.from(this.cellVertexIds(c)),
      });
    }
    return out;
  }

  cell1dRecords(): Cell1D[] {
    const zs = this.centersZ;
    if (!zs) return [];
    const out: Cell1D[] = [];
    for (let c = 0; c < this.cellCount; c++) {
      out.push({
        cell_id: c,
        center_x: this.centersX[c],
        center_y: this.centersY[c],
        center_z: zs[c],
        vertex_ids: Array.from(this.cellVertexIds(c)),
      });
    }
    return out;
  }
}
