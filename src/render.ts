import { IndexOutOfRangeError } from "./errors.js";
import type { CellVerticesView, XY } from "./types.js";

export type GridLine = [XY, XY];

/** Ring of one cell as `[x, y]` pairs, in stored order. */
export function cellRing(vertices: CellVerticesView, cell: number): XY[] {
  const xs = vertices.x[cell];
  const ys = vertices.y[cell];
  if (xs === undefined || ys === undefined) {
    throw new IndexOutOfRangeError(`cell ${cell} has no geometry; the topology holds ${vertices.x.length} cells`);
  }
  return xs.map((x, i): XY => [x, ys[i]]);
}

/** Append the first point when the ring is not already closed. */
export function closeRing(ring: readonly XY[]): XY[] {
  const out = ring.map((p): XY => [p[0], p[1]]);
  if (out.length === 0) return out;
  const first = out[0];
  const last = out[out.length - 1];
  if (first[0] !== last[0] || first[1] !== last[1]) {
    out.push([first[0], first[1]]);
  }
  return out;
}

/**
 * One segment per ring edge. Each cell starts with the closing edge
 * (last vertex to first), then follows the ring order.
 */
export function gridLines(vertices: CellVerticesView): GridLine[] {
  const lines: GridLine[] = [];
  vertices.x.forEach((xs, cell) => {
    const ys = vertices.y[cell];
    const n = xs.length;
    for (let i = 0; i < n; i++) {
      const prev = (i - 1 + n) % n;
      lines.push([
        [xs[prev], ys[prev]],
        [xs[i], ys[i]],
      ]);
    }
  });
  return lines;
}

/** Closed ring per cell for filled-polygon rendering. */
export function cellPolygons(vertices: CellVerticesView, ncpl: number): XY[][] {
  const out: XY[][] = [];
  for (let cell = 0; cell < ncpl; cell++) {
    out.push(closeRing(cellRing(vertices, cell)));
  }
  return out;
}
