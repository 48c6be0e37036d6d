import { VertexGrid, type Cell2D, type Vertex, type VertexGridOptions } from "../src/index.js";

/** 3x3 lattice of vertices, id = row * 3 + col, at (col, row). */
export function latticeVertices(): Vertex[] {
  const out: Vertex[] = [];
  for (let r = 0; r < 3; r++) {
    for (let c = 0; c < 3; c++) {
      out.push({ id: r * 3 + c, x: c, y: r });
    }
  }
  return out;
}

/** Four counter-clockwise unit squares; cell = row * 2 + col. */
export function quadCells(): Cell2D[] {
  const cells: Cell2D[] = [];
  for (let i = 0; i < 2; i++) {
    for (let j = 0; j < 2; j++) {
      const a = i * 3 + j;
      cells.push({
        cell_id: i * 2 + j,
        center_x: j + 0.5,
        center_y: i + 0.5,
        vertex_ids: [a, a + 1, a + 4, a + 3],
      });
    }
  }
  return cells;
}

export const TOP = [10, 10, 10, 10];
export const BOTM = [
  [5, 5, 5, 5],
  [0, 0, 0, 0],
  [-5, -5, -5, -5],
];
export const IDOMAIN = [
  [1, 1, 1, 1],
  [1, 1, 1, 1],
  [1, 1, 1, 1],
];

/** nlay = 3, ncpl = 4 grid over the unit-square lattice. */
export function quadGrid(options: VertexGridOptions = {}): VertexGrid {
  return new VertexGrid({
    vertices: latticeVertices(),
    cell2d: quadCells(),
    top: TOP,
    botm: BOTM,
    idomain: IDOMAIN,
    ...options,
  });
}

/** Two unit squares sharing the edge x = 1. */
export function pairGrid(options: VertexGridOptions = {}): VertexGrid {
  return new VertexGrid({
    vertices: [
      { id: 0, x: 0, y: 0 },
      { id: 1, x: 1, y: 0 },
      { id: 2, x: 2, y: 0 },
      { id: 3, x: 0, y: 1 },
      { id: 4, x: 1, y: 1 },
      { id: 5, x: 2, y: 1 },
    ],
    cell2d: [
      { cell_id: 0, center_x: 0.5, center_y: 0.5, vertex_ids: [0, 1, 4, 3] },
      { cell_id: 1, center_x: 1.5, center_y: 0.5, vertex_ids: [1, 2, 5, 4] },
    ],
    ...options,
  });
}
