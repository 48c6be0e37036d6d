import { describe, expect, it } from "vitest";
import { ConstructionIncompleteError, IndexOutOfRangeError, VertexGrid } from "../src/index.js";
import { BOTM, latticeVertices, pairGrid, quadCells, quadGrid } from "./fixtures.js";

describe("vertex grid shape", () => {
  it("derives layer and cell counts from botm", () => {
    const grid = quadGrid();
    expect(grid.nlay).toBe(3);
    expect(grid.ncpl).toBe(4);
    expect(grid.nnodes).toBe(12);
    expect(grid.nvert).toBe(9);
    expect(grid.shape).toEqual([3, 4]);
    expect(grid.cellKind).toBe("cell2d");
    expect(grid.isValid).toBe(true);
    expect(grid.isComplete).toBe(true);
  });

  it("falls back to one layer of cell2d cells without elevations", () => {
    const grid = new VertexGrid({ vertices: latticeVertices(), cell2d: quadCells() });
    expect(grid.nlay).toBe(1);
    expect(grid.ncpl).toBe(4);
    expect(grid.isValid).toBe(true);
    expect(grid.isComplete).toBe(false);
    expect(grid.zcellcenters).toBeNull();
    expect(grid.zvertices).toBeNull();
  });

  it("uses explicit counts when there is no geometry", () => {
    const grid = new VertexGrid({ nlay: 2, ncpl: 5 });
    expect(grid.nnodes).toBe(10);
    expect(grid.isValid).toBe(false);
    expect(new VertexGrid().shape).toEqual([0, 0]);
  });

  it("ignores explicit counts when botm is given", () => {
    const grid = quadGrid({ nlay: 7, ncpl: 9 });
    expect(grid.shape).toEqual([3, 4]);
  });

  it("lists vertex ids per cell and compacts padded records", () => {
    const grid = new VertexGrid({
      vertices: latticeVertices(),
      cell2d: [{ cell_id: 0, center_x: 0.5, center_y: 0.5, vertex_ids: [0, 1, 4, 3, null] }],
    });
    expect(grid.iverts).toEqual([[0, 1, 4, 3]]);
    expect(grid.cell2d).toEqual([{ cell_id: 0, center_x: 0.5, center_y: 0.5, vertex_ids: [0, 1, 4, 3] }]);
    expect(grid.cell1d).toBeUndefined();
    expect(quadGrid().iverts).toEqual([
      [0, 1, 4, 3],
      [1, 2, 5, 4],
      [3, 4, 7, 6],
      [4, 5, 8, 7],
    ]);
  });
});

describe("vertex grid geometry", () => {
  it("computes layer elevations from top and botm", () => {
    const grid = quadGrid();
    expect(grid.topBotm).toEqual([[10, 10, 10, 10], ...BOTM]);
    expect(grid.zcellcenters).toEqual([
      [7.5, 7.5, 7.5, 7.5],
      [2.5, 2.5, 2.5, 2.5],
      [-2.5, -2.5, -2.5, -2.5],
    ]);
    expect(grid.zvertices).toEqual([[10, 10, 10, 10], ...BOTM]);
  });

  it("reports cell centers and rings in world coordinates", () => {
    const grid = quadGrid({ xoffset: 10, yoffset: -5 });
    expect(grid.xcellcenters).toEqual([10.5, 11.5, 10.5, 11.5]);
    expect(grid.ycellcenters).toEqual([-4.5, -4.5, -3.5, -3.5]);
    expect(grid.xvertices[3]).toEqual([11, 12, 12, 11]);
    expect(grid.yvertices[3]).toEqual([-4, -4, -3, -3]);
    expect(grid.verts[5]).toEqual([12, -4]);
    expect(grid.extent).toEqual({ xmin: 10, xmax: 12, ymin: -5, ymax: -3 });
  });

  it("repeats the same ring for a cell in every layer", () => {
    const grid = quadGrid();
    const ring = [
      [1, 1],
      [2, 1],
      [2, 2],
      [1, 2],
    ];
    expect(grid.getCellVertices(3)).toEqual(ring);
    expect(grid.getCellVertices(7)).toEqual(ring);
    expect(grid.getCellVertices(11)).toEqual(ring);
  });

  it("rejects node numbers outside the grid", () => {
    const grid = quadGrid();
    expect(() => grid.getCellVertices(12)).toThrow(IndexOutOfRangeError);
    expect(() => grid.getCellVertices(12)).toThrow("cellid 12 out of index for size 12");
    expect(() => grid.getCellVertices(-1)).toThrow(IndexOutOfRangeError);
    expect(() => grid.getCellVertices(1.5)).toThrow(IndexOutOfRangeError);
  });

  it("reports cells that botm counts but the topology lacks", () => {
    const grid = pairGrid({ top: [1, 1, 1, 1], botm: [[0, 0, 0, 0]] });
    expect(grid.ncpl).toBe(4);
    expect(() => grid.getCellVertices(3)).toThrow(IndexOutOfRangeError);
    expect(() => grid.getCellVertices(3)).toThrow("cell 3 has no geometry; the topology holds 2 cells");
    expect(() => grid.mapPolygons).toThrow(IndexOutOfRangeError);
  });

  it("needs vertices and cells before building geometry", () => {
    expect(() => new VertexGrid().xcellcenters).toThrow(ConstructionIncompleteError);
    expect(() => new VertexGrid({ vertices: latticeVertices() }).xvertices).toThrow(
      "grid has no cell2d or cell1d topology"
    );
    expect(() => pairGrid().topBotm).toThrow(ConstructionIncompleteError);
  });
});

describe("vertex grid reference frame", () => {
  it("stores rotation in radians and reports degrees", () => {
    const grid = quadGrid({ angrot: 30 });
    expect(grid.angrot).toBeCloseTo(30, 12);
    expect(grid.angrotRadians).toBeCloseTo(Math.PI / 6, 12);
    expect(grid.hasRefCoordinates).toBe(true);
    expect(quadGrid().hasRefCoordinates).toBe(false);
  });

  it("converts between local and world coordinates", () => {
    const grid = quadGrid({ xoffset: 100, yoffset: 50, angrot: 90 });
    const [wx, wy] = grid.getCoords(1, 0);
    expect(wx).toBeCloseTo(100, 12);
    expect(wy).toBeCloseTo(51, 12);
    const [lx, ly] = grid.getLocalCoords(wx, wy);
    expect(lx).toBeCloseTo(1, 12);
    expect(ly).toBeCloseTo(0, 12);
  });

  it("advances the generation on geometry edits only", () => {
    const grid = quadGrid();
    const start = grid.generationToken;
    grid.setIdomain([[0, 0, 0, 0], [1, 1, 1, 1], [1, 1, 1, 1]]);
    expect(grid.generationToken).toBe(start);
    grid.setTop([12, 12, 12, 12]);
    expect(grid.generationToken).toBe(start + 1);
    expect(grid.zcellcenters?.[0]).toEqual([8.5, 8.5, 8.5, 8.5]);
    grid.setBotm([[0, 0, 0, 0]]);
    expect(grid.nlay).toBe(1);
    expect(grid.generationToken).toBe(start + 2);
  });
});

describe("one-dimensional cells", () => {
  const grid = new VertexGrid({
    vertices: [
      { id: 0, x: 0, y: 0, z: 1 },
      { id: 1, x: 1, y: 0, z: 2 },
      { id: 2, x: 2, y: 0, z: 3 },
    ],
    cell1d: [
      { cell_id: 0, center_x: 0.5, center_y: 0, center_z: 1.5, vertex_ids: [0, 1] },
      { cell_id: 1, center_x: 1.5, center_y: 0, center_z: 2.5, vertex_ids: [1, 2] },
    ],
  });

  it("has a single layer of chains", () => {
    expect(grid.cellKind).toBe("cell1d");
    expect(grid.shape).toEqual([1, 2]);
    expect(grid.cell2d).toBeUndefined();
    expect(grid.cell1d?.map((c) => c.center_z)).toEqual([1.5, 2.5]);
  });

  it("takes elevations from the vertex and center records", () => {
    expect(grid.zcellcenters).toEqual([[1.5, 2.5]]);
    expect(grid.zvertices).toEqual([
      [1, 2],
      [2, 3],
    ]);
    expect(grid.getCellVertices(1)).toEqual([
      [1, 0],
      [2, 0],
    ]);
  });
});

describe("convertGrid", () => {
  it("scales every length", () => {
    const scaled = quadGrid({ xoffset: 10, yoffset: 4, angrot: 30, crs: "EPSG:26915" }).convertGrid(2);
    expect(scaled.xoffset).toBe(20);
    expect(scaled.yoffset).toBe(8);
    expect(scaled.angrot).toBeCloseTo(30, 12);
    expect(scaled.crs).toBe("EPSG:26915");
    expect(scaled.top).toEqual([20, 20, 20, 20]);
    expect(scaled.botm).toEqual([
      [10, 10, 10, 10],
      [0, 0, 0, 0],
      [-10, -10, -10, -10],
    ]);
    expect(scaled.vertices?.[8]).toEqual({ id: 8, x: 4, y: 4 });
    expect(scaled.cell2d?.[3]).toMatchObject({ center_x: 3, center_y: 3 });
    expect(scaled.shape).toEqual([3, 4]);
  });

  it("refuses grids without full elevation data", () => {
    const grid = new VertexGrid({ vertices: latticeVertices(), cell2d: quadCells() });
    expect(() => grid.convertGrid(2)).toThrow(ConstructionIncompleteError);
    expect(() => grid.convertGrid(2)).toThrow("Grid is not complete and cannot be converted");
  });
});
