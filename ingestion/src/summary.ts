import type { VertexGrid } from "@vertex-grid/core";

/** Human-readable description of a grid, one fact per line. */
export function formatGridSummary(grid: VertexGrid, skipped: readonly string[] = []): string[] {
  const lines = [
    `cell type: ${grid.cellKind ?? "none"}`,
    `layers: ${grid.nlay}`,
    `cells per layer: ${grid.ncpl}`,
    `nodes: ${grid.nnodes}`,
    `vertices: ${grid.nvert}`,
    `crs: ${grid.crs ?? "none"}`,
  ];
  if (grid.ncpl > 0) {
    const { xmin, xmax, ymin, ymax } = grid.extent;
    lines.push(`extent: x [${xmin}, ${xmax}] y [${ymin}, ${ymax}]`);
  }
  if (skipped.length > 0) {
    lines.push(`skipped features: ${skipped.length}`);
    for (const reason of skipped) lines.push(`  ${reason}`);
  }
  return lines;
}
