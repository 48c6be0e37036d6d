import { ConstructionIncompleteError } from "./errors.js";
import type { ElevationInput, ElevationMidpointResult, LayeredArray } from "./types.js";

/** Stack `top` over `botm`: row 0 is the grid top, row `k + 1` the bottom of layer `k`. */
export function stackTopBotm(top: readonly number[] | undefined, botm: LayeredArray | undefined): number[][] {
  if (!top || !botm) {
    throw new ConstructionIncompleteError("top and botm are required to build the elevation table");
  }
  return [[...top], ...botm.map((row) => [...row])];
}

/**
 * Default elevation routine: layer boundaries as vertex z, mean of each
 * layer's top and bottom as center z. Returns nulls when elevations are absent.
 */
export function layerMidpoints({ top, botm }: ElevationInput): ElevationMidpointResult {
  if (!top || !botm) return { zVertices: null, zCenters: null };
  const zVertices = stackTopBotm(top, botm);
  const zCenters: number[][] = [];
  for (let k = 1; k < zVertices.length; k++) {
    const upper = zVertices[k - 1];
    const lower = zVertices[k];
    zCenters.push(upper.map((z, i) => (z + lower[i]) / 2));
  }
  return { zVertices, zCenters };
}
