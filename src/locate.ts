import { LocationNotFoundError } from "./errors.js";
import { toWorld } from "./transform.js";
import type { CellVerticesView, LayeredArray, ReferenceFrame } from "./types.js";

/** Twice the signed area sum over edges; positive for clockwise rings. */
export function isClockwise(xs: readonly number[], ys: readonly number[]): boolean {
  let sum = 0;
  const n = xs.length;
  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    sum += (xs[j] - xs[i]) * (ys[j] + ys[i]);
  }
  return sum > 0;
}

/** Even-odd ray cast. Points exactly on an edge may land either way. */
export function pointInRing(px: number, py: number, xs: readonly number[], ys: readonly number[]): boolean {
  let inside = false;
  const n = xs.length;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const xi = xs[i];
    const yi = ys[i];
    const xj = xs[j];
    const yj = ys[j];
    if (yi > py !== yj > py && px < ((xj - xi) * (py - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside;
}

function segmentDistance(px: number, py: number, ax: number, ay: number, bx: number, by: number): number {
  const dx = bx - ax;
  const dy = by - ay;
  const len2 = dx * dx + dy * dy;
  const t = len2 === 0 ? 0 : Math.max(0, Math.min(1, ((px - ax) * dx + (py - ay) * dy) / len2));
  return Math.hypot(px - (ax + t * dx), py - (ay + t * dy));
}

export function distanceToRing(px: number, py: number, xs: readonly number[], ys: readonly number[]): number {
  const n = xs.length;
  if (n === 0) return Infinity;
  let best = Infinity;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    best = Math.min(best, segmentDistance(px, py, xs[j], ys[j], xs[i], ys[i]));
  }
  return best;
}

/**
 * Containment with a signed boundary radius. The radius is read relative to
 * the ring's winding: a positive radius grows a counter-clockwise ring, a
 * negative one grows a clockwise ring, and the opposite signs shrink them.
 */
export function containsPoint(
  px: number,
  py: number,
  xs: readonly number[],
  ys: readonly number[],
  radius: number
): boolean {
  const orientation = isClockwise(xs, ys) ? -1 : 1;
  const expansion = radius * orientation;
  const inside = pointInRing(px, py, xs, ys);
  if (expansion > 0) return inside || distanceToRing(px, py, xs, ys) <= expansion;
  if (expansion < 0) return inside && distanceToRing(px, py, xs, ys) > -expansion;
  return inside;
}

/** Radius that includes the boundary for either winding. */
export function boundaryRadius(xs: readonly number[], ys: readonly number[], tolerance: number): number {
  return isClockwise(xs, ys) ? -tolerance : tolerance;
}

function inBoundingBox(px: number, py: number, xs: readonly number[], ys: readonly number[]): boolean {
  if (xs.length === 0) return false;
  return px >= Math.min(...xs) && px <= Math.max(...xs) && py >= Math.min(...ys) && py <= Math.max(...ys);
}

export interface LocateSource {
  readonly nlay: number;
  readonly ncpl: number;
  readonly frame: ReferenceFrame;
  readonly tolerance: number;
  vertices(): CellVerticesView;
  topBotm(): LayeredArray;
}

export interface LocateOptions {
  /** `x`/`y` are in the grid's local frame. */
  local?: boolean;
  /** Return NaN sentinels instead of throwing when nothing matches. */
  forgive?: boolean;
}

export interface CellMatch {
  cell: number;
  layer?: number;
}

/**
 * Lowest-indexed cell containing the world point, and with `z` the first
 * layer whose top/bottom bracket it. Null when nothing matches.
 */
export function findCell(source: LocateSource, x: number, y: number, z?: number): CellMatch | null {
  const { x: xv, y: yv } = source.vertices();
  const ncpl = Math.min(source.ncpl, xv.length);
  let topBotm: LayeredArray | undefined;
  for (let cell = 0; cell < ncpl; cell++) {
    const xs = xv[cell];
    const ys = yv[cell];
    if (!inBoundingBox(x, y, xs, ys)) continue;
    if (!containsPoint(x, y, xs, ys, boundaryRadius(xs, ys, source.tolerance))) continue;
    if (z === undefined) return { cell };

    topBotm ??= source.topBotm();
    for (let layer = 0; layer < source.nlay; layer++) {
      if (topBotm[layer][cell] >= z && z >= topBotm[layer + 1][cell]) {
        return { cell, layer };
      }
    }
  }
  return null;
}

export function locate(source: LocateSource, x: number, y: number, z?: undefined, options?: LocateOptions): number;
export function locate(source: LocateSource, x: number, y: number, z: number, options?: LocateOptions): [number, number];
export function locate(
  source: LocateSource,
  x: number,
  y: number,
  z?: number,
  options?: LocateOptions
): number | [number, number];
export function locate(
  source: LocateSource,
  x: number,
  y: number,
  z?: number,
  options: LocateOptions = {}
): number | [number, number] {
  const [wx, wy] = options.local ? toWorld(x, y, source.frame) : [x, y];
  const match = findCell(source, wx, wy, z);
  if (match) {
    return z === undefined ? match.cell : [match.layer ?? 0, match.cell];
  }
  if (!options.forgive) throw new LocationNotFoundError(x, y, z);
  return z === undefined ? Number.NaN : [Number.NaN, Number.NaN];
}
