import { IndexOutOfRangeError, InternalConsistencyError, ShapeMismatchError } from "./errors.js";
import type { LayerShape } from "./types.js";

export type NumericVector = ArrayLike<number>;

export type NestedArray = NumericVector | readonly NestedArray[];

/** Nested numeric array of rank 1 to 3 (deeper nesting is rejected at runtime). */
export type LayerArrayInput = NestedArray;

function isVector(a: NestedArray): a is NumericVector {
  return a.length === 0 || typeof a[0] === "number";
}

/**
 * Shape of a rectangular nested array, outermost axis first.
 */
export function shapeOf(a: NestedArray): number[] {
  if (isVector(a)) return [a.length];
  const outer: readonly NestedArray[] = a;
  const inner = shapeOf(outer[0]);
  for (let i = 1; i < outer.length; i++) {
    const s = shapeOf(outer[i]);
    if (s.length !== inner.length || s.some((d, k) => d !== inner[k])) {
      throw new ShapeMismatchError(`ragged array: row ${i} has shape [${s.join(", ")}], expected [${inner.join(", ")}]`);
    }
  }
  return [outer.length, ...inner];
}

function rows(a: NestedArray): readonly NestedArray[] {
  if (isVector(a)) throw new ShapeMismatchError("expected a nested array, got a flat one");
  return a;
}

function vector(a: NestedArray): number[] {
  if (!isVector(a)) throw new ShapeMismatchError("expected a flat array, got a nested one");
  return Array.from(a);
}

function checkLayer(layer: number, nlay: number): void {
  if (!Number.isInteger(layer) || layer < 0 || layer >= nlay) {
    throw new IndexOutOfRangeError(`layer ${layer} out of range for ${nlay} layers`);
  }
}

/**
 * Reduce a client array to the flat `ncpl` slice for one layer.
 *
 * - rank 3: exactly one of the first two axes must have size 1; it is
 *   squeezed and the remaining layer axis indexed.
 * - rank 2: `[nlay][ncpl]`, indexed by layer.
 * - rank 1: `ncpl` values are returned as-is, `nlay * ncpl` values are
 *   reshaped and sliced.
 */
export function projectLayerArray(a: LayerArrayInput, layer: number, { nlay, ncpl }: LayerShape): number[] {
  const shape = shapeOf(a);
  let plot: number[];

  if (shape.length === 3) {
    const axis0 = shape[0] === 1;
    const axis1 = shape[1] === 1;
    if (axis0 === axis1) {
      throw new ShapeMismatchError(
        `array has 3 dimensions [${shape.join(", ")}] so exactly one of the first two must be of size 1`
      );
    }
    if (axis0) {
      const squeezed = rows(rows(a)[0]);
      checkLayer(layer, squeezed.length);
      plot = vector(squeezed[layer]);
    } else {
      const squeezed = rows(a);
      checkLayer(layer, squeezed.length);
      plot = vector(rows(squeezed[layer])[0]);
    }
  } else if (shape.length === 2) {
    const layers = rows(a);
    checkLayer(layer, layers.length);
    plot = vector(layers[layer]);
  } else if (shape.length === 1) {
    const flat = vector(a);
    if (flat.length === ncpl) {
      plot = flat;
    } else if (flat.length === nlay * ncpl) {
      checkLayer(layer, nlay);
      plot = flat.slice(layer * ncpl, (layer + 1) * ncpl);
    } else {
      throw new ShapeMismatchError(`array of length ${flat.length} matches neither ncpl (${ncpl}) nor nnodes (${nlay * ncpl})`);
    }
  } else {
    throw new ShapeMismatchError(`array to plot must be of dimension 1, 2 or 3, got ${shape.length}`);
  }

  if (plot.length !== ncpl) {
    throw new InternalConsistencyError(`${plot.length} /= ${ncpl}`);
  }
  return plot;
}

/** How many layer slices the array holds. */
export function countPlottableLayers(a: LayerArrayInput, ncpl: number): number {
  const shape = shapeOf(a);
  if (shape.length === 1 && shape[0] === ncpl) return 1;
  const size = shape.reduce((acc, d) => acc * d, 1);
  return Math.floor(size / ncpl);
}
