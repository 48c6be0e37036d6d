import type {
  CellCenters,
  CellCentersView,
  CellVertices,
  CellVerticesView,
  GeometryBundles,
  GeometryKey,
  GeometryViews,
  LayeredArray,
} from "./types.js";

type Copiers = { [K in GeometryKey]: (view: GeometryViews[K]) => GeometryBundles[K] };

function copyRows(rows: LayeredArray): number[][] {
  return rows.map((row) => [...row]);
}

const copiers: Copiers = {
  cellcenters: (v: CellCentersView): CellCenters => ({
    x: [...v.x],
    y: [...v.y],
    z: v.z ? copyRows(v.z) : null,
  }),
  xyzgrid: (v: CellVerticesView): CellVertices => ({
    x: copyRows(v.x),
    y: copyRows(v.y),
    z: v.z ? copyRows(v.z) : null,
  }),
};

function freezeRows(rows: number[][] | null): void {
  if (!rows) return;
  rows.forEach((row) => Object.freeze(row));
  Object.freeze(rows);
}

function freezeBundles(bundles: GeometryBundles): GeometryViews {
  const { cellcenters, xyzgrid } = bundles;
  Object.freeze(cellcenters.x);
  Object.freeze(cellcenters.y);
  freezeRows(cellcenters.z);
  freezeRows(xyzgrid.x);
  freezeRows(xyzgrid.y);
  freezeRows(xyzgrid.z);
  Object.freeze(cellcenters);
  Object.freeze(xyzgrid);
  return Object.freeze(bundles);
}

interface CacheSnapshot {
  views: GeometryViews;
  generation: number;
}

/**
 * Generation-stamped store of derived grid geometry.
 *
 * `view` hands out the shared, frozen bundle and never copies; `get` returns
 * a fresh deep copy the caller owns. Both bundles are rebuilt together the
 * first time either is read after the owner's generation moves.
 */
export class GeometryCache {
  private snapshot: CacheSnapshot | null = null;
  private builds = 0;

  constructor(
    private readonly build: () => GeometryBundles,
    private readonly generation: () => number
  ) {}

  isStale(key: GeometryKey): boolean {
    return !this.snapshot || !(key in this.snapshot.views) || this.snapshot.generation !== this.generation();
  }

  /** Number of rebuilds performed so far. */
  get buildCount(): number {
    return this.builds;
  }

  view<K extends GeometryKey>(key: K): GeometryViews[K] {
    return this.current(key)[key];
  }

  get<K extends GeometryKey>(key: K): GeometryBundles[K] {
    const copy: Copiers[K] = copiers[key];
    return copy(this.view(key));
  }

  invalidate(): void {
    this.snapshot = null;
  }

  private current(key: GeometryKey): GeometryViews {
    if (!this.snapshot || this.isStale(key)) {
      const generation = this.generation();
      const views = freezeBundles(this.build());
      this.builds += 1;
      this.snapshot = { views, generation };
    }
    return this.snapshot.views;
  }
}
