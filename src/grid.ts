import { buildGridGeometry } from "./builder.js";
import { GeometryCache } from "./cache.js";
import { resolveGridConfig, type GridConfig } from "./config.js";
import { layerMidpoints, stackTopBotm } from "./elevation.js";
import { ConstructionIncompleteError, IndexOutOfRangeError } from "./errors.js";
import { countPlottableLayers, projectLayerArray, type LayerArrayInput } from "./layers.js";
import { locate, type LocateOptions, type LocateSource } from "./locate.js";
import { cellPolygons, cellRing, gridLines, type GridLine } from "./render.js";
import { TopologyStore } from "./topology.js";
import { isIdentityFrame, toDegrees, toLocal, toRadians, toWorld, transformCoords } from "./transform.js";
import type {
  Cell1D,
  Cell2D,
  CellCenters,
  CellCentersView,
  CellKind,
  CellVertices,
  CellVerticesView,
  ElevationMidpoints,
  Extent,
  LayeredArray,
  ReferenceFrame,
  Vertex,
  XY,
} from "./types.js";

export interface VertexGridOptions {
  vertices?: readonly Vertex[];
  cell2d?: readonly Cell2D[];
  cell1d?: readonly Cell1D[];
  top?: readonly number[];
  botm?: LayeredArray;
  idomain?: LayeredArray;
  xoffset?: number;
  yoffset?: number;
  /** Rotation about the origin, degrees counter-clockwise. */
  angrot?: number;
  nlay?: number;
  ncpl?: number;
  /** Coordinate reference system label, carried through to exports. */
  crs?: string;
  zcoords?: ElevationMidpoints;
  config?: Partial<GridConfig>;
}

/**
 * Layered unstructured grid whose cells are polygons (or vertex chains)
 * over a shared vertex table.
 */
export class VertexGrid {
  private vertexTable?: readonly Vertex[];
  private cell2dTable?: readonly Cell2D[];
  private cell1dTable?: readonly Cell1D[];
  private topArray?: readonly number[];
  private botmArray?: LayeredArray;
  private idomainArray?: LayeredArray;
  private readonly explicitNlay?: number;
  private readonly explicitNcpl?: number;
  private frame: ReferenceFrame;
  private generation = 0;
  private topologyStore: TopologyStore | null = null;
  private readonly cache: GeometryCache;
  private readonly zcoords: ElevationMidpoints;
  readonly config: GridConfig;
  readonly crs?: string;

  constructor(options: VertexGridOptions = {}) {
    this.vertexTable = options.vertices;
    this.cell2dTable = options.cell2d;
    this.cell1dTable = options.cell1d;
    this.topArray = options.top;
    this.botmArray = options.botm;
    this.idomainArray = options.idomain;
    if (!options.botm) {
      this.explicitNlay = options.nlay;
      this.explicitNcpl = options.ncpl;
    }
    this.frame = {
      xoffset: options.xoffset ?? 0,
      yoffset: options.yoffset ?? 0,
      rotation: toRadians(options.angrot ?? 0),
    };
    this.crs = options.crs;
    this.zcoords = options.zcoords ?? layerMidpoints;
    this.config = resolveGridConfig(options.config);
    this.cache = new GeometryCache(
      () =>
        buildGridGeometry({
          topology: this.topology,
          frame: this.frame,
          elevations: { top: this.topArray, botm: this.botmArray },
          zcoords: this.zcoords,
        }),
      () => this.generation
    );
  }

  private touch(): void {
    this.generation += 1;
  }

  /** Advances on every mutation of topology, elevations or the reference frame. */
  get generationToken(): number {
    return this.generation;
  }

  // ── topology ──

  get isValid(): boolean {
    return this.vertexTable !== undefined && (this.cell2dTable !== undefined || this.cell1dTable !== undefined);
  }

  get isComplete(): boolean {
    return this.isValid && this.topArray !== undefined && this.botmArray !== undefined && this.idomainArray !== undefined;
  }

  get cellKind(): CellKind | undefined {
    if (this.cell1dTable) return "cell1d";
    if (this.cell2dTable) return "cell2d";
    return undefined;
  }

  get topology(): TopologyStore {
    if (!this.topologyStore) {
      const vertices = this.vertexTable;
      if (!vertices) throw new ConstructionIncompleteError("grid has no vertices");
      if (this.cell1dTable) {
        this.topologyStore = TopologyStore.fromCell1d(vertices, this.cell1dTable);
      } else if (this.cell2dTable) {
        this.topologyStore = TopologyStore.fromCell2d(vertices, this.cell2dTable);
      } else {
        throw new ConstructionIncompleteError("grid has no cell2d or cell1d topology");
      }
    }
    return this.topologyStore;
  }

  get nlay(): number {
    if (this.cell1dTable) return 1;
    if (this.botmArray) return this.botmArray.length;
    return this.explicitNlay ?? (this.cell2dTable ? 1 : 0);
  }

  get ncpl(): number {
    if (this.cell1dTable) return this.cell1dTable.length;
    if (this.botmArray) return this.botmArray[0]?.length ?? 0;
    if (this.cell2dTable && this.explicitNlay === undefined) return this.cell2dTable.length;
    return this.explicitNcpl ?? 0;
  }

  get nnodes(): number {
    return this.nlay * this.ncpl;
  }

  get nvert(): number {
    return this.vertexTable?.length ?? 0;
  }

  get shape(): [number, number] {
    return [this.nlay, this.ncpl];
  }

  get vertices(): readonly Vertex[] | undefined {
    return this.vertexTable;
  }

  /** Compacted 2-D cell records, or undefined for grids without them. */
  get cell2d(): Cell2D[] | undefined {
    if (!this.cell2dTable || !this.vertexTable) return undefined;
    return TopologyStore.fromCell2d(this.vertexTable, this.cell2dTable).cell2dRecords();
  }

  get cell1d(): Cell1D[] | undefined {
    if (!this.cell1dTable || !this.vertexTable) return undefined;
    return TopologyStore.fromCell1d(this.vertexTable, this.cell1dTable).cell1dRecords();
  }

  /** Vertex ids per cell. */
  get iverts(): number[][] {
    const topology = this.topology;
    const out: number[][] = [];
    for (let c = 0; c < topology.cellCount; c++) out.push(Array.from(topology.cellVertexIds(c)));
    return out;
  }

  /** Vertex table in world coordinates. */
  get verts(): XY[] {
    const table = this.vertexTable;
    if (!table) throw new ConstructionIncompleteError("grid has no vertices");
    const [xs, ys] = transformCoords(
      table.map((v) => v.x),
      table.map((v) => v.y),
      this.frame
    );
    return xs.map((x, i): XY => [x, ys[i]]);
  }

  setVertices(vertices: readonly Vertex[]): void {
    this.vertexTable = vertices;
    this.topologyStore = null;
    this.touch();
  }

  setCell2d(cells: readonly Cell2D[]): void {
    this.cell2dTable = cells;
    this.topologyStore = null;
    this.touch();
  }

  setCell1d(cells: readonly Cell1D[]): void {
    this.cell1dTable = cells;
    this.topologyStore = null;
    this.touch();
  }

  // ── elevations ──

  get top(): readonly number[] | undefined {
    return this.topArray;
  }

  get botm(): LayeredArray | undefined {
    return this.botmArray;
  }

  get idomain(): LayeredArray | undefined {
    return this.idomainArray;
  }

  /** `[top, ...botm]`, indexed `[layer][cell]`. */
  get topBotm(): number[][] {
    return stackTopBotm(this.topArray, this.botmArray);
  }

  setTop(top: readonly number[]): void {
    this.topArray = top;
    this.touch();
  }

  setBotm(botm: LayeredArray): void {
    this.botmArray = botm;
    this.touch();
  }

  setIdomain(idomain: LayeredArray): void {
    this.idomainArray = idomain;
  }

  // ── reference frame ──

  get referenceFrame(): ReferenceFrame {
    return { ...this.frame };
  }

  get xoffset(): number {
    return this.frame.xoffset;
  }

  get yoffset(): number {
    return this.frame.yoffset;
  }

  get angrot(): number {
    return toDegrees(this.frame.rotation);
  }

  get angrotRadians(): number {
    return this.frame.rotation;
  }

  get hasRefCoordinates(): boolean {
    return !isIdentityFrame(this.frame);
  }

  /** Replace any of offset and rotation (radians). */
  setReferenceFrame(frame: Partial<ReferenceFrame>): void {
    this.frame = {
      xoffset: frame.xoffset ?? this.frame.xoffset,
      yoffset: frame.yoffset ?? this.frame.yoffset,
      rotation: frame.rotation ?? this.frame.rotation,
    };
    this.touch();
  }

  setAngrot(degrees: number): void {
    this.setReferenceFrame({ rotation: toRadians(degrees) });
  }

  /** Local to world. */
  getCoords(x: number, y: number): XY {
    return toWorld(x, y, this.frame);
  }

  /** World to local. */
  getLocalCoords(x: number, y: number): XY {
    return toLocal(x, y, this.frame);
  }

  // ── cached geometry ──

  xyzCellCenters(): CellCenters {
    return this.cache.get("cellcenters");
  }

  xyzVertices(): CellVertices {
    return this.cache.get("xyzgrid");
  }

  /** Shared cell centers; frozen, never copied. */
  cellCentersView(): CellCentersView {
    return this.cache.view("cellcenters");
  }

  /** Shared vertex rings; frozen, never copied. */
  verticesView(): CellVerticesView {
    return this.cache.view("xyzgrid");
  }

  get geometryBuildCount(): number {
    return this.cache.buildCount;
  }

  get xcellcenters(): number[] {
    return this.xyzCellCenters().x;
  }

  get ycellcenters(): number[] {
    return this.xyzCellCenters().y;
  }

  get zcellcenters(): number[][] | null {
    return this.xyzCellCenters().z;
  }

  get xvertices(): number[][] {
    return this.xyzVertices().x;
  }

  get yvertices(): number[][] {
    return this.xyzVertices().y;
  }

  get zvertices(): number[][] | null {
    return this.xyzVertices().z;
  }

  get extent(): Extent {
    const { x, y } = this.verticesView();
    let xmin = Infinity;
    let xmax = -Infinity;
    let ymin = Infinity;
    let ymax = -Infinity;
    x.forEach((xs, cell) => {
      const ys = y[cell];
      for (let i = 0; i < xs.length; i++) {
        if (xs[i] < xmin) xmin = xs[i];
        if (xs[i] > xmax) xmax = xs[i];
        if (ys[i] < ymin) ymin = ys[i];
        if (ys[i] > ymax) ymax = ys[i];
      }
    });
    return { xmin, xmax, ymin, ymax };
  }

  get gridLines(): GridLine[] {
    return gridLines(this.verticesView());
  }

  get mapPolygons(): XY[][] {
    return cellPolygons(this.verticesView(), this.ncpl);
  }

  /**
   * Ring of a cell in world coordinates. Node numbers from lower layers are
   * folded back onto their cell, since geometry repeats per layer.
   */
  getCellVertices(cellid: number): XY[] {
    const nnodes = this.nnodes;
    if (!Number.isInteger(cellid) || cellid < 0 || cellid >= nnodes) {
      throw new IndexOutOfRangeError(`cellid ${cellid} out of index for size ${nnodes}`);
    }
    return cellRing(this.verticesView(), cellid % this.ncpl);
  }

  // ── queries ──

  private locateSource(): LocateSource {
    return {
      nlay: this.nlay,
      ncpl: this.ncpl,
      frame: this.frame,
      tolerance: this.config.boundaryTolerance,
      vertices: () => this.verticesView(),
      topBotm: () => this.topBotm,
    };
  }

  /**
   * Cell containing the point; on a shared edge the lowest cell number wins.
   * With `z`, returns `[layer, cell]`.
   */
  intersect(x: number, y: number, z?: undefined, options?: LocateOptions): number;
  intersect(x: number, y: number, z: number, options?: LocateOptions): [number, number];
  intersect(x: number, y: number, z?: number, options?: LocateOptions): number | [number, number];
  intersect(x: number, y: number, z?: number, options?: LocateOptions): number | [number, number] {
    return locate(this.locateSource(), x, y, z, options);
  }

  getPlottableLayerShape(): [number] {
    return [this.ncpl];
  }

  getPlottableLayerArray(a: LayerArrayInput, layer: number): number[] {
    return projectLayerArray(a, layer, { nlay: this.nlay, ncpl: this.ncpl });
  }

  getNumberPlottableLayers(a: LayerArrayInput): number {
    return countPlottableLayers(a, this.ncpl);
  }

  // ── derived grids ──

  /** New grid with every length scaled by `factor`. */
  convertGrid(factor: number): VertexGrid {
    const { vertexTable, topArray, botmArray, idomainArray } = this;
    if (!this.isComplete || !vertexTable || !topArray || !botmArray || !idomainArray) {
      throw new ConstructionIncompleteError("Grid is not complete and cannot be converted");
    }
    return new VertexGrid({
      vertices: vertexTable.map((v) => ({
        id: v.id,
        x: v.x * factor,
        y: v.y * factor,
        ...(v.z === undefined ? {} : { z: v.z * factor }),
      })),
      cell2d: this.cell2dTable?.map((c) => ({
        ...c,
        center_x: c.center_x * factor,
        center_y: c.center_y * factor,
      })),
      cell1d: this.cell1dTable?.map((c) => ({
        ...c,
        center_x: c.center_x * factor,
        center_y: c.center_y * factor,
        center_z: c.center_z * factor,
      })),
      top: topArray.map((z) => z * factor),
      botm: botmArray.map((row) => row.map((z) => z * factor)),
      idomain: idomainArray,
      xoffset: this.xoffset * factor,
      yoffset: this.yoffset * factor,
      angrot: this.angrot,
      crs: this.crs,
      zcoords: this.zcoords,
      config: this.config,
    });
  }
}
