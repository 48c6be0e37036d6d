import { isIdentityFrame, transformCoords } from "./transform.js";
import type { TopologyStore } from "./topology.js";
import type {
  ElevationInput,
  ElevationMidpoints,
  GeometryBundles,
  ReferenceFrame,
} from "./types.js";

export interface BuildGeometryInput {
  topology: TopologyStore;
  frame: ReferenceFrame;
  elevations: ElevationInput;
  zcoords: ElevationMidpoints;
}

/**
 * Resolve every cell's vertex ids into coordinate rings and record cell
 * centers, in topology order. Both bundles come out of one pass.
 */
export function buildGridGeometry({ topology, frame, elevations, zcoords }: BuildGeometryInput): GeometryBundles {
  const ncells = topology.cellCount;
  let xcenters: number[] = [];
  let ycenters: number[] = [];
  let xvertices: number[][] = [];
  let yvertices: number[][] = [];
  let zcenters: number[][] | null;
  let zvertices: number[][] | null;

  if (topology.kind === "cell1d") {
    const zc: number[] = [];
    const zv: number[][] = [];
    for (let c = 0; c < ncells; c++) {
      xcenters.push(topology.centerX(c));
      ycenters.push(topology.centerY(c));
      zc.push(topology.centerZ(c) ?? Number.NaN);
      const ring = Array.from(topology.cellVertexIds(c), (id) => topology.vertex(id));
      xvertices.push(ring.map((v) => v.x));
      yvertices.push(ring.map((v) => v.y));
      zv.push(ring.map((v) => v.z ?? Number.NaN));
    }
    zcenters = [zc];
    zvertices = zv;
  } else {
    for (let c = 0; c < ncells; c++) {
      xcenters.push(topology.centerX(c));
      ycenters.push(topology.centerY(c));
      const ring = Array.from(topology.cellVertexIds(c), (id) => topology.vertex(id));
      xvertices.push(ring.map((v) => v.x));
      yvertices.push(ring.map((v) => v.y));
    }
    const z = zcoords(elevations);
    zvertices = z.zVertices && z.zVertices.map((row) => [...row]);
    zcenters = z.zCenters && z.zCenters.map((row) => [...row]);
  }

  if (!isIdentityFrame(frame)) {
    [xcenters, ycenters] = transformCoords(xcenters, ycenters, frame);
    const xform = xvertices.map((xs, c) => transformCoords(xs, yvertices[c], frame));
    xvertices = xform.map(([xs]) => xs);
    yvertices = xform.map(([, ys]) => ys);
  }

  return {
    cellcenters: { x: xcenters, y: ycenters, z: zcenters },
    xyzgrid: { x: xvertices, y: yvertices, z: zvertices },
  };
}
