import type { ReferenceFrame, XY } from "./types.js";

export const IDENTITY_FRAME: Readonly<ReferenceFrame> = {
  xoffset: 0,
  yoffset: 0,
  rotation: 0,
};

export function isIdentityFrame(frame: ReferenceFrame): boolean {
  return frame.xoffset === 0 && frame.yoffset === 0 && frame.rotation === 0;
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

/** Rotate about the local origin, then translate by the frame offset. */
export function toWorld(x: number, y: number, frame: ReferenceFrame): XY {
  const cos = Math.cos(frame.rotation);
  const sin = Math.sin(frame.rotation);
  return [frame.xoffset + x * cos - y * sin, frame.yoffset + x * sin + y * cos];
}

/** Inverse of {@link toWorld}. */
export function toLocal(x: number, y: number, frame: ReferenceFrame): XY {
  const dx = x - frame.xoffset;
  const dy = y - frame.yoffset;
  const cos = Math.cos(-frame.rotation);
  const sin = Math.sin(-frame.rotation);
  return [dx * cos - dy * sin, dx * sin + dy * cos];
}

/**
 * Element-wise {@link toWorld} (or {@link toLocal} when `inverse`) over coordinate sequences.
 */
export function transformCoords(
  xs: readonly number[],
  ys: readonly number[],
  frame: ReferenceFrame,
  inverse = false
): [number[], number[]] {
  if (xs.length !== ys.length) {
    throw new RangeError(`x and y sequences differ in length (${xs.length} != ${ys.length})`);
  }
  const apply = inverse ? toLocal : toWorld;
  const outX = new Array<number>(xs.length);
  const outY = new Array<number>(ys.length);
  for (let i = 0; i < xs.length; i++) {
    const [tx, ty] = apply(xs[i], ys[i], frame);
    outX[i] = tx;
    outY[i] = ty;
  }
  return [outX, outY];
}
