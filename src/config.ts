export interface GridConfig {
  /** Distance within which a point on a cell edge still counts as inside. */
  boundaryTolerance: number;
}

export const DEFAULT_GRID_CONFIG: Readonly<GridConfig> = {
  boundaryTolerance: 1e-9,
};

export const BOUNDARY_TOLERANCE_ENV = "VERTEX_GRID_BOUNDARY_TOLERANCE";

type Env = Record<string, string | undefined>;

function processEnv(): Env {
  return typeof process !== "undefined" && process.env ? process.env : {};
}

function isUsableTolerance(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function parseTolerance(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  return isUsableTolerance(value) ? value : undefined;
}

/**
 * Merge defaults, environment and explicit overrides, in increasing order of precedence.
 */
export function resolveGridConfig(overrides: Partial<GridConfig> = {}, env: Env = processEnv()): GridConfig {
  if (overrides.boundaryTolerance !== undefined && !isUsableTolerance(overrides.boundaryTolerance)) {
    throw new RangeError(`boundaryTolerance must be a finite number > 0, got ${overrides.boundaryTolerance}`);
  }
  const fromEnv = parseTolerance(env[BOUNDARY_TOLERANCE_ENV]);
  return {
    boundaryTolerance: overrides.boundaryTolerance ?? fromEnv ?? DEFAULT_GRID_CONFIG.boundaryTolerance,
  };
}
