export class GridError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The grid lacks the topology or elevation data an operation needs. */
export class ConstructionIncompleteError extends GridError {}

export class IndexOutOfRangeError extends GridError {}

export class ShapeMismatchError extends GridError {}

export class LocationNotFoundError extends GridError {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly z?: number
  ) {
    super(`point (${x}, ${y}${z === undefined ? "" : `, ${z}`}) is outside of the model area`);
  }
}

/** Raised when a reshaped array fails its own length check. */
export class InternalConsistencyError extends GridError {}
