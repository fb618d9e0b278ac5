import { Identifier } from "./types"

export interface MissingPoint {
  readonly _tag: "MissingPoint";
  readonly message: string;
}

export interface SelfConnection {
  readonly _tag: "SelfConnection";
  readonly pointId: Identifier;
  readonly message: string;
}

export interface EmptyPath {
  readonly _tag: "EmptyPath";
  readonly message: string;
}

export interface PointNotFound {
  readonly _tag: "PointNotFound";
  readonly pointId: Identifier;
  readonly message: string;
}

export interface NoPathFound {
  readonly _tag: "NoPathFound";
  readonly message: string;
}

export interface PathCannotBeBuilt {
  readonly _tag: "PathCannotBeBuilt";
  readonly cause: EmptyPath;
  readonly message: string;
}

export interface DuplicatePoint {
  readonly _tag: "DuplicatePoint";
  readonly pointIds: ReadonlyArray<Identifier>;
  readonly message: string;
}

export type NodeError = MissingPoint | SelfConnection;
export type NetError = PointNotFound | NoPathFound | PathCannotBeBuilt;

export const missingPoint = (): MissingPoint => ({
  _tag: "MissingPoint",
  message: "Missing Point: a node cannot be built without a point.",
});

export const selfConnection = (pointId: Identifier): SelfConnection => ({
  _tag: "SelfConnection",
  pointId,
  message: `Self Connection Not Allowed: point '${pointId}' is connected to itself.`,
});

export const emptyPath = (): EmptyPath => ({
  _tag: "EmptyPath",
  message: "Empty Path: a path needs at least one point.",
});

export const pointNotFound = (pointId: Identifier): PointNotFound => ({
  _tag: "PointNotFound",
  pointId,
  message: `Point Not Found: the point with id '${pointId}' could not be found in the net.`,
});

export const noPathFound = (): NoPathFound => ({
  _tag: "NoPathFound",
  message: "No Path Found: no path connects the given points.",
});

export const pathCannotBeBuilt = (cause: EmptyPath): PathCannotBeBuilt => ({
  _tag: "PathCannotBeBuilt",
  cause,
  message: `Path Cannot Be Built: ${cause.message}`,
});

export const duplicatePoints = (pointIds: ReadonlyArray<Identifier>): DuplicatePoint => ({
  _tag: "DuplicatePoint",
  pointIds,
  message: pointIds
    .map(pointId => `Duplicate Points Not Allowed: point '${pointId}' already in net.`)
    .join("; "),
});

/**
 * Thrown when a connection names a point that has no node in the net.
 * The net was assembled from mismatched data, so the search cannot continue.
 */
export class NetInconsistencyError extends Error {
  constructor(readonly pointId: Identifier, readonly fromPointId: Identifier) {
    super(`Inconsistent Net: point '${fromPointId}' is connected to '${pointId}', which has no node.`);
    this.name = "NetInconsistencyError";
  }
}
