/**
 * Pipeline errors. Routing failures are not errors: the refiner absorbs
 * them per edge. Only input problems and provider outages surface here.
 */

export type InvalidGeometryReason =
  | "unsupported-geometry"
  | "empty-geometry"
  | "non-finite-coordinate"
  | "coordinate-out-of-range";

/** A facility record cannot be reduced to a valid WGS84 coordinate */
export class InvalidGeometryError extends Error {
  readonly status = 422;

  constructor(
    readonly recordIndex: number,
    readonly reason: InvalidGeometryReason,
    readonly geometryType?: string,
  ) {
    super(
      `Invalid geometry at record ${recordIndex}: ${reason}` +
        (geometryType ? ` (${geometryType})` : ""),
    );
    this.name = "InvalidGeometryError";
  }
}

/** The routable network provider is unavailable as a whole (not per edge) */
export class ExternalProviderError extends Error {
  readonly status = 502;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExternalProviderError";
  }
}

/** Spanning tree input did not connect every node */
export class GraphDisconnectedError extends Error {
  constructor(
    readonly nodeCount: number,
    readonly treeEdgeCount: number,
  ) {
    super(
      `Graph is not connected: ${treeEdgeCount} tree edges for ${nodeCount} nodes`,
    );
    this.name = "GraphDisconnectedError";
  }
}
