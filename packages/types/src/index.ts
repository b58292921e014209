/**
 * @hubline/types
 *
 * Shared domain types for the logistics network pipeline.
 *
 * - Facility: raw geometric records per transport mode
 * - Network: points, edges and the assembled result
 * - Road: routable network contracts used for edge refinement
 */

export * from "./geo.js";
export * from "./facility.js";
export * from "./network.js";
export * from "./road.js";
