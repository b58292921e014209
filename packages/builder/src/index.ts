/**
 * @hubline/builder
 *
 * Facility and road network ingestion from OpenStreetMap.
 *
 * 1. Pick the OSM tags of a transport mode
 * 2. Query Overpass for facilities (or drivable roads) inside a bbox
 * 3. Parse the response into FacilityRecords / RoadNetworkData
 * 4. Keep facility sets in a read-through cache
 */

export { UnknownModeError, FacilitySourceError } from "./errors.js";

export { MODE_TAGS, getModeTags, isTransportMode, parseMode } from "./ingestion/modes.js";

export {
  loadFacilities,
  type LoadFacilitiesOptions,
  type FacilityLoadResult,
} from "./ingestion/index.js";

export {
  DiskFacilityCache,
  MemoryFacilityCache,
  cacheSizeKB,
  defaultCacheDir,
  facilityCacheId,
  type FacilityCache,
  type FacilityCacheEntry,
  type FacilityCacheKey,
} from "./ingestion/cache.js";

// Overpass API
export {
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT,
  DRIVABLE_HIGHWAYS,
  buildFacilityQuery,
  buildRoadNetworkQuery,
  fetchOverpassData,
  formatBbox as formatOverpassBbox,
  type OverpassOptions,
} from "./ingestion/overpass/query.js";
export {
  assembleRings,
  parseFacilityResponse,
  parseRoadNetworkResponse,
  type FacilityParseResult,
} from "./ingestion/overpass/parser.js";

// Bounding boxes
export {
  bboxFromEdges,
  bboxProblem,
  edgesFromBbox,
  expandBbox,
  formatBbox,
  parseBboxEdges,
  type BboxEdges,
} from "./location/index.js";
