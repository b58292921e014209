export {
  networkToGeoJson,
  type GeoJsonExportOptions,
  type NetworkFeature,
  type NetworkFeatureCollection,
} from "./geojson.js";
