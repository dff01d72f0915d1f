/**
 * kd-places
 *
 * 2-D k-d tree spatial index and a place catalog built on it.
 */

// Core index
export {
  KDTree,
  axisForDepth,
  euclideanDistance,
  findMinAlongAxis,
  isWithinRectangle,
  pointsEqual,
} from './core/kd-tree.js';
export type {
  Axis,
  KDNode,
  NearestResult,
  Place,
  PlaceMatch,
  Point,
  RangeEntry,
  ReadonlyKDNode,
} from './core/types.js';

// Errors
export {
  DuplicatePlaceError,
  GeocodingError,
  IndexInvariantError,
  InvalidCoordinateError,
  PlaceNotFoundError,
  PlaceValidationError,
} from './core/errors.js';

// Geography
export { degreeBoxesAround, haversineKm, placesToFeatureCollection } from './core/geo-utils.js';
export type { DegreeBox, PlaceFeatureProperties } from './core/geo-utils.js';

// Catalog and geocoding
export { PlaceCatalog } from './services/place-catalog.js';
export type { GeocoderImportOptions, PlaceInput } from './services/place-catalog.js';
export { NominatimGeocoder } from './providers/nominatim-geocoder.js';
export type {
  GeocodeResult,
  GeocodeSearchOptions,
  Geocoder,
  Viewbox,
} from './providers/nominatim-geocoder.js';

// Persistence
export {
  loadCatalog,
  parsePlacesContent,
  readPlacesFile,
  serializePlaces,
  writePlacesFile,
} from './cli/lib/ndjson.js';

// Logging
export { createConsoleWriter, resetLogWriter, setLogWriter } from './core/utils/logger.js';
export type { LogLevel, LogMetadata, LogWriter } from './core/utils/logger.js';
