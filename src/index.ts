/**
 * Three-word address geocoding client
 *
 * Offline recognition of three-word addresses in text, an immutable request
 * options builder, and a typed client for the conversion, autosuggest and
 * grid endpoints.
 */

// Address recognition (offline)
export {
  isPossibleAddress,
  findPossibleAddresses,
  didYouMean,
} from './recognizer/recognizer.js';
export { ADDRESS_DELIMITERS, LOOSE_SEPARATORS } from './recognizer/patterns.js';

// Request options
export {
  RequestOptions,
  formatCoordinates,
  formatBoundingBox,
  type ClipPolicy,
  type QueryParams,
} from './options/request-options.js';

// Client
export {
  GeocodingClient,
  createGeocodingClient,
  DEFAULT_API_HOST,
  type GeocodingClientConfig,
} from './services/geocoding/client.js';
export {
  AxiosTransport,
  type Transport,
  type AxiosTransportConfig,
} from './services/geocoding/transport.js';
export {
  decodeGeocodeResult,
  decodeGridSection,
} from './services/geocoding/format.js';
export { loadConfig, createClientFromEnv } from './config.js';

// Errors
export { GeocoderApiException, DecodeError, type GeocoderErrorCode } from './errors.js';

// Models
export type {
  Coordinates,
  BoundingBox,
  Circle,
  Polygon,
  OutputFormat,
  InputType,
  Square,
  Address,
  AddressFeature,
  AddressGeoJson,
  GeocodeResult,
  GridLine,
  GridSectionJson,
  GridSectionGeoJson,
  GridSectionResult,
  Suggestion,
  AutosuggestResponse,
  Language,
  AvailableLanguages,
} from './models/geocoding.js';
