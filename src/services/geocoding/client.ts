/**
 * Geocoding Client
 * Composes request options into queries, sends them through a Transport and
 * decodes the bodies into typed results
 */

import {
  AutosuggestResponseSchema,
  AvailableLanguagesSchema,
  type AutosuggestResponse,
  type AvailableLanguages,
  type BoundingBox,
  type Coordinates,
  type GeocodeResult,
  type GridSectionResult,
  type OutputFormat,
  type Suggestion,
} from '../../models/geocoding.js';
import {
  RequestOptions,
  formatBoundingBox,
  formatCoordinates,
} from '../../options/request-options.js';
import { isPossibleAddress } from '../../recognizer/recognizer.js';
import { decodeGeocodeResult, decodeGridSection, decodeWith } from './format.js';
import { AxiosTransport, type Transport } from './transport.js';

export const DEFAULT_API_HOST = 'https://api.what3words.com/v3';

export interface GeocodingClientConfig {
  apiKey: string;
  hostname?: string;
  headers?: Record<string, string>;
  timeout?: number;
  debug?: boolean;
  // Replaces the axios transport; hostname, headers, timeout and debug are then unused
  transport?: Transport;
}

const DEFAULT_CONFIG = {
  hostname: DEFAULT_API_HOST,
  timeout: 30000,
  debug: false,
};

export class GeocodingClient {
  private transport: Transport;
  public readonly hostname: string;

  constructor(config: GeocodingClientConfig) {
    // Explicit undefined falls back to the default as well
    this.hostname = config.hostname ?? DEFAULT_CONFIG.hostname;

    this.transport =
      config.transport ??
      new AxiosTransport({
        apiKey: config.apiKey,
        baseUrl: this.hostname,
        timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
        headers: { ...config.headers },
        debug: config.debug ?? DEFAULT_CONFIG.debug,
      });
  }

  // ==================== Conversion ====================

  /**
   * Three-word address of the square containing `coordinates`.
   * The result variant follows `options.outputFormat` (json by default).
   */
  async convertTo3wa(
    coordinates: Coordinates,
    options: RequestOptions = RequestOptions.create()
  ): Promise<GeocodeResult> {
    const format = options.format;
    const raw = await this.transport.get('/convert-to-3wa', {
      coordinates: formatCoordinates(coordinates),
      ...options.toQueryParams(),
      format,
    });
    return decodeGeocodeResult(format, raw);
  }

  /**
   * Centre coordinates and square of a three-word address.
   */
  async convertToCoordinates(
    words: string,
    options: RequestOptions = RequestOptions.create()
  ): Promise<GeocodeResult> {
    const format = options.format;
    const raw = await this.transport.get('/convert-to-coordinates', {
      words,
      ...options.toQueryParams(),
      format,
    });
    return decodeGeocodeResult(format, raw);
  }

  // ==================== Reference data ====================

  async availableLanguages(): Promise<AvailableLanguages> {
    const raw = await this.transport.get('/available-languages');
    return decodeWith(AvailableLanguagesSchema, raw, 'available-languages');
  }

  /**
   * The 3m grid lines inside `boundingBox`.
   */
  async gridSection(
    boundingBox: BoundingBox,
    format: OutputFormat = 'json'
  ): Promise<GridSectionResult> {
    const raw = await this.transport.get('/grid-section', {
      'bounding-box': formatBoundingBox(boundingBox),
      format,
    });
    return decodeGridSection(format, raw);
  }

  // ==================== Autosuggest ====================

  async autosuggest(
    input: string,
    options: RequestOptions = RequestOptions.create()
  ): Promise<AutosuggestResponse> {
    const raw = await this.transport.get('/autosuggest', {
      input,
      ...options.toQueryParams(),
    });
    return decodeWith(AutosuggestResponseSchema, raw, 'autosuggest');
  }

  /**
   * Like autosuggest, but every suggestion also carries coordinates,
   * square and map link.
   */
  async autosuggestWithCoordinates(
    input: string,
    options: RequestOptions = RequestOptions.create()
  ): Promise<AutosuggestResponse> {
    const raw = await this.transport.get('/autosuggest-with-coordinates', {
      input,
      ...options.toQueryParams(),
    });
    return decodeWith(AutosuggestResponseSchema, raw, 'autosuggest');
  }

  /**
   * Report which suggestion the user picked for `rawInput`. Pass the same
   * options that produced the suggestions.
   */
  async autosuggestSelection(
    rawInput: string,
    suggestion: Pick<Suggestion, 'words' | 'rank'>,
    options: RequestOptions = RequestOptions.create()
  ): Promise<void> {
    await this.transport.get('/autosuggest-selection', {
      'raw-input': rawInput,
      selection: suggestion.words,
      rank: String(suggestion.rank),
      'source-api': 'text',
      ...options.toQueryParams(),
    });
  }

  // ==================== Validation ====================

  /**
   * True when `text` is address-shaped and the service's top suggestion for
   * it is exactly that address. Only address-shaped input reaches the
   * service; transport and decode failures are rethrown.
   */
  async isValidAddress(text: string): Promise<boolean> {
    const words = text.trim();
    if (!isPossibleAddress(words)) {
      return false;
    }

    const { suggestions } = await this.autosuggest(
      words,
      RequestOptions.create().nResults(1)
    );
    return suggestions.length > 0 && suggestions[0].words === words;
  }
}

/**
 * Create a geocoding client instance
 */
export function createGeocodingClient(config: GeocodingClientConfig): GeocodingClient {
  return new GeocodingClient(config);
}
