/**
 * Request Options
 * Immutable builder for the optional query parameters of geocoding and
 * autosuggest requests
 */

import type {
  BoundingBox,
  Circle,
  Coordinates,
  InputType,
  OutputFormat,
  Polygon,
} from '../models/geocoding.js';

/**
 * Geographic filters. All four may be set on one request; which of them the
 * service applies when several are present is up to the service.
 */
export interface ClipPolicy {
  readonly countries?: readonly string[];
  readonly boundingBox?: BoundingBox;
  readonly circle?: Circle;
  readonly polygon?: Polygon;
}

interface RequestOptionsState {
  readonly nResults?: number;
  readonly focus?: Coordinates;
  readonly nFocusResults?: number;
  readonly clip: ClipPolicy;
  readonly inputType?: InputType;
  readonly language?: string;
  readonly locale?: string;
  readonly preferLand?: boolean;
  readonly outputFormat?: OutputFormat;
}

export type QueryParams = Record<string, string>;

export function formatCoordinates({ lat, lng }: Coordinates): string {
  return `${lat},${lng}`;
}

export function formatBoundingBox({ southwest, northeast }: BoundingBox): string {
  return `${formatCoordinates(southwest)},${formatCoordinates(northeast)}`;
}

export class RequestOptions {
  private readonly state: RequestOptionsState;

  private constructor(state: RequestOptionsState) {
    this.state = state;
    Object.freeze(this);
  }

  static create(): RequestOptions {
    return new RequestOptions({ clip: {} });
  }

  private with(patch: Partial<RequestOptionsState>): RequestOptions {
    return new RequestOptions({ ...this.state, ...patch });
  }

  private withClip(patch: ClipPolicy): RequestOptions {
    return this.with({ clip: { ...this.state.clip, ...patch } });
  }

  // ==================== Setters ====================

  focus(coordinates: Coordinates): RequestOptions {
    return this.with({ focus: { lat: coordinates.lat, lng: coordinates.lng } });
  }

  language(code: string): RequestOptions {
    return this.with({ language: code });
  }

  locale(code: string): RequestOptions {
    return this.with({ locale: code });
  }

  clipToCountry(...countries: string[]): RequestOptions {
    return this.withClip({ countries: [...countries] });
  }

  clipToBoundingBox(boundingBox: BoundingBox): RequestOptions {
    return this.withClip({
      boundingBox: {
        southwest: { ...boundingBox.southwest },
        northeast: { ...boundingBox.northeast },
      },
    });
  }

  clipToCircle(circle: Circle): RequestOptions {
    return this.withClip({
      circle: { center: { ...circle.center }, radiusMeters: circle.radiusMeters },
    });
  }

  clipToPolygon(polygon: Polygon): RequestOptions {
    return this.withClip({ polygon: polygon.map((point) => ({ ...point })) });
  }

  outputFormat(format: OutputFormat): RequestOptions {
    return this.with({ outputFormat: format });
  }

  nResults(count: number): RequestOptions {
    return this.with({ nResults: count });
  }

  nFocusResults(count: number): RequestOptions {
    return this.with({ nFocusResults: count });
  }

  inputType(type: InputType): RequestOptions {
    return this.with({ inputType: type });
  }

  preferLand(prefer: boolean): RequestOptions {
    return this.with({ preferLand: prefer });
  }

  // ==================== Accessors ====================

  get clip(): ClipPolicy {
    return this.state.clip;
  }

  /** The requested response shape; `json` unless set otherwise. */
  get format(): OutputFormat {
    return this.state.outputFormat ?? 'json';
  }

  // ==================== Serialization ====================

  /**
   * Query parameters for every option that has been set, in a fixed key
   * order. Unset options produce no key at all.
   */
  toQueryParams(): QueryParams {
    const { clip, ...state } = this.state;
    const params: QueryParams = {};

    if (state.nResults !== undefined) {
      params['n-result'] = String(state.nResults);
    }
    if (state.focus) {
      params.focus = formatCoordinates(state.focus);
    }
    if (state.nFocusResults !== undefined) {
      params['n-focus-result'] = String(state.nFocusResults);
    }
    if (clip.countries) {
      params['clip-to-country'] = clip.countries.join(',');
    }
    if (clip.boundingBox) {
      params['clip-to-bounding-box'] = formatBoundingBox(clip.boundingBox);
    }
    if (clip.circle) {
      params['clip-to-circle'] = `${formatCoordinates(clip.circle.center)},${clip.circle.radiusMeters}`;
    }
    if (clip.polygon) {
      params['clip-to-polygon'] = clip.polygon.map(formatCoordinates).join(',');
    }
    if (state.inputType) {
      params['input-type'] = state.inputType;
    }
    if (state.language) {
      params.language = state.language;
    }
    if (state.locale) {
      params.locale = state.locale;
    }
    if (state.preferLand !== undefined) {
      params['prefer-land'] = String(state.preferLand);
    }
    if (state.outputFormat) {
      params.format = state.outputFormat;
    }

    return params;
  }
}
