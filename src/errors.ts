/**
 * Geocoder Errors
 * Transport failures and payload decode failures are kept as separate classes
 */

export type GeocoderErrorCode =
  | 'NETWORK_ERROR'
  | 'REQUEST_ERROR'
  | 'API_ERROR'
  | (string & {});

// Raised for anything that went wrong between sending the request and receiving a body
export class GeocoderApiException extends Error {
  public readonly code: GeocoderErrorCode;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: GeocoderErrorCode,
    message: string,
    statusCode: number,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GeocoderApiException';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }

  toJSON(): { code: string; message: string } {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Raised when a response body does not have the shape expected for the
 * requested format. `format` names what was expected, e.g. `geojson` or
 * `autosuggest`.
 */
export class DecodeError extends Error {
  public readonly format: string;
  public readonly issues: string[];

  constructor(format: string, issues: string[]) {
    super(
      `Response does not match the expected "${format}" shape: ${issues.join('; ')}`
    );
    this.name = 'DecodeError';
    this.format = format;
    this.issues = issues;
  }

  toJSON(): { code: string; message: string } {
    return {
      code: 'DECODE_ERROR',
      message: this.message,
    };
  }
}
