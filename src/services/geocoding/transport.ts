/**
 * Geocoder Transport
 * HTTP plumbing for the geocoding service: base URL, auth header, logging
 * and conversion of failures into GeocoderApiException
 */

import axios, {
  AxiosError,
  AxiosInstance,
  InternalAxiosRequestConfig,
} from 'axios';
import { GeocoderApiException } from '../../errors.js';
import { ApiErrorResponseSchema } from '../../models/geocoding.js';
import type { QueryParams } from '../../options/request-options.js';

export const API_KEY_HEADER = 'X-Api-Key';
export const WRAPPER_HEADER = 'X-W3W-Wrapper';
export const WRAPPER_ID = `threeword-geocoder-ts/0.1.0 (${process.platform})`;

/**
 * Anything that can issue a GET against the service and hand back the
 * parsed body. Resolves to `null` for an empty success body.
 */
export interface Transport {
  get(path: string, params?: QueryParams): Promise<unknown>;
}

export interface AxiosTransportConfig {
  apiKey: string;
  baseUrl: string;
  timeout: number;
  headers: Record<string, string>;
  debug: boolean;
}

export class AxiosTransport implements Transport {
  private client: AxiosInstance;
  private debug: boolean;

  constructor(config: AxiosTransportConfig) {
    this.debug = config.debug;

    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout,
      headers: {
        Accept: 'application/json',
        ...config.headers,
        [WRAPPER_HEADER]: WRAPPER_ID,
      },
    });

    this.client.interceptors.request.use(
      (request: InternalAxiosRequestConfig) => {
        request.headers[API_KEY_HEADER] = config.apiKey;
        this.log(`${request.method?.toUpperCase()} ${request.url}`);
        return request;
      }
    );

    this.client.interceptors.response.use(
      (response) => {
        this.log(`Response ${response.status} ${response.config.url}`);
        return response;
      },
      (error: AxiosError) => this.handleError(error)
    );
  }

  private log(message: string): void {
    if (this.debug) {
      // stdout belongs to the stdio protocol
      console.error(`[Geocoder API] ${message}`);
    }
  }

  private handleError(error: AxiosError): never {
    if (error.response) {
      const { status, data } = error.response;
      this.log(`Error ${status}: ${JSON.stringify(data)}`);
      const body = ApiErrorResponseSchema.safeParse(data);
      if (body.success) {
        throw new GeocoderApiException(
          body.data.error.code,
          body.data.error.message,
          status
        );
      }
      throw new GeocoderApiException('API_ERROR', error.message, status);
    } else if (error.request) {
      this.log('Network error: Unable to reach API');
      throw new GeocoderApiException(
        'NETWORK_ERROR',
        `Network error: Unable to reach geocoding API (${error.message})`,
        0
      );
    } else {
      this.log(`Request error: ${error.message}`);
      throw new GeocoderApiException('REQUEST_ERROR', error.message, 0);
    }
  }

  async get(path: string, params?: QueryParams): Promise<unknown> {
    const response = await this.client.get<unknown>(path, { params });
    // Empty bodies come back as '' from axios
    if (response.data === '' || response.data === undefined) {
      return null;
    }
    return response.data;
  }
}
