import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import nock from 'nock';
import { convertTo3waTool, convertToCoordinatesTool } from '../../src/tools/convert.js';
import {
  autosuggestSchema,
  autosuggestTool,
  buildAutosuggestOptions,
} from '../../src/tools/autosuggest.js';
import { availableLanguagesTool, gridSectionTool } from '../../src/tools/reference.js';
import { geocoderTools, registerAllTools } from '../../src/tools/index.js';
import { resetGeocodingClient } from '../../src/tools/client.js';
import { toolRegistry } from '../../src/mcp/registry.js';
import {
  addressGeoJson,
  addressJson,
  autosuggestBody,
  gridSectionJson,
  languagesBody,
} from '../fixtures/responses.js';

describe('Geocoding tools', () => {
  const BASE_URL = 'https://api.example.test/v3';

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    vi.stubEnv('GEOCODER_API_KEY', 'test-api-key');
    vi.stubEnv('GEOCODER_API_HOST', BASE_URL);
    vi.stubEnv('GEOCODER_DEBUG', 'false');
    resetGeocodingClient();
    nock.cleanAll();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetGeocodingClient();
    nock.cleanAll();
  });

  describe('convert_to_3wa', () => {
    it('should convert coordinates using the configured key', async () => {
      const scope = nock(BASE_URL)
        .get('/convert-to-3wa')
        .matchHeader('X-Api-Key', 'test-api-key')
        .query({ coordinates: '51.521251,-0.203586', language: 'en', format: 'json' })
        .reply(200, addressJson);

      const response = await convertTo3waTool.handler({
        latitude: 51.521251,
        longitude: -0.203586,
        language: 'en',
      });

      expect(scope.isDone()).toBe(true);
      expect(response.isError).toBeUndefined();
      expect(JSON.parse(response.content[0].text)).toEqual({
        format: 'json',
        address: addressJson,
      });
    });

    it('should reject out-of-range latitude without calling the service', async () => {
      const response = await convertTo3waTool.handler({ latitude: 95, longitude: 0 });

      expect(response.isError).toBe(true);
      expect(JSON.parse(response.content[0].text)).toEqual({
        error: 'INVALID_PARAMS',
        message: 'latitude: Number must be less than or equal to 90',
        data: { issues: ['latitude: Number must be less than or equal to 90'] },
      });
    });

    it('should report service errors as error content', async () => {
      nock(BASE_URL)
        .get('/convert-to-3wa')
        .query(true)
        .reply(401, { error: { code: 'InvalidKey', message: 'Authentication failed' } });

      const response = await convertTo3waTool.handler({ latitude: 1, longitude: 2 });

      expect(response.isError).toBe(true);
      expect(JSON.parse(response.content[0].text)).toEqual({
        error: 'InvalidKey',
        message: 'Authentication failed',
      });
    });

    it('should report a body of the wrong shape as a decode error', async () => {
      nock(BASE_URL)
        .get('/convert-to-3wa')
        .query({ coordinates: '1,2', format: 'geojson' })
        .reply(200, addressJson);

      const response = await convertTo3waTool.handler({
        latitude: 1,
        longitude: 2,
        format: 'geojson',
      });

      expect(response.isError).toBe(true);
      expect(JSON.parse(response.content[0].text).error).toBe('DECODE_ERROR');
    });
  });

  describe('convert_to_coordinates', () => {
    it('should return the geojson result when asked', async () => {
      nock(BASE_URL)
        .get('/convert-to-coordinates')
        .query({ words: 'filled.count.soap', format: 'geojson' })
        .reply(200, addressGeoJson);

      const response = await convertToCoordinatesTool.handler({
        words: 'filled.count.soap',
        format: 'geojson',
      });

      expect(JSON.parse(response.content[0].text)).toEqual({
        format: 'geojson',
        collection: addressGeoJson,
      });
    });

    it('should require the words', async () => {
      const response = await convertToCoordinatesTool.handler({ words: '' });
      expect(response.isError).toBe(true);
      expect(JSON.parse(response.content[0].text)).toEqual({
        error: 'INVALID_PARAMS',
        message: 'words: String must contain at least 1 character(s)',
        data: { issues: ['words: String must contain at least 1 character(s)'] },
      });
    });
  });

  describe('autosuggest', () => {
    it('should translate tool arguments into request options', () => {
      const input = autosuggestSchema.parse({
        input: 'filled.count.so',
        focusLatitude: 51.5,
        focusLongitude: -0.2,
        clipToCountry: ['GB'],
        nResults: 2,
        language: 'en',
      });

      expect(buildAutosuggestOptions(input).toQueryParams()).toEqual({
        'n-result': '2',
        focus: '51.5,-0.2',
        'clip-to-country': 'GB',
        language: 'en',
      });
    });

    it('should require both focus coordinates', async () => {
      const response = await autosuggestTool.handler({
        input: 'filled.count.so',
        focusLatitude: 51.5,
      });

      expect(JSON.parse(response.content[0].text)).toEqual({
        error: 'INVALID_PARAMS',
        message: 'focusLatitude: focusLatitude and focusLongitude must be given together',
        data: { issues: ['focusLatitude: focusLatitude and focusLongitude must be given together'] },
      });
    });

    it('should return the suggestions', async () => {
      nock(BASE_URL)
        .get('/autosuggest')
        .query({ input: 'filled.count.so', 'clip-to-country': 'GB,FR' })
        .reply(200, autosuggestBody);

      const response = await autosuggestTool.handler({
        input: 'filled.count.so',
        clipToCountry: ['GB', 'FR'],
      });

      expect(JSON.parse(response.content[0].text)).toEqual(autosuggestBody);
    });
  });

  describe('reference tools', () => {
    it('should list available languages', async () => {
      nock(BASE_URL).get('/available-languages').reply(200, languagesBody);

      const response = await availableLanguagesTool.handler({});
      expect(JSON.parse(response.content[0].text)).toEqual(languagesBody);
    });

    it('should fetch a grid section for the box', async () => {
      nock(BASE_URL)
        .get('/grid-section')
        .query({
          'bounding-box': '52.207988,0.116126,52.208867,0.11754',
          format: 'json',
        })
        .reply(200, gridSectionJson);

      const response = await gridSectionTool.handler({
        southLat: 52.207988,
        westLng: 0.116126,
        northLat: 52.208867,
        eastLng: 0.11754,
      });

      expect(JSON.parse(response.content[0].text)).toEqual({
        format: 'json',
        grid: gridSectionJson,
      });
    });

    it('should reject an inverted bounding box', async () => {
      const response = await gridSectionTool.handler({
        southLat: 53,
        westLng: 0,
        northLat: 52,
        eastLng: 1,
      });

      expect(JSON.parse(response.content[0].text)).toEqual({
        error: 'INVALID_PARAMS',
        message: 'southLat: southLat must not be greater than northLat',
        data: { issues: ['southLat: southLat must not be greater than northLat'] },
      });
    });
  });

  describe('registerAllTools', () => {
    afterEach(() => {
      toolRegistry.clear();
    });

    it('should register every tool once', () => {
      toolRegistry.clear();
      registerAllTools();
      registerAllTools();

      expect(toolRegistry.size).toBe(geocoderTools.length);
      expect(toolRegistry.listTools().map((tool) => tool.name)).toEqual([
        'convert_to_3wa',
        'convert_to_coordinates',
        'autosuggest',
        'available_languages',
        'grid_section',
        'find_possible_3wa',
        'is_possible_3wa',
        'did_you_mean',
      ]);
    });
  });
});
