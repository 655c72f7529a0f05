/**
 * Shared geocoding client for the MCP tools, created from the environment
 * on first use
 */

import { createClientFromEnv } from '../config.js';
import type { GeocodingClient } from '../services/geocoding/client.js';

let geocodingClient: GeocodingClient | null = null;

export function getGeocodingClient(): GeocodingClient {
  if (!geocodingClient) {
    geocodingClient = createClientFromEnv();
  }
  return geocodingClient;
}

// Reset client for testing purposes
export function resetGeocodingClient(): void {
  geocodingClient = null;
}
