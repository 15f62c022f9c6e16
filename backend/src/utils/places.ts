import { BoundingBox } from './geo.js';
import { FetchWithTimeout, isRecord, readJsonPayload } from './http-client.js';

export const MAX_QUERY_LENGTH = 120;
export const MAX_PLACE_RESULTS = 8;

export interface PlaceResult {
  name: string;
  lat: number;
  lon: number;
  type: string;
  class: string;
}

export const normalizeSearchQuery = (value: unknown): string =>
  typeof value === 'string' ? value.trim().slice(0, MAX_QUERY_LENGTH) : '';

export const buildNominatimSearchUrl = (query: string, region: BoundingBox | null, limit: number = MAX_PLACE_RESULTS): string => {
  const params = new URLSearchParams({
    format: 'json',
    q: query,
    limit: String(limit),
    addressdetails: '1',
  });
  if (region) {
    // viewbox is left,top,right,bottom; without `bounded` it only ranks results.
    params.set('viewbox', [region.minLon, region.maxLat, region.maxLon, region.minLat].map((value) => value.toFixed(6)).join(','));
  }
  return `https://nominatim.openstreetmap.org/search?${params.toString()}`;
};

const toPlaceResult = (item: unknown): PlaceResult | null => {
  if (!isRecord(item) || typeof item.display_name !== 'string') {
    return null;
  }
  const lat = parseFloat(String(item.lat));
  const lon = parseFloat(String(item.lon));
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    return null;
  }
  return {
    name: item.display_name,
    lat,
    lon,
    type: typeof item.type === 'string' ? item.type : 'unknown',
    class: typeof item.class === 'string' ? item.class : 'unknown',
  };
};

interface SearchPlacesOptions {
  query: string;
  region: BoundingBox | null;
  fetchWithTimeout: FetchWithTimeout;
  fetchOptions?: RequestInit;
}

/**
 * Looks places up by free text. Any upstream failure yields an empty list so
 * the map simply shows no markers.
 */
export const searchPlaces = async ({ query, region, fetchWithTimeout, fetchOptions = {} }: SearchPlacesOptions): Promise<PlaceResult[]> => {
  if (!query) {
    return [];
  }

  try {
    const response = await fetchWithTimeout(buildNominatimSearchUrl(query, region), fetchOptions);
    if (!response.ok) {
      throw new Error(`Nominatim request failed with status ${response.status}`);
    }

    const payload = await readJsonPayload(response);
    const results = (Array.isArray(payload) ? payload : [])
      .map(toPlaceResult)
      .filter((place): place is PlaceResult => place !== null);

    return results
      .filter((value, index, array) => array.findIndex((entry) => entry.name === value.name) === index)
      .slice(0, MAX_PLACE_RESULTS);
  } catch (error) {
    console.warn('[Search] Place lookup failed:', error instanceof Error ? error.message : error);
    return [];
  }
};
