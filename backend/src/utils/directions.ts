import { BoundingBox, Coordinate, boundingBoxOf } from './geo.js';
import { FetchWithTimeout, isRecord, readJsonPayload } from './http-client.js';

export interface RouteSummary {
  distanceMeters: number;
  expectedTravelTimeSeconds: number;
  polyline: Coordinate[];
  boundingBox: BoundingBox | null;
}

export const buildOsrmRouteUrl = (source: Coordinate, destination: Coordinate): string => {
  const path = `${source.lon},${source.lat};${destination.lon},${destination.lat}`;
  const params = new URLSearchParams({ overview: 'full', geometries: 'geojson' });
  return `https://router.project-osrm.org/route/v1/driving/${path}?${params.toString()}`;
};

// GeoJSON positions are [lon, lat].
const toCoordinate = (position: unknown): Coordinate | null => {
  if (!Array.isArray(position) || position.length < 2) {
    return null;
  }
  const [lon, lat] = position;
  if (typeof lat !== 'number' || typeof lon !== 'number') {
    return null;
  }
  return { lat, lon };
};

export const parseOsrmRoute = (payload: unknown): RouteSummary | null => {
  if (!isRecord(payload)) {
    throw new Error('OSRM response was not an object.');
  }
  if (payload.code === 'NoRoute' || payload.code === 'NoSegment') {
    return null;
  }
  if (payload.code !== 'Ok' || !Array.isArray(payload.routes)) {
    throw new Error(`OSRM route failed with code ${String(payload.code)}`);
  }

  const [route] = payload.routes;
  if (!isRecord(route)) {
    return null;
  }
  const geometry = isRecord(route.geometry) && Array.isArray(route.geometry.coordinates) ? route.geometry.coordinates : [];
  const polyline = geometry
    .map(toCoordinate)
    .filter((point): point is Coordinate => point !== null);

  return {
    distanceMeters: Number(route.distance) || 0,
    expectedTravelTimeSeconds: Number(route.duration) || 0,
    polyline,
    boundingBox: boundingBoxOf(polyline),
  };
};

interface FetchRouteOptions {
  source: Coordinate;
  destination: Coordinate;
  fetchWithTimeout: FetchWithTimeout;
  fetchOptions?: RequestInit;
}

export const fetchRoute = async ({ source, destination, fetchWithTimeout, fetchOptions = {} }: FetchRouteOptions): Promise<RouteSummary | null> => {
  const response = await fetchWithTimeout(buildOsrmRouteUrl(source, destination), fetchOptions);
  const payload = await readJsonPayload(response);
  // OSRM answers 400 with a JSON body for unroutable pairs.
  if (!response.ok && !(isRecord(payload) && (payload.code === 'NoRoute' || payload.code === 'NoSegment'))) {
    throw new Error(`OSRM route failed with status ${response.status}`);
  }
  return parseOsrmRoute(payload);
};
