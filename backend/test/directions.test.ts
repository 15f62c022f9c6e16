import { buildOsrmRouteUrl, fetchRoute, parseOsrmRoute } from '../src/utils/directions.js';
import { jsonResponse } from './helpers.js';

const source = { lat: 25.7602, lon: -80.1959 };
const destination = { lat: 25.7743, lon: -80.1937 };

const osrmOk = {
  code: 'Ok',
  routes: [
    {
      distance: 1820.4,
      duration: 312.9,
      geometry: {
        type: 'LineString',
        coordinates: [[-80.1959, 25.7602], [-80.1971, 25.7668], [-80.1937, 25.7743]],
      },
    },
  ],
};

describe('buildOsrmRouteUrl', () => {
  test('orders each position as lon,lat', () => {
    expect(buildOsrmRouteUrl(source, destination)).toBe(
      'https://router.project-osrm.org/route/v1/driving/-80.1959,25.7602;-80.1937,25.7743?overview=full&geometries=geojson',
    );
  });
});

describe('parseOsrmRoute', () => {
  test('maps the first route to a summary with a bounding box', () => {
    expect(parseOsrmRoute(osrmOk)).toEqual({
      distanceMeters: 1820.4,
      expectedTravelTimeSeconds: 312.9,
      polyline: [
        { lat: 25.7602, lon: -80.1959 },
        { lat: 25.7668, lon: -80.1971 },
        { lat: 25.7743, lon: -80.1937 },
      ],
      boundingBox: { minLat: 25.7602, minLon: -80.1971, maxLat: 25.7743, maxLon: -80.1937 },
    });
  });

  test('returns null when no route exists', () => {
    expect(parseOsrmRoute({ code: 'NoRoute', message: 'Impossible route between points' })).toBeNull();
  });

  test('returns null for an empty route list', () => {
    expect(parseOsrmRoute({ code: 'Ok', routes: [] })).toBeNull();
  });

  test('throws on other error codes', () => {
    expect(() => parseOsrmRoute({ code: 'InvalidQuery' })).toThrow('OSRM route failed with code InvalidQuery');
  });

  test('throws on a non-object payload', () => {
    expect(() => parseOsrmRoute(null)).toThrow('OSRM response was not an object.');
  });
});

describe('fetchRoute', () => {
  test('treats a 400 NoRoute answer as no route', async () => {
    const route = await fetchRoute({
      source,
      destination,
      fetchWithTimeout: async () => jsonResponse({ code: 'NoRoute' }, 400),
    });
    expect(route).toBeNull();
  });

  test('throws on other upstream failures', async () => {
    await expect(fetchRoute({
      source,
      destination,
      fetchWithTimeout: async () => new Response('Bad gateway', { status: 502 }),
    })).rejects.toThrow('OSRM route failed with status 502');
  });
});
