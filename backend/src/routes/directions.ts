import { Express, NextFunction, Request, Response } from 'express';
import { fetchRoute } from '../utils/directions.js';
import { Coordinate } from '../utils/geo.js';
import { FetchWithTimeout } from '../utils/http-client.js';
import { LocationProvider } from '../utils/location.js';
import { InvalidParamError, readNumberParam } from '../utils/query-params.js';

interface RegisterDirectionsRoutesOptions {
  app: Express;
  fetchWithTimeout: FetchWithTimeout;
  defaultFetchHeaders: Record<string, string>;
  locationProvider: LocationProvider;
}

export const registerDirectionsRoutes = ({ app, fetchWithTimeout, defaultFetchHeaders, locationProvider }: RegisterDirectionsRoutesOptions) => {
  app.get('/api/directions', async (req: Request, res: Response, next: NextFunction) => {
    const origin = locationProvider.getCurrentLocation();
    let source: Coordinate;
    let destination: Coordinate;
    try {
      source = {
        lat: readNumberParam(req, 'fromLat', origin.lat, { min: -90, max: 90 }),
        lon: readNumberParam(req, 'fromLon', origin.lon, { min: -180, max: 180 }),
      };
      destination = {
        lat: readNumberParam(req, 'toLat', Number.NaN, { min: -90, max: 90 }),
        lon: readNumberParam(req, 'toLon', Number.NaN, { min: -180, max: 180 }),
      };
    } catch (error) {
      if (error instanceof InvalidParamError) {
        return res.status(400).json({ error: error.message });
      }
      return next(error);
    }
    if (Number.isNaN(destination.lat) || Number.isNaN(destination.lon)) {
      return res.status(400).json({ error: '"toLat" and "toLon" are required.' });
    }

    try {
      const route = await fetchRoute({ source, destination, fetchWithTimeout, fetchOptions: { headers: defaultFetchHeaders } });
      if (!route) {
        return res.status(404).json({ error: 'No route found.', source, destination });
      }
      return res.json({ source, destination, route });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn('[Directions] Route lookup failed:', message);
      return res.status(502).json({ error: 'Failed to calculate route.', details: message });
    }
  });
};
