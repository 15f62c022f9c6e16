import { Express, Request, Response } from 'express';
import { FetchWithTimeout } from '../utils/http-client.js';
import { LocationProvider } from '../utils/location.js';
import { normalizeSearchQuery, searchPlaces } from '../utils/places.js';
import { readStringParam } from '../utils/query-params.js';

interface RegisterSearchRoutesOptions {
  app: Express;
  fetchWithTimeout: FetchWithTimeout;
  defaultFetchHeaders: Record<string, string>;
  locationProvider: LocationProvider;
}

export const registerSearchRoutes = ({ app, fetchWithTimeout, defaultFetchHeaders, locationProvider }: RegisterSearchRoutesOptions) => {
  app.get('/api/search', async (req: Request, res: Response) => {
    const query = normalizeSearchQuery(readStringParam(req, 'q'));
    const results = await searchPlaces({
      query,
      region: locationProvider.getRegion().boundingBox,
      fetchWithTimeout,
      fetchOptions: { headers: defaultFetchHeaders },
    });
    res.json(results);
  });
};
