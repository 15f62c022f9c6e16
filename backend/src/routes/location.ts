import { Express, Request, Response } from 'express';
import { LocationProvider } from '../utils/location.js';

export const registerLocationRoutes = (app: Express, locationProvider: LocationProvider) => {
  app.get('/api/location', (_req: Request, res: Response) => {
    res.json({
      location: locationProvider.getCurrentLocation(),
      region: locationProvider.getRegion(),
    });
  });
};
