import { Express, NextFunction, Request, Response } from 'express';
import { RandomSource, generateLocations } from '../utils/geo.js';
import { PrecipitationSweep, SweepParams } from '../utils/precipitation-sweep.js';
import { ForecastRequestError } from '../utils/precipitation.js';
import { InvalidParamError, readNumberParam } from '../utils/query-params.js';

export const MAX_SAMPLE_COUNT = 50;
export const MAX_SAMPLE_RADIUS_M = 500000;

export const readSweepParams = (req: Request, defaults: SweepParams): SweepParams => ({
  center: {
    lat: readNumberParam(req, 'lat', defaults.center.lat, { min: -90, max: 90, exclusive: true }),
    lon: readNumberParam(req, 'lon', defaults.center.lon, { min: -180, max: 180 }),
  },
  radiusMeters: readNumberParam(req, 'radius', defaults.radiusMeters, { min: 0, max: MAX_SAMPLE_RADIUS_M }),
  count: readNumberParam(req, 'count', defaults.count, { min: 0, max: MAX_SAMPLE_COUNT, integer: true }),
});

interface RegisterPrecipitationRoutesOptions {
  app: Express;
  sweep: PrecipitationSweep;
  defaults: SweepParams;
  random?: RandomSource;
}

export const registerPrecipitationRoutes = ({ app, sweep, defaults, random = Math.random }: RegisterPrecipitationRoutesOptions) => {
  const withParams = (handler: (params: SweepParams, res: Response) => Promise<unknown> | unknown) =>
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        await handler(readSweepParams(req, defaults), res);
      } catch (error) {
        if (error instanceof InvalidParamError) {
          res.status(400).json({ error: error.message });
          return;
        }
        next(error);
      }
    };

  app.get('/api/precipitation/points', withParams((params, res) => {
    res.json({ ...params, points: generateLocations({ ...params, random }) });
  }));

  app.get('/api/precipitation', withParams(async (params, res) => {
    const result = await sweep.run(params);
    if (result.ok) {
      return res.json({
        center: result.center,
        radiusMeters: result.radiusMeters,
        count: result.count,
        records: result.records,
        durationMs: result.durationMs,
      });
    }

    const failedPoint = result.error instanceof ForecastRequestError
      ? { index: result.error.index, coordinate: result.error.coordinate }
      : null;
    return res.status(502).json({
      error: 'Failed to fetch weather data.',
      details: result.error.message,
      failedPoint,
    });
  }));
};
