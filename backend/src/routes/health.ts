import { Express, Request, Response } from 'express';
import pkg from '../../../package.json';
import { PrecipitationSweep, SweepParams } from '../utils/precipitation-sweep.js';

const { name, version } = pkg;

interface RegisterHealthRoutesOptions {
  app: Express;
  sweep: PrecipitationSweep;
  sweepDefaults: SweepParams;
}

export const registerHealthRoutes = ({ app, sweep, sweepDefaults }: RegisterHealthRoutesOptions) => {
  const respond = (_req: Request, res: Response) => {
    const inFlight = sweep.inFlightCount();
    res.json({
      ok: true,
      service: name,
      version,
      env: process.env.NODE_ENV || 'development',
      uptime: Math.floor(process.uptime()),
      heapUsedMb: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
      precipitation: {
        status: inFlight > 0 ? 'sweeping' : 'idle',
        inFlight,
        center: sweepDefaults.center,
        radiusMeters: sweepDefaults.radiusMeters,
        count: sweepDefaults.count,
      },
      timestamp: new Date().toISOString(),
    });
  };

  app.get('/healthz', respond);
  app.get('/api/healthz', respond);
};
