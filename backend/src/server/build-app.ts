import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import crypto from 'node:crypto';
import { registerDirectionsRoutes } from '../routes/directions.js';
import { registerHealthRoutes } from '../routes/health.js';
import { registerLocationRoutes } from '../routes/location.js';
import { registerPrecipitationRoutes } from '../routes/precipitation.js';
import { registerSearchRoutes } from '../routes/search.js';
import { RandomSource } from '../utils/geo.js';
import { DEFAULT_FETCH_HEADERS, FetchWithTimeout } from '../utils/http-client.js';
import { LocationProvider } from '../utils/location.js';
import { PrecipitationSweep, SweepParams } from '../utils/precipitation-sweep.js';

export interface BuildAppOptions {
  isProduction: boolean;
  corsAllowlist: string[];
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
  fetchWithTimeout: FetchWithTimeout;
  locationProvider: LocationProvider;
  sweep: PrecipitationSweep;
  sweepDefaults: SweepParams;
  random?: RandomSource;
}

// Browsers outside the allowlist are refused; an empty allowlist is open outside production.
const buildCorsOptions = (corsAllowlist: string[], isProduction: boolean): cors.CorsOptions => ({
  origin(origin, callback) {
    if (!origin) {
      callback(null, true);
      return;
    }
    callback(null, corsAllowlist.length === 0 ? !isProduction : corsAllowlist.includes(origin));
  },
});

// Tags each request for the access log; sweeps and upstream calls log under the same id.
const requestLogger = (isProduction: boolean) => (req: Request, res: Response, next: NextFunction) => {
  const requestId = crypto.randomUUID();
  const startedAt = Date.now();
  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);
  res.on('finish', () => {
    if (!isProduction || res.statusCode >= 500) {
      console.log(`[${requestId}] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
    }
  });
  next();
};

export const buildApp = ({
  isProduction,
  corsAllowlist,
  rateLimitWindowMs,
  rateLimitMaxRequests,
  fetchWithTimeout,
  locationProvider,
  sweep,
  sweepDefaults,
  random,
}: BuildAppOptions): Express => {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', 1);
  app.use(cors(buildCorsOptions(corsAllowlist, isProduction)));
  app.use(compression());
  app.use(helmet());
  app.use(requestLogger(isProduction));
  app.use(
    '/api',
    rateLimit({
      windowMs: rateLimitWindowMs,
      limit: rateLimitMaxRequests,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.method === 'OPTIONS',
      message: { error: 'Too many requests. Please retry later.' },
    }),
  );

  const upstream = { fetchWithTimeout, defaultFetchHeaders: DEFAULT_FETCH_HEADERS, locationProvider };

  registerHealthRoutes({ app, sweep, sweepDefaults });
  registerLocationRoutes(app, locationProvider);
  registerSearchRoutes({ app, ...upstream });
  registerDirectionsRoutes({ app, ...upstream });
  registerPrecipitationRoutes({ app, sweep, defaults: sweepDefaults, random });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found.' });
  });

  // Express recognises error middleware by its four-argument signature.
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const details = error instanceof Error ? error.message : String(error);
    console.error(`[${String(res.locals.requestId ?? '-')}] Unhandled route error:`, details);
    res.status(500).json({ error: 'Internal server error.', details });
  });

  return app;
};
