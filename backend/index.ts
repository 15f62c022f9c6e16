import { buildApp } from './src/server/build-app.js';
import { startServer as startBackendServer } from './src/server/start-server.js';
import { createStartupSweep } from './src/server/startup-sweep.js';
import {
  PORT,
  IS_PRODUCTION,
  DEBUG_WEATHER,
  SWEEP_ON_START,
  REQUEST_TIMEOUT_MS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
  SAMPLE_CENTER,
  SAMPLE_RADIUS_M,
  SAMPLE_COUNT,
  FORECAST_HOURS,
  USER_LOCATION,
  USER_REGION_SPAN_M,
} from './src/server/runtime.js';
import { DEFAULT_FETCH_HEADERS, createFetchWithTimeout } from './src/utils/http-client.js';
import { createStaticLocationProvider } from './src/utils/location.js';
import { createPrecipitationSweep, SweepParams } from './src/utils/precipitation-sweep.js';
import { createOpenMeteoForecastSource } from './src/utils/weather-service.js';

const fetchWithTimeout = createFetchWithTimeout(REQUEST_TIMEOUT_MS);

const sweepDefaults: SweepParams = {
  center: SAMPLE_CENTER,
  radiusMeters: SAMPLE_RADIUS_M,
  count: SAMPLE_COUNT,
};

export const sweep = createPrecipitationSweep({
  forecastSource: createOpenMeteoForecastSource({
    fetchWithTimeout,
    fetchOptions: { headers: DEFAULT_FETCH_HEADERS },
  }),
  forecastHours: FORECAST_HOURS,
  debug: DEBUG_WEATHER,
});

export const app = buildApp({
  isProduction: IS_PRODUCTION,
  corsAllowlist: CORS_ALLOWLIST,
  rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
  rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
  fetchWithTimeout,
  locationProvider: createStaticLocationProvider(USER_LOCATION, USER_REGION_SPAN_M),
  sweep,
  sweepDefaults,
});

const runStartupSweep = createStartupSweep(sweep, sweepDefaults);

if (process.env.NODE_ENV !== 'test') {
  startBackendServer({
    app,
    port: PORT,
    onListening: () => {
      if (SWEEP_ON_START) {
        runStartupSweep().catch((error) => {
          console.error('[Weather] Startup sweep crashed:', error);
        });
      }
    },
    onShutdown: () => sweep.abortAll(new Error('Server shutting down')),
  });
}
