import dotenv from 'dotenv';
import { Coordinate, isSamplableLatitude, isValidLatitude, isValidLongitude } from '../utils/geo.js';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const parseFiniteNumber = (rawValue: string | undefined, fallback: number): number => {
  if (rawValue === undefined || !rawValue.trim()) {
    return fallback;
  }
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const PORT = process.env.PORT || 3001;
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const DEBUG_WEATHER = process.env.DEBUG_WEATHER === 'true';
export const SWEEP_ON_START = process.env.SWEEP_ON_START !== 'false';

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 9000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);

interface CoordinateEnvOptions {
  fallback: Coordinate;
  isLatitudeAllowed?: (value: number) => boolean;
}

// Each axis falls back on its own when missing, unparsable or out of range.
export const parseCoordinateEnv = (
  rawLat: string | undefined,
  rawLon: string | undefined,
  { fallback, isLatitudeAllowed = isValidLatitude }: CoordinateEnvOptions,
): Coordinate => {
  const lat = parseFiniteNumber(rawLat, fallback.lat);
  const lon = parseFiniteNumber(rawLon, fallback.lon);
  return {
    lat: isLatitudeAllowed(lat) ? lat : fallback.lat,
    lon: isValidLongitude(lon) ? lon : fallback.lon,
  };
};

// Sweep defaults: center of the sampled area, radius in meters, number of points.
export const SAMPLE_CENTER = parseCoordinateEnv(process.env.SAMPLE_CENTER_LAT, process.env.SAMPLE_CENTER_LON, {
  fallback: { lat: -6, lon: 106 },
  isLatitudeAllowed: isSamplableLatitude,
});
export const SAMPLE_RADIUS_M = parsePositiveInt(process.env.SAMPLE_RADIUS_M, 100000);
export const SAMPLE_COUNT = parsePositiveInt(process.env.SAMPLE_COUNT, 10);
export const FORECAST_HOURS = parsePositiveInt(process.env.FORECAST_HOURS, 12);

export const USER_LOCATION = parseCoordinateEnv(process.env.USER_LAT, process.env.USER_LON, {
  fallback: { lat: 25.7602, lon: -80.1959 },
});
export const USER_REGION_SPAN_M = parsePositiveInt(process.env.USER_REGION_SPAN_M, 10000);
