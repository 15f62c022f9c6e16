import { Coordinate } from './geo.js';
import { FetchWithTimeout, isRecord, readJsonPayload } from './http-client.js';
import { ForecastSource, HourlyForecastEntry } from './precipitation.js';
import { normalizeUtcIsoTimestamp } from './time.js';

const OPEN_METEO_HOST = 'api.open-meteo.com';
const OPEN_METEO_TIMEZONE = 'GMT';

export const buildOpenMeteoPrecipitationUrl = ({ lat, lon }: Coordinate, hours: number): string => {
  const params = new URLSearchParams({
    latitude: String(lat),
    longitude: String(lon),
    hourly: 'precipitation_probability',
    forecast_hours: String(hours),
    timezone: OPEN_METEO_TIMEZONE,
  });
  return `https://${OPEN_METEO_HOST}/v1/forecast?${params.toString()}`;
};

/**
 * Turns an Open-Meteo `hourly` block into forecast entries. Probabilities arrive
 * as percentages and are returned as fractions.
 */
export const parseOpenMeteoPrecipitation = (payload: unknown): HourlyForecastEntry[] => {
  const hourly = isRecord(payload) ? payload.hourly : null;
  if (!isRecord(hourly) || !Array.isArray(hourly.time)) {
    throw new Error('Open-Meteo forecast response did not include hourly time series.');
  }
  const probabilities = Array.isArray(hourly.precipitation_probability) ? hourly.precipitation_probability : [];

  return hourly.time.map((timeValue: unknown, idx: number) => {
    const time = normalizeUtcIsoTimestamp(typeof timeValue === 'string' ? timeValue : null, OPEN_METEO_TIMEZONE);
    const percent = probabilities[idx];
    if (time === null || typeof percent !== 'number' || !Number.isFinite(percent)) {
      throw new Error(`Open-Meteo forecast response had an unreadable hour at index ${idx}.`);
    }
    return { time, precipitationChance: percent / 100 };
  });
};

interface CreateOpenMeteoForecastSourceOptions {
  fetchWithTimeout: FetchWithTimeout;
  fetchOptions?: RequestInit;
}

export const createOpenMeteoForecastSource = ({ fetchWithTimeout, fetchOptions = {} }: CreateOpenMeteoForecastSourceOptions): ForecastSource =>
  async (coordinate, { hours, signal }) => {
    const response = await fetchWithTimeout(buildOpenMeteoPrecipitationUrl(coordinate, hours), { ...fetchOptions, signal });
    if (!response.ok) {
      throw new Error(`Open-Meteo forecast failed with status ${response.status}`);
    }
    return parseOpenMeteoPrecipitation(await readJsonPayload(response));
  };
