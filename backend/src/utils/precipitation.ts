import { Coordinate } from './geo.js';

export const DEFAULT_FORECAST_HOURS = 12;

export interface HourlyForecastEntry {
  time: string;
  precipitationChance: number;
}

export interface HourlyPrecipitationReading {
  time: string;
  probability: number;
}

export interface LocationPrecipitationRecord {
  coordinate: Coordinate;
  hourlyData: HourlyPrecipitationReading[];
}

export interface ForecastRequestOptions {
  hours: number;
  signal?: AbortSignal;
}

export type ForecastSource = (coordinate: Coordinate, options: ForecastRequestOptions) => Promise<HourlyForecastEntry[]>;

export class ForecastRequestError extends Error {
  readonly coordinate: Coordinate;
  readonly index: number;

  constructor(coordinate: Coordinate, index: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Forecast request failed for point ${index} (${coordinate.lat}, ${coordinate.lon}): ${reason}`, { cause });
    this.name = 'ForecastRequestError';
    this.coordinate = coordinate;
    this.index = index;
  }
}

interface GetHourlyPrecipitationOptions {
  forecastSource: ForecastSource;
  hours?: number;
  signal?: AbortSignal;
  onReading?: (coordinate: Coordinate, reading: HourlyPrecipitationReading) => void;
}

/**
 * Fetches the hourly precipitation chance for each location, one request at a
 * time and in input order. The first failing request rejects the whole batch
 * with a ForecastRequestError; records already fetched are dropped. An aborted
 * signal fails the batch at the next location without requesting it.
 */
export const getHourlyPrecipitation = async (
  locations: Coordinate[],
  { forecastSource, hours = DEFAULT_FORECAST_HOURS, signal, onReading }: GetHourlyPrecipitationOptions,
): Promise<LocationPrecipitationRecord[]> => {
  const locationData: LocationPrecipitationRecord[] = [];

  for (let index = 0; index < locations.length; index += 1) {
    const coordinate = locations[index];
    if (signal?.aborted) {
      throw new ForecastRequestError(coordinate, index, signal.reason ?? new Error('Forecast batch aborted'));
    }
    let forecasts: HourlyForecastEntry[];
    try {
      forecasts = await forecastSource(coordinate, { hours, signal });
    } catch (error) {
      throw new ForecastRequestError(coordinate, index, error);
    }

    const hourlyData = forecasts.slice(0, hours).map((forecast) => {
      const reading = { time: forecast.time, probability: forecast.precipitationChance };
      onReading?.(coordinate, reading);
      return reading;
    });

    locationData.push({ coordinate, hourlyData });
  }

  return locationData;
};
