import { Coordinate, RandomSource, generateLocations } from './geo.js';
import {
  DEFAULT_FORECAST_HOURS,
  ForecastSource,
  LocationPrecipitationRecord,
  getHourlyPrecipitation,
} from './precipitation.js';

export interface SweepParams {
  center: Coordinate;
  radiusMeters: number;
  count: number;
}

interface SweepOutcomeBase extends SweepParams {
  points: Coordinate[];
  durationMs: number;
}

export type SweepResult =
  | (SweepOutcomeBase & { ok: true; records: LocationPrecipitationRecord[] })
  | (SweepOutcomeBase & { ok: false; error: Error });

export interface PrecipitationSweep {
  run: (params: SweepParams) => Promise<SweepResult>;
  inFlightCount: () => number;
  abortAll: (reason?: unknown) => number;
}

interface CreatePrecipitationSweepOptions {
  forecastSource: ForecastSource;
  forecastHours?: number;
  random?: RandomSource;
  debug?: boolean;
  now?: () => number;
}

const sweepKey = ({ center, radiusMeters, count }: SweepParams) => `${center.lat},${center.lon}|${radiusMeters}|${count}`;

export const createPrecipitationSweep = ({
  forecastSource,
  forecastHours = DEFAULT_FORECAST_HOURS,
  random = Math.random,
  debug = false,
  now = Date.now,
}: CreatePrecipitationSweepOptions): PrecipitationSweep => {
  const inFlight = new Map<string, { result: Promise<SweepResult>; controller: AbortController }>();

  const weatherLog = (...args: unknown[]) => {
    if (debug) {
      console.log(...args);
    }
  };

  const execute = async (params: SweepParams, signal: AbortSignal): Promise<SweepResult> => {
    const startedAt = now();
    const points = generateLocations({ ...params, random });

    try {
      const records = await getHourlyPrecipitation(points, {
        forecastSource,
        hours: forecastHours,
        signal,
        onReading: (coordinate, reading) => {
          weatherLog(`[Weather] (${coordinate.lat.toFixed(4)}, ${coordinate.lon.toFixed(4)}) ${reading.time} -> ${reading.probability}`);
        },
      });
      const durationMs = now() - startedAt;
      console.log(`[Weather] Precipitation sweep fetched ${records.length} point(s) around (${params.center.lat}, ${params.center.lon}) in ${durationMs}ms`);
      return { ok: true, ...params, points, records, durationMs };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      console.error(`[Weather] Failed to fetch weather data: ${failure.message}`);
      return { ok: false, ...params, points, error: failure, durationMs: now() - startedAt };
    }
  };

  const run = (params: SweepParams): Promise<SweepResult> => {
    const key = sweepKey(params);
    const pending = inFlight.get(key);
    if (pending) {
      weatherLog(`[Weather] Sweep ${key} already in flight, sharing result.`);
      return pending.result;
    }

    const controller = new AbortController();
    const result = execute(params, controller.signal).finally(() => {
      inFlight.delete(key);
    });
    inFlight.set(key, { result, controller });
    return result;
  };

  // In-flight sweeps stop before their next request and resolve as failures.
  const abortAll = (reason: unknown = new Error('Precipitation sweep aborted')): number => {
    for (const { controller } of inFlight.values()) {
      controller.abort(reason);
    }
    return inFlight.size;
  };

  return { run, inFlightCount: () => inFlight.size, abortAll };
};
