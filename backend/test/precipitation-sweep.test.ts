import { createPrecipitationSweep } from '../src/utils/precipitation-sweep.js';
import { ForecastRequestError, ForecastSource, HourlyForecastEntry } from '../src/utils/precipitation.js';
import { buildForecastEntries, sequenceRandom, silenceConsole } from './helpers.js';

const params = { center: { lat: -6, lon: 106 }, radiusMeters: 100000, count: 3 };

beforeEach(() => {
  silenceConsole();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('createPrecipitationSweep', () => {
  test('samples points and returns one record per point', async () => {
    const sweep = createPrecipitationSweep({
      forecastSource: async () => buildForecastEntries(20),
      random: sequenceRandom([0.1, 0.2, 0.3, 0.4, 0.5, 0.6]),
    });

    const result = await sweep.run(params);

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.points).toHaveLength(3);
    expect(result.records.map((record) => record.coordinate)).toEqual(result.points);
    expect(result.records.every((record) => record.hourlyData.length === 12)).toBe(true);
    expect(result.center).toEqual(params.center);
  });

  test('uses the configured forecast hours', async () => {
    const sweep = createPrecipitationSweep({
      forecastSource: async () => buildForecastEntries(20),
      forecastHours: 6,
    });
    const result = await sweep.run({ ...params, count: 1 });
    expect(result.ok && result.records[0].hourlyData).toHaveLength(6);
  });

  test('measures duration with the injected clock', async () => {
    const ticks = [1000, 1250];
    const sweep = createPrecipitationSweep({
      forecastSource: async () => buildForecastEntries(1),
      now: () => ticks.shift() ?? 0,
    });
    const result = await sweep.run({ ...params, count: 1 });
    expect(result.durationMs).toBe(250);
  });

  test('resolves to a failure result and logs it when any point fails', async () => {
    let calls = 0;
    const sweep = createPrecipitationSweep({
      forecastSource: async () => {
        calls += 1;
        if (calls === 2) {
          throw new Error('service unavailable');
        }
        return buildForecastEntries(12);
      },
    });

    const result = await sweep.run(params);

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error).toBeInstanceOf(ForecastRequestError);
    expect(result.points).toHaveLength(3);
    expect(calls).toBe(2);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringMatching(/^\[Weather\] Failed to fetch weather data: Forecast request failed for point 1 \(.+\): service unavailable$/),
    );
  });

  test('shares an in-flight run for identical parameters', async () => {
    let release: (entries: HourlyForecastEntry[]) => void = () => undefined;
    const forecastSource = jest.fn<ReturnType<ForecastSource>, Parameters<ForecastSource>>(
      () => new Promise((resolve) => {
        release = resolve;
      }),
    );
    const sweep = createPrecipitationSweep({ forecastSource });
    const single = { ...params, count: 1 };

    const first = sweep.run(single);
    const second = sweep.run(single);

    expect(second).toBe(first);
    expect(sweep.inFlightCount()).toBe(1);

    release(buildForecastEntries(1));
    await first;

    expect(forecastSource).toHaveBeenCalledTimes(1);
    expect(sweep.inFlightCount()).toBe(0);

    const third = sweep.run(single);
    expect(third).not.toBe(first);
    release(buildForecastEntries(1));
    await third;
  });

  test('runs different parameters independently', async () => {
    const sweep = createPrecipitationSweep({ forecastSource: async () => buildForecastEntries(1) });

    const first = sweep.run({ ...params, count: 1 });
    const second = sweep.run({ ...params, count: 2 });

    expect(second).not.toBe(first);
    expect(sweep.inFlightCount()).toBe(2);
    await Promise.all([first, second]);
    expect(sweep.inFlightCount()).toBe(0);
  });

  test('logs each hour only in debug mode', async () => {
    const sweep = createPrecipitationSweep({
      forecastSource: async () => buildForecastEntries(2),
      random: sequenceRandom([0, 0]),
      debug: true,
    });
    await sweep.run({ ...params, count: 1 });
    expect(console.log).toHaveBeenCalledWith('[Weather] (-6.0000, 106.0000) 2024-07-09T01:00:00.000Z -> 0.01');
  });

  test('abortAll stops in-flight sweeps before their next request', async () => {
    let release: (entries: HourlyForecastEntry[]) => void = () => undefined;
    const forecastSource = jest.fn<ReturnType<ForecastSource>, Parameters<ForecastSource>>(
      () => new Promise((resolve) => {
        release = resolve;
      }),
    );
    const sweep = createPrecipitationSweep({ forecastSource });

    const pending = sweep.run({ ...params, count: 2 });
    expect(sweep.abortAll(new Error('Server shutting down'))).toBe(1);
    expect(forecastSource.mock.calls[0][1].signal?.aborted).toBe(true);
    release(buildForecastEntries(1));
    const result = await pending;

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error).toBeInstanceOf(ForecastRequestError);
    expect(result.error.message).toMatch(/^Forecast request failed for point 1 \(.+\): Server shutting down$/);
    expect(forecastSource).toHaveBeenCalledTimes(1);
    expect(sweep.inFlightCount()).toBe(0);
  });

  test('abortAll reports zero when nothing is running', () => {
    const sweep = createPrecipitationSweep({ forecastSource: async () => buildForecastEntries(1) });
    expect(sweep.abortAll()).toBe(0);
  });
});
