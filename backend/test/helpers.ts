import { HourlyForecastEntry } from '../src/utils/precipitation.js';
import { RandomSource } from '../src/utils/geo.js';

export const jsonResponse = (body: unknown, status: number = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

// Cycles through fixed values so sampled points are reproducible.
export const sequenceRandom = (values: number[]): RandomSource => {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index += 1;
    return value;
  };
};

export const hourStamp = (hour: number): string => `2024-07-09T${String(hour).padStart(2, '0')}:00`;

export const buildForecastEntries = (count: number): HourlyForecastEntry[] =>
  Array.from({ length: count }, (_, hour) => ({
    time: `${hourStamp(hour)}:00.000Z`,
    precipitationChance: hour / 100,
  }));

export const openMeteoPayload = (hours: number) => ({
  latitude: -6,
  longitude: 106,
  hourly_units: { time: 'iso8601', precipitation_probability: '%' },
  hourly: {
    time: Array.from({ length: hours }, (_, hour) => hourStamp(hour)),
    precipitation_probability: Array.from({ length: hours }, (_, hour) => hour * 5),
  },
});

export const silenceConsole = () => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
};
