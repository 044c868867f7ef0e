import { z } from 'zod';
import type { WeatherRecord, WeatherReport } from '../types';
import { describeError, LocationNotFoundError } from '../lib/errors';
import { FORECAST_WINDOW } from '../lib/displays';
import { zipToCoordinates } from './geocodingService';
import { fetchJson, USER_AGENT } from './http';

const NWS_BASE_URL = 'https://api.weather.gov';

const PointsSchema = z.object({
  properties: z.object({
    forecast: z.string().url(),
    relativeLocation: z.object({
      properties: z.object({ city: z.string(), state: z.string() }),
    }),
  }),
});

const PeriodSchema = z.object({
  name: z.string(),
  temperature: z.number().nullable(),
  temperatureUnit: z.string().default('F'),
  windSpeed: z.string().default(''),
  windDirection: z.string().default(''),
  shortForecast: z.string(),
  detailedForecast: z.string().default(''),
});

const ForecastSchema = z.object({
  properties: z.object({ periods: z.array(PeriodSchema) }),
});

/** Throws on any failure. */
export const fetchWeatherReport = async (zipcode: string, signal?: AbortSignal): Promise<WeatherReport> => {
  const { latitude, longitude } = await zipToCoordinates(zipcode, signal);
  const init: RequestInit = { headers: { 'User-Agent': USER_AGENT }, signal };

  const points = await fetchJson(`${NWS_BASE_URL}/points/${latitude},${longitude}`, PointsSchema, init);
  const forecast = await fetchJson(points.properties.forecast, ForecastSchema, init);

  const periods = forecast.properties.periods;
  const current = periods[0];
  const { city, state } = points.properties.relativeLocation.properties;

  return {
    zipcode,
    location: { latitude, longitude, city, state },
    current: {
      temperature: current?.temperature ?? null,
      temperatureUnit: current?.temperatureUnit ?? 'F',
      windSpeed: current?.windSpeed ?? 'N/A',
      windDirection: current?.windDirection ?? '',
      shortForecast: current?.shortForecast ?? 'N/A',
      detailedForecast: current?.detailedForecast ?? '',
    },
    forecast: periods.slice(0, FORECAST_WINDOW).map(p => ({
      name: p.name,
      temperature: p.temperature,
      shortForecast: p.shortForecast,
    })),
  };
};

export const weatherFailure = (zipcode: string, error: unknown): WeatherRecord => ({
  error: error instanceof LocationNotFoundError
    ? error.message
    : `Failed to fetch weather data: ${describeError(error)}`,
  zipcode,
});
