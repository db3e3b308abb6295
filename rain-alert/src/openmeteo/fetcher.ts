/**
 * Open-Meteo precipitation forecast fetcher
 *
 * Uses the JMA model endpoint, which serves hourly data as parallel arrays
 * keyed by field name.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { OPEN_METEO_JMA_URL, REQUEST_TIMEOUT_MS } from '../config.js';
import { classifyHttpError, type HttpFailure } from '../http/errors.js';

/**
 * One hourly precipitation forecast
 */
export interface RainForecast {
  time: string;            // Wall-clock datetime in `timezone`, as sent by the API: "2024-01-01T10:00"
  timezone: string;        // IANA zone the API was asked to report in
  precipitationMm: number;
  weatherCode: number;     // WMO weather code
}

export interface ForecastQuery {
  latitude: number;
  longitude: number;
  hours: number;
  timezone: string;
}

export interface FetchOptions {
  http?: AxiosInstance;
  apiUrl?: string;
  timeoutMs?: number;
}

export type FetchFailure =
  | HttpFailure
  | { kind: 'malformed'; message: string };

export type FetchResult =
  | { ok: true; forecasts: RainForecast[] }
  | { ok: false; error: FetchFailure };

const hourlyResponseSchema = z.object({
  hourly: z.object({
    time: z.array(z.string()),
    precipitation: z.array(z.number().nullable()).optional(),
    weather_code: z.array(z.number().nullable()).optional(),
  }),
});

type HourlyResponse = z.infer<typeof hourlyResponseSchema>;

const LOCAL_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2})?$/;

/**
 * Local ISO datetime without offset ("2024-01-01T10:00")
 */
export function isLocalTime(time: string): boolean {
  return LOCAL_TIME_PATTERN.test(time);
}

/**
 * Wall-clock "HH:MM" of a forecast in its own timezone
 */
export function formatForecastTime(forecast: RainForecast): string {
  return forecast.time.slice(11, 16);
}

/**
 * Millimetres with at least one decimal place: 1 -> "1.0", 0.25 -> "0.25"
 */
export function formatPrecipitation(mm: number): string {
  return Number.isInteger(mm) ? mm.toFixed(1) : String(mm);
}

/**
 * Zip the parallel hourly arrays into forecast records.
 * Missing or null values default to 0 so that no hour is dropped.
 */
export function parseHourlyForecast(data: HourlyResponse, timezone: string): RainForecast[] | null {
  const { time, precipitation = [], weather_code: weatherCodes = [] } = data.hourly;

  if (precipitation.length !== time.length || weatherCodes.length !== time.length) {
    console.warn(
      `⚠️  Hourly arrays differ in length (time=${time.length}, precipitation=${precipitation.length}, weather_code=${weatherCodes.length}); missing values default to 0`
    );
  }

  const forecasts: RainForecast[] = [];

  for (let i = 0; i < time.length; i++) {
    if (!isLocalTime(time[i])) return null;

    forecasts.push({
      time: time[i],
      timezone,
      precipitationMm: precipitation[i] ?? 0,
      weatherCode: weatherCodes[i] ?? 0,
    });
  }

  return forecasts;
}

/**
 * Fetch the next `hours` hourly precipitation forecasts for a point.
 * Transport and parse failures come back as values, not exceptions.
 */
export async function fetchRainForecast(
  query: ForecastQuery,
  options: FetchOptions = {}
): Promise<FetchResult> {
  const http = options.http ?? axios;
  const url = options.apiUrl ?? OPEN_METEO_JMA_URL;

  console.log(`🌐 Calling Open-Meteo JMA API: ${url}`);
  console.log(`   Location: ${query.latitude}, ${query.longitude} (${query.hours}h, ${query.timezone})`);

  let body: unknown;
  try {
    const response = await http.get<unknown>(url, {
      params: {
        latitude: query.latitude,
        longitude: query.longitude,
        hourly: 'precipitation,weather_code',
        forecast_hours: query.hours,
        timezone: query.timezone,
      },
      timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
    });
    body = response.data;
  } catch (error) {
    const failure = classifyHttpError(error);
    console.error(`API request error: ${failure.message}`);
    return { ok: false, error: failure };
  }

  const parsed = hourlyResponseSchema.safeParse(body);
  if (!parsed.success) {
    const message = 'Unexpected response format: missing hourly time series';
    console.error(`API request error: ${message}`);
    return { ok: false, error: { kind: 'malformed', message } };
  }

  const forecasts = parseHourlyForecast(parsed.data, query.timezone);
  if (!forecasts) {
    const message = 'Unexpected response format: unparseable hourly timestamp';
    console.error(`API request error: ${message}`);
    return { ok: false, error: { kind: 'malformed', message } };
  }

  console.log(`📊 Fetched ${forecasts.length} hourly forecasts`);
  return { ok: true, forecasts };
}
