/**
 * Check-and-notify cycle: fetch, filter, format, notify
 */

import type { AxiosInstance } from 'axios';
import type { RainAlertConfig } from './config.js';
import { filterRainForecasts } from './evaluator/threshold.js';
import {
  fetchRainForecast,
  formatForecastTime,
  formatPrecipitation,
  type FetchFailure,
  type RainForecast,
} from './openmeteo/fetcher.js';
import { buildWebhookPayload } from './discord/payload.js';
import { sendDiscordNotification, type DeliveryResult } from './discord/notifier.js';
import { describeWeatherCode } from './weather/codes.js';

export interface CheckDependencies {
  http?: AxiosInstance;
  now?: () => Date;
}

export type CheckOutcome =
  | { status: 'fetch-failed'; error: FetchFailure }
  | { status: 'no-rain'; forecasts: RainForecast[] }
  | { status: 'rain'; forecasts: RainForecast[]; matches: RainForecast[]; delivery: DeliveryResult };

export const EXIT_OK = 0;
export const EXIT_FETCH_FAILED = 1;
export const EXIT_DELIVERY_FAILED = 2;

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Local wall-clock "YYYY-MM-DD HH:MM:SS" for log lines
 */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Run one precipitation check and send a Discord alert if rain is expected.
 * Not idempotent: two runs against the same forecast send two alerts.
 */
export async function checkAndNotify(
  config: Readonly<RainAlertConfig>,
  deps: CheckDependencies = {}
): Promise<CheckOutcome> {
  const now = deps.now ?? (() => new Date());

  console.log(`[${formatLogTimestamp(now())}] Checking precipitation forecast...`);

  const result = await fetchRainForecast(
    {
      latitude: config.latitude,
      longitude: config.longitude,
      hours: config.hoursToCheck,
      timezone: config.timezone,
    },
    { http: deps.http, apiUrl: config.forecastApiUrl, timeoutMs: config.requestTimeoutMs }
  );

  if (!result.ok) {
    console.log('Failed to fetch forecast data');
    return { status: 'fetch-failed', error: result.error };
  }

  const matches = filterRainForecasts(result.forecasts, config.rainThresholdMm);

  if (matches.length === 0) {
    console.log('✅ No rain expected');
    return { status: 'no-rain', forecasts: result.forecasts };
  }

  console.log(`⚠️  Rain expected: ${matches.length} occurrence(s)`);
  for (const f of matches) {
    console.log(`  - ${formatForecastTime(f)}: ${formatPrecipitation(f.precipitationMm)}mm (${describeWeatherCode(f.weatherCode)})`);
  }

  let delivery: DeliveryResult;
  if (config.discordWebhookUrl) {
    const payload = buildWebhookPayload(matches, config, now());
    delivery = await sendDiscordNotification(config.discordWebhookUrl, payload, {
      http: deps.http,
      timeoutMs: config.requestTimeoutMs,
    });
  } else {
    console.log('Notice: Discord Webhook URL is not set, notification not sent');
    console.log('Please set the DISCORD_WEBHOOK_URL environment variable');
    delivery = { status: 'skipped', reason: 'not-configured' };
  }

  return { status: 'rain', forecasts: result.forecasts, matches, delivery };
}

export function isRainExpected(outcome: CheckOutcome): boolean {
  return outcome.status === 'rain';
}

export function exitCodeFor(outcome: CheckOutcome): number {
  switch (outcome.status) {
    case 'fetch-failed':
      return EXIT_FETCH_FAILED;
    case 'rain':
      return outcome.delivery.status === 'failed' ? EXIT_DELIVERY_FAILED : EXIT_OK;
    case 'no-rain':
      return EXIT_OK;
  }
}
