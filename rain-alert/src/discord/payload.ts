/**
 * Discord webhook payload builder
 */

import type { RainAlertConfig } from '../config.js';
import { formatForecastTime, formatPrecipitation, type RainForecast } from '../openmeteo/fetcher.js';
import { describeWeatherCode } from '../weather/codes.js';

export interface DiscordEmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface DiscordEmbed {
  title: string;
  description: string;
  color: number;
  fields: DiscordEmbedField[];
  footer: { text: string };
  timestamp: string;
}

export interface DiscordWebhookPayload {
  embeds: DiscordEmbed[];
}

export const EMBED_COLOR = 0x5865f2; // Discord Blurple
export const NO_FORECAST_PLACEHOLDER = 'データなし';

/**
 * One embed line per forecast: "`10:00` - 小雨 (降水量: 0.6mm)"
 */
export function formatForecastLines(forecasts: readonly RainForecast[]): string {
  return forecasts
    .map((f) => `\`${formatForecastTime(f)}\` - ${describeWeatherCode(f.weatherCode)} (降水量: ${formatPrecipitation(f.precipitationMm)}mm)\n`)
    .join('');
}

export function formatLocation(
  config: Pick<RainAlertConfig, 'latitude' | 'longitude' | 'locationLabel'>
): string {
  const coordinates = `緯度: ${config.latitude}, 経度: ${config.longitude}`;
  return config.locationLabel ? `${coordinates}\n(${config.locationLabel})` : coordinates;
}

/**
 * Build the rain alert embed.
 * `now` is the generation time shown in the embed, not the forecast time.
 */
export function buildWebhookPayload(
  forecasts: readonly RainForecast[],
  config: Pick<RainAlertConfig, 'latitude' | 'longitude' | 'locationLabel'>,
  now: Date = new Date()
): DiscordWebhookPayload {
  const embed: DiscordEmbed = {
    title: '🌧️ 雨が降りそうです',
    description: 'まもなく雨が予想されます。',
    color: EMBED_COLOR,
    fields: [
      {
        name: '予報',
        value: formatForecastLines(forecasts) || NO_FORECAST_PLACEHOLDER,
        inline: false,
      },
      {
        name: '場所',
        value: formatLocation(config),
        inline: false,
      },
    ],
    footer: {
      text: 'Powered by Open-Meteo JMA API',
    },
    timestamp: now.toISOString(),
  };

  return { embeds: [embed] };
}
