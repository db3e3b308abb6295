/**
 * Configuration for the Rain Alert Service
 *
 * Built once at process entry from environment variables and passed into
 * every component; nothing below the entry point reads process.env.
 */

import { z } from 'zod';

export const OPEN_METEO_JMA_URL = 'https://api.open-meteo.com/v1/jma';
export const REQUEST_TIMEOUT_MS = 10_000;

export interface RainAlertConfig {
  latitude: number;
  longitude: number;
  rainThresholdMm: number;
  hoursToCheck: number;
  timezone: string;
  discordWebhookUrl?: string;
  locationLabel?: string;
  forecastApiUrl: string;
  requestTimeoutMs: number;
}

/**
 * Raised when one or more environment variables fail validation
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

// Unset and blank variables both fall back to the default
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envSchema = z.object({
  RAIN_LATITUDE: z.preprocess(blankToUndefined, z.coerce.number().finite().default(35.6895)),
  RAIN_LONGITUDE: z.preprocess(blankToUndefined, z.coerce.number().finite().default(139.6917)),
  RAIN_THRESHOLD: z.preprocess(blankToUndefined, z.coerce.number().finite().min(0).default(0.5)),
  RAIN_HOURS_TO_CHECK: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(1)),
  RAIN_TIMEZONE: z.preprocess(blankToUndefined, z.string().default('Asia/Tokyo')),
  RAIN_LOCATION_LABEL: z.preprocess(blankToUndefined, z.string().optional()),
  DISCORD_WEBHOOK_URL: z.preprocess(blankToUndefined, z.string().trim().optional()),
});

const webhookUrlSchema = z.string().url();

// An unusable webhook only disables delivery; the forecast check still runs
function usableWebhookUrl(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  if (webhookUrlSchema.safeParse(raw).success) return raw;

  console.warn('⚠️  DISCORD_WEBHOOK_URL is not a valid URL; notification will be skipped');
  return undefined;
}

/**
 * Validate the environment and build an immutable config
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<RainAlertConfig> {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;

  return Object.freeze({
    latitude: vars.RAIN_LATITUDE,
    longitude: vars.RAIN_LONGITUDE,
    rainThresholdMm: vars.RAIN_THRESHOLD,
    hoursToCheck: vars.RAIN_HOURS_TO_CHECK,
    timezone: vars.RAIN_TIMEZONE,
    discordWebhookUrl: usableWebhookUrl(vars.DISCORD_WEBHOOK_URL),
    locationLabel: vars.RAIN_LOCATION_LABEL?.trim(),
    forecastApiUrl: OPEN_METEO_JMA_URL,
    requestTimeoutMs: REQUEST_TIMEOUT_MS,
  });
}
