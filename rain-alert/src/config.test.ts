import { describe, it, expect, vi } from 'vitest';
import { ConfigError, loadConfig, OPEN_METEO_JMA_URL, REQUEST_TIMEOUT_MS } from './config.js';

describe('loadConfig', () => {
  it('falls back to the Shinjuku defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({
      latitude: 35.6895,
      longitude: 139.6917,
      rainThresholdMm: 0.5,
      hoursToCheck: 1,
      timezone: 'Asia/Tokyo',
      discordWebhookUrl: undefined,
      locationLabel: undefined,
      forecastApiUrl: OPEN_METEO_JMA_URL,
      requestTimeoutMs: REQUEST_TIMEOUT_MS,
    });
  });

  it('parses numeric variables from strings', () => {
    const config = loadConfig({
      RAIN_LATITUDE: '34.6937',
      RAIN_LONGITUDE: '135.5023',
      RAIN_THRESHOLD: '1.2',
      RAIN_HOURS_TO_CHECK: '3',
      RAIN_TIMEZONE: 'Asia/Tokyo',
      RAIN_LOCATION_LABEL: ' 大阪市付近 ',
      DISCORD_WEBHOOK_URL: 'https://discord.example/api/webhooks/1/test-token',
    });

    expect(config.latitude).toBe(34.6937);
    expect(config.longitude).toBe(135.5023);
    expect(config.rainThresholdMm).toBe(1.2);
    expect(config.hoursToCheck).toBe(3);
    expect(config.locationLabel).toBe('大阪市付近');
    expect(config.discordWebhookUrl).toBe('https://discord.example/api/webhooks/1/test-token');
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ DISCORD_WEBHOOK_URL: '', RAIN_THRESHOLD: '  ', RAIN_LOCATION_LABEL: '' });

    expect(config.discordWebhookUrl).toBeUndefined();
    expect(config.rainThresholdMm).toBe(0.5);
    expect(config.locationLabel).toBeUndefined();
  });

  it('accepts a zero threshold', () => {
    expect(loadConfig({ RAIN_THRESHOLD: '0' }).rainThresholdMm).toBe(0);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it('drops a webhook that is not a URL with a warning instead of failing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const config = loadConfig({ DISCORD_WEBHOOK_URL: 'not-a-url', RAIN_THRESHOLD: '1' });

    expect(config.discordWebhookUrl).toBeUndefined();
    expect(config.rainThresholdMm).toBe(1);
    expect(warn).toHaveBeenCalledWith('⚠️  DISCORD_WEBHOOK_URL is not a valid URL; notification will be skipped');
  });

  it('does not warn about a valid webhook', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    loadConfig({ DISCORD_WEBHOOK_URL: 'https://discord.example/api/webhooks/1/test-token' });

    expect(warn).not.toHaveBeenCalled();
  });

  describe('rejects invalid values', () => {
    it('non-numeric latitude', () => {
      expect(() => loadConfig({ RAIN_LATITUDE: 'north' })).toThrow(ConfigError);
    });

    it('zero or fractional hours', () => {
      expect(() => loadConfig({ RAIN_HOURS_TO_CHECK: '0' })).toThrow(ConfigError);
      expect(() => loadConfig({ RAIN_HOURS_TO_CHECK: '1.5' })).toThrow(ConfigError);
    });

    it('negative threshold', () => {
      expect(() => loadConfig({ RAIN_THRESHOLD: '-0.1' })).toThrow(ConfigError);
    });

    it('lists every offending variable', () => {
      try {
        loadConfig({ RAIN_LATITUDE: 'north', RAIN_HOURS_TO_CHECK: '0' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (!(error instanceof ConfigError)) return;
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toMatch(/^RAIN_LATITUDE: /);
        expect(error.issues[1]).toMatch(/^RAIN_HOURS_TO_CHECK: /);
      }
    });
  });
});
