/**
 * Precipitation threshold evaluator
 */

import type { RainForecast } from '../openmeteo/fetcher.js';

/**
 * Keep the forecasts whose precipitation reaches the threshold (inclusive),
 * in their original order
 */
export function filterRainForecasts(forecasts: readonly RainForecast[], thresholdMm: number): RainForecast[] {
  return forecasts.filter((f) => f.precipitationMm >= thresholdMm);
}
