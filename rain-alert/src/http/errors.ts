/**
 * Classification of HTTP client failures into plain values
 */

import axios from 'axios';

export type HttpFailureKind = 'timeout' | 'network' | 'http';

export interface HttpFailure {
  kind: HttpFailureKind;
  message: string;
  status?: number;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Turn an axios error into an HttpFailure.
 * Anything that is not an axios error is rethrown.
 */
export function classifyHttpError(error: unknown): HttpFailure {
  if (!axios.isAxiosError(error)) {
    throw error;
  }

  if (error.response) {
    const data: unknown = error.response.data;
    // Open-Meteo explains 400s in a `reason` field
    const reason =
      typeof data === 'object' && data !== null && 'reason' in data && typeof data.reason === 'string'
        ? data.reason
        : error.message;
    return {
      kind: 'http',
      status: error.response.status,
      message: `HTTP ${error.response.status} - ${reason}`,
    };
  }

  if (error.code && TIMEOUT_CODES.has(error.code)) {
    return { kind: 'timeout', message: error.message };
  }

  return { kind: 'network', message: error.message };
}
