/**
 * Discord webhook notifier
 */

import axios, { type AxiosInstance } from 'axios';
import { REQUEST_TIMEOUT_MS } from '../config.js';
import { classifyHttpError, type HttpFailure } from '../http/errors.js';
import type { DiscordWebhookPayload } from './payload.js';

export interface NotifyOptions {
  http?: AxiosInstance;
  timeoutMs?: number;
}

export type DeliveryResult =
  | { status: 'sent' }
  | { status: 'skipped'; reason: 'not-configured' }
  | { status: 'failed'; error: HttpFailure };

/**
 * POST a payload to a Discord webhook.
 * Delivery problems are logged and returned; they never throw.
 */
export async function sendDiscordNotification(
  webhookUrl: string | undefined,
  payload: DiscordWebhookPayload,
  options: NotifyOptions = {}
): Promise<DeliveryResult> {
  if (!webhookUrl) {
    console.error('Error: Discord Webhook URL is not configured');
    return { status: 'skipped', reason: 'not-configured' };
  }

  const http = options.http ?? axios;

  try {
    await http.post(webhookUrl, payload, {
      timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
    });
    console.log('✅ Discord notification sent successfully');
    return { status: 'sent' };
  } catch (error) {
    const failure = classifyHttpError(error);
    console.error(`Discord notification error: ${failure.message}`);
    return { status: 'failed', error: failure };
  }
}

export function isDelivered(result: DeliveryResult): boolean {
  return result.status === 'sent';
}
