/**
 * Operator notifications over the Telegram Bot API.
 *
 * Notifications are best effort: a failure is logged and never affects the
 * outcome of a run.
 */

import { requestJson } from './http.js';
import { errorMessage } from './logger.js';
import type { Logger } from './logger.js';
import type { Notifier } from '../types/services.js';

export const TELEGRAM_API_BASE_URL = 'https://api.telegram.org';

/** Upper bound on a single notification request */
const SEND_TIMEOUT_MS = 15000;

export interface TelegramNotifierOptions {
  botToken: string;
  chatId: string;
  /** Overrides the Bot API endpoint */
  apiBaseUrl?: string;
}

export class TelegramNotifier implements Notifier {
  constructor(private readonly options: TelegramNotifierOptions) {}

  async notify(message: string): Promise<void> {
    const base = this.options.apiBaseUrl ?? TELEGRAM_API_BASE_URL;
    const response = await requestJson(`${base}/bot${this.options.botToken}/sendMessage`, {
      method: 'POST',
      body: { chat_id: this.options.chatId, text: message },
      timeoutMs: SEND_TIMEOUT_MS,
    });
    if (typeof response !== 'object' || response === null || !('ok' in response) || response.ok !== true) {
      const description =
        typeof response === 'object' && response !== null && 'description' in response
          ? String(response.description)
          : 'no description';
      throw new Error(`Telegram rejected the message: ${description}`);
    }
  }
}

/**
 * Notifier used when notifications are disabled.
 */
export class NullNotifier implements Notifier {
  async notify(): Promise<void> {}
}

/**
 * Sends a notification, logging instead of throwing on failure.
 */
export async function notifySafely(notifier: Notifier, message: string, logger: Logger): Promise<void> {
  try {
    await notifier.notify(message);
    logger.debug(`Notification sent: ${message}`);
  } catch (error) {
    logger.warn(`Failed to send notification: ${errorMessage(error)}`);
  }
}
