/**
 * Webhook notification module
 * Posts digest messages to a Microsoft Teams incoming webhook
 */

import type { WebhookConfig } from '../types/index.js';
import { NotifyError, toError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Notifier interface; resolves with the HTTP status of the delivery
 */
export interface Notifier {
  send(message: string): Promise<number>;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Teams incoming webhook implementation
 */
export class WebhookNotifier implements Notifier {
  constructor(
    private url: string,
    private timeoutMs: number,
    private logger: Logger
  ) {}

  /**
   * POST {"text": message}; transport failures raise NotifyError, any status is returned
   */
  async send(message: string): Promise<number> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: message }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      this.logger.error('Webhook request failed', error);
      throw new NotifyError(`Webhook request failed: ${toError(error).message}`, undefined, { cause: error });
    }

    if (isSuccessStatus(response.status)) {
      this.logger.info(`Webhook accepted message (${response.status})`);
    } else {
      const body = await response.text().catch(() => '');
      this.logger.warn(`Webhook rejected message: ${response.status} ${response.statusText} ${body}`.trim());
    }
    return response.status;
  }
}

/**
 * Create a webhook notifier, or null when no URL is configured
 */
export function createNotifier(config: WebhookConfig, logger: Logger): Notifier | null {
  if (!config.url) return null;
  return new WebhookNotifier(config.url, config.timeoutMs, logger.child('notifier'));
}
