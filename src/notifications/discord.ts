import { request, type Dispatcher } from 'undici';
import { NotifyError } from '../errors.js';
import { countChanges } from '../pipeline/diff.js';
import type { Catalog, ChangeSet } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { composeMessage, truncateMessage } from './format.js';
import type { DeliveryResult, Notifier } from './types.js';

export interface DiscordNotifierOptions {
  /** Webhook URL; when unset every delivery is skipped. */
  webhookUrl?: string;
  timeoutMs: number;
  sectionLimit: number;
  dispatcher?: Dispatcher;
}

export const TEST_MESSAGE = '\u{1F9EA} **Test Message:** Discord webhook is working!';

export class DiscordNotifier implements Notifier {
  constructor(private readonly options: DiscordNotifierOptions) {}

  async notify(changes: ChangeSet, catalog: Catalog): Promise<DeliveryResult> {
    const content = composeMessage(changes, catalog, { sectionLimit: this.options.sectionLimit });
    const result = await this.send(content);
    if (result.status === 'sent') {
      logger.info({ changes: countChanges(changes), length: content.length }, 'Discord notification sent');
    }
    return result;
  }

  sendTestMessage(): Promise<DeliveryResult> {
    return this.send(TEST_MESSAGE);
  }

  private async send(content: string): Promise<DeliveryResult> {
    const { webhookUrl, timeoutMs, dispatcher } = this.options;
    if (!webhookUrl) {
      logger.warn('DISCORD_WEBHOOK not set, skipping Discord notification');
      return { status: 'skipped', reason: 'webhook not configured' };
    }

    try {
      const { statusCode, body } = await request(webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ content: truncateMessage(content) }),
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
        dispatcher,
      });
      const text = await body.text();

      if (statusCode !== 200 && statusCode !== 204) {
        const error = new NotifyError(`Discord webhook returned HTTP ${statusCode}: ${text.slice(0, 200)}`, {
          status: statusCode,
        });
        logger.error({ err: error, status: statusCode }, 'Discord notification rejected');
        return { status: 'failed', error };
      }
      return { status: 'sent', httpStatus: statusCode };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      const error = new NotifyError(`Discord webhook request failed: ${reason}`, { cause: err });
      logger.error({ err: error }, 'Failed to send Discord notification');
      return { status: 'failed', error };
    }
  }
}
