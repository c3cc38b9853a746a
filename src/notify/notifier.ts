import { NotificationError, describeError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { NotifySettings } from '../types/index.js';

export interface Notifier {
  send(message: string): Promise<void>;
}

export class ConsoleNotifier implements Notifier {
  async send(message: string): Promise<void> {
    console.log(message);
  }
}

/**
 * Form-encoded `message=` POST with an optional bearer token, the shape
 * LINE Notify and most push-notification bridges accept.
 */
export class WebhookNotifier implements Notifier {
  constructor(
    private readonly url: string,
    private readonly token: string | undefined,
    private readonly timeout: number,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async send(message: string): Promise<void> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
    };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers,
        body: new URLSearchParams({ message }).toString(),
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      throw new NotificationError(`Notification request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new NotificationError(`Notification rejected (${response.status}): ${body}`);
    }
    logger.info('Notification sent');
  }
}

export function createNotifier(
  settings: NotifySettings,
  options: { dryRun?: boolean; token?: string } = {}
): Notifier {
  if (settings.url && !options.dryRun) {
    return new WebhookNotifier(settings.url, options.token, settings.timeout);
  }
  return new ConsoleNotifier();
}
