import { createChildLogger } from './logger.js';

const log = createChildLogger('notifier');

export type NotificationData = Record<string, unknown>;

/** Outbound operator notifications. Implementations resolve even when delivery fails. */
export interface Notifier {
  send(message: string, data?: NotificationData): Promise<void>;
}

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/** POSTs `{ message, timestamp, data, source }` JSON to a webhook (n8n, Zapier, ...) */
export class WebhookNotifier implements Notifier {
  constructor(
    private readonly url: string,
    private readonly source: string = 'signal-bridge',
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async send(message: string, data: NotificationData = {}): Promise<void> {
    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          message,
          timestamp: new Date().toISOString(),
          data,
          source: this.source,
        }),
        signal: AbortSignal.timeout(10_000),
      });

      if (!response.ok) {
        log.warn({ status: response.status }, 'Webhook rejected notification');
      }
    } catch (err) {
      log.error({ err }, 'Failed to deliver webhook notification');
    }
  }
}

/** Adapts a plain `(message) => Promise<void>` sender, such as a Telegram alert */
export class CallbackNotifier implements Notifier {
  constructor(private readonly deliver: (message: string) => Promise<void>) {}

  async send(message: string, _data?: NotificationData): Promise<void> {
    try {
      await this.deliver(message);
    } catch (err) {
      log.error({ err }, 'Notification callback failed');
    }
  }
}

export class FanoutNotifier implements Notifier {
  constructor(private readonly targets: Notifier[]) {}

  get size(): number {
    return this.targets.length;
  }

  async send(message: string, data?: NotificationData): Promise<void> {
    const results = await Promise.allSettled(this.targets.map((t) => t.send(message, data)));
    for (const result of results) {
      if (result.status === 'rejected') {
        log.error({ err: result.reason }, 'Notifier target failed');
      }
    }
  }
}
