import { describe, expect, it, vi } from 'vitest';
import { CallbackNotifier, FanoutNotifier, WebhookNotifier, type Notifier } from '../notifier.js';

describe('WebhookNotifier', () => {
  it('posts the message with its data as JSON', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: RequestInit) => new Response(null, { status: 204 }));
    const notifier = new WebhookNotifier('https://hooks.test/notify', 'signal-bridge', fetchImpl);

    await notifier.send('<b>Orders Placed</b>', { action: 'trade_executed' });

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://hooks.test/notify');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json' });

    const body: unknown = JSON.parse(String(init.body));
    expect(body).toMatchObject({
      message: '<b>Orders Placed</b>',
      data: { action: 'trade_executed' },
      source: 'signal-bridge',
    });
  });

  it('resolves even when the webhook is unreachable', async () => {
    const fetchImpl = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });
    const notifier = new WebhookNotifier('https://hooks.test/notify', 'signal-bridge', fetchImpl);

    await expect(notifier.send('hello')).resolves.toBeUndefined();
  });

  it('resolves when the webhook answers with an error status', async () => {
    const fetchImpl = vi.fn(async () => new Response('nope', { status: 500 }));
    const notifier = new WebhookNotifier('https://hooks.test/notify', 'signal-bridge', fetchImpl);

    await expect(notifier.send('hello')).resolves.toBeUndefined();
  });
});

describe('CallbackNotifier', () => {
  it('forwards only the message text', async () => {
    const deliver = vi.fn(async (_message: string) => undefined);
    await new CallbackNotifier(deliver).send('hi', { action: 'x' });
    expect(deliver).toHaveBeenCalledWith('hi');
  });

  it('swallows delivery failures', async () => {
    const notifier = new CallbackNotifier(async () => {
      throw new Error('telegram down');
    });
    await expect(notifier.send('hi')).resolves.toBeUndefined();
  });
});

describe('FanoutNotifier', () => {
  it('delivers to every target even when one fails', async () => {
    const broken: Notifier = { send: vi.fn(async () => { throw new Error('down'); }) };
    const healthy: Notifier = { send: vi.fn(async () => undefined) };
    const fanout = new FanoutNotifier([broken, healthy]);

    await fanout.send('hi', { action: 'x' });

    expect(fanout.size).toBe(2);
    expect(healthy.send).toHaveBeenCalledWith('hi', { action: 'x' });
  });
});
