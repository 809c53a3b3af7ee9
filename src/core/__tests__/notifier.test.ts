import { afterEach, describe, expect, it, vi } from 'vitest';
import { NotifyError } from '../../utils/errors.js';
import { createNotifier, isSuccessStatus, WebhookNotifier } from '../notifier.js';
import { quietLogger } from './helpers.js';

const WEBHOOK_URL = 'https://hooks.test/webhook/placeholder';

describe('WebhookNotifier', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the message as {"text": ...}', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(null, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const status = await new WebhookNotifier(WEBHOOK_URL, 1000, quietLogger()).send('**Hola**<br>');

    expect(status).toBe(200);
    expect(fetchMock).toHaveBeenCalledWith(
      WEBHOOK_URL,
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"text":"**Hola**<br>"}',
      })
    );
  });

  it('returns a rejecting status to the caller', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('bad payload', { status: 400 })));

    await expect(new WebhookNotifier(WEBHOOK_URL, 1000, quietLogger()).send('x')).resolves.toBe(400);
  });

  it('raises NotifyError on transport failure', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    await expect(new WebhookNotifier(WEBHOOK_URL, 1000, quietLogger()).send('x')).rejects.toThrow(
      new NotifyError('Webhook request failed: fetch failed')
    );
  });
});

describe('createNotifier', () => {
  it('returns null without a URL', () => {
    expect(createNotifier({ timeoutMs: 1000 }, quietLogger())).toBeNull();
    expect(createNotifier({ url: WEBHOOK_URL, timeoutMs: 1000 }, quietLogger())).toBeInstanceOf(WebhookNotifier);
  });
});

describe('isSuccessStatus', () => {
  it('accepts any 2xx', () => {
    expect([199, 200, 202, 299, 300, 502].map(isSuccessStatus)).toEqual([false, true, true, true, false, false]);
  });
});
