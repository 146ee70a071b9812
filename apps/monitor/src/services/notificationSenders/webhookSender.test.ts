import { afterEach, describe, expect, it, vi } from 'vitest';
import { sendWebhookNotification, validateWebhookConfig } from './webhookSender';

describe('webhook sender', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('posts the monitor event with bearer auth', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await sendWebhookNotification(
      { url: 'https://hooks.example.test/netpulse', authType: 'bearer', authToken: 'test-secret' },
      { kind: 'interface_change', message: 'ether1 is down', device: 'core', recipients: ['100'] }
    );

    expect(result).toEqual({ success: true, statusCode: 200, responseBody: 'ok' });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://hooks.example.test/netpulse');
    expect(init.method).toBe('POST');
    expect(init.headers['Authorization']).toBe('Bearer test-secret');
    expect(JSON.parse(init.body)).toMatchObject({
      event: 'monitor.interface_change',
      device: 'core',
      message: 'ether1 is down',
      recipients: ['100']
    });
  });

  it('does not retry client errors', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const fetchMock = vi.fn().mockResolvedValue(new Response('bad payload', { status: 400 }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await sendWebhookNotification(
      { url: 'https://hooks.example.test/netpulse', retryCount: 3 },
      { kind: 'message', message: 'hello' }
    );

    expect(result).toEqual({ success: false, error: 'HTTP 400: bad payload' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports network failures instead of throwing', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('ECONNREFUSED')));

    const result = await sendWebhookNotification(
      { url: 'https://hooks.example.test/netpulse' },
      { kind: 'message', message: 'hello' }
    );

    expect(result).toEqual({ success: false, error: 'ECONNREFUSED' });
  });

  it('validates the channel configuration', () => {
    expect(validateWebhookConfig({ url: 'https://hooks.example.test' })).toEqual({ valid: true, errors: [] });
    expect(validateWebhookConfig({ url: 'not a url', authType: 'bearer' }).errors).toEqual([
      'Invalid URL format',
      'Bearer auth requires authToken'
    ]);
  });
});
