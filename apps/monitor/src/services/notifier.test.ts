import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('./notificationSenders', () => ({
  sendTelegramNotification: vi.fn(),
  sendWebhookNotification: vi.fn()
}));

import { sendTelegramNotification, sendWebhookNotification } from './notificationSenders';
import { ChannelNotifier, CooldownNotifier, QueuedNotifier } from './notifier';

describe('ChannelNotifier', () => {
  beforeEach(() => {
    vi.mocked(sendTelegramNotification).mockReset();
    vi.mocked(sendWebhookNotification).mockReset();
  });

  it('sends to every telegram chat and the webhook', async () => {
    vi.mocked(sendTelegramNotification).mockResolvedValue({ success: true, statusCode: 200 });
    vi.mocked(sendWebhookNotification).mockResolvedValue({ success: true, statusCode: 200 });

    const notifier = new ChannelNotifier({
      telegram: { botToken: 'test-token' },
      webhook: { url: 'https://hooks.example.test' }
    });

    const result = await notifier.notify('hello', new Set(['1', '2']), { kind: 'threshold_breach', device: 'core' });

    expect(result).toEqual({ success: true, delivered: ['telegram:1', 'telegram:2', 'webhook'] });
    expect(notifier.channels).toEqual(['telegram', 'webhook']);
    expect(sendTelegramNotification).toHaveBeenCalledTimes(2);
    expect(sendTelegramNotification).toHaveBeenCalledWith({ botToken: 'test-token' }, '2', 'hello');
    expect(sendWebhookNotification).toHaveBeenCalledWith(
      { url: 'https://hooks.example.test' },
      { kind: 'threshold_breach', message: 'hello', device: 'core', recipients: ['1', '2'] }
    );
  });

  it('reports partial failures without throwing', async () => {
    vi.mocked(sendTelegramNotification)
      .mockResolvedValueOnce({ success: true })
      .mockResolvedValueOnce({ success: false, error: 'HTTP 403: Forbidden' });

    const notifier = new ChannelNotifier({ telegram: { botToken: 'test-token' } });
    const result = await notifier.notify('hello', new Set(['1', '2']));

    expect(result).toEqual({
      success: false,
      error: 'telegram notification failed: chat 2: HTTP 403: Forbidden',
      delivered: ['telegram:1']
    });
  });

  it('skips targets an earlier attempt already reached', async () => {
    vi.mocked(sendTelegramNotification).mockResolvedValue({ success: true });
    vi.mocked(sendWebhookNotification).mockResolvedValue({ success: true });

    const notifier = new ChannelNotifier({
      telegram: { botToken: 'test-token' },
      webhook: { url: 'https://hooks.example.test' }
    });
    const result = await notifier.notify('hello', new Set(['1', '2']), { skipTargets: ['telegram:1', 'webhook'] });

    expect(result).toEqual({ success: true, delivered: ['telegram:2'] });
    expect(sendTelegramNotification).toHaveBeenCalledTimes(1);
    expect(sendTelegramNotification).toHaveBeenCalledWith({ botToken: 'test-token' }, '2', 'hello');
    expect(sendWebhookNotification).not.toHaveBeenCalled();
  });
});

describe('QueuedNotifier', () => {
  it('enqueues a delivery job', async () => {
    const add = vi.fn().mockResolvedValue({ id: 'job-1' });
    const notifier = new QueuedNotifier({ add });

    await expect(notifier.notify('hello', new Set(['1']), { cooldownKey: 'k' })).resolves.toEqual({ success: true });
    expect(add).toHaveBeenCalledWith('deliver', { message: 'hello', recipients: ['1'], options: { cooldownKey: 'k' } });
  });

  it('turns an enqueue failure into a result', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const notifier = new QueuedNotifier({ add: vi.fn().mockRejectedValue(new Error('Connection is closed.')) });

    await expect(notifier.notify('hello', new Set())).resolves.toEqual({
      success: false,
      error: 'Connection is closed.'
    });
  });
});

describe('CooldownNotifier', () => {
  function innerNotifier() {
    return { notify: vi.fn().mockResolvedValue({ success: true }) };
  }

  it('suppresses a repeated key inside the window', async () => {
    let now = 0;
    const inner = innerNotifier();
    const notifier = new CooldownNotifier(inner, { windowMinutes: 10, now: () => now });

    await notifier.notify('cpu high', new Set(), { cooldownKey: 'core:cpu' });
    const second = await notifier.notify('cpu high', new Set(), { cooldownKey: 'core:cpu' });
    now = 10 * 60 * 1000;
    await notifier.notify('cpu high', new Set(), { cooldownKey: 'core:cpu' });

    expect(second).toEqual({ success: true, suppressed: true });
    expect(inner.notify).toHaveBeenCalledTimes(2);
  });

  it('passes messages without a key and disables itself at zero minutes', async () => {
    const inner = innerNotifier();
    const disabled = new CooldownNotifier(inner, { windowMinutes: 0 });

    await disabled.notify('a', new Set(), { cooldownKey: 'x' });
    await disabled.notify('a', new Set(), { cooldownKey: 'x' });
    await new CooldownNotifier(inner, { windowMinutes: 5 }).notify('b', new Set());

    expect(inner.notify).toHaveBeenCalledTimes(3);
  });

  it('claims the window with SET NX EX when Redis is available', async () => {
    const set = vi.fn().mockResolvedValueOnce('OK').mockResolvedValueOnce(null);
    const inner = innerNotifier();
    const notifier = new CooldownNotifier(inner, {
      windowMinutes: 15,
      redis: () => ({ set }),
      now: () => 1000
    });

    await notifier.notify('ram high', new Set(), { cooldownKey: 'core:ram' });
    await notifier.notify('ram high', new Set(), { cooldownKey: 'core:ram' });

    expect(set).toHaveBeenCalledWith('netpulse:notify:cooldown:core:ram', '1000', 'EX', 900, 'NX');
    expect(inner.notify).toHaveBeenCalledTimes(1);
  });
});
