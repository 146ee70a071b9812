import type { AppConfig } from '../config/validate';
import { validateWebhookConfig, type WebhookConfig } from './notificationSenders';
import {
  ChannelNotifier,
  ConsoleNotifier,
  CooldownNotifier,
  QueuedNotifier,
  type ChannelNotifierConfig,
  type CooldownClient,
  type NotificationQueue,
  type Notifier
} from './notifier';

type NotifierSettings = Pick<
  AppConfig,
  'TELEGRAM_BOT_TOKEN' | 'NOTIFY_WEBHOOK_URL' | 'THRESHOLD_ALERT_COOLDOWN_MINUTES'
>;

function webhookConfigFrom(url: string | undefined): WebhookConfig | undefined {
  if (!url) return undefined;

  const webhook: WebhookConfig = { url };
  const { valid, errors } = validateWebhookConfig(webhook);
  if (!valid) {
    console.error(`[Notifier] Webhook channel disabled: ${errors.join('; ')}`);
    return undefined;
  }
  return webhook;
}

export function channelConfigFrom(config: NotifierSettings): ChannelNotifierConfig {
  return {
    telegram: config.TELEGRAM_BOT_TOKEN ? { botToken: config.TELEGRAM_BOT_TOKEN } : undefined,
    webhook: webhookConfigFrom(config.NOTIFY_WEBHOOK_URL)
  };
}

/**
 * Notifier that delivers in process: the notification worker and one-shot
 * scripts use it. Falls back to the log when no channel is configured.
 */
export function createDeliveryNotifier(config: NotifierSettings): Notifier {
  const notifier = new ChannelNotifier(channelConfigFrom(config));
  if (notifier.channels.length === 0) {
    return new ConsoleNotifier();
  }
  return notifier;
}

export interface EngineNotifierOptions {
  /** Notification queue; without one messages are delivered inline */
  queue?: NotificationQueue;
  redis?: () => CooldownClient | null;
}

/**
 * Notifier handed to the monitor engine: cooldown first, so a suppressed
 * message never reaches the queue, then the queue or inline delivery.
 */
export function createEngineNotifier(config: NotifierSettings, options: EngineNotifierOptions = {}): Notifier {
  const delivery = createDeliveryNotifier(config);

  const transport: Notifier =
    options.queue && !(delivery instanceof ConsoleNotifier) ? new QueuedNotifier(options.queue) : delivery;

  if (config.THRESHOLD_ALERT_COOLDOWN_MINUTES <= 0) {
    return transport;
  }
  return new CooldownNotifier(transport, {
    windowMinutes: config.THRESHOLD_ALERT_COOLDOWN_MINUTES,
    redis: options.redis
  });
}
