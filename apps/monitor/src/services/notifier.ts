/**
 * Notifier Adapter
 *
 * Every delivery path resolves to a NotifyResult; nothing here throws into
 * the poll loop. Composition at startup:
 *
 *   CooldownNotifier -> QueuedNotifier -> (notification worker) -> ChannelNotifier
 */

import {
  sendTelegramNotification,
  sendWebhookNotification,
  type NotificationChannelType,
  type TelegramConfig,
  type WebhookConfig,
  type WebhookNotificationPayload
} from './notificationSenders';
import { NotifyError, describeError } from './monitorErrors';

export type NotificationKind = WebhookNotificationPayload['kind'];

export interface NotifyOptions {
  /** Messages sharing a key are rate limited by CooldownNotifier */
  cooldownKey?: string;
  kind?: NotificationKind;
  device?: string;
  /** Targets a previous attempt already reached; see ChannelNotifier */
  skipTargets?: readonly string[];
}

export interface NotifyResult {
  success: boolean;
  error?: string;
  suppressed?: boolean;
  /** Targets reached by this call, e.g. `telegram:<chatId>` or `webhook` */
  delivered?: string[];
}

export interface Notifier {
  notify(message: string, recipients: ReadonlySet<string>, options?: NotifyOptions): Promise<NotifyResult>;
}

// ============================================
// Direct delivery
// ============================================

export interface ChannelNotifierConfig {
  telegram?: TelegramConfig;
  webhook?: WebhookConfig;
}

/**
 * Delivers to every configured channel. Telegram recipients are chat ids; the
 * webhook receives the recipient list in its payload. Each chat and the
 * webhook is a separate target, so a retry can skip the ones already reached.
 */
export class ChannelNotifier implements Notifier {
  constructor(private readonly config: ChannelNotifierConfig) {}

  get channels(): NotificationChannelType[] {
    const channels: NotificationChannelType[] = [];
    if (this.config.telegram) channels.push('telegram');
    if (this.config.webhook) channels.push('webhook');
    return channels;
  }

  async notify(message: string, recipients: ReadonlySet<string>, options: NotifyOptions = {}): Promise<NotifyResult> {
    const failures: NotifyError[] = [];
    const delivered: string[] = [];
    const skip = new Set(options.skipTargets ?? []);

    const { telegram, webhook } = this.config;
    if (telegram) {
      for (const chatId of recipients) {
        const target = `telegram:${chatId}`;
        if (skip.has(target)) continue;
        const result = await sendTelegramNotification(telegram, chatId, message);
        if (result.success) {
          delivered.push(target);
        } else {
          failures.push(new NotifyError('telegram', `chat ${chatId}: ${result.error ?? 'unknown error'}`));
        }
      }
    }

    if (webhook && !skip.has('webhook')) {
      const result = await sendWebhookNotification(webhook, {
        kind: options.kind ?? 'message',
        message,
        device: options.device,
        recipients: [...recipients]
      });
      if (result.success) {
        delivered.push('webhook');
      } else {
        failures.push(new NotifyError('webhook', result.error ?? 'unknown error'));
      }
    }

    if (failures.length > 0) {
      return { success: false, error: failures.map((failure) => failure.message).join('; '), delivered };
    }
    return { success: true, delivered };
  }
}

/**
 * Stand-in when no channel is configured: the message only reaches the log.
 */
export class ConsoleNotifier implements Notifier {
  async notify(message: string, recipients: ReadonlySet<string>): Promise<NotifyResult> {
    console.log(`[Notifier] (no channel) to ${recipients.size} recipient(s):\n${message}`);
    return { success: true };
  }
}

// ============================================
// Queued delivery
// ============================================

export interface NotificationJobData {
  message: string;
  recipients: string[];
  options: NotifyOptions;
  /** Targets reached by earlier attempts of this job */
  delivered?: string[];
}

/** The slice of a BullMQ queue the notifier needs */
export interface NotificationQueue {
  add(name: string, data: NotificationJobData): Promise<{ id?: string }>;
}

/**
 * Hands messages to the notification queue; the worker does the delivery and
 * lets BullMQ retry failures with backoff.
 */
export class QueuedNotifier implements Notifier {
  constructor(private readonly queue: NotificationQueue) {}

  async notify(message: string, recipients: ReadonlySet<string>, options: NotifyOptions = {}): Promise<NotifyResult> {
    try {
      await this.queue.add('deliver', { message, recipients: [...recipients], options });
      return { success: true };
    } catch (error) {
      const reason = describeError(error);
      console.error(`[Notifier] Failed to enqueue notification: ${reason}`);
      return { success: false, error: reason };
    }
  }
}

// ============================================
// Cooldown
// ============================================

const COOLDOWN_PREFIX = 'netpulse:notify:cooldown';

/** The Redis command the cooldown needs; an ioredis client satisfies it */
export interface CooldownClient {
  set(key: string, value: string, mode: 'EX', seconds: number, condition: 'NX'): Promise<'OK' | null>;
}

export interface CooldownNotifierOptions {
  windowMinutes: number;
  /** Returns null when Redis is unavailable; the in-memory window is used then */
  redis?: () => CooldownClient | null;
  now?: () => number;
}

/**
 * Suppresses a message whose cooldownKey was delivered within the window.
 * Messages without a key always pass through.
 */
export class CooldownNotifier implements Notifier {
  private readonly memoryCooldowns = new Map<string, number>();
  private readonly now: () => number;

  constructor(
    private readonly inner: Notifier,
    private readonly options: CooldownNotifierOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  private memoryAcquire(key: string): boolean {
    const expiry = this.memoryCooldowns.get(key);
    const now = this.now();
    if (expiry !== undefined && now < expiry) return false;
    this.memoryCooldowns.set(key, now + this.options.windowMinutes * 60 * 1000);
    return true;
  }

  /** True when the caller may send; claims the window atomically */
  async acquire(key: string): Promise<boolean> {
    const redis = this.options.redis?.() ?? null;
    if (!redis) {
      return this.memoryAcquire(key);
    }

    try {
      const ttlSeconds = Math.max(1, Math.round(this.options.windowMinutes * 60));
      const result = await redis.set(`${COOLDOWN_PREFIX}:${key}`, String(this.now()), 'EX', ttlSeconds, 'NX');
      return result === 'OK';
    } catch (error) {
      console.error(`[Notifier] Cooldown check failed, using in-memory window: ${describeError(error)}`);
      return this.memoryAcquire(key);
    }
  }

  async notify(message: string, recipients: ReadonlySet<string>, options: NotifyOptions = {}): Promise<NotifyResult> {
    if (options.cooldownKey && this.options.windowMinutes > 0) {
      if (!(await this.acquire(options.cooldownKey))) {
        return { success: true, suppressed: true };
      }
    }
    return this.inner.notify(message, recipients, options);
  }
}
