/**
 * Notification Senders
 *
 * Exports all notification sender implementations.
 */

export {
  sendTelegramNotification,
  splitTelegramMessage,
  type TelegramConfig,
  type SendResult as TelegramSendResult
} from './telegramSender';

export {
  sendWebhookNotification,
  validateWebhookConfig,
  type WebhookNotificationPayload,
  type WebhookConfig,
  type SendResult as WebhookSendResult
} from './webhookSender';

/**
 * Channel types a notification can be delivered through
 */
export type NotificationChannelType = 'telegram' | 'webhook';
