/**
 * Notification Worker
 *
 * Delivers queued notifications through the configured channels. A failed
 * delivery throws so BullMQ retries it with exponential backoff; after the
 * last attempt the failure is logged and dropped. Targets reached before a
 * failure are stored on the job and skipped by the retry.
 */

import { Queue, Worker, type Job } from 'bullmq';
import { getRedisConnection } from '../services/redis';
import type { NotificationJobData, Notifier } from '../services/notifier';

const NOTIFICATION_QUEUE = 'monitor-notifications';
const MAX_ATTEMPTS = 3;

let notificationQueue: Queue<NotificationJobData> | null = null;

export function getNotificationQueue(): Queue<NotificationJobData> {
  if (!notificationQueue) {
    notificationQueue = new Queue<NotificationJobData>(NOTIFICATION_QUEUE, {
      connection: getRedisConnection(),
      defaultJobOptions: {
        attempts: MAX_ATTEMPTS,
        backoff: { type: 'exponential', delay: 5000 },
        removeOnComplete: { count: 100 },
        removeOnFail: { count: 200 }
      }
    });
  }
  return notificationQueue;
}

export async function deliverNotification(
  notifier: Notifier,
  data: NotificationJobData,
  recordDelivered?: (delivered: string[]) => Promise<void>
): Promise<{ delivered: true }> {
  const alreadyDelivered = data.delivered ?? [];
  const options = alreadyDelivered.length > 0 ? { ...data.options, skipTargets: alreadyDelivered } : data.options;

  const result = await notifier.notify(data.message, new Set(data.recipients), options);
  if (!result.success) {
    const reached = result.delivered ?? [];
    if (recordDelivered && reached.length > 0) {
      await recordDelivered([...alreadyDelivered, ...reached]);
    }
    throw new Error(result.error ?? 'Notification delivery failed');
  }
  return { delivered: true };
}

function createNotificationWorker(notifier: Notifier): Worker<NotificationJobData> {
  return new Worker<NotificationJobData>(
    NOTIFICATION_QUEUE,
    async (job: Job<NotificationJobData>) =>
      deliverNotification(notifier, job.data, (delivered) => job.updateData({ ...job.data, delivered })),
    {
      connection: getRedisConnection(),
      concurrency: 5
    }
  );
}

let notificationWorkerInstance: Worker<NotificationJobData> | null = null;

export async function initializeNotificationWorker(notifier: Notifier): Promise<void> {
  try {
    notificationWorkerInstance = createNotificationWorker(notifier);

    notificationWorkerInstance.on('error', (error) => {
      console.error('[NotificationWorker] Worker error:', error);
    });

    notificationWorkerInstance.on('failed', (job, error) => {
      const attempts = job?.opts.attempts ?? MAX_ATTEMPTS;
      if (job && job.attemptsMade >= attempts) {
        const device = job.data.options.device ?? 'n/a';
        console.error(`[NotificationWorker] Giving up on job ${job.id} (device ${device}) after ${job.attemptsMade} attempts: ${error.message}`);
      } else {
        console.warn(`[NotificationWorker] Job ${job?.id} failed, will retry: ${error.message}`);
      }
    });

    console.log('[NotificationWorker] Notification worker initialized');
  } catch (error) {
    console.error('[NotificationWorker] Failed to initialize:', error);
    throw error;
  }
}

export async function shutdownNotificationWorker(): Promise<void> {
  if (notificationWorkerInstance) {
    await notificationWorkerInstance.close();
    notificationWorkerInstance = null;
  }
  if (notificationQueue) {
    await notificationQueue.close();
    notificationQueue = null;
  }
  console.log('[NotificationWorker] Notification worker shut down');
}
