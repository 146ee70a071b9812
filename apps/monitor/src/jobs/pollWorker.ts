/**
 * Poll Worker
 *
 * BullMQ repeatable job that drives one monitor pass per interval.
 * Concurrency 1 keeps the engine a single writer; BullMQ only schedules the
 * next repeat once the current job starts, so an overrunning pass leaves at
 * most one tick waiting behind it.
 */

import { Queue, Worker, type Job } from 'bullmq';
import { getRedisConnection } from '../services/redis';
import type { MonitorEngine } from '../services/monitorEngine';

const POLL_QUEUE = 'monitor-poll';
const POLL_JOB = 'poll-pass';

interface PollPassJobData {
  type: 'poll-pass';
}

export interface PollPassSummary {
  skipped: boolean;
  succeeded: number;
  failed: number;
  events: number;
  haltedDevices: string[];
}

let pollQueue: Queue<PollPassJobData> | null = null;

export function getPollQueue(): Queue<PollPassJobData> {
  if (!pollQueue) {
    pollQueue = new Queue<PollPassJobData>(POLL_QUEUE, {
      connection: getRedisConnection()
    });
  }
  return pollQueue;
}

/**
 * Run one pass and reduce the report to what BullMQ keeps as the job result
 */
export async function processPollPass(engine: Pick<MonitorEngine, 'runPass'>, now: Date = new Date()): Promise<PollPassSummary> {
  const report = await engine.runPass(now);

  if (report.haltedDevices.length > 0) {
    console.error(`[CRITICAL] [PollWorker] Halted devices: ${report.haltedDevices.join(', ')}`);
  }

  return {
    skipped: report.skipped,
    succeeded: report.succeeded,
    failed: report.failed.length,
    events: report.events.length,
    haltedDevices: report.haltedDevices
  };
}

function createPollWorker(engine: MonitorEngine): Worker<PollPassJobData> {
  return new Worker<PollPassJobData>(
    POLL_QUEUE,
    async (job: Job<PollPassJobData>) => {
      if (job.data.type !== POLL_JOB) {
        throw new Error(`Unknown job type: ${job.data.type}`);
      }
      return processPollPass(engine);
    },
    {
      connection: getRedisConnection(),
      concurrency: 1
    }
  );
}

/**
 * Replace any existing schedule so an interval change takes effect on restart
 */
export async function schedulePollPasses(intervalSeconds: number): Promise<void> {
  const queue = getPollQueue();

  const existingJobs = await queue.getRepeatableJobs();
  for (const job of existingJobs) {
    if (job.name === POLL_JOB) {
      await queue.removeRepeatableByKey(job.key);
    }
  }

  await queue.add(
    POLL_JOB,
    { type: POLL_JOB },
    {
      repeat: {
        every: intervalSeconds * 1000,
        immediately: true
      },
      removeOnComplete: { count: 10 },
      removeOnFail: { count: 20 }
    }
  );

  console.log(`[PollWorker] Scheduled poll pass every ${intervalSeconds}s`);
}

let pollWorkerInstance: Worker<PollPassJobData> | null = null;

export async function initializePollWorker(engine: MonitorEngine, intervalSeconds: number): Promise<void> {
  try {
    pollWorkerInstance = createPollWorker(engine);

    pollWorkerInstance.on('error', (error) => {
      console.error('[PollWorker] Worker error:', error);
    });

    pollWorkerInstance.on('failed', (job, error) => {
      console.error(`[PollWorker] Job ${job?.id} failed:`, error);
    });

    await schedulePollPasses(intervalSeconds);

    console.log('[PollWorker] Poll worker initialized');
  } catch (error) {
    console.error('[PollWorker] Failed to initialize:', error);
    throw error;
  }
}

export async function shutdownPollWorker(): Promise<void> {
  if (pollWorkerInstance) {
    await pollWorkerInstance.close();
    pollWorkerInstance = null;
  }
  if (pollQueue) {
    await pollQueue.close();
    pollQueue = null;
  }
  console.log('[PollWorker] Poll worker shut down');
}
