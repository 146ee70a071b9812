import { beforeEach, describe, expect, it, vi } from 'vitest';

const queueMock = vi.hoisted(() => ({
  getRepeatableJobs: vi.fn(),
  removeRepeatableByKey: vi.fn(),
  add: vi.fn(),
  close: vi.fn()
}));

vi.mock('bullmq', () => ({
  Queue: class {
    getRepeatableJobs = queueMock.getRepeatableJobs;
    removeRepeatableByKey = queueMock.removeRepeatableByKey;
    add = queueMock.add;
    close = queueMock.close;
  },
  Worker: class {},
  Job: class {}
}));

vi.mock('../services/redis', () => ({
  getRedisConnection: vi.fn(() => ({}))
}));

import type { PassReport } from '../services/monitorEngine';
import { processPollPass, schedulePollPasses } from './pollWorker';

function buildReport(overrides: Partial<PassReport> = {}): PassReport {
  return {
    startedAt: '2026-03-10T08:00:00.000Z',
    finishedAt: '2026-03-10T08:00:02.000Z',
    skipped: false,
    devices: 3,
    succeeded: 2,
    failed: [{ device: 'edge', reason: 'Device edge unreachable: connection refused' }],
    events: [],
    warnings: [],
    haltedDevices: [],
    rolledDay: false,
    rolledMonths: [],
    ...overrides
  };
}

describe('processPollPass', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('runs one pass and keeps a compact summary as the job result', async () => {
    const now = new Date('2026-03-10T08:00:00.000Z');
    const engine = { runPass: vi.fn().mockResolvedValue(buildReport()) };

    const summary = await processPollPass(engine, now);

    expect(engine.runPass).toHaveBeenCalledWith(now);
    expect(summary).toEqual({ skipped: false, succeeded: 2, failed: 1, events: 0, haltedDevices: [] });
    expect(console.error).not.toHaveBeenCalled();
  });

  it('logs halted devices as critical', async () => {
    const engine = { runPass: vi.fn().mockResolvedValue(buildReport({ haltedDevices: ['core-router', 'edge'] })) };

    const summary = await processPollPass(engine);

    expect(summary.haltedDevices).toEqual(['core-router', 'edge']);
    expect(console.error).toHaveBeenCalledWith('[CRITICAL] [PollWorker] Halted devices: core-router, edge');
  });

  it('lets an engine failure fail the job', async () => {
    const engine = { runPass: vi.fn().mockRejectedValue(new Error('state directory unreadable')) };

    await expect(processPollPass(engine)).rejects.toThrow('state directory unreadable');
  });
});

describe('schedulePollPasses', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    queueMock.getRepeatableJobs.mockResolvedValue([
      { name: 'poll-pass', key: 'poll-pass:::60000' },
      { name: 'other-job', key: 'other-job:::1000' }
    ]);
    queueMock.removeRepeatableByKey.mockResolvedValue(true);
    queueMock.add.mockResolvedValue({ id: 'repeat:1' });
  });

  it('replaces the previous poll schedule with the configured interval', async () => {
    await schedulePollPasses(300);

    expect(queueMock.removeRepeatableByKey).toHaveBeenCalledTimes(1);
    expect(queueMock.removeRepeatableByKey).toHaveBeenCalledWith('poll-pass:::60000');
    expect(queueMock.add).toHaveBeenCalledWith(
      'poll-pass',
      { type: 'poll-pass' },
      {
        repeat: { every: 300_000, immediately: true },
        removeOnComplete: { count: 10 },
        removeOnFail: { count: 20 }
      }
    );
  });
});
