import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, readdir, rm, stat, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { DailyRecord, MonthlyRecord, PersistedDeviceState } from '@netpulse/shared';
import { FileMonitorStore, deviceStorageKey, withPersistenceRetry } from './monitorStore';
import { PersistenceError } from './monitorErrors';

function dailyRecord(date: string, inBytes = 1000): DailyRecord {
  return {
    device: 'core router',
    date,
    samples: 10,
    failedPolls: 0,
    cpu: { sum: 100, count: 10, max: 30 },
    ram: { sum: 400, count: 10, max: 45 },
    interfaces: {
      ether1: { inBytes, outBytes: 500, downEvents: 1, upEvents: 1, lastStatus: 'up' }
    },
    finalizedAt: `${date}T23:59:59.000Z`
  };
}

const monthly: MonthlyRecord = {
  device: 'core router',
  month: '2026-02',
  days: 2,
  samples: 20,
  failedPolls: 0,
  cpu: { average: 10, peak: 30, samples: 20 },
  ram: { average: 40, peak: 45, samples: 20 },
  totals: { inBytes: 2000, outBytes: 1000, flaps: 2 },
  interfaces: {
    ether1: { inBytes: 2000, outBytes: 1000, downEvents: 2, upEvents: 2, flaps: 2, lastStatus: 'up' }
  },
  generatedAt: '2026-03-01T00:00:10.000Z'
};

describe('FileMonitorStore', () => {
  let dataDir: string;
  let store: FileMonitorStore;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'netpulse-store-'));
    store = new FileMonitorStore(dataDir, { attempts: 1, baseDelayMs: 0 });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dataDir, { recursive: true, force: true });
  });

  it('maps device names to file-system safe keys', () => {
    expect(deviceStorageKey('Mikrotik Core/1')).toBe('Mikrotik_Core_1');
  });

  it('round-trips device state and leaves no temp files behind', async () => {
    const state: PersistedDeviceState = {
      device: 'core router',
      lastReading: { timestamp: '2026-02-01T00:00:00.000Z', cpuPercent: 12, ramPercent: 40.5 },
      interfaces: {
        '1': { link: 'down_pending', consecutiveDownCount: 1, lastKnownUp: true, inOctets: '18446744073709551000', outOctets: null }
      },
      consecutiveFailures: 0,
      lastFailureAt: null,
      lastFailureReason: null
    };

    await store.saveDeviceState(state);

    await expect(store.loadDeviceState('core router')).resolves.toEqual(state);
    expect(await readdir(join(dataDir, 'state', 'devices'))).toEqual(['core_router.json']);
  });

  it('returns null for a device that never reported', async () => {
    await expect(store.loadDeviceState('unknown')).resolves.toBeNull();
  });

  it('rejects a corrupt state file instead of reporting it missing', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    await mkdir(join(dataDir, 'state'), { recursive: true });
    await writeFile(join(dataDir, 'state', 'accumulator.json'), '{"date": ');

    await expect(store.loadAccumulator()).rejects.toThrow(
      `Persistence failed during parse (${join(dataDir, 'state', 'accumulator.json')})`
    );
  });

  it('rejects a rollover checkpoint with an unexpected shape', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    await mkdir(join(dataDir, 'state'), { recursive: true });
    await writeFile(join(dataDir, 'state', 'script-state.json'), '{"lastRolledMonth": 202601}');

    await expect(store.loadScriptState()).rejects.toBeInstanceOf(PersistenceError);
  });

  it('round-trips the script state', async () => {
    await store.saveScriptState({ lastRolledMonth: '2026-01' });
    await expect(store.loadScriptState()).resolves.toEqual({ lastRolledMonth: '2026-01' });
  });

  it('appends daily records once per date', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    await expect(store.appendDailyRecord(dailyRecord('2026-02-01'))).resolves.toBe(true);
    await expect(store.appendDailyRecord(dailyRecord('2026-02-02'))).resolves.toBe(true);
    await expect(store.appendDailyRecord(dailyRecord('2026-02-01', 9999))).resolves.toBe(false);

    const records = await store.readDailyRecords('core router', '2026-02');
    expect(records.map((record) => record.date)).toEqual(['2026-02-01', '2026-02-02']);
    expect(records[0]?.interfaces['ether1']?.inBytes).toBe(1000);
  });

  it('skips unreadable lines in the daily file', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    await store.appendDailyRecord(dailyRecord('2026-02-01'));
    const path = join(dataDir, 'records', 'core_router', '2026-02', 'daily.jsonl');
    await writeFile(path, `${await readFile(path, 'utf8')}not json\n`);

    const records = await store.readDailyRecords('core router', '2026-02');
    expect(records).toHaveLength(1);
  });

  it('archives a month and keeps it readable', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    await store.appendDailyRecord(dailyRecord('2026-02-01'));
    await store.appendDailyRecord(dailyRecord('2026-02-02'));
    await store.writeMonthlyRecord(monthly);

    await expect(store.archiveMonth('core router', '2026-02')).resolves.toBe('archived');

    await expect(stat(join(dataDir, 'records', 'core_router', '2026-02'))).rejects.toThrow();
    await expect(stat(join(dataDir, 'archive', 'core_router', '2026-02.json.gz'))).resolves.toBeTruthy();
    await expect(store.readMonthlyRecord('core router', '2026-02')).resolves.toEqual(monthly);
    await expect(store.readDailyRecords('core router', '2026-02')).resolves.toHaveLength(2);
  });

  it('treats a second archive of the same month as a no-op', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    await store.appendDailyRecord(dailyRecord('2026-02-01'));
    await store.archiveMonth('core router', '2026-02');

    await expect(store.archiveMonth('core router', '2026-02')).resolves.toBe('already_archived');
    await expect(store.archiveMonth('core router', '2025-12')).resolves.toBe('nothing_to_archive');
  });
});

describe('withPersistenceRetry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('retries until the write succeeds', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const write = vi.fn()
      .mockRejectedValueOnce(new Error('EBUSY'))
      .mockResolvedValueOnce('ok');

    await expect(withPersistenceRetry('save', '/tmp/x', write, { attempts: 3, baseDelayMs: 0 })).resolves.toBe('ok');
    expect(write).toHaveBeenCalledTimes(2);
  });

  it('raises a PersistenceError after the last attempt', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const write = vi.fn().mockRejectedValue(new Error('ENOSPC'));

    const attempt = withPersistenceRetry('save accumulator', '/data/state/accumulator.json', write, {
      attempts: 2,
      baseDelayMs: 0
    });

    await expect(attempt).rejects.toBeInstanceOf(PersistenceError);
    await expect(attempt).rejects.toThrow('Persistence failed during save accumulator (/data/state/accumulator.json)');
    expect(write).toHaveBeenCalledTimes(2);
  });
});
