import type {
  DailyAccumulator,
  DailyRecord,
  DeviceDescriptor,
  MonthlyRecord,
  PersistedDeviceState,
  ScriptState
} from '@netpulse/shared';
import type { ArchiveOutcome, MonitorStore } from '../services/monitorStore';
import type { Notifier, NotifyOptions, NotifyResult } from '../services/notifier';
import { monthOfDate } from '../utils/calendar';

export function createTestDevice(overrides: Partial<DeviceDescriptor> = {}): DeviceDescriptor {
  return {
    name: 'core-router',
    address: '10.0.0.1',
    port: 161,
    community: 'public',
    snmpVersion: 'v2c',
    oids: {
      cpu: '1.3.6.1.4.1.2021.11.10.0',
      ramUsed: '1.3.6.1.2.1.25.2.3.1.6.65536',
      ramTotal: '1.3.6.1.2.1.25.2.3.1.5.65536'
    },
    thresholds: { cpu: 85, ram: 90 },
    interfaces: [{ index: 1, label: 'ether1', counterWidth: 32 }],
    recipients: [],
    ...overrides
  };
}

export function createTestDailyRecord(overrides: Partial<DailyRecord> = {}): DailyRecord {
  return {
    device: 'core-router',
    date: '2026-02-01',
    samples: 10,
    failedPolls: 0,
    cpu: { sum: 100, count: 10, max: 30 },
    ram: { sum: 400, count: 10, max: 45 },
    interfaces: {
      ether1: { inBytes: 1000, outBytes: 500, downEvents: 0, upEvents: 0, lastStatus: 'up' }
    },
    finalizedAt: '2026-02-02T00:00:00.000Z',
    ...overrides
  };
}

/**
 * In-process MonitorStore with the same idempotency rules as the file store.
 * Individual methods can be swapped for vi.fn() to inject failures.
 */
export class MemoryMonitorStore implements MonitorStore {
  deviceStates = new Map<string, PersistedDeviceState>();
  accumulator: DailyAccumulator | null = null;
  scriptState: ScriptState | null = null;
  daily = new Map<string, DailyRecord[]>();
  monthly = new Map<string, MonthlyRecord>();
  archived = new Set<string>();

  private key(device: string, month: string): string {
    return `${device}/${month}`;
  }

  async loadDeviceState(device: string): Promise<PersistedDeviceState | null> {
    return this.deviceStates.get(device) ?? null;
  }

  async saveDeviceState(state: PersistedDeviceState): Promise<void> {
    this.deviceStates.set(state.device, state);
  }

  async loadAccumulator(): Promise<DailyAccumulator | null> {
    return this.accumulator;
  }

  async saveAccumulator(accumulator: DailyAccumulator): Promise<void> {
    this.accumulator = accumulator;
  }

  async loadScriptState(): Promise<ScriptState | null> {
    return this.scriptState;
  }

  async saveScriptState(state: ScriptState): Promise<void> {
    this.scriptState = state;
  }

  async appendDailyRecord(record: DailyRecord): Promise<boolean> {
    const key = this.key(record.device, monthOfDate(record.date));
    const records = this.daily.get(key) ?? [];
    if (records.some((entry) => entry.date === record.date)) return false;
    this.daily.set(key, [...records, record]);
    return true;
  }

  async readDailyRecords(device: string, month: string): Promise<DailyRecord[]> {
    return this.daily.get(this.key(device, month)) ?? [];
  }

  async writeMonthlyRecord(record: MonthlyRecord): Promise<void> {
    this.monthly.set(this.key(record.device, record.month), record);
  }

  async readMonthlyRecord(device: string, month: string): Promise<MonthlyRecord | null> {
    return this.monthly.get(this.key(device, month)) ?? null;
  }

  async archiveMonth(device: string, month: string): Promise<ArchiveOutcome> {
    const key = this.key(device, month);
    if (this.archived.has(key)) return 'already_archived';
    if (!this.daily.has(key) && !this.monthly.has(key)) return 'nothing_to_archive';
    this.archived.add(key);
    return 'archived';
  }
}

export interface SentNotification {
  message: string;
  recipients: string[];
  options: NotifyOptions;
}

export class RecordingNotifier implements Notifier {
  sent: SentNotification[] = [];
  result: NotifyResult = { success: true };

  async notify(message: string, recipients: ReadonlySet<string>, options: NotifyOptions = {}): Promise<NotifyResult> {
    this.sent.push({ message, recipients: [...recipients], options });
    return this.result;
  }
}
