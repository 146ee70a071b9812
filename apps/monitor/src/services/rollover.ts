/**
 * Rollover Engine
 *
 * Day boundary: finalize the accumulator into daily records, append them,
 * start an empty accumulator for the new day.
 * Month boundary: fold every daily record of the finished month into a
 * monthly record per device, report it, archive the month, and only then
 * advance the checkpoint, so a crash part way through repeats the rollover
 * instead of skipping it.
 */

import type {
  DailyAccumulator,
  DailyRecord,
  DeviceDescriptor,
  MonthlyInterfaceSummary,
  MonthlyMetricSummary,
  MonthlyRecord,
  MetricStats,
  ScriptState
} from '@netpulse/shared';
import { createAccumulator, finalizeAccumulator } from './dailyAccumulator';
import type { MonitorStore } from './monitorStore';
import type { Notifier } from './notifier';
import { formatMonthlyReport } from './alertMessages';
import { calendarDate, calendarMonth, monthsBetween, previousMonth } from '../utils/calendar';
import { describeError } from './monitorErrors';

function summarizeMetric(days: MetricStats[]): MonthlyMetricSummary {
  let sum = 0;
  let count = 0;
  let peak: number | null = null;
  for (const day of days) {
    sum += day.sum;
    count += day.count;
    if (day.max !== null) {
      peak = peak === null ? day.max : Math.max(peak, day.max);
    }
  }
  return {
    average: count === 0 ? null : Math.round((sum / count) * 100) / 100,
    peak,
    samples: count
  };
}

/**
 * Aggregate a month of daily records for one device. Totals are exact sums;
 * averages weight each day by its sample count.
 */
export function buildMonthlyRecord(
  device: string,
  month: string,
  dailyRecords: DailyRecord[],
  generatedAt: string
): MonthlyRecord {
  const ordered = [...dailyRecords].sort((a, b) => a.date.localeCompare(b.date));
  const interfaces: Record<string, MonthlyInterfaceSummary> = {};

  for (const day of ordered) {
    for (const [label, totals] of Object.entries(day.interfaces)) {
      const summary = interfaces[label] ?? {
        inBytes: 0,
        outBytes: 0,
        downEvents: 0,
        upEvents: 0,
        flaps: 0,
        lastStatus: 'unknown'
      };
      interfaces[label] = {
        inBytes: summary.inBytes + totals.inBytes,
        outBytes: summary.outBytes + totals.outBytes,
        downEvents: summary.downEvents + totals.downEvents,
        upEvents: summary.upEvents + totals.upEvents,
        flaps: summary.flaps + totals.downEvents,
        lastStatus: totals.lastStatus === 'unknown' ? summary.lastStatus : totals.lastStatus
      };
    }
  }

  const interfaceList = Object.values(interfaces);

  return {
    device,
    month,
    days: new Set(ordered.map((day) => day.date)).size,
    samples: ordered.reduce((total, day) => total + day.samples, 0),
    failedPolls: ordered.reduce((total, day) => total + day.failedPolls, 0),
    cpu: summarizeMetric(ordered.map((day) => day.cpu)),
    ram: summarizeMetric(ordered.map((day) => day.ram)),
    totals: {
      inBytes: interfaceList.reduce((total, iface) => total + iface.inBytes, 0),
      outBytes: interfaceList.reduce((total, iface) => total + iface.outBytes, 0),
      flaps: interfaceList.reduce((total, iface) => total + iface.flaps, 0)
    },
    interfaces,
    generatedAt
  };
}

export interface RolloverEngineOptions {
  store: MonitorStore;
  notifier: Notifier;
  devices: readonly DeviceDescriptor[];
  timeZone: string;
  recipients: ReadonlySet<string>;
}

export interface DayRolloverResult {
  accumulator: DailyAccumulator;
  rolled: boolean;
  records: DailyRecord[];
}

export interface MonthRolloverResult {
  scriptState: ScriptState;
  rolledMonths: string[];
  reports: MonthlyRecord[];
}

export class RolloverEngine {
  constructor(private readonly options: RolloverEngineOptions) {}

  private recipientsFor(device: DeviceDescriptor): Set<string> {
    return new Set([...this.options.recipients, ...device.recipients]);
  }

  /**
   * Finalize the accumulator when `now` falls on a later calendar day.
   * Appends are idempotent per device and date, so a retry after a crash
   * between append and reset does not duplicate a day.
   */
  async rollDay(accumulator: DailyAccumulator, now: Date): Promise<DayRolloverResult> {
    const today = calendarDate(now, this.options.timeZone);
    if (accumulator.date === today) {
      return { accumulator, rolled: false, records: [] };
    }

    if (accumulator.date > today) {
      console.warn(`[Rollover] Accumulator date ${accumulator.date} is ahead of ${today}; clock moved backwards, keeping it`);
      return { accumulator, rolled: false, records: [] };
    }

    const records = finalizeAccumulator(accumulator, now.toISOString());
    for (const record of records) {
      await this.options.store.appendDailyRecord(record);
    }

    console.log(`[Rollover] Finalized ${records.length} daily record(s) for ${accumulator.date}`);
    return { accumulator: createAccumulator(today), rolled: true, records };
  }

  /**
   * Roll every completed month after the checkpoint, oldest first.
   * On the very first start there is nothing to roll: the checkpoint is set to
   * the previous month.
   */
  async rollMonths(scriptState: ScriptState | null, now: Date): Promise<MonthRolloverResult> {
    const lastCompleted = previousMonth(calendarMonth(now, this.options.timeZone));

    if (!scriptState || scriptState.lastRolledMonth === null) {
      const initial: ScriptState = { lastRolledMonth: lastCompleted };
      await this.options.store.saveScriptState(initial);
      console.log(`[Rollover] No rollover checkpoint found, starting after ${lastCompleted}`);
      return { scriptState: initial, rolledMonths: [], reports: [] };
    }

    const pending = monthsBetween(scriptState.lastRolledMonth, lastCompleted);
    let current = scriptState;
    const reports: MonthlyRecord[] = [];

    for (const month of pending) {
      reports.push(...(await this.rollMonth(month, now)));
      current = { lastRolledMonth: month };
      await this.options.store.saveScriptState(current);
      console.log(`[Rollover] Monthly rollover for ${month} complete`);
    }

    return { scriptState: current, rolledMonths: pending, reports };
  }

  private async rollMonth(month: string, now: Date): Promise<MonthlyRecord[]> {
    const reports: MonthlyRecord[] = [];

    for (const device of this.options.devices) {
      const record = await this.ensureMonthlyRecord(device.name, month, now);
      if (record) {
        reports.push(record);
        await this.sendReport(device, record);
      } else {
        console.log(`[Rollover] No daily records for ${device.name} in ${month}`);
      }
      await this.options.store.archiveMonth(device.name, month);
    }

    return reports;
  }

  /** Reuse a record written by an interrupted earlier attempt */
  private async ensureMonthlyRecord(device: string, month: string, now: Date): Promise<MonthlyRecord | null> {
    const existing = await this.options.store.readMonthlyRecord(device, month);
    if (existing) return existing;

    const daily = await this.options.store.readDailyRecords(device, month);
    if (daily.length === 0) return null;

    const record = buildMonthlyRecord(device, month, daily, now.toISOString());
    await this.options.store.writeMonthlyRecord(record);
    return record;
  }

  private async sendReport(device: DeviceDescriptor, record: MonthlyRecord): Promise<void> {
    const result = await this.options.notifier.notify(formatMonthlyReport(record), this.recipientsFor(device), {
      kind: 'monthly_report',
      device: device.name
    });
    if (!result.success) {
      console.error(`[Rollover] Monthly report for ${device.name} ${record.month} not delivered: ${result.error ?? 'unknown error'}`);
    }
  }

  /**
   * Rebuild and send reports for a month without archiving or touching the
   * checkpoint. Backs the manual report script.
   */
  async resendReports(month: string, now: Date): Promise<MonthlyRecord[]> {
    const reports: MonthlyRecord[] = [];
    for (const device of this.options.devices) {
      try {
        const existing = await this.options.store.readMonthlyRecord(device.name, month);
        const record = existing ?? buildMonthlyRecord(
          device.name,
          month,
          await this.options.store.readDailyRecords(device.name, month),
          now.toISOString()
        );
        reports.push(record);
        await this.sendReport(device, record);
      } catch (error) {
        console.error(`[Rollover] Failed to rebuild report for ${device.name} ${month}: ${describeError(error)}`);
      }
    }
    return reports;
  }
}
