/**
 * Daily Accumulator
 *
 * Running per-device, per-interface totals for one calendar day. Every fold
 * returns a new accumulator; the monitor engine is the only writer and swaps
 * the reference after each pass.
 */

import type {
  DailyAccumulator,
  DailyRecord,
  DeviceDayAccumulator,
  InterfaceTotals,
  MetricStats
} from '@netpulse/shared';
import type { InterfaceTraffic } from './stateReconciler';

export interface CycleContribution {
  timestamp: string;
  cpuPercent: number | null;
  ramPercent: number | null;
  traffic: InterfaceTraffic[];
}

export interface FoldResult {
  accumulator: DailyAccumulator;
  /** False when the guard rejected a reading already folded */
  applied: boolean;
}

export function createAccumulator(date: string): DailyAccumulator {
  return { date, devices: {} };
}

function emptyStats(): MetricStats {
  return { sum: 0, count: 0, max: null };
}

export function emptyDeviceAccumulator(): DeviceDayAccumulator {
  return {
    lastFoldedAt: null,
    samples: 0,
    failedPolls: 0,
    cpu: emptyStats(),
    ram: emptyStats(),
    interfaces: {}
  };
}

function emptyInterfaceTotals(): InterfaceTotals {
  return { inBytes: 0, outBytes: 0, downEvents: 0, upEvents: 0, lastStatus: 'unknown' };
}

function addSample(stats: MetricStats, value: number | null): MetricStats {
  if (value === null) return stats;
  return {
    sum: stats.sum + value,
    count: stats.count + 1,
    max: stats.max === null ? value : Math.max(stats.max, value)
  };
}

export function foldCycle(
  accumulator: DailyAccumulator,
  device: string,
  contribution: CycleContribution
): FoldResult {
  const current = accumulator.devices[device] ?? emptyDeviceAccumulator();

  if (current.lastFoldedAt !== null && Date.parse(contribution.timestamp) <= Date.parse(current.lastFoldedAt)) {
    return { accumulator, applied: false };
  }

  const interfaces = { ...current.interfaces };
  for (const traffic of contribution.traffic) {
    const totals = interfaces[traffic.label] ?? emptyInterfaceTotals();
    interfaces[traffic.label] = {
      inBytes: totals.inBytes + traffic.inBytes,
      outBytes: totals.outBytes + traffic.outBytes,
      downEvents: totals.downEvents + (traffic.downEvent ? 1 : 0),
      upEvents: totals.upEvents + (traffic.upEvent ? 1 : 0),
      // an unknown reading does not overwrite the last observed status
      lastStatus: traffic.status === 'unknown' ? totals.lastStatus : traffic.status
    };
  }

  const next: DeviceDayAccumulator = {
    lastFoldedAt: contribution.timestamp,
    samples: current.samples + 1,
    failedPolls: current.failedPolls,
    cpu: addSample(current.cpu, contribution.cpuPercent),
    ram: addSample(current.ram, contribution.ramPercent),
    interfaces
  };

  return {
    accumulator: { ...accumulator, devices: { ...accumulator.devices, [device]: next } },
    applied: true
  };
}

export function foldFailure(accumulator: DailyAccumulator, device: string): DailyAccumulator {
  const current = accumulator.devices[device] ?? emptyDeviceAccumulator();
  return {
    ...accumulator,
    devices: {
      ...accumulator.devices,
      [device]: { ...current, failedPolls: current.failedPolls + 1 }
    }
  };
}

/**
 * Snapshot every device of the day into immutable daily records.
 * Devices that never produced a sample or a failure are left out.
 */
export function finalizeAccumulator(accumulator: DailyAccumulator, finalizedAt: string): DailyRecord[] {
  return Object.entries(accumulator.devices)
    .filter(([, day]) => day.samples > 0 || day.failedPolls > 0)
    .map(([device, day]) => ({
      device,
      date: accumulator.date,
      samples: day.samples,
      failedPolls: day.failedPolls,
      cpu: { ...day.cpu },
      ram: { ...day.ram },
      interfaces: Object.fromEntries(
        Object.entries(day.interfaces).map(([label, totals]) => [label, { ...totals }])
      ),
      finalizedAt
    }));
}

export function averageOf(stats: MetricStats): number | null {
  return stats.count === 0 ? null : stats.sum / stats.count;
}
