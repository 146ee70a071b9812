/**
 * State Reconciler
 *
 * Diffs a fresh reading against the device's persisted state. Each interface
 * runs a small state machine (up, down_pending, down): one down observation only
 * arms it, a second consecutive one confirms the outage and emits
 * `interface_down`, and the first up after a confirmed outage emits
 * `interface_up`. A single down followed by up is a blip and emits nothing.
 *
 * Pure: no I/O, the caller persists the returned state.
 */

import {
  DOWN_CONFIRMATION_CYCLES,
  type DeviceDescriptor,
  type MonitoredInterface,
  type OperStatus,
  type PersistedDeviceState,
  type PersistedInterfaceState,
  type RamReading,
  type RawReading,
  type SemanticEvent
} from '@netpulse/shared';
import { computeCounterDelta } from './counterDelta';
import type { DataQualityWarning } from './monitorErrors';

export interface ReconcileOptions {
  maxBytesPerSecond?: number;
}

export interface InterfaceTraffic {
  index: number;
  label: string;
  status: OperStatus;
  inBytes: number;
  outBytes: number;
  downEvent: boolean;
  upEvent: boolean;
}

export interface ReconcileResult {
  /** The reading is not newer than the last one applied; nothing changed */
  duplicate: boolean;
  events: SemanticEvent[];
  state: PersistedDeviceState;
  traffic: InterfaceTraffic[];
  warnings: DataQualityWarning[];
  cpuPercent: number | null;
  ramPercent: number | null;
}

type LinkTransition = 'down' | 'up' | null;

export function createInitialState(device: string): PersistedDeviceState {
  return {
    device,
    lastReading: null,
    interfaces: {},
    consecutiveFailures: 0,
    lastFailureAt: null,
    lastFailureReason: null
  };
}

function initialInterfaceState(): PersistedInterfaceState {
  return {
    link: 'up',
    consecutiveDownCount: 0,
    lastKnownUp: true,
    inOctets: null,
    outOctets: null
  };
}

export function calculateRamPercent(ram: RamReading | null): number | null {
  if (!ram || ram.totalBytes <= 0) return null;
  return Math.round((ram.usedBytes / ram.totalBytes) * 10_000) / 100;
}

/**
 * Advance one interface's link state by a single observation.
 */
export function advanceLink(
  current: PersistedInterfaceState,
  observed: OperStatus
): { next: PersistedInterfaceState; transition: LinkTransition } {
  if (observed === 'unknown') {
    return { next: current, transition: null };
  }

  if (observed === 'up') {
    return {
      next: { ...current, link: 'up', consecutiveDownCount: 0, lastKnownUp: true },
      transition: current.link === 'down' ? 'up' : null
    };
  }

  const consecutiveDownCount = current.consecutiveDownCount + 1;

  if (current.link === 'down') {
    return { next: { ...current, consecutiveDownCount }, transition: null };
  }

  if (consecutiveDownCount >= DOWN_CONFIRMATION_CYCLES) {
    return {
      next: { ...current, link: 'down', consecutiveDownCount, lastKnownUp: false },
      transition: 'down'
    };
  }

  return {
    next: { ...current, link: 'down_pending', consecutiveDownCount },
    transition: null
  };
}

function parseCounter(value: string | null): bigint | null {
  if (value === null || !/^\d+$/.test(value)) return null;
  return BigInt(value);
}

/**
 * Time covered by a counter delta. Cycles that skip a counter leave it stored
 * with its own timestamp, so the gap counts toward the plausibility ceiling.
 */
function counterElapsedMs(storedAt: string | null | undefined, readingMs: number, fallbackMs: number): number {
  if (!storedAt) return fallbackMs;
  const sampledMs = Date.parse(storedAt);
  return Number.isFinite(sampledMs) && sampledMs < readingMs ? readingMs - sampledMs : fallbackMs;
}

function reconcileInterface(
  device: DeviceDescriptor,
  iface: Readonly<MonitoredInterface>,
  reading: RawReading,
  previous: PersistedInterfaceState,
  readingMs: number,
  fallbackElapsedMs: number,
  options: ReconcileOptions,
  warnings: DataQualityWarning[]
): { state: PersistedInterfaceState; traffic: InterfaceTraffic; transition: LinkTransition } {
  const observed = reading.interfaces[iface.index];
  const status: OperStatus = observed?.operStatus ?? 'unknown';
  const { next, transition } = advanceLink(previous, status);

  const traffic: InterfaceTraffic = {
    index: iface.index,
    label: iface.label,
    status,
    inBytes: 0,
    outBytes: 0,
    downEvent: transition === 'down',
    upEvent: transition === 'up'
  };

  if (!observed || status === 'unknown') {
    return { state: next, traffic, transition };
  }

  const state = { ...next };
  const directions = [
    { direction: 'in' as const, current: observed.inOctets, stored: previous.inOctets, storedAt: previous.inSampledAt },
    { direction: 'out' as const, current: observed.outOctets, stored: previous.outOctets, storedAt: previous.outSampledAt }
  ];

  for (const { direction, current, stored, storedAt } of directions) {
    if (current === null) continue;

    const result = computeCounterDelta({
      previous: parseCounter(stored),
      current,
      width: iface.counterWidth,
      elapsedMs: counterElapsedMs(storedAt, readingMs, fallbackElapsedMs),
      maxBytesPerSecond: options.maxBytesPerSecond
    });

    if (result.issue) {
      warnings.push({
        code: result.issue.code,
        device: device.name,
        interfaceLabel: iface.label,
        direction,
        message: result.issue.message
      });
    }

    if (direction === 'in') {
      traffic.inBytes = result.delta;
      state.inOctets = current.toString();
      state.inSampledAt = reading.timestamp;
    } else {
      traffic.outBytes = result.delta;
      state.outOctets = current.toString();
      state.outSampledAt = reading.timestamp;
    }
  }

  return { state, traffic, transition };
}

export function reconcileReading(
  device: DeviceDescriptor,
  reading: RawReading,
  previous: PersistedDeviceState | null,
  options: ReconcileOptions = {}
): ReconcileResult {
  const prior = previous ?? createInitialState(device.name);
  const readingMs = Date.parse(reading.timestamp);
  const lastMs = prior.lastReading ? Date.parse(prior.lastReading.timestamp) : null;

  if (lastMs !== null && readingMs <= lastMs) {
    return {
      duplicate: true,
      events: [],
      state: prior,
      traffic: [],
      warnings: [],
      cpuPercent: null,
      ramPercent: null
    };
  }

  const elapsedMs = lastMs === null ? 0 : readingMs - lastMs;
  const events: SemanticEvent[] = [];
  const warnings: DataQualityWarning[] = [];
  const traffic: InterfaceTraffic[] = [];
  const interfaces: Record<string, PersistedInterfaceState> = {};

  for (const iface of device.interfaces) {
    const key = String(iface.index);
    const result = reconcileInterface(
      device,
      iface,
      reading,
      prior.interfaces[key] ?? initialInterfaceState(),
      readingMs,
      elapsedMs,
      options,
      warnings
    );

    interfaces[key] = result.state;
    traffic.push(result.traffic);

    if (result.transition) {
      events.push({
        type: result.transition === 'down' ? 'interface_down' : 'interface_up',
        device: device.name,
        timestamp: reading.timestamp,
        interfaceIndex: iface.index,
        interfaceLabel: iface.label
      });
    }
  }

  const cpuPercent = reading.cpuPercent;
  const ramPercent = calculateRamPercent(reading.ram);

  if (cpuPercent !== null && cpuPercent > device.thresholds.cpu) {
    events.push({
      type: 'threshold_breach',
      device: device.name,
      timestamp: reading.timestamp,
      metric: 'cpu',
      value: cpuPercent,
      threshold: device.thresholds.cpu
    });
  }

  if (ramPercent !== null && ramPercent > device.thresholds.ram) {
    events.push({
      type: 'threshold_breach',
      device: device.name,
      timestamp: reading.timestamp,
      metric: 'ram',
      value: ramPercent,
      threshold: device.thresholds.ram
    });
  }

  return {
    duplicate: false,
    events,
    state: {
      device: device.name,
      lastReading: { timestamp: reading.timestamp, cpuPercent, ramPercent },
      interfaces,
      consecutiveFailures: 0,
      lastFailureAt: prior.lastFailureAt,
      lastFailureReason: prior.lastFailureReason
    },
    traffic,
    warnings,
    cpuPercent,
    ramPercent
  };
}

/**
 * An unreachable device changes nothing but its failure counter; in particular
 * its interfaces are not treated as down.
 */
export function recordPollFailure(
  previous: PersistedDeviceState | null,
  device: string,
  reason: string,
  at: string
): PersistedDeviceState {
  const prior = previous ?? createInitialState(device);
  return {
    ...prior,
    consecutiveFailures: prior.consecutiveFailures + 1,
    lastFailureAt: at,
    lastFailureReason: reason
  };
}
