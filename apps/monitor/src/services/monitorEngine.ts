/**
 * Monitor Engine
 *
 * One pass per scheduler tick:
 *
 *   rollover (day, then month)
 *   -> fetch every device, bounded concurrency, per-device timeout
 *   -> fan-in in registry order
 *   -> reconcile -> persist device state
 *   -> fold into the day of each reading's timestamp (rolling the day when a
 *      reading is already past midnight)
 *   -> persist accumulator -> notify
 *
 * The engine is the only writer of persisted state. Events are sent only after
 * the state that produced them is on disk, so a failed write re-detects the
 * same transition on the next pass instead of losing or duplicating it.
 */

import type {
  DailyAccumulator,
  DeviceDescriptor,
  PersistedDeviceState,
  RawReading,
  ScriptState,
  SemanticEvent,
  ThresholdBreachEvent
} from '@netpulse/shared';
import { createAccumulator, foldCycle, foldFailure } from './dailyAccumulator';
import type { MetricReader } from './metricReader';
import type { MonitorStore } from './monitorStore';
import type { Notifier } from './notifier';
import { RolloverEngine } from './rollover';
import { reconcileReading, recordPollFailure } from './stateReconciler';
import {
  formatInterfaceChanges,
  formatMonitorError,
  formatThresholdBreach,
  type InterfaceChangeEvent
} from './alertMessages';
import { describeError, type DataQualityWarning } from './monitorErrors';
import { mapWithConcurrency, withTimeout } from '../utils/concurrency';
import { calendarDate } from '../utils/calendar';

export interface MonitorEngineOptions {
  devices: readonly DeviceDescriptor[];
  reader: MetricReader;
  store: MonitorStore;
  notifier: Notifier;
  timeZone: string;
  concurrency: number;
  deviceTimeoutMs: number;
  maxBytesPerSecond: number;
  /** Receive every notification, in addition to each device's own recipients */
  recipients: ReadonlySet<string>;
}

export interface FailedDevice {
  device: string;
  reason: string;
}

export interface PassReport {
  startedAt: string;
  finishedAt: string;
  skipped: boolean;
  devices: number;
  succeeded: number;
  failed: FailedDevice[];
  events: SemanticEvent[];
  warnings: DataQualityWarning[];
  haltedDevices: string[];
  rolledDay: boolean;
  rolledMonths: string[];
}

interface PendingFold {
  /** Calendar day the contribution belongs to */
  date: string;
  at: Date;
  apply: (acc: DailyAccumulator) => DailyAccumulator;
}

type FetchOutcome =
  | { device: DeviceDescriptor; ok: true; reading: RawReading }
  | { device: DeviceDescriptor; ok: false; reason: string };

export class MonitorEngine {
  private readonly rollover: RolloverEngine;
  private readonly deviceStates = new Map<string, PersistedDeviceState>();
  private readonly halted = new Set<string>();
  /** Operator alerts already sent for a problem that has not cleared yet */
  private readonly openAlerts = new Set<string>();
  private accumulator: DailyAccumulator | null = null;
  private scriptState: ScriptState | null = null;
  private initialized = false;
  private running = false;

  constructor(private readonly options: MonitorEngineOptions) {
    this.rollover = new RolloverEngine({
      store: options.store,
      notifier: options.notifier,
      devices: options.devices,
      timeZone: options.timeZone,
      recipients: options.recipients
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Load persisted state once. Read failures other than a missing file are
   * fatal: starting from blank state would re-alert and double count.
   */
  async initialize(now: Date = new Date()): Promise<void> {
    if (this.initialized) return;

    for (const device of this.options.devices) {
      const state = await this.options.store.loadDeviceState(device.name);
      if (state) this.deviceStates.set(device.name, state);
    }

    this.accumulator =
      (await this.options.store.loadAccumulator()) ?? createAccumulator(calendarDate(now, this.options.timeZone));
    this.scriptState = await this.options.store.loadScriptState();
    this.initialized = true;

    console.log(
      `[MonitorEngine] Initialized with ${this.options.devices.length} device(s), ` +
        `${this.deviceStates.size} restored state(s), accumulator for ${this.accumulator.date}`
    );
  }

  async runPass(now: Date = new Date()): Promise<PassReport> {
    if (this.running) {
      console.warn('[MonitorEngine] Previous pass still running, skipping this tick');
      const at = now.toISOString();
      return {
        startedAt: at,
        finishedAt: at,
        skipped: true,
        devices: this.options.devices.length,
        succeeded: 0,
        failed: [],
        events: [],
        warnings: [],
        haltedDevices: [...this.halted],
        rolledDay: false,
        rolledMonths: []
      };
    }

    this.running = true;
    try {
      const report = await this.executePass(now);
      this.clearAlert('pass');
      return report;
    } catch (error) {
      await this.raiseAlert('pass', 'Monitor pass failed', describeError(error));
      throw error;
    } finally {
      this.running = false;
    }
  }

  private async executePass(now: Date): Promise<PassReport> {
    const startedAt = new Date().toISOString();
    await this.initialize(now);

    const rolled = await this.rollOver(now);
    let accumulator = rolled.accumulator;

    const outcomes = await mapWithConcurrency(this.options.devices, this.options.concurrency, (device) =>
      this.fetchDevice(device)
    );

    const failed: FailedDevice[] = [];
    const events: SemanticEvent[] = [];
    const warnings: DataQualityWarning[] = [];
    const pending: PendingFold[] = [];
    let succeeded = 0;

    for (const outcome of outcomes) {
      const name = outcome.device.name;
      const previous = this.deviceStates.get(name) ?? null;

      let nextState: PersistedDeviceState;
      let deviceEvents: SemanticEvent[] = [];
      let fold: PendingFold;

      if (outcome.ok) {
        succeeded++;
        const result = reconcileReading(outcome.device, outcome.reading, previous, {
          maxBytesPerSecond: this.options.maxBytesPerSecond
        });

        if (result.duplicate) {
          console.warn(`[MonitorEngine] ${name}: reading at ${outcome.reading.timestamp} is not newer than the last one, ignored`);
          continue;
        }

        for (const warning of result.warnings) {
          console.warn(`[MonitorEngine] Data quality (${warning.code}) ${name}/${warning.interfaceLabel} ${warning.direction}: ${warning.message}`);
        }
        warnings.push(...result.warnings);

        nextState = result.state;
        deviceEvents = result.events;
        const readAt = new Date(outcome.reading.timestamp);
        fold = {
          date: calendarDate(readAt, this.options.timeZone),
          at: readAt,
          apply: (acc) => {
            const folded = foldCycle(acc, name, {
              timestamp: outcome.reading.timestamp,
              cpuPercent: result.cpuPercent,
              ramPercent: result.ramPercent,
              traffic: result.traffic
            });
            if (!folded.applied) {
              console.warn(`[MonitorEngine] ${name}: cycle at ${outcome.reading.timestamp} already folded, skipped`);
            }
            return folded.accumulator;
          }
        };
      } else {
        failed.push({ device: name, reason: outcome.reason });
        console.warn(`[MonitorEngine] ${outcome.reason}`);
        nextState = recordPollFailure(previous, name, outcome.reason, now.toISOString());
        fold = {
          date: calendarDate(now, this.options.timeZone),
          at: now,
          apply: (acc) => foldFailure(acc, name)
        };
      }

      if (!(await this.persistDeviceState(nextState))) {
        continue;
      }

      events.push(...deviceEvents);
      pending.push(fold);
    }

    let rolledDay = rolled.rolledDay;
    let accumulatorChanged = false;
    if (rolled.accumulate && pending.length > 0) {
      const folded = await this.applyFolds(accumulator, pending);
      accumulator = folded.accumulator;
      rolledDay = rolledDay || folded.rolledDay;
      accumulatorChanged = true;
    }

    this.accumulator = accumulator;
    if (accumulatorChanged || rolledDay) {
      try {
        await this.options.store.saveAccumulator(accumulator);
      } catch (error) {
        console.error(`[CRITICAL] [MonitorEngine] Day accumulator not persisted: ${describeError(error)}`);
      }
    }

    await this.notify(events);

    const report: PassReport = {
      startedAt,
      finishedAt: new Date().toISOString(),
      skipped: false,
      devices: this.options.devices.length,
      succeeded,
      failed,
      events,
      warnings,
      haltedDevices: [...this.halted],
      rolledDay,
      rolledMonths: rolled.rolledMonths
    };

    console.log(
      `[MonitorEngine] Pass complete: ${succeeded}/${report.devices} device(s) read, ` +
        `${failed.length} failed, ${events.length} event(s)`
    );
    return report;
  }

  /**
   * Fold the pass into the accumulator by reading time. Contributions stamped
   * on the current day go in first; a reading already past midnight rolls the
   * day before its own contribution lands. When that rollover fails, only the
   * later day's contributions are dropped.
   */
  private async applyFolds(
    accumulator: DailyAccumulator,
    pending: PendingFold[]
  ): Promise<{ accumulator: DailyAccumulator; rolledDay: boolean }> {
    const current = pending.filter((fold) => fold.date <= accumulator.date);
    const later = pending.filter((fold) => fold.date > accumulator.date);

    let next = current.reduce((acc, fold) => fold.apply(acc), accumulator);
    if (later.length === 0) {
      return { accumulator: next, rolledDay: false };
    }

    const latest = later.reduce((a, b) => (b.at.getTime() > a.at.getTime() ? b : a));
    let rolledDay = false;
    try {
      const day = await this.rollover.rollDay(next, latest.at);
      next = day.accumulator;
      rolledDay = day.rolled;
      this.clearAlert('day-rollover');
    } catch (error) {
      const reason = describeError(error);
      console.error(`[CRITICAL] [MonitorEngine] Day rollover failed, ${later.length} contribution(s) dropped: ${reason}`);
      await this.raiseAlert('day-rollover', 'Day rollover failed, accumulation paused', reason);
      return { accumulator: next, rolledDay: false };
    }

    return { accumulator: later.reduce((acc, fold) => fold.apply(acc), next), rolledDay };
  }

  /**
   * Day rollover must finish before anything folds into the new day. When it
   * fails the pass still reconciles and alerts, but accumulates nothing.
   */
  private async rollOver(now: Date): Promise<{
    accumulator: DailyAccumulator;
    accumulate: boolean;
    rolledDay: boolean;
    rolledMonths: string[];
  }> {
    let accumulator = this.accumulator ?? createAccumulator(calendarDate(now, this.options.timeZone));
    let accumulate = true;
    let rolledDay = false;
    let rolledMonths: string[] = [];

    try {
      const day = await this.rollover.rollDay(accumulator, now);
      accumulator = day.accumulator;
      rolledDay = day.rolled;
      this.clearAlert('day-rollover');
    } catch (error) {
      accumulate = false;
      const reason = describeError(error);
      console.error(`[CRITICAL] [MonitorEngine] Day rollover failed, accumulation paused: ${reason}`);
      await this.raiseAlert('day-rollover', 'Day rollover failed, accumulation paused', reason);
    }

    if (accumulate) {
      try {
        const months = await this.rollover.rollMonths(this.scriptState, now);
        this.scriptState = months.scriptState;
        rolledMonths = months.rolledMonths;
      } catch (error) {
        console.error(`[MonitorEngine] Monthly rollover failed, retrying next pass: ${describeError(error)}`);
        // Months completed before the failure already moved the checkpoint on disk
        try {
          this.scriptState = await this.options.store.loadScriptState();
        } catch (reloadError) {
          console.error(`[MonitorEngine] Could not reload rollover checkpoint: ${describeError(reloadError)}`);
        }
      }
    }

    return { accumulator, accumulate, rolledDay, rolledMonths };
  }

  private async fetchDevice(device: DeviceDescriptor): Promise<FetchOutcome> {
    const controller = new AbortController();
    try {
      const reading = await withTimeout(
        this.options.reader.fetch(device, controller.signal),
        this.options.deviceTimeoutMs,
        `Poll of ${device.name}`,
        () => controller.abort()
      );
      return { device, ok: true, reading };
    } catch (error) {
      return { device, ok: false, reason: describeError(error) };
    }
  }

  private async persistDeviceState(state: PersistedDeviceState): Promise<boolean> {
    try {
      await this.options.store.saveDeviceState(state);
    } catch (error) {
      const reason = describeError(error);
      this.halted.add(state.device);
      console.error(`[CRITICAL] [MonitorEngine] State of ${state.device} not persisted, device halted: ${reason}`);
      await this.raiseAlert(`halted:${state.device}`, `${state.device} halted, state not persisted`, reason);
      return false;
    }

    this.deviceStates.set(state.device, state);
    if (this.halted.delete(state.device)) {
      console.log(`[MonitorEngine] State of ${state.device} persisted again, device resumed`);
      this.clearAlert(`halted:${state.device}`);
    }
    return true;
  }

  /**
   * Tell the operator about a problem once; the alert re-arms after the
   * problem clears. The cooldown key also rate limits a problem that flaps.
   */
  private async raiseAlert(key: string, summary: string, detail: string): Promise<void> {
    if (this.openAlerts.has(key)) return;
    this.openAlerts.add(key);

    const result = await this.options.notifier.notify(formatMonitorError(summary, detail), this.options.recipients, {
      kind: 'monitor_error',
      cooldownKey: `monitor:${key}`
    });
    if (!result.success) {
      console.error(`[MonitorEngine] Operator alert "${summary}" not delivered: ${result.error ?? 'unknown error'}`);
    }
  }

  private clearAlert(key: string): void {
    this.openAlerts.delete(key);
  }

  private recipientsFor(device: string): Set<string> {
    const descriptor = this.options.devices.find((entry) => entry.name === device);
    return new Set([...this.options.recipients, ...(descriptor?.recipients ?? [])]);
  }

  private async notify(events: SemanticEvent[]): Promise<void> {
    const interfaceChanges = new Map<string, InterfaceChangeEvent[]>();
    const breaches: ThresholdBreachEvent[] = [];

    for (const event of events) {
      if (event.type === 'threshold_breach') {
        breaches.push(event);
      } else {
        const list = interfaceChanges.get(event.device) ?? [];
        list.push(event);
        interfaceChanges.set(event.device, list);
      }
    }

    for (const [device, changes] of interfaceChanges) {
      const result = await this.options.notifier.notify(formatInterfaceChanges(device, changes), this.recipientsFor(device), {
        kind: 'interface_change',
        device
      });
      if (!result.success) {
        console.error(`[MonitorEngine] Interface change notification for ${device} failed: ${result.error ?? 'unknown error'}`);
      }
    }

    for (const breach of breaches) {
      const result = await this.options.notifier.notify(formatThresholdBreach(breach), this.recipientsFor(breach.device), {
        kind: 'threshold_breach',
        device: breach.device,
        cooldownKey: `${breach.device}:${breach.metric}`
      });
      if (!result.success) {
        console.error(`[MonitorEngine] Threshold notification for ${breach.device} failed: ${result.error ?? 'unknown error'}`);
      }
    }
  }
}
