/**
 * File-backed persistence for the monitor.
 *
 * Layout under the data directory:
 *   state/devices/<device>.json        last reconciled state per device
 *   state/accumulator.json             running totals of the current day
 *   state/script-state.json           monthly rollover checkpoint
 *   records/<device>/<YYYY-MM>/daily.jsonl    finalized days, append-only
 *   records/<device>/<YYYY-MM>/monthly.json   monthly summary
 *   archive/<device>/<YYYY-MM>.json.gz         compacted month
 *
 * Whole-file writes go to a temp file first and are renamed into place so the
 * query API never observes a partially written file.
 */

import { appendFile, mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { gunzipSync, gzipSync } from 'node:zlib';
import { nanoid } from 'nanoid';
import type { z } from 'zod';
import type {
  DailyAccumulator,
  DailyRecord,
  MonthlyRecord,
  PersistedDeviceState,
  ScriptState
} from '@netpulse/shared';
import { PersistenceError, describeError } from './monitorErrors';
import {
  dailyAccumulatorSchema,
  dailyRecordSchema,
  monthArchiveSchema,
  monthlyRecordSchema,
  persistedDeviceStateSchema,
  scriptStateSchema,
  type MonthArchive
} from './persistedSchemas';
import { sleep } from '../utils/concurrency';
import { monthOfDate } from '../utils/calendar';

export type ArchiveOutcome = 'archived' | 'already_archived' | 'nothing_to_archive';

export interface MonitorStore {
  loadDeviceState(device: string): Promise<PersistedDeviceState | null>;
  saveDeviceState(state: PersistedDeviceState): Promise<void>;
  loadAccumulator(): Promise<DailyAccumulator | null>;
  saveAccumulator(accumulator: DailyAccumulator): Promise<void>;
  loadScriptState(): Promise<ScriptState | null>;
  saveScriptState(state: ScriptState): Promise<void>;
  /** Returns false when a record for the same device and date already exists */
  appendDailyRecord(record: DailyRecord): Promise<boolean>;
  readDailyRecords(device: string, month: string): Promise<DailyRecord[]>;
  writeMonthlyRecord(record: MonthlyRecord): Promise<void>;
  readMonthlyRecord(device: string, month: string): Promise<MonthlyRecord | null>;
  archiveMonth(device: string, month: string): Promise<ArchiveOutcome>;
}

/** File-system safe directory name for a device */
export function deviceStorageKey(device: string): string {
  return device.trim().replace(/[^A-Za-z0-9._-]+/g, '_');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isMissingFile(error)) return false;
    throw error;
  }
}

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
}

/**
 * Retry a write with exponential backoff; the final failure surfaces as a PersistenceError.
 */
export async function withPersistenceRetry<T>(
  operation: string,
  path: string,
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = options.attempts ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 200;
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      console.error(`[FileMonitorStore] ${operation} failed (attempt ${attempt + 1}/${attempts}): ${describeError(error)}`);
      if (attempt < attempts - 1) {
        await sleep(baseDelayMs * 2 ** attempt);
      }
    }
  }

  throw new PersistenceError(operation, path, { cause: lastError });
}

export class FileMonitorStore implements MonitorStore {
  constructor(
    private readonly dataDir: string,
    private readonly retry: RetryOptions = {}
  ) {}

  // --- Paths ---

  private deviceStatePath(device: string): string {
    return join(this.dataDir, 'state', 'devices', `${deviceStorageKey(device)}.json`);
  }

  private get accumulatorPath(): string {
    return join(this.dataDir, 'state', 'accumulator.json');
  }

  private get scriptStatePath(): string {
    return join(this.dataDir, 'state', 'script-state.json');
  }

  private monthDir(device: string, month: string): string {
    return join(this.dataDir, 'records', deviceStorageKey(device), month);
  }

  private dailyPath(device: string, month: string): string {
    return join(this.monthDir(device, month), 'daily.jsonl');
  }

  private monthlyPath(device: string, month: string): string {
    return join(this.monthDir(device, month), 'monthly.json');
  }

  private archivePath(device: string, month: string): string {
    return join(this.dataDir, 'archive', deviceStorageKey(device), `${month}.json.gz`);
  }

  // --- Primitives ---

  private async writeAtomic(path: string, contents: string | Buffer): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const tempPath = `${path}.${nanoid(8)}.tmp`;
    try {
      await writeFile(tempPath, contents);
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  private async writeJson(operation: string, path: string, value: unknown): Promise<void> {
    await withPersistenceRetry(operation, path, () => this.writeAtomic(path, `${JSON.stringify(value, null, 2)}\n`), this.retry);
  }

  /**
   * Null only when the file does not exist. A file that is there but cannot be
   * parsed is an error: treating it as missing would reset the state it holds.
   */
  private async readJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new PersistenceError('read', path, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      console.error(`[FileMonitorStore] Unreadable JSON in ${path}: ${describeError(error)}`);
      throw new PersistenceError('parse', path, { cause: error });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      console.error(`[FileMonitorStore] Unexpected shape in ${path}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
      throw new PersistenceError('parse', path, { cause: parsed.error });
    }
    return parsed.data;
  }

  private async readJsonLines(path: string): Promise<DailyRecord[] | null> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new PersistenceError('read', path, { cause: error });
    }

    const records: DailyRecord[] = [];
    raw.split('\n').forEach((line, index) => {
      if (!line.trim()) return;
      try {
        const parsed = dailyRecordSchema.safeParse(JSON.parse(line));
        if (parsed.success) {
          records.push(parsed.data);
        } else {
          console.error(`[FileMonitorStore] Skipping invalid record at ${path}:${index + 1}`);
        }
      } catch (error) {
        console.error(`[FileMonitorStore] Skipping unreadable line ${path}:${index + 1}: ${describeError(error)}`);
      }
    });
    return records;
  }

  private async readArchive(device: string, month: string): Promise<MonthArchive | null> {
    const path = this.archivePath(device, month);
    let compressed: Buffer;
    try {
      compressed = await readFile(path);
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new PersistenceError('read', path, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(gunzipSync(compressed).toString('utf8'));
    } catch (error) {
      throw new PersistenceError('parse', path, { cause: error });
    }

    const parsed = monthArchiveSchema.safeParse(json);
    if (!parsed.success) {
      console.error(`[FileMonitorStore] Archive ${path} has an unexpected shape`);
      throw new PersistenceError('parse', path, { cause: parsed.error });
    }
    return parsed.data;
  }

  // --- Device state ---

  async loadDeviceState(device: string): Promise<PersistedDeviceState | null> {
    return this.readJson(this.deviceStatePath(device), persistedDeviceStateSchema);
  }

  async saveDeviceState(state: PersistedDeviceState): Promise<void> {
    await this.writeJson('save device state', this.deviceStatePath(state.device), state);
  }

  // --- Accumulator and checkpoint ---

  async loadAccumulator(): Promise<DailyAccumulator | null> {
    return this.readJson(this.accumulatorPath, dailyAccumulatorSchema);
  }

  async saveAccumulator(accumulator: DailyAccumulator): Promise<void> {
    await this.writeJson('save accumulator', this.accumulatorPath, accumulator);
  }

  async loadScriptState(): Promise<ScriptState | null> {
    return this.readJson(this.scriptStatePath, scriptStateSchema);
  }

  async saveScriptState(state: ScriptState): Promise<void> {
    await this.writeJson('save script state', this.scriptStatePath, state);
  }

  // --- Records ---

  async appendDailyRecord(record: DailyRecord): Promise<boolean> {
    const month = monthOfDate(record.date);
    const path = this.dailyPath(record.device, month);
    const existing = await this.readDailyRecords(record.device, month);

    if (existing.some((entry) => entry.date === record.date)) {
      console.warn(`[FileMonitorStore] Daily record ${record.device}/${record.date} already stored, skipping`);
      return false;
    }

    await withPersistenceRetry('append daily record', path, async () => {
      await mkdir(dirname(path), { recursive: true });
      await appendFile(path, `${JSON.stringify(record)}\n`, 'utf8');
    }, this.retry);
    return true;
  }

  async readDailyRecords(device: string, month: string): Promise<DailyRecord[]> {
    const live = await this.readJsonLines(this.dailyPath(device, month));
    if (live) return live;
    const archived = await this.readArchive(device, month);
    return archived?.daily ?? [];
  }

  async writeMonthlyRecord(record: MonthlyRecord): Promise<void> {
    await this.writeJson('write monthly record', this.monthlyPath(record.device, record.month), record);
  }

  async readMonthlyRecord(device: string, month: string): Promise<MonthlyRecord | null> {
    const live = await this.readJson(this.monthlyPath(device, month), monthlyRecordSchema);
    if (live) return live;
    const archived = await this.readArchive(device, month);
    return archived?.monthly ?? null;
  }

  /**
   * Compact a month into a single gzip file and remove the source directory.
   * Safe to repeat after a crash: an archived month is left alone.
   */
  async archiveMonth(device: string, month: string): Promise<ArchiveOutcome> {
    const sourceDir = this.monthDir(device, month);
    const target = this.archivePath(device, month);

    if (!(await pathExists(sourceDir))) {
      return (await pathExists(target)) ? 'already_archived' : 'nothing_to_archive';
    }

    const archive: MonthArchive = {
      device,
      month,
      monthly: await this.readJson(this.monthlyPath(device, month), monthlyRecordSchema),
      daily: (await this.readJsonLines(this.dailyPath(device, month))) ?? []
    };

    await withPersistenceRetry('archive month', target, async () => {
      await this.writeAtomic(target, gzipSync(JSON.stringify(archive)));
      await rm(sourceDir, { recursive: true, force: true });
    }, this.retry);

    console.log(`[FileMonitorStore] Archived ${device} ${month} to ${target}`);
    return 'archived';
  }
}
