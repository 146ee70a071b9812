/**
 * Device Registry
 *
 * Loads the device configuration file once at startup. Each entry is
 * validated on its own: an invalid entry is logged and skipped, the rest
 * load. An unreadable or malformed file is fatal.
 */

import { readFile } from 'node:fs/promises';
import {
  deviceDescriptorSchema,
  deviceRegistryFileSchema,
  type DeviceDescriptor
} from '@netpulse/shared';
import { ConfigError, describeError } from './monitorErrors';
import { deviceStorageKey } from './monitorStore';

export interface DeviceRegistry {
  readonly devices: ReadonlyArray<DeviceDescriptor>;
  readonly errors: ReadonlyArray<ConfigError>;
  get(name: string): DeviceDescriptor | undefined;
}

function entryLabel(entry: unknown, position: number): string {
  if (entry && typeof entry === 'object' && 'name' in entry && typeof entry.name === 'string' && entry.name.trim()) {
    return `"${entry.name.trim()}"`;
  }
  return `entry #${position + 1}`;
}

function freezeDescriptor(device: DeviceDescriptor): DeviceDescriptor {
  return Object.freeze({
    ...device,
    oids: Object.freeze({ ...device.oids }),
    thresholds: Object.freeze({ ...device.thresholds }),
    interfaces: Object.freeze(device.interfaces.map((iface) => Object.freeze({ ...iface }))),
    recipients: Object.freeze([...device.recipients])
  });
}

/**
 * Validate an already parsed configuration document.
 * Throws a ConfigError only when the document is not a list of devices.
 */
export function parseDeviceRegistry(json: unknown): DeviceRegistry {
  const file = deviceRegistryFileSchema.safeParse(json);
  if (!file.success) {
    throw new ConfigError('device file', ['expected a JSON array of devices']);
  }

  const devices: DeviceDescriptor[] = [];
  const errors: ConfigError[] = [];
  const names = new Set<string>();
  const storageKeys = new Map<string, string>();

  file.data.forEach((entry, position) => {
    const label = entryLabel(entry, position);
    const parsed = deviceDescriptorSchema.safeParse(entry);

    if (!parsed.success) {
      errors.push(new ConfigError(label, parsed.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })));
      return;
    }

    const device = parsed.data;
    if (names.has(device.name)) {
      errors.push(new ConfigError(label, [`duplicate device name "${device.name}"`]));
      return;
    }

    const storageKey = deviceStorageKey(device.name);
    const owner = storageKeys.get(storageKey);
    if (owner !== undefined) {
      errors.push(new ConfigError(label, [`stored under the same key "${storageKey}" as "${owner}"`]));
      return;
    }

    names.add(device.name);
    storageKeys.set(storageKey, device.name);
    devices.push(freezeDescriptor(device));
  });

  for (const error of errors) {
    console.error(`[DeviceRegistry] Skipping device: ${error.message}`);
  }

  const frozen = Object.freeze(devices);
  const byName = new Map(frozen.map((device): [string, DeviceDescriptor] => [device.name, device]));

  return Object.freeze({
    devices: frozen,
    errors: Object.freeze(errors),
    get: (name: string) => byName.get(name)
  });
}

export async function loadDeviceRegistry(path: string): Promise<DeviceRegistry> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(path, [`cannot read device file: ${describeError(error)}`]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(path, [`malformed JSON: ${describeError(error)}`]);
  }

  const registry = parseDeviceRegistry(json);
  console.log(`[DeviceRegistry] Loaded ${registry.devices.length} device(s) from ${path}`);
  if (registry.devices.length === 0) {
    console.warn('[DeviceRegistry] No valid devices configured; passes will be empty');
  }
  return registry;
}
