/**
 * Metric Reader
 *
 * Turns a device descriptor into the list of OIDs to GET and parses the
 * answers into a RawReading. Transport lives in the implementations
 * (see snmpGatewayReader.ts); parsing here is pure.
 */

import {
  IF_OPER_STATUS_UP,
  INTERFACE_OIDS,
  type DeviceDescriptor,
  type InterfaceReading,
  type OperStatus,
  type RawReading
} from '@netpulse/shared';

export interface MetricReader {
  /** Rejects with a TransportError when the device cannot be read at all */
  fetch(device: DeviceDescriptor, signal: AbortSignal): Promise<RawReading>;
}

export type OidRole =
  | { metric: 'cpu' }
  | { metric: 'ramUsed' }
  | { metric: 'ramTotal' }
  | { metric: 'ramAllocationUnits' }
  | { metric: 'operStatus'; index: number }
  | { metric: 'inOctets'; index: number }
  | { metric: 'outOctets'; index: number };

export interface OidPlan {
  oids: string[];
  roles: Map<string, OidRole>;
}

export interface OidResult {
  oid: string;
  value: string | number | null;
  error?: string;
}

export function buildOidPlan(device: DeviceDescriptor): OidPlan {
  const roles = new Map<string, OidRole>();

  roles.set(device.oids.cpu, { metric: 'cpu' });
  roles.set(device.oids.ramUsed, { metric: 'ramUsed' });
  roles.set(device.oids.ramTotal, { metric: 'ramTotal' });
  if (device.oids.ramAllocationUnits) {
    roles.set(device.oids.ramAllocationUnits, { metric: 'ramAllocationUnits' });
  }

  for (const iface of device.interfaces) {
    const wide = iface.counterWidth === 64;
    roles.set(`${INTERFACE_OIDS.operStatus}.${iface.index}`, { metric: 'operStatus', index: iface.index });
    roles.set(`${wide ? INTERFACE_OIDS.inOctets64 : INTERFACE_OIDS.inOctets32}.${iface.index}`, {
      metric: 'inOctets',
      index: iface.index
    });
    roles.set(`${wide ? INTERFACE_OIDS.outOctets64 : INTERFACE_OIDS.outOctets32}.${iface.index}`, {
      metric: 'outOctets',
      index: iface.index
    });
  }

  return { oids: [...roles.keys()], roles };
}

function parseNumber(value: string | number | null): number | null {
  if (value === null) return null;
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

function parseCounter(value: string | number | null): bigint | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? BigInt(value) : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return BigInt(value.trim());
  }
  return null;
}

function parseOperStatus(value: string | number | null): OperStatus | null {
  const parsed = parseNumber(value);
  if (parsed === null || !Number.isInteger(parsed)) return null;
  return parsed === IF_OPER_STATUS_UP ? 'up' : 'down';
}

/**
 * Parse gateway answers. OIDs that are missing, errored or unparsable are
 * listed in `missing`; the reading is still usable.
 */
export function buildRawReading(
  device: DeviceDescriptor,
  results: OidResult[],
  timestamp: string
): RawReading {
  const plan = buildOidPlan(device);
  const answers = new Map<string, string | number | null>();
  for (const result of results) {
    if (!result.error) answers.set(result.oid, result.value);
  }

  const missing: string[] = [];
  let cpuPercent: number | null = null;
  let ramUsed: number | null = null;
  let ramTotal: number | null = null;
  let allocationUnits: number | null = null;
  const interfaces: Record<number, InterfaceReading> = {};

  for (const iface of device.interfaces) {
    interfaces[iface.index] = { operStatus: 'unknown', inOctets: null, outOctets: null };
  }

  for (const [oid, role] of plan.roles) {
    const raw = answers.get(oid) ?? null;

    switch (role.metric) {
      case 'cpu':
        cpuPercent = parseNumber(raw);
        if (cpuPercent === null) missing.push(oid);
        break;
      case 'ramUsed':
        ramUsed = parseNumber(raw);
        if (ramUsed === null || ramUsed < 0) {
          ramUsed = null;
          missing.push(oid);
        }
        break;
      case 'ramTotal':
        ramTotal = parseNumber(raw);
        if (ramTotal === null || ramTotal < 0) {
          ramTotal = null;
          missing.push(oid);
        }
        break;
      case 'ramAllocationUnits':
        allocationUnits = parseNumber(raw);
        if (allocationUnits === null || allocationUnits <= 0) {
          allocationUnits = null;
          missing.push(oid);
        }
        break;
      case 'operStatus': {
        const status = parseOperStatus(raw);
        const reading = interfaces[role.index];
        if (status === null) missing.push(oid);
        else if (reading) reading.operStatus = status;
        break;
      }
      case 'inOctets':
      case 'outOctets': {
        const counter = parseCounter(raw);
        const reading = interfaces[role.index];
        if (counter === null) missing.push(oid);
        else if (reading && role.metric === 'inOctets') reading.inOctets = counter;
        else if (reading) reading.outOctets = counter;
        break;
      }
    }
  }

  // Units cancel out in the percentage; a missing units answer only affects the byte values
  const units = allocationUnits ?? 1;

  return {
    device: device.name,
    timestamp,
    cpuPercent,
    ram: ramUsed !== null && ramTotal !== null ? { usedBytes: ramUsed * units, totalBytes: ramTotal * units } : null,
    interfaces,
    missing
  };
}
