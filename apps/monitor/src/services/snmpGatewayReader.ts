/**
 * SNMP Gateway Reader
 *
 * Reads devices through an HTTP gateway that speaks SNMP on the wire.
 * One POST per device with every OID of the poll plan.
 */

import { z } from 'zod';
import type { DeviceDescriptor, RawReading } from '@netpulse/shared';
import { buildOidPlan, buildRawReading, type MetricReader } from './metricReader';
import { TransportError, describeError } from './monitorErrors';

export interface SnmpGatewayConfig {
  baseUrl: string;
  token?: string;
  now?: () => Date;
}

const gatewayResponseSchema = z.object({
  results: z.array(
    z.object({
      oid: z.string(),
      value: z.union([z.string(), z.number(), z.null()]),
      error: z.string().optional()
    })
  )
});

/**
 * Build the gateway request body for a device.
 */
export function buildSnmpGetCommand(device: DeviceDescriptor, oids: string[]) {
  return {
    target: device.address,
    port: device.port,
    version: device.snmpVersion,
    community: device.community,
    oids
  };
}

export class SnmpGatewayReader implements MetricReader {
  private readonly endpoint: string;
  private readonly now: () => Date;

  constructor(private readonly config: SnmpGatewayConfig) {
    this.endpoint = `${config.baseUrl.replace(/\/+$/, '')}/snmp/get`;
    this.now = config.now ?? (() => new Date());
  }

  async fetch(device: DeviceDescriptor, signal: AbortSignal): Promise<RawReading> {
    const plan = buildOidPlan(device);
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.token) {
      headers['Authorization'] = `Bearer ${this.config.token}`;
    }

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers,
        body: JSON.stringify(buildSnmpGetCommand(device, plan.oids)),
        signal
      });
    } catch (error) {
      const reason = error instanceof Error && error.name === 'AbortError' ? 'request aborted' : describeError(error);
      throw new TransportError(device.name, reason, { cause: error });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new TransportError(device.name, `gateway returned HTTP ${response.status}${text ? `: ${text.substring(0, 200)}` : ''}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TransportError(device.name, 'gateway returned invalid JSON', { cause: error });
    }

    const parsed = gatewayResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(device.name, `unexpected gateway response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }

    const answered = parsed.data.results.filter((result) => !result.error && result.value !== null);
    if (answered.length === 0) {
      throw new TransportError(device.name, 'no OIDs answered');
    }

    const reading = buildRawReading(device, parsed.data.results, this.now().toISOString());
    if (reading.missing.length > 0) {
      console.warn(`[SnmpGatewayReader] ${device.name}: ${reading.missing.length} OID(s) missing or unparsable`);
    }
    return reading;
  }
}
